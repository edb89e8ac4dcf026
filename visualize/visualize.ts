import chalk from "chalk";
import fs from "node:fs/promises";
import path from "node:path";
import sharp, { type OverlayOptions } from "sharp";
import bar from "../bar";
import { AssessError } from "../errors";
import { loadResults } from "../results/results";
import { meanScore, overallScore } from "../results/stats";
import { MODEL_TYPES, pathExists } from "../utils";
import { escapeXml, renderDistributionSvg } from "./chart";

const CANVAS = { width: 1200, height: 800 };
const PHOTO_PANEL = { width: 780, top: 56, bottom: 84 };

const MODEL_STYLE: Readonly<Record<ModelType, { title: string; color: string }>> = {
	aesthetic: { title: "Aesthetic Scores", color: "blue" },
	technical: { title: "Technical Scores", color: "green" },
};

/** Caption under the photo: overall score when both models ran */
export function scoreCaption(scores: ImageScores): string {
	if (scores.aesthetic && scores.technical) {
		return `Overall Score: ${overallScore(scores.aesthetic, scores.technical).toFixed(2)}/10`;
	}
	if (scores.aesthetic) {
		return `Aesthetic Score: ${meanScore(scores.aesthetic).toFixed(2)}/10`;
	}
	if (scores.technical) {
		return `Technical Score: ${meanScore(scores.technical).toFixed(2)}/10`;
	}
	throw new Error("No scores to caption");
}

function labelsSvg(imageName: string, caption: string): string {
	const cx = PHOTO_PANEL.width / 2;
	const cy = CANVAS.height - PHOTO_PANEL.bottom / 2;
	const boxW = Math.max(240, caption.length * 10 + 40);
	return [
		`<svg xmlns="http://www.w3.org/2000/svg" width="${PHOTO_PANEL.width}" height="${CANVAS.height}" font-family="sans-serif">`,
		`<text x="${cx}" y="34" font-size="18" text-anchor="middle">${escapeXml(imageName)}</text>`,
		`<rect x="${cx - boxW / 2}" y="${cy - 20}" width="${boxW}" height="40" rx="10" fill="#fff" fill-opacity="0.8" stroke="#999"/>`,
		`<text x="${cx}" y="${cy + 7}" font-size="20" text-anchor="middle">${escapeXml(caption)}</text>`,
		"</svg>",
	].join("\n");
}

/** Renders `<stem>_scores.png`: photo left, one chart per model right. */
export async function renderVisualization(
	imagePath: string,
	scores: ImageScores,
	outputDir: string,
): Promise<string> {
	const imageName = path.basename(imagePath);
	const caption = scoreCaption(scores);

	const boxW = PHOTO_PANEL.width - 40;
	const boxH = CANVAS.height - PHOTO_PANEL.top - PHOTO_PANEL.bottom;
	const { data: photo, info } = await sharp(imagePath, { failOn: "none" })
		.rotate()
		.resize(boxW, boxH, { fit: "inside" })
		.png()
		.toBuffer({ resolveWithObject: true });

	const layers: OverlayOptions[] = [
		{
			input: photo,
			left: Math.round((PHOTO_PANEL.width - info.width) / 2),
			top: PHOTO_PANEL.top + Math.round((boxH - info.height) / 2),
		},
		{ input: Buffer.from(labelsSvg(imageName, caption)), left: 0, top: 0 },
	];

	const charts = MODEL_TYPES.filter((m) => scores[m]);
	const chartW = CANVAS.width - PHOTO_PANEL.width;
	const chartH = Math.floor(CANVAS.height / charts.length);
	charts.forEach((modelType, i) => {
		const distribution = scores[modelType];
		if (!distribution) return;
		const svg = renderDistributionSvg(distribution, {
			...MODEL_STYLE[modelType],
			width: chartW,
			height: chartH,
		});
		layers.push({
			input: Buffer.from(svg),
			left: PHOTO_PANEL.width,
			top: i * chartH,
		});
	});

	await fs.mkdir(outputDir, { recursive: true });
	const outputFile = path.join(outputDir, `${path.parse(imageName).name}_scores.png`);
	await sharp({
		create: {
			width: CANVAS.width,
			height: CANVAS.height,
			channels: 3,
			background: "#ffffff",
		},
	})
		.composite(layers)
		.png()
		.toFile(outputFile);

	return outputFile;
}

export type VisualizeOptions = {
	imageDir?: string;
	resultsDir?: string;
	modelType?: ModelSelection;
};

/** Renders a chart for every image that has results; returns the PNG paths. */
export async function visualizeResults(opts: VisualizeOptions = {}): Promise<string[]> {
	const imageDir = path.resolve(opts.imageDir ?? "sample_images");
	const resultsDir = path.resolve(opts.resultsDir ?? "results");
	const modelType = opts.modelType ?? "both";

	await fs.mkdir(resultsDir, { recursive: true });
	const results = await loadResults(resultsDir, modelType);
	if (results.size === 0) {
		throw new AssessError(
			`No results found in '${resultsDir}' for model type '${modelType}'.\nPlease run the assessment first to generate results.`,
		);
	}

	if (!(await pathExists(imageDir))) {
		throw new AssessError(`Error: Directory '${imageDir}' does not exist.`);
	}

	const written: string[] = [];
	const b = bar.start(0, results.size, { task: "Rendering charts" });
	try {
		for (const [imageName, scores] of results) {
			const imagePath = path.join(imageDir, imageName);
			if (!(await pathExists(imagePath))) {
				console.warn(
					chalk.yellow(
						`⚠️ Image file '${imagePath}' not found, skipping visualization.`,
					),
				);
				b.increment();
				continue;
			}

			b.increment(0, { detail: imageName });
			written.push(await renderVisualization(imagePath, scores, resultsDir));
			b.increment();
		}
		b.complete();
	} finally {
		b.stop();
	}

	for (const file of written) {
		console.log(`Saved visualization to ${file}`);
	}
	console.log(
		`\nVisualization complete! Check the '${path.relative(process.cwd(), resultsDir) || "."}' directory for output images.`,
	);
	return written;
}
