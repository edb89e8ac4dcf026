import chalk from "chalk";
import fs from "node:fs/promises";
import path from "node:path";
import { type AssessOptions, assessImages, getAssessConfig } from "../assess/assess";
import { AssessError } from "../errors";
import { visualizeResults } from "../visualize/visualize";
import { BUCKETS } from "./stats";

const MODEL_PATTERN = /===== Evaluating (\w+) quality/;
const IMAGE_PATTERN = /Evaluating: ([\w.-]+)/;
const SCORE_PATTERN = /Predicted score distribution: \[([\d.\s,eE+-]+)\]/;

function asModelType(value: string): ModelType | null {
	const v = value.toLowerCase();
	return v === "aesthetic" || v === "technical" ? v : null;
}

/**
 * Rebuilds score distributions from an assessment transcript. A distribution
 * belongs to the most recent model header and the most recent image line.
 */
export function parseAssessmentOutput(text: string): ScoresByImage {
	const results: ScoresByImage = new Map();
	let currentModel: ModelType | null = null;
	let currentImage: string | null = null;

	for (const line of text.split(/\r?\n/)) {
		const model = MODEL_PATTERN.exec(line);
		if (model?.[1]) {
			currentModel = asModelType(model[1]);
			continue;
		}

		const image = IMAGE_PATTERN.exec(line);
		if (image?.[1]) {
			currentImage = image[1];
			continue;
		}

		const score = SCORE_PATTERN.exec(line);
		if (score?.[1] && currentImage && currentModel) {
			const scores = score[1].split(",").map((s) => Number.parseFloat(s.trim()));
			if (scores.length !== BUCKETS || scores.some(Number.isNaN)) continue;
			const entry = results.get(currentImage) ?? {};
			entry[currentModel] = scores;
			results.set(currentImage, entry);
		}
	}

	return results;
}

/** Writes `<stem>_scores.json` per image; returns the written paths. */
export async function saveParsedScores(
	results: ScoresByImage,
	outputDir: string,
): Promise<string[]> {
	await fs.mkdir(outputDir, { recursive: true });
	const written: string[] = [];
	for (const [image, models] of results) {
		const outputFile = path.join(outputDir, `${path.parse(image).name}_scores.json`);
		await fs.writeFile(outputFile, JSON.stringify(models, null, 2));
		console.log(`Saved results for ${image} to ${outputFile}`);
		written.push(outputFile);
	}
	return written;
}

export type ParseOptions = Pick<AssessOptions, "cwd" | "runtime"> & {
	imageDir?: string;
	modelType?: ModelSelection;
};

/** Assess, scrape the transcript into per-image summaries, then visualize. */
export async function parseResults(opts: ParseOptions = {}): Promise<ScoresByImage> {
	const cwd = path.resolve(opts.cwd ?? process.cwd());
	const imageDir = opts.imageDir ?? "sample_images";
	const modelType = opts.modelType ?? "both";
	const resultsDir = path.resolve(cwd, getAssessConfig().resultsDir);

	console.log(
		chalk.bold(`Running assessment for ${modelType} model(s) on images in ${imageDir}...`),
	);
	const { transcript } = await assessImages({
		cwd,
		imageDir,
		model: modelType,
		runtime: opts.runtime,
	});

	console.log("Parsing results...");
	const results = parseAssessmentOutput(transcript);
	if (results.size === 0) {
		throw new AssessError("No results found. Check if the assessment ran correctly.");
	}

	console.log(`Found results for ${results.size} image(s).`);
	await saveParsedScores(results, resultsDir);

	console.log("\nNow running visualization...");
	await visualizeResults({
		imageDir: path.resolve(cwd, imageDir),
		resultsDir,
		modelType,
	});

	return results;
}
