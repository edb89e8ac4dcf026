import chalk from "chalk";
import fs from "node:fs/promises";
import path from "node:path";
import {
	buildRunArgs,
	type ContainerRuntime,
	DEFAULT_DOCKER_IMAGE,
	DockerRuntime,
} from "../docker/docker";
import { AssessError } from "../errors";
import { getFilesInFolder, isDirEmpty, modelsFor, pathExists } from "../utils";

export const SAMPLE_IMAGE_DIR = "sample_images";
export const CUSTOM_IMAGE_DIR = "my_images";

/** Weight files as the container sees them under /models */
export const WEIGHTS: Readonly<Record<ModelType, string>> = {
	aesthetic: "/models/weights_mobilenet_aesthetic_0.07.hdf5",
	technical: "/models/weights_mobilenet_technical_0.11.hdf5",
};

export type AssessConfig = {
	resultsDir?: string;
	modelsDir?: string;
	scriptPath?: string;
	dockerImage?: string;
	dockerBin?: string;
};

let ASSESS_CONFIG: Required<AssessConfig> = {
	resultsDir: "results",
	modelsDir: "models/MobileNet",
	scriptPath: "predict_script.py",
	dockerImage: DEFAULT_DOCKER_IMAGE,
	dockerBin: "docker",
};

export function setAssessConfig(cfg: AssessConfig) {
	ASSESS_CONFIG = { ...ASSESS_CONFIG, ...cfg };
}

export function getAssessConfig(): Readonly<Required<AssessConfig>> {
	return ASSESS_CONFIG;
}

export type AssessOptions = AssessConfig & {
	model?: ModelSelection;
	/** Evaluate my_images instead of sample_images */
	custom?: boolean;
	/** Explicit image directory, wins over `custom` */
	imageDir?: string;
	/** Base for every relative path, defaults to process.cwd() */
	cwd?: string;
	runtime?: ContainerRuntime;
};

export type AssessedImage = { image: string; modelType: ModelType };

export type AssessOutcome = {
	imageDir: string;
	processed: AssessedImage[];
	/** Uncoloured console output plus container stdout, in order */
	transcript: string;
};

type ModelFlags = {
	aesthetic?: boolean;
	technical?: boolean;
	both?: boolean;
};

/** Maps the mutually exclusive model flags to a selection, aesthetic by default. */
export function selectModel(flags: ModelFlags): ModelSelection {
	const picked = (["aesthetic", "technical", "both"] as const).filter(
		(k) => flags[k],
	);
	if (picked.length > 1) {
		throw new AssessError(
			`Choose only one of --aesthetic, --technical or --both (got ${picked
				.map((p) => `--${p}`)
				.join(", ")})`,
		);
	}
	return picked[0] ?? "aesthetic";
}

export async function assessImages(
	opts: AssessOptions = {},
): Promise<AssessOutcome> {
	const o = { ...ASSESS_CONFIG, ...opts };
	const cwd = path.resolve(opts.cwd ?? process.cwd());
	const resolve = (p: string) => path.resolve(cwd, p);
	const selection = opts.model ?? "aesthetic";
	const imageDirName =
		opts.imageDir ?? (opts.custom ? CUSTOM_IMAGE_DIR : SAMPLE_IMAGE_DIR);
	const imageDir = resolve(imageDirName);
	const runtime = opts.runtime ?? new DockerRuntime(o.dockerBin);

	const transcript: string[] = [];
	const say = (line: string, color: (text: string) => string = (t) => t) => {
		console.log(color(line));
		transcript.push(line);
	};

	say("===== Image Quality Assessment Tool =====", chalk.bold);

	if (!(await runtime.isAvailable())) {
		throw new AssessError(
			"Error: Docker is not installed or not in PATH. Please install Docker first.",
		);
	}

	if (await isDirEmpty(imageDir)) {
		throw new AssessError(
			imageDirName === SAMPLE_IMAGE_DIR
				? "Error: No sample images found. Please run 'setup' to download sample images."
				: `Error: No images found in ${imageDirName} directory. Please add your images there.`,
		);
	}

	const scriptPath = resolve(o.scriptPath);
	if (!(await pathExists(scriptPath))) {
		throw new AssessError(
			`Error: Prediction script not found at ${scriptPath}. Please run 'setup' first.`,
		);
	}

	const resultsDir = resolve(o.resultsDir);
	await fs.mkdir(resultsDir, { recursive: true });

	const images = await getFilesInFolder(imageDir);
	const processed: AssessedImage[] = [];

	for (const modelType of modelsFor(selection)) {
		say("");
		say(
			`===== Evaluating ${modelType.toUpperCase()} quality of images in ${imageDirName} =====`,
			chalk.cyan.bold,
		);

		for (const img of images) {
			const imageName = path.basename(img);
			say("");
			say(`Evaluating: ${imageName}`, chalk.yellow);

			const { stdout } = await runtime.run(
				buildRunArgs({
					imageDir,
					modelsDir: resolve(o.modelsDir),
					resultsDir,
					scriptPath,
					dockerImage: o.dockerImage,
					imageName,
					weightsFile: WEIGHTS[modelType],
					modelType,
				}),
			);
			transcript.push(...stdout.split(/\r?\n/));
			processed.push({ image: imageName, modelType });
		}
	}

	say("");
	say("===== Assessment completed! =====", chalk.green.bold);
	console.log(
		`Results have been displayed above and saved to the '${o.resultsDir}' directory.`,
	);
	console.log(
		chalk.dim(
			[
				"You can run with different options to evaluate aesthetic or technical quality:",
				"  assess --aesthetic  : Aesthetic quality only",
				"  assess --technical  : Technical quality only",
				"  assess --both       : Both aesthetic and technical quality",
				"  assess --custom     : Assess your own images in my_images directory",
			].join("\n"),
		),
	);

	return { imageDir, processed, transcript: transcript.join("\n") };
}
