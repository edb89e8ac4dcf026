import chalk from "chalk";
import fs from "node:fs/promises";
import path from "node:path";
import {
	assessImages,
	CUSTOM_IMAGE_DIR,
	getAssessConfig,
	SAMPLE_IMAGE_DIR,
} from "../assess/assess";
import type { ContainerRuntime } from "../docker/docker";
import { hasResults } from "../results/results";
import type { Fetcher } from "../setup/download";
import { runSetup } from "../setup/setup";
import { visualizeResults } from "../visualize/visualize";

export type RunOptions = {
	imageDir?: string;
	modelType?: ModelSelection;
	/** Download models and samples first */
	setup?: boolean;
	skipVisualization?: boolean;
	cwd?: string;
	runtime?: ContainerRuntime;
	fetcher?: Fetcher;
};

/** Which steps ran, in order */
export type RunReport = Step[];

/** Setup (optional), assessment and visualization in one go. */
export async function runPipeline(opts: RunOptions = {}): Promise<RunReport> {
	const cwd = path.resolve(opts.cwd ?? process.cwd());
	const imageDir = opts.imageDir ?? SAMPLE_IMAGE_DIR;
	const modelType = opts.modelType ?? "both";
	const resultsDir = path.resolve(cwd, getAssessConfig().resultsDir);
	const ran: RunReport = [];

	if (opts.setup) {
		console.log("Running setup...");
		await runSetup({ cwd, fetcher: opts.fetcher });
		ran.push("setup");
	} else {
		console.log("⚠️ Skipping: setup");
	}

	for (const dir of [SAMPLE_IMAGE_DIR, CUSTOM_IMAGE_DIR]) {
		await fs.mkdir(path.join(cwd, dir), { recursive: true });
	}
	await fs.mkdir(resultsDir, { recursive: true });

	console.log(`Running assessment for ${modelType} model(s) on images in ${imageDir}...`);
	await assessImages({ cwd, imageDir, model: modelType, runtime: opts.runtime });
	ran.push("assess");

	if (!(await hasResults(resultsDir))) {
		console.warn(
			chalk.yellow(
				"⚠️ No result files were generated. The assessment may have failed.",
			),
		);
	}

	if (opts.skipVisualization) {
		console.log("⚠️ Skipping: visualize");
	} else {
		console.log("\nRunning visualization...");
		try {
			await visualizeResults({
				imageDir: path.resolve(cwd, imageDir),
				resultsDir,
				modelType,
			});
			ran.push("visualize");
		} catch (err) {
			console.error(
				chalk.red(
					`Error running visualization: ${err instanceof Error ? err.message : String(err)}`,
				),
			);
		}
	}

	console.log(chalk.green.bold("\nAll tasks completed!"));
	console.log(`You can find the detailed results in '${resultsDir}'.`);
	return ran;
}
