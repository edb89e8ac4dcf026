import chalk from "chalk";
import fs from "node:fs/promises";
import path from "node:path";
import { fileURLToPath } from "node:url";
import { CUSTOM_IMAGE_DIR, getAssessConfig, SAMPLE_IMAGE_DIR } from "../assess/assess";
import bar from "../bar";
import { isDirEmpty, isNonEmptyFile } from "../utils";
import { downloadFile, type Fetcher } from "./download";
import sources from "./sources.json";

const PREDICT_ASSETS = ["predict_script.py", "tensorflow_requirements.txt"];

function assetPath(name: string): string {
	return fileURLToPath(new URL(`../predict/${name}`, import.meta.url));
}

export type SetupOptions = {
	cwd?: string;
	/** Defaults to the assess config's models directory */
	modelsDir?: string;
	fetcher?: Fetcher;
};

export type SetupReport = {
	samplesDownloaded: string[];
	weightsDownloaded: string[];
	/** Weight files still absent or empty after every source was tried */
	missingWeights: string[];
};

async function tryDownload(fetcher: Fetcher, url: string, dest: string): Promise<boolean> {
	try {
		await fetcher(url, dest);
	} catch (err) {
		console.warn(
			chalk.yellow(
				`⚠️ Download failed (${url}): ${err instanceof Error ? err.message : String(err)}`,
			),
		);
		// a broken stream leaves a truncated file that would pass as downloaded
		await fs.rm(dest, { force: true });
		return false;
	}
	return isNonEmptyFile(dest);
}

/**
 * Prepares a workspace: image folders, sample photos, model weights and the
 * prediction script mounted into the container.
 */
export async function runSetup(opts: SetupOptions = {}): Promise<SetupReport> {
	const cwd = path.resolve(opts.cwd ?? process.cwd());
	const fetcher = opts.fetcher ?? downloadFile;
	const report: SetupReport = {
		samplesDownloaded: [],
		weightsDownloaded: [],
		missingWeights: [],
	};

	console.log(chalk.bold("===== Setting up Image Quality Assessment Tool ====="));

	const sampleDir = path.join(cwd, SAMPLE_IMAGE_DIR);
	const modelsDirName = opts.modelsDir ?? getAssessConfig().modelsDir;
	const modelsDir = path.resolve(cwd, modelsDirName);
	for (const dir of [sampleDir, path.join(cwd, CUSTOM_IMAGE_DIR), modelsDir]) {
		await fs.mkdir(dir, { recursive: true });
	}

	if (await isDirEmpty(sampleDir)) {
		const b = bar.start(0, sources.samples.length, {
			task: "Downloading sample images",
		});
		try {
			for (const sample of sources.samples) {
				b.increment(0, { detail: sample.file });
				await fetcher(sample.url, path.join(sampleDir, sample.file));
				report.samplesDownloaded.push(sample.file);
				b.increment();
			}
			b.complete();
		} finally {
			b.stop();
		}
	} else {
		console.log("⚠️ Skipping: sample images already present");
	}

	console.log("Downloading model weights...");
	for (const weight of sources.weights) {
		const dest = path.join(modelsDir, weight.file);
		if (await isNonEmptyFile(dest)) continue;
		console.log(`Downloading ${weight.file}...`);
		if (await tryDownload(fetcher, weight.url, dest)) {
			report.weightsDownloaded.push(weight.file);
		}
	}

	const missing: typeof sources.weights = [];
	for (const weight of sources.weights) {
		if (!(await isNonEmptyFile(path.join(modelsDir, weight.file)))) missing.push(weight);
	}

	if (missing.length > 0) {
		console.error(
			chalk.red("Error: Failed to download model weights. Trying the mirror..."),
		);
		for (const weight of missing) {
			const dest = path.join(modelsDir, weight.file);
			if (await tryDownload(fetcher, weight.mirror, dest)) {
				report.weightsDownloaded.push(weight.file);
			} else {
				report.missingWeights.push(weight.file);
			}
		}
	}

	if (report.missingWeights.length > 0) {
		console.error(
			chalk.red(
				[
					"Error: Still failed to download model weights. Please download them manually from:",
					sources.manualDownload,
					`and place them in the ${modelsDirName} directory.`,
				].join("\n"),
			),
		);
	}

	for (const asset of PREDICT_ASSETS) {
		await fs.copyFile(assetPath(asset), path.join(cwd, asset));
	}

	console.log(chalk.green.bold("===== Setup completed! ====="));
	console.log("You can now run 'assess' to evaluate sample images.");
	return report;
}
