import chalk from "chalk";
import { hideBin } from "yargs/helpers";
import yargs from "yargs/yargs";
import { assessImages, selectModel, setAssessConfig } from "./assess/assess";
import { AssessError, exitCodeOf } from "./errors";
import { parseResults } from "./results/parse";
import { runPipeline } from "./run/run";
import { runSetup } from "./setup/setup";
import { visualizeResults } from "./visualize/visualize";

const MODEL_CHOICES = ["aesthetic", "technical", "both"] as const;

async function main() {
	await yargs(hideBin(process.argv))
		.scriptName("nima-assess")
		.option("results-dir", {
			type: "string",
			default: "results",
			describe: "Where result JSON and charts are written",
		})
		.option("models-dir", {
			type: "string",
			default: "models/MobileNet",
			describe: "Host directory holding the .hdf5 weight files",
		})
		.option("docker-image", {
			type: "string",
			default: "tensorflow/tensorflow:2.9.1",
			describe: "Image the prediction script runs in",
		})
		.option("docker-bin", {
			type: "string",
			default: "docker",
			describe: "Container CLI to invoke",
		})
		.middleware((argv) => {
			setAssessConfig({
				resultsDir: String(argv["results-dir"]),
				modelsDir: String(argv["models-dir"]),
				dockerImage: String(argv["docker-image"]),
				dockerBin: String(argv["docker-bin"]),
			});
		})
		.command(
			"setup",
			"Download sample images and model weights, write the prediction script",
			(y) => y,
			async () => {
				await runSetup();
			},
		)
		.command(
			"assess",
			"Score images one container run at a time",
			(y) =>
				y
					.option("aesthetic", {
						type: "boolean",
						describe: "Evaluate aesthetic quality only (default)",
					})
					.option("technical", {
						type: "boolean",
						describe: "Evaluate technical quality only",
					})
					.option("both", {
						type: "boolean",
						describe: "Evaluate both aesthetic and technical quality",
					})
					.option("custom", {
						type: "boolean",
						describe: "Evaluate your own images from my_images instead of samples",
					}),
			async (argv) => {
				await assessImages({
					model: selectModel(argv),
					custom: Boolean(argv.custom),
				});
			},
		)
		.command(
			"parse",
			"Assess, then rebuild per-image score summaries from the output",
			(y) =>
				y
					.option("image-dir", {
						type: "string",
						default: "sample_images",
						describe: "Directory containing images",
					})
					.option("model-type", {
						choices: MODEL_CHOICES,
						default: "both" as const,
						describe: "Model type to parse results for",
					}),
			async (argv) => {
				await parseResults({
					imageDir: argv["image-dir"],
					modelType: argv["model-type"],
				});
			},
		)
		.command(
			"visualize",
			"Render score charts for assessed images",
			(y) =>
				y
					.option("image-dir", {
						type: "string",
						default: "sample_images",
						describe: "Directory containing images",
					})
					.option("model-type", {
						choices: MODEL_CHOICES,
						default: "both" as const,
						describe: "Model type to visualize",
					}),
			async (argv) => {
				await visualizeResults({
					imageDir: argv["image-dir"],
					resultsDir: argv["results-dir"],
					modelType: argv["model-type"],
				});
			},
		)
		.command(
			"run",
			"Setup (optional), assess and visualize in one go",
			(y) =>
				y
					.option("image-dir", {
						type: "string",
						default: "sample_images",
						describe: "Directory containing images",
					})
					.option("model-type", {
						choices: MODEL_CHOICES,
						default: "both" as const,
						describe: "Model type to use",
					})
					.option("setup", {
						type: "boolean",
						default: false,
						describe: "Download models and sample images first",
					})
					.option("skip-visualization", {
						type: "boolean",
						default: false,
						describe: "Skip the visualization step",
					}),
			async (argv) => {
				await runPipeline({
					imageDir: argv["image-dir"],
					modelType: argv["model-type"],
					setup: argv.setup,
					skipVisualization: argv["skip-visualization"],
				});
			},
		)
		.demandCommand(1, "Choose a command: setup, assess, parse, visualize or run")
		.strict()
		.fail((msg: string | null, err: Error | undefined, y) => {
			if (err) throw err;
			y.showHelp();
			throw new AssessError(msg ?? "Invalid usage");
		})
		.help()
		.parseAsync();
}

await main().catch((err: unknown) => {
	console.error(chalk.red(err instanceof Error ? err.message : String(err)));
	process.exitCode = exitCodeOf(err);
});
