import { spawn } from "node:child_process";
import path from "node:path";
import { AssessError } from "../errors";

export const DEFAULT_DOCKER_IMAGE = "tensorflow/tensorflow:2.9.1";

export type ContainerRunResult = {
	exitCode: number;
	/** Everything the container wrote to stdout */
	stdout: string;
};

/** The container engine the assessment shells out to. */
export interface ContainerRuntime {
	isAvailable(): Promise<boolean>;
	run(args: string[]): Promise<ContainerRunResult>;
}

/** One prediction: host directories are mounted, the script sees container paths. */
export type PredictionRun = {
	imageDir: string;
	modelsDir: string;
	resultsDir: string;
	scriptPath: string;
	dockerImage: string;
	/** File name inside imageDir */
	imageName: string;
	/** Weights path inside the container */
	weightsFile: string;
	modelType: ModelType;
};

export function buildRunArgs(run: PredictionRun): string[] {
	return [
		"run",
		"--rm",
		"-v",
		`${path.resolve(run.imageDir)}:/images`,
		"-v",
		`${path.resolve(run.modelsDir)}:/models`,
		"-v",
		`${path.resolve(run.resultsDir)}:/results`,
		"-v",
		`${path.resolve(run.scriptPath)}:/predict_script.py`,
		run.dockerImage,
		"python3",
		"/predict_script.py",
		"--image-path",
		`/images/${run.imageName}`,
		"--weights-file",
		run.weightsFile,
		"--model-type",
		run.modelType,
	];
}

export class DockerRuntime implements ContainerRuntime {
	constructor(private readonly bin = "docker") {}

	isAvailable(): Promise<boolean> {
		return new Promise((resolve) => {
			const child = spawn(this.bin, ["--version"], { stdio: "ignore" });
			child.on("error", () => resolve(false));
			child.on("close", (code) => resolve(code === 0));
		});
	}

	/** Streams container output to the terminal while capturing stdout. */
	run(args: string[]): Promise<ContainerRunResult> {
		return new Promise((resolve, reject) => {
			const child = spawn(this.bin, args, {
				stdio: ["ignore", "pipe", "pipe"],
			});
			let stdout = "";

			child.stdout.on("data", (chunk: Buffer) => {
				const text = chunk.toString("utf8");
				stdout += text;
				process.stdout.write(text);
			});
			child.stderr.on("data", (chunk: Buffer) => {
				process.stderr.write(chunk);
			});

			child.on("error", (err) => {
				reject(new AssessError(`Failed to start ${this.bin}: ${err.message}`));
			});
			child.on("close", (code, signal) => {
				if (code === 0) {
					resolve({ exitCode: 0, stdout });
					return;
				}
				reject(
					new AssessError(
						`${this.bin} ${args[0] ?? ""} exited with ${code ?? signal}`,
					),
				);
			});
		});
	}
}
