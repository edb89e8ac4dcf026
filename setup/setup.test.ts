import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { countTimers, sleep, withTty } from "../testing/tty";
import type { Fetcher } from "./download";
import { runSetup } from "./setup";

const AESTHETIC = "weights_mobilenet_aesthetic_0.07.hdf5";
const TECHNICAL = "weights_mobilenet_technical_0.11.hdf5";

/** Writes the URL as file content, or nothing for URLs in `broken` */
function fakeFetcher(broken: (url: string) => boolean = () => false) {
	const calls: string[] = [];
	const fetcher: Fetcher = async (url, dest) => {
		calls.push(url);
		await fs.mkdir(path.dirname(dest), { recursive: true });
		if (broken(url)) throw new Error(`404 for ${url}`);
		await fs.writeFile(dest, url);
	};
	return { fetcher, calls };
}

describe("runSetup", () => {
	let cwd: string;

	beforeEach(async () => {
		cwd = await fs.mkdtemp(path.join(os.tmpdir(), "nima-setup-"));
		vi.spyOn(console, "log").mockImplementation(() => {});
		vi.spyOn(console, "warn").mockImplementation(() => {});
		vi.spyOn(console, "error").mockImplementation(() => {});
	});

	afterEach(async () => {
		vi.restoreAllMocks();
		await fs.rm(cwd, { recursive: true, force: true });
	});

	it("creates the workspace and downloads samples and weights", async () => {
		const { fetcher } = fakeFetcher();

		const report = await runSetup({ cwd, fetcher });

		expect(report).toEqual({
			samplesDownloaded: [
				"landscape.jpg",
				"portrait.jpg",
				"city.jpg",
				"nature.jpg",
				"blurry.jpg",
			],
			weightsDownloaded: [AESTHETIC, TECHNICAL],
			missingWeights: [],
		});
		expect(await fs.readdir(path.join(cwd, "my_images"))).toEqual([]);
		expect((await fs.readdir(path.join(cwd, "models", "MobileNet"))).sort()).toEqual([
			AESTHETIC,
			TECHNICAL,
		]);
	});

	it("writes the prediction script and requirements", async () => {
		await runSetup({ cwd, fetcher: fakeFetcher().fetcher });

		const script = await fs.readFile(path.join(cwd, "predict_script.py"), "utf8");
		expect(script).toContain('"--model-type", choices=["aesthetic", "technical"]');
		const requirements = await fs.readFile(
			path.join(cwd, "tensorflow_requirements.txt"),
			"utf8",
		);
		expect(requirements.split("\n")[0]).toBe("tensorflow==2.9.1");
	});

	it("leaves existing samples and weights alone", async () => {
		await fs.mkdir(path.join(cwd, "sample_images"));
		await fs.writeFile(path.join(cwd, "sample_images", "mine.jpg"), "x");
		await fs.mkdir(path.join(cwd, "models", "MobileNet"), { recursive: true });
		await fs.writeFile(path.join(cwd, "models", "MobileNet", AESTHETIC), "w");
		const { fetcher, calls } = fakeFetcher();

		const report = await runSetup({ cwd, fetcher });

		expect(report.samplesDownloaded).toEqual([]);
		expect(report.weightsDownloaded).toEqual([TECHNICAL]);
		expect(calls).toEqual([
			`https://github.com/idealo/image-quality-assessment/releases/download/v1.0.0/${TECHNICAL}`,
		]);
	});

	it("falls back to the mirror when the release download fails", async () => {
		const { fetcher, calls } = fakeFetcher((url) => url.includes("github.com"));
		await fs.mkdir(path.join(cwd, "sample_images"));
		await fs.writeFile(path.join(cwd, "sample_images", "mine.jpg"), "x");

		const report = await runSetup({ cwd, fetcher });

		expect(report.weightsDownloaded).toEqual([AESTHETIC, TECHNICAL]);
		expect(report.missingWeights).toEqual([]);
		expect(calls.filter((u) => u.includes("amazonaws.com"))).toHaveLength(2);
		const weight = await fs.readFile(
			path.join(cwd, "models", "MobileNet", TECHNICAL),
			"utf8",
		);
		expect(weight).toBe(
			`https://s3.eu-central-1.amazonaws.com/idealo-ml-image-quality/${TECHNICAL}`,
		);
	});

	it("discards a truncated download and retries from the mirror", async () => {
		const calls: string[] = [];
		const fetcher: Fetcher = async (url, dest) => {
			calls.push(url);
			await fs.mkdir(path.dirname(dest), { recursive: true });
			await fs.writeFile(dest, url.includes("github.com") ? "half" : url);
			if (url.includes("github.com")) throw new Error("socket hang up");
		};
		await fs.mkdir(path.join(cwd, "sample_images"));
		await fs.writeFile(path.join(cwd, "sample_images", "mine.jpg"), "x");

		const report = await runSetup({ cwd, fetcher });

		expect(report.weightsDownloaded).toEqual([AESTHETIC, TECHNICAL]);
		expect(report.missingWeights).toEqual([]);
		expect(calls.filter((u) => u.includes("amazonaws.com"))).toHaveLength(2);
		const weight = await fs.readFile(
			path.join(cwd, "models", "MobileNet", AESTHETIC),
			"utf8",
		);
		expect(weight).toBe(
			`https://s3.eu-central-1.amazonaws.com/idealo-ml-image-quality/${AESTHETIC}`,
		);
	});

	it("leaves no partial weight file when every source breaks midway", async () => {
		const fetcher: Fetcher = async (url, dest) => {
			await fs.mkdir(path.dirname(dest), { recursive: true });
			await fs.writeFile(dest, "half");
			if (url.endsWith(".hdf5")) throw new Error("socket hang up");
		};

		const report = await runSetup({ cwd, fetcher });

		expect(report.weightsDownloaded).toEqual([]);
		expect(report.missingWeights).toEqual([AESTHETIC, TECHNICAL]);
		expect(await fs.readdir(path.join(cwd, "models", "MobileNet"))).toEqual([]);
	});

	it("reports weights that no source could provide", async () => {
		const { fetcher } = fakeFetcher((url) => url.endsWith(".hdf5"));

		const report = await runSetup({ cwd, fetcher });

		expect(report.missingWeights).toEqual([AESTHETIC, TECHNICAL]);
		expect(console.error).toHaveBeenCalledWith(
			expect.stringContaining("Please download them manually"),
		);
	});

	it("stops the progress bar when a sample download fails", async () => {
		const { fetcher } = fakeFetcher((url) => url.includes("unsplash.com"));
		vi.spyOn(process.stderr, "write").mockImplementation(() => true);
		const before = countTimers();

		await withTty(async () => {
			await expect(runSetup({ cwd, fetcher })).rejects.toThrow(/404/);
		});
		await sleep(300);

		expect(countTimers()).toBe(before);
	});

	it("stops when a sample image cannot be downloaded", async () => {
		const { fetcher } = fakeFetcher((url) => url.includes("unsplash.com"));

		await expect(runSetup({ cwd, fetcher })).rejects.toThrow(/404 for https:\/\/unsplash/);
	});
});
