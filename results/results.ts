import fg from "fast-glob";
import fs from "node:fs/promises";
import path from "node:path";
import { z } from "zod";
import { BUCKETS } from "./stats";

/** What the prediction script writes for one (image, model) pair */
export const AssessmentResultSchema = z.object({
	image: z.string().min(1),
	model_type: z.enum(["aesthetic", "technical"]),
	mean_score: z.number(),
	scores: z.array(z.number()).length(BUCKETS),
});

export type AssessmentResult = z.infer<typeof AssessmentResultSchema>;

export function resultFileName(image: string, modelType: ModelType): string {
	return `${path.parse(image).name}_${modelType}_results.json`;
}

async function listJson(resultsDir: string): Promise<string[]> {
	const files = await fg(["*.json"], {
		cwd: resultsDir,
		onlyFiles: true,
		caseSensitiveMatch: false,
	});
	return files.sort().map((f) => path.join(resultsDir, f));
}

/** Parses a result file; null when the JSON is some other record. */
export async function readResultFile(
	file: string,
): Promise<AssessmentResult | null> {
	const raw = await fs.readFile(file, "utf8");
	let data: unknown;
	try {
		data = JSON.parse(raw);
	} catch (err) {
		throw new Error(
			`Invalid JSON in ${file}: ${err instanceof Error ? err.message : String(err)}`,
		);
	}
	const parsed = AssessmentResultSchema.safeParse(data);
	return parsed.success ? parsed.data : null;
}

export async function loadResults(
	resultsDir: string,
	selection: ModelSelection = "both",
): Promise<ScoresByImage> {
	const results: ScoresByImage = new Map();

	for (const file of await listJson(resultsDir)) {
		const record = await readResultFile(file);
		if (!record) continue;
		if (selection !== "both" && record.model_type !== selection) continue;

		const entry = results.get(record.image) ?? {};
		entry[record.model_type] = record.scores;
		results.set(record.image, entry);
	}

	return results;
}

export async function hasResults(resultsDir: string): Promise<boolean> {
	return (await listJson(resultsDir)).length > 0;
}
