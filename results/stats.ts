export const BUCKETS = 10;

export function assertDistribution(scores: ReadonlyArray<number>): void {
	if (scores.length !== BUCKETS || !scores.every(Number.isFinite)) {
		throw new Error(
			`Expected ${BUCKETS} finite probabilities, got [${scores.join(", ")}]`,
		);
	}
}

/** Expected rating on the 1..10 scale: Σ p[i] * (i + 1) */
export function meanScore(scores: ReadonlyArray<number>): number {
	assertDistribution(scores);
	return scores.reduce((acc, p, i) => acc + p * (i + 1), 0);
}

export function stdScore(scores: ReadonlyArray<number>): number {
	const mean = meanScore(scores);
	const variance = scores.reduce(
		(acc, p, i) => acc + p * (i + 1 - mean) ** 2,
		0,
	);
	return Math.sqrt(variance);
}

/** Average of the aesthetic and technical means */
export function overallScore(
	aesthetic: ReadonlyArray<number>,
	technical: ReadonlyArray<number>,
): number {
	return (meanScore(aesthetic) + meanScore(technical)) / 2;
}
