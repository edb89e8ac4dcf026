import { BUCKETS, meanScore, stdScore } from "../results/stats";

export type ChartOptions = {
	title: string;
	color: string;
	width: number;
	height: number;
};

const MARGIN = { top: 56, right: 16, bottom: 44, left: 56 };

export function escapeXml(text: string): string {
	return text
		.replace(/&/g, "&amp;")
		.replace(/</g, "&lt;")
		.replace(/>/g, "&gt;")
		.replace(/"/g, "&quot;")
		.replace(/'/g, "&apos;");
}

function fmt(n: number): string {
	return Number(n.toFixed(2)).toString();
}

/** Horizontal position of a 1..10 rating on the chart */
export function scoreToX(score: number, width: number): number {
	const slot = (width - MARGIN.left - MARGIN.right) / BUCKETS;
	return MARGIN.left + (score - 0.5) * slot;
}

/**
 * Bar chart of a score distribution with a dashed line at the mean.
 * Titled with the distribution's mean and standard deviation.
 */
export function renderDistributionSvg(
	scores: ReadonlyArray<number>,
	opts: ChartOptions,
): string {
	const { width, height, color } = opts;
	const mean = meanScore(scores);
	const std = stdScore(scores);

	const plotW = width - MARGIN.left - MARGIN.right;
	const plotH = height - MARGIN.top - MARGIN.bottom;
	const slot = plotW / BUCKETS;
	const yMax = Math.max(...scores) * 1.1 || 1;
	const baseline = MARGIN.top + plotH;

	const bars = scores.map((p, i) => {
		const h = (Math.max(0, p) / yMax) * plotH;
		return `<rect class="bar" x="${fmt(MARGIN.left + i * slot + slot * 0.1)}" y="${fmt(baseline - h)}" width="${fmt(slot * 0.8)}" height="${fmt(h)}" fill="${color}" fill-opacity="0.7"/>`;
	});

	const ticks = scores.map(
		(_, i) =>
			`<text x="${fmt(scoreToX(i + 1, width))}" y="${fmt(baseline + 16)}" font-size="11" text-anchor="middle">${i + 1}</text>`,
	);

	const grid = [0.25, 0.5, 0.75, 1].map((f) => {
		const y = baseline - f * plotH;
		return `<line x1="${MARGIN.left}" y1="${fmt(y)}" x2="${MARGIN.left + plotW}" y2="${fmt(y)}" stroke="#000" stroke-opacity="0.1"/><text x="${MARGIN.left - 6}" y="${fmt(y + 4)}" font-size="10" text-anchor="end">${(f * yMax).toFixed(2)}</text>`;
	});

	const meanX = scoreToX(mean, width);

	return [
		`<svg xmlns="http://www.w3.org/2000/svg" width="${width}" height="${height}" viewBox="0 0 ${width} ${height}" font-family="sans-serif">`,
		`<text x="${width / 2}" y="20" font-size="14" text-anchor="middle">${escapeXml(opts.title)}</text>`,
		`<text x="${width / 2}" y="38" font-size="13" text-anchor="middle">Mean: ${mean.toFixed(2)}, Std: ${std.toFixed(2)}</text>`,
		...grid,
		...bars,
		`<line x1="${MARGIN.left}" y1="${fmt(baseline)}" x2="${MARGIN.left + plotW}" y2="${fmt(baseline)}" stroke="#000"/>`,
		...ticks,
		`<line class="mean" x1="${fmt(meanX)}" y1="${MARGIN.top}" x2="${fmt(meanX)}" y2="${fmt(baseline)}" stroke="red" stroke-opacity="0.8" stroke-dasharray="6 4"/>`,
		`<text x="${width / 2}" y="${height - 6}" font-size="12" text-anchor="middle">Score</text>`,
		`<text x="14" y="${fmt(MARGIN.top + plotH / 2)}" font-size="12" text-anchor="middle" transform="rotate(-90 14 ${fmt(MARGIN.top + plotH / 2)})">Probability</text>`,
		"</svg>",
	].join("\n");
}
