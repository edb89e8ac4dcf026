import { describe, expect, it } from "vitest";
import { escapeXml, renderDistributionSvg, scoreToX } from "./chart";

const FIVE = [0, 0, 0, 0, 1, 0, 0, 0, 0, 0];

describe("renderDistributionSvg", () => {
	const svg = renderDistributionSvg(FIVE, {
		title: "Aesthetic Scores",
		color: "blue",
		width: 420,
		height: 400,
	});

	it("titles the chart with the mean and standard deviation", () => {
		expect(svg).toContain(">Aesthetic Scores</text>");
		expect(svg).toContain(">Mean: 5.00, Std: 0.00</text>");
	});

	it("draws one bar per bucket in the given color", () => {
		const bars = svg.match(/<rect class="bar"[^>]*>/g) ?? [];
		expect(bars).toHaveLength(10);
		expect(bars.every((b) => b.includes('fill="blue"'))).toBe(true);
	});

	it("gives the only populated bucket the full plot height", () => {
		// plot height = 400 - 56 - 44 = 300, yMax = 1.1 so the bar is 300 / 1.1
		const bars = svg.match(/<rect class="bar"[^>]*>/g) ?? [];
		expect(bars[4]).toContain('height="272.73"');
		expect(bars[0]).toContain('height="0"');
	});

	it("places the mean line over the matching bucket", () => {
		// slot = (420 - 56 - 16) / 10 = 34.8, center of bucket 5 = 56 + 4.5 * 34.8
		expect(scoreToX(5, 420)).toBeCloseTo(212.6, 6);
		expect(svg).toContain('<line class="mean" x1="212.6"');
	});

	it("rejects a distribution with the wrong length", () => {
		expect(() =>
			renderDistributionSvg([0.5, 0.5], {
				title: "x",
				color: "red",
				width: 100,
				height: 100,
			}),
		).toThrow("Expected 10 finite probabilities, got [0.5, 0.5]");
	});
});

describe("escapeXml", () => {
	it("escapes markup characters in file names", () => {
		expect(escapeXml(`a&b<"c">'d`)).toBe("a&amp;b&lt;&quot;c&quot;&gt;&apos;d");
	});
});
