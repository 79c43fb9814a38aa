import { mkdtemp, readFile, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { describe, expect, it } from "vitest";
import { Chart } from "../src/chart/chart.ts";
import { Page, renderLegend } from "../src/chart/page.ts";
import { Plot } from "../src/chart/plot.ts";

const lines = Chart.builder().title("Lines").plot(Plot.line("Series A", [1, 2])).build();
const areas = Chart.builder()
	.title("Areas")
	.plot(Plot.line("First", [1, 2]))
	.plot(Plot.area("A & B", [1, 2]))
	.build();

describe("renderLegend", () => {
	it("should list each series with its marker glyph", () => {
		expect(renderLegend(lines)).toBe(
			[
				'<div class="legend">',
				'<div class="legend-item"><svg viewBox="-1 -1 2 2" class="plot-0"><circle r="1"/></svg><span>Series A</span></div>',
				"</div>",
			].join("\n"),
		);
	});

	it("should draw areas as squares and escape names", () => {
		const legend = renderLegend(areas).split("\n");
		expect(legend[2]).toBe(
			'<div class="legend-item"><svg viewBox="-1 -1 2 2" class="plot-1"><rect x="-1" y="-1" width="2" height="2"/></svg><span>A &amp; B</span></div>',
		);
	});
});

describe("Page", () => {
	const page = Page.create().chart(lines).chart(areas);

	it("should share one stylesheet across charts", () => {
		const html = page.toHtml();
		expect(html.startsWith("<!DOCTYPE html>\n<html>\n<head>")).toBe(true);
		expect(html.split("<style>").length - 1).toBe(1);
		expect(html.endsWith("</div>\n</body>\n</html>")).toBe(true);
	});

	it("should keep element ids unique per chart", () => {
		const html = page.toHtml();
		expect(html).toContain('<clipPath id="chart-0-clip-chart">');
		expect(html).toContain('<clipPath id="chart-1-clip-chart">');
		expect(html).toContain('marker-end="url(#chart-1-marker-0)"');
		expect(html).not.toContain('id="clip-chart"');
	});

	it("should not change when a chart is added to a copy", () => {
		const empty = Page.create();
		empty.chart(lines);
		expect(empty.toHtml()).not.toContain("<svg");
	});

	it("should write the html document", async () => {
		const dir = await mkdtemp(join(tmpdir(), "tickplot-"));
		try {
			const path = join(dir, "page.html");
			await page.toFile(path);
			expect(await readFile(path, "utf8")).toBe(page.toString());
		} finally {
			await rm(dir, { recursive: true, force: true });
		}
	});
});
