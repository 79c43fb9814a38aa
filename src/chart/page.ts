/* PAGE
/*-----------------------------------------------------
/* HTML document holding several charts, each with a
/* legend naming its series.
/* ==================================================== */

import { writeDocument } from "../io/document.ts";
import type { Chart } from "./chart.ts";
import { MARKERS, markerIndex, styleIndex } from "./markers.ts";
import { chartStylesheet } from "./svg.ts";
import { escapeXml } from "./text.ts";

export class Page {
	private constructor(private readonly charts: readonly Chart[]) {}

	static create(): Page {
		return new Page([]);
	}

	chart(chart: Chart): Page {
		return new Page([...this.charts, chart]);
	}

	toHtml(): string {
		const parts = [
			"<!DOCTYPE html>",
			"<html>",
			"<head>",
			'<meta charset="utf-8">',
			"<style>",
			chartStylesheet().trimEnd(),
			"</style>",
			"</head>",
			"<body>",
			'<div class="charts">',
		];
		this.charts.forEach((chart, i) => {
			const idPrefix = `chart-${i}-`;
			parts.push('<div class="chart">');
			parts.push(chart.toSvg({ standalone: false, idPrefix }));
			parts.push(renderLegend(chart));
			parts.push("</div>");
		});
		parts.push("</div>", "</body>", "</html>");
		return parts.join("\n");
	}

	toString(): string {
		return this.toHtml();
	}

	async toFile(path: string): Promise<void> {
		await writeDocument(path, this.toHtml());
	}
}

export function renderLegend(chart: Chart): string {
	const items = chart.plots.map(({ plot, num }) => {
		const glyph = plot.kind === "area" ? MARKERS[1] : MARKERS[markerIndex(num)];
		return [
			'<div class="legend-item">',
			`<svg viewBox="-1 -1 2 2" class="plot-${styleIndex(num)}">${glyph ?? MARKERS[0]}</svg>`,
			`<span>${escapeXml(plot.name)}</span>`,
			"</div>",
		].join("");
	});
	return ['<div class="legend">', ...items, "</div>"].join("\n");
}
