/* SVG RENDERER
/*-----------------------------------------------------
/* Assembles a chart into an SVG document: header, style,
/* marker and clip definitions, titles, axes and plots.
/* ==================================================== */

import { readFileSync } from "node:fs";
import type { Chart } from "./chart.ts";
import { markerDef, markerIndex } from "./markers.ts";
import { renderPlot } from "./plot.ts";

export interface SvgOptions {
	/** Embed the stylesheet; a page supplies it once for all charts instead */
	standalone?: boolean;
	/** Prefix for element ids, keeping them unique when several charts share a page */
	idPrefix?: string;
}

let stylesheet: string | undefined;

export function chartStylesheet(): string {
	stylesheet ??= readFileSync(new URL("./chart.css", import.meta.url), "utf8");
	return stylesheet;
}

export function renderSvg(chart: Chart, options: SvgOptions = {}): string {
	const canvas = chart.canvas();
	const area = chart.area();
	const prefix = options.idPrefix ?? "";
	const parts: string[] = [];

	parts.push(
		`<svg xmlns="http://www.w3.org/2000/svg" viewBox="${canvas.x} ${canvas.y} ${canvas.width} ${canvas.height}">`,
	);
	if (options.standalone ?? true) {
		parts.push("<style>", chartStylesheet().trimEnd(), "</style>");
	}
	parts.push(renderDefs(chart, prefix));

	for (const { title, rect } of chart.titles) {
		parts.push(title.render(rect));
	}

	// One grid per orientation, from the first axis on it
	const horizontal = chart.axes.find(({ axis }) => axis.edge === "top" || axis.edge === "bottom");
	const vertical = chart.axes.find(({ axis }) => axis.edge === "left" || axis.edge === "right");
	if (horizontal) parts.push(horizontal.axis.renderGrid(area));
	if (vertical) parts.push(vertical.axis.renderGrid(area));

	for (const { axis, rect } of chart.axes) {
		parts.push(axis.render(rect, area, chart.config));
	}

	parts.push(`<g clip-path="url(#${prefix}clip-chart)">`);
	for (const { plot, bound, num } of chart.plots) {
		parts.push(renderPlot(plot, bound, num, prefix));
	}
	parts.push("</g>");
	parts.push("</svg>");
	return parts.join("\n");
}

function renderDefs(chart: Chart, prefix: string): string {
	const area = chart.area();
	const parts = ["<defs>"];
	const used = new Set(chart.plots.map(({ num }) => markerIndex(num)));
	for (const index of [...used].sort((a, b) => a - b)) {
		parts.push(markerDef(index, prefix));
	}
	parts.push(`<clipPath id="${prefix}clip-chart">`);
	parts.push(`<rect x="${area.x}" y="${area.y}" width="${area.width}" height="${area.height}"/>`);
	parts.push("</clipPath>");
	parts.push("</defs>");
	return parts.join("\n");
}
