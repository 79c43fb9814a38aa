/* PLOTS
/*-----------------------------------------------------
/* Data series and the path geometry each kind produces
/* against a bound domain.
/* ==================================================== */

import type { BoundDomain } from "../domain/domain.ts";
import { toPoint, type PointLike } from "../geometry/point.ts";
import { markerIndex, styleIndex } from "./markers.ts";
import { textClose, textOpen, tspan } from "./text.ts";

export type PlotKind = "area" | "line" | "scatter";

/**
 * One data series. `data` is the caller's array, read at render time.
 */
export interface Plot {
	readonly kind: PlotKind;
	readonly name: string;
	readonly data: readonly PointLike[];
	/** Draw an `(x y)` label above every point */
	readonly labelled: boolean;
}

export const Plot = {
	/** Filled area between the series and the zero baseline */
	area(name: string, data: readonly PointLike[]): Plot {
		return { kind: "area", name, data, labelled: false };
	},
	/** Points connected by line segments */
	line(name: string, data: readonly PointLike[]): Plot {
		return { kind: "line", name, data, labelled: false };
	},
	/** Unconnected points */
	scatter(name: string, data: readonly PointLike[]): Plot {
		return { kind: "scatter", name, data, labelled: false };
	},
	labelled(plot: Plot): Plot {
		return { ...plot, labelled: true };
	},
};

export type PathCommand =
	| { readonly op: "M"; readonly x: number; readonly y: number }
	| { readonly op: "L"; readonly x: number; readonly y: number }
	| { readonly op: "Z" };

export function plotPath(plot: Plot, bound: BoundDomain): PathCommand[] {
	const vertices = plot.data.map((pt) => {
		const { x, y } = toPoint(pt);
		return { x: bound.xMap(x), y: bound.yMap(y) };
	});
	const [first] = vertices;
	const last = vertices[vertices.length - 1];
	if (first === undefined || last === undefined) return [];

	switch (plot.kind) {
		case "line":
			return vertices.map((v, i): PathCommand => (i === 0 ? { op: "M", ...v } : { op: "L", ...v }));
		case "scatter":
			return vertices.map((v): PathCommand => ({ op: "M", ...v }));
		case "area": {
			// Closed against y = 0, starting and ending on the baseline
			const base = bound.yMap(0);
			return [
				{ op: "M", x: first.x, y: base },
				...vertices.map((v): PathCommand => ({ op: "L", ...v })),
				{ op: "L", x: last.x, y: base },
				{ op: "Z" },
			];
		}
	}
}

/** SVG path data; coordinates after a move continue as implicit line-to */
export function toPathData(commands: readonly PathCommand[]): string {
	let d = "";
	for (const cmd of commands) {
		switch (cmd.op) {
			case "M":
				d += `M${cmd.x} ${cmd.y}`;
				break;
			case "L":
				d += ` ${cmd.x} ${cmd.y}`;
				break;
			case "Z":
				d += "Z";
				break;
		}
	}
	return d;
}

export function renderPlot(plot: Plot, bound: BoundDomain, num: number, idPrefix = ""): string {
	const d = toPathData(plotPath(plot, bound));
	let attrs = `class="plot-${styleIndex(num)} plot-${plot.kind}" d="${d}"`;
	if (plot.kind !== "area") {
		const marker = `url(#${idPrefix}marker-${markerIndex(num)})`;
		attrs += ` marker-start="${marker}" marker-mid="${marker}" marker-end="${marker}"`;
	}
	const parts = [`<path ${attrs}/>`];
	if (plot.labelled) parts.push(renderLabels(plot, bound));
	return parts.join("\n");
}

function renderLabels(plot: Plot, bound: BoundDomain): string {
	const spans = plot.data.map((pt) => {
		const { x, y } = toPoint(pt);
		return tspan({ text: `(${x} ${y})`, x: bound.xMap(x), y: bound.yMap(y), dy: -0.66 });
	});
	return [textOpen({ edge: "top", className: "plot-label" }), ...spans, textClose()].join("\n");
}
