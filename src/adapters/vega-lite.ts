/* VEGA-LITE ADAPTER
/*-----------------------------------------------------
/* Converts a built Chart to a layered Vega-Lite spec,
/* one layer per plot, sharing the chart's nice scales.
/* Rendering goes through vega-lite + vega, loaded lazily.
/* ==================================================== */

import type { TopLevelSpec } from "vega-lite";
import type { BoundPlot, Chart } from "../chart/chart.ts";
import { STYLE_COLORS, styleIndex } from "../chart/markers.ts";
import { toPoint } from "../geometry/point.ts";

export type VegaLiteSpec = Extract<TopLevelSpec, { layer: unknown }>;
type VegaLiteLayer = VegaLiteSpec["layer"][number];

const VEGA_LITE_SCHEMA = "https://vega.github.io/schema/vega-lite/v5.json";

export function toVegaLiteSpec(chart: Chart): VegaLiteSpec {
	const area = chart.area();
	const title = chart.titles[0]?.title.text;
	return {
		$schema: VEGA_LITE_SCHEMA,
		...(title !== undefined ? { title } : {}),
		width: area.width,
		height: area.height,
		layer: chart.plots.map((plot) => toLayer(chart, plot)),
	};
}

function toLayer(chart: Chart, { plot, num }: BoundPlot): VegaLiteLayer {
	const { xScale, yScale } = chart.domain;
	const color = STYLE_COLORS[styleIndex(num)] ?? STYLE_COLORS[0];
	const xName = axisName(chart, "x");
	const yName = axisName(chart, "y");
	const values = plot.data.map((pt) => {
		const { x, y } = toPoint(pt);
		return { x, y, series: plot.name };
	});
	return {
		data: { values },
		mark:
			plot.kind === "area"
				? { type: "area", opacity: 0.6 }
				: plot.kind === "line"
					? { type: "line", point: true }
					: { type: "point", filled: true },
		encoding: {
			x: {
				field: "x",
				type: "quantitative",
				scale: { domain: [xScale.start, xScale.stop], nice: false, zero: false },
				axis: { title: xName ?? null },
			},
			y: {
				field: "y",
				type: "quantitative",
				scale: { domain: [yScale.start, yScale.stop], nice: false, zero: false },
				axis: { title: yName ?? null },
			},
			color: { value: color },
		},
	};
}

function axisName(chart: Chart, dimension: "x" | "y"): string | undefined {
	for (const { axis } of chart.axes) {
		const horizontal = axis.edge === "top" || axis.edge === "bottom";
		if (horizontal === (dimension === "x") && axis.name !== undefined) return axis.name;
	}
	return undefined;
}

async function load<T>(name: string, loader: () => Promise<T>): Promise<T> {
	try {
		return await loader();
	} catch (cause) {
		throw new Error(`${name} is required for renderVegaLite(). Install it: npm install vega-lite vega`, {
			cause,
		});
	}
}

export async function renderVegaLite(chart: Chart): Promise<string> {
	const vegaLite = await load("vega-lite", () => import("vega-lite"));
	const vega = await load("vega", () => import("vega"));

	const compiled = vegaLite.compile(toVegaLiteSpec(chart));
	const view = new vega.View(vega.parse(compiled.spec), { renderer: "none" });
	try {
		return await view.toSVG();
	} finally {
		view.finalize();
	}
}
