/* CHART BUILDER
/*-----------------------------------------------------
/* Fluent construction in phase order. Each stage only
/* exposes the phases that may still follow, so adding
/* an axis after a plot does not type-check.
/* ==================================================== */

import type { Domain } from "../domain/domain.ts";
import type { Edge, AspectRatio } from "../geometry/rect.ts";
import { unwrap } from "../types/result.ts";
import type { Chart } from "./chart.ts";
import type { Plot } from "./plot.ts";
import type { TitleLike } from "./title.ts";

export class PlotStage {
	constructor(protected readonly chart: Chart) {}

	plot(plot: Plot): PlotStage {
		return new PlotStage(unwrap(this.chart.withPlot(plot)));
	}

	build(): Chart {
		return this.chart;
	}
}

export class AxisStage extends PlotStage {
	/** Add an axis from the chart's domain; an empty name leaves it unnamed */
	axis(name: string, edge: Edge): AxisStage {
		return new AxisStage(unwrap(this.chart.withAxis(this.chart.domain.axis(name, edge))));
	}
}

export class TitleStage extends AxisStage {
	title(title: TitleLike): TitleStage {
		return new TitleStage(unwrap(this.chart.withTitle(title)));
	}
}

export class ChartBuilder extends TitleStage {
	aspectRatio(aspectRatio: AspectRatio): ChartBuilder {
		return new ChartBuilder(unwrap(this.chart.withAspectRatio(aspectRatio)));
	}

	domain(domain: Domain): TitleStage {
		return new TitleStage(unwrap(this.chart.withDomain(domain)));
	}
}
