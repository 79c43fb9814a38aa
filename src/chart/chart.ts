/* CHART
/*-----------------------------------------------------
/* Chart composition: partitions the canvas in phase
/* order (inset, titles, axes) and binds each plot to
/* the plot area known when it is added.
/* ==================================================== */

import { Domain, type BoundDomain } from "../domain/domain.ts";
import { InvalidOperationError } from "../errors/index.ts";
import { aspectRect, type AspectRatio, type Rect } from "../geometry/rect.ts";
import { writeDocument } from "../io/document.ts";
import { err, ok, type Result } from "../types/result.ts";
import type { Axis } from "./axis.ts";
import { ChartBuilder } from "./builder.ts";
import { resolveLayoutConfig, type LayoutConfig } from "./config.ts";
import type { Plot } from "./plot.ts";
import { renderSvg, type SvgOptions } from "./svg.ts";
import { Title, type TitleLike } from "./title.ts";

/** Construction phases, in the only order they may run */
export type ChartPhase = "aspect" | "domain" | "titles" | "axes" | "plots";

const PHASE_ORDER: readonly ChartPhase[] = ["aspect", "domain", "titles", "axes", "plots"];

export interface PlacedTitle {
	readonly title: Title;
	readonly rect: Rect;
}

export interface PlacedAxis {
	readonly axis: Axis;
	/** Band reserved when the axis was added */
	readonly rect: Rect;
}

export interface BoundPlot {
	readonly plot: Plot;
	readonly bound: BoundDomain;
	/** Series index, drives style and marker assignment */
	readonly num: number;
}

interface ChartState {
	readonly config: LayoutConfig;
	readonly aspectRatio: AspectRatio;
	readonly domain: Domain;
	readonly phase: ChartPhase;
	readonly area: Rect;
	readonly titles: readonly PlacedTitle[];
	readonly axes: readonly PlacedAxis[];
	readonly plots: readonly BoundPlot[];
}

export type ChartResult = Result<Chart, InvalidOperationError>;

export class Chart {
	private constructor(private readonly state: ChartState) {}

	static create(config: Partial<LayoutConfig> = {}): Chart {
		const resolved = resolveLayoutConfig(config);
		return new Chart({
			config: resolved,
			aspectRatio: "landscape",
			domain: Domain.default(),
			phase: "aspect",
			area: aspectRect("landscape").inset(resolved.margin),
			titles: [],
			axes: [],
			plots: [],
		});
	}

	/** Fluent builder whose stages only expose legal next steps */
	static builder(config: Partial<LayoutConfig> = {}): ChartBuilder {
		return new ChartBuilder(Chart.create(config));
	}

	get phase(): ChartPhase {
		return this.state.phase;
	}

	get aspectRatio(): AspectRatio {
		return this.state.aspectRatio;
	}

	get domain(): Domain {
		return this.state.domain;
	}

	get config(): LayoutConfig {
		return this.state.config;
	}

	get titles(): readonly PlacedTitle[] {
		return this.state.titles;
	}

	get axes(): readonly PlacedAxis[] {
		return this.state.axes;
	}

	get plots(): readonly BoundPlot[] {
		return this.state.plots;
	}

	/** Full canvas for the aspect ratio */
	canvas(): Rect {
		return aspectRect(this.state.aspectRatio);
	}

	/** Space left after titles and axes: the plot area once axes are done */
	area(): Rect {
		return this.state.area;
	}

	withAspectRatio(aspectRatio: AspectRatio): ChartResult {
		return this.advance("withAspectRatio", "aspect", () => ({
			aspectRatio,
			area: aspectRect(aspectRatio).inset(this.state.config.margin),
		}));
	}

	withDomain(domain: Domain): ChartResult {
		return this.advance("withDomain", "domain", () => ({ domain }));
	}

	withTitle(title: TitleLike): ChartResult {
		return this.advance("withTitle", "titles", () => {
			const t = Title.from(title);
			const [area, rect] = this.state.area.split(t.edge, this.state.config.titleSpace);
			return { area, titles: [...this.state.titles, { title: t, rect }] };
		});
	}

	withAxis(axis: Axis): ChartResult {
		return this.advance("withAxis", "axes", () => {
			const [area, rect] = axis.split(this.state.area, this.state.config);
			return { area, axes: [...this.state.axes, { axis, rect }] };
		});
	}

	withPlot(plot: Plot): ChartResult {
		return this.advance("withPlot", "plots", () => {
			const bound = this.state.domain.bind(this.state.area);
			const num = this.state.plots.length;
			return { plots: [...this.state.plots, { plot, bound, num }] };
		});
	}

	toSvg(options: SvgOptions = {}): string {
		return renderSvg(this, options);
	}

	toString(): string {
		return this.toSvg();
	}

	async toFile(path: string): Promise<void> {
		await writeDocument(path, this.toSvg());
	}

	private advance(
		operation: string,
		phase: ChartPhase,
		update: () => Partial<ChartState>,
	): ChartResult {
		const current = this.state.phase;
		if (PHASE_ORDER.indexOf(current) > PHASE_ORDER.indexOf(phase)) {
			return err(
				new InvalidOperationError(
					operation,
					`cannot run in the ${phase} phase once the chart has reached the ${current} phase`,
					`build charts in the order ${PHASE_ORDER.join(" → ")}`,
				),
			);
		}
		return ok(new Chart({ ...this.state, ...update(), phase }));
	}
}
