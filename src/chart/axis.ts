/* AXIS
/*-----------------------------------------------------
/* Tick marks, tick labels, axis name and grid lines
/* for one edge of a chart.
/* ==================================================== */

import { isHorizontal, type Edge, type Rect } from "../geometry/rect.ts";
import { tickX, tickY, type Tick } from "../scale/tick.ts";
import type { LayoutConfig } from "./config.ts";
import { textClose, textElement, textOpen, tspan } from "./text.ts";

export class Axis {
	constructor(
		readonly edge: Edge,
		readonly ticks: readonly Tick[],
		readonly name?: string,
	) {}

	/** Band this axis reserves on its edge */
	space(config: LayoutConfig): number {
		return this.name === undefined ? config.axisSpace : config.namedAxisSpace;
	}

	/** Returns `[remainder, reserved]` */
	split(area: Rect, config: LayoutConfig): [Rect, Rect] {
		return area.split(this.edge, this.space(config));
	}

	/**
	 * Render into the band reserved for this axis, trimmed to the final
	 * plot `area` so ticks line up with the plotted data.
	 */
	render(reserved: Rect, area: Rect, config: LayoutConfig): string {
		const parts: string[] = [];
		let rect = isHorizontal(this.edge) ? reserved.intersectHoriz(area) : reserved.intersectVert(area);
		if (this.name !== undefined) {
			const [rest, nameRect] = rect.split(this.edge, Math.trunc(this.space(config) / 2));
			parts.push(textElement({ edge: this.edge, rect: nameRect, className: "axis" }, this.name));
			rect = rest;
		}
		parts.push(this.renderTickLines(rect, config));
		parts.push(this.renderTickLabels(rect, config));
		return parts.join("\n");
	}

	renderGrid(area: Rect): string {
		if (isHorizontal(this.edge)) {
			const d = this.ticks
				.map((t) => `M${tickX(t, this.edge, area, 0)} ${area.y}v${area.height}`)
				.join("");
			return `<path class="grid-x" d="${d}"/>`;
		}
		const d = this.ticks
			.map((t) => `M${area.x} ${tickY(t, this.edge, area, 0)}h${area.width}`)
			.join("");
		return `<path class="grid-y" d="${d}"/>`;
	}

	private renderTickLines(rect: Rect, config: LayoutConfig): string {
		const len = config.tickLength;
		let d: string;
		if (isHorizontal(this.edge)) {
			const [y, height]: [number, number] = this.edge === "top" ? [rect.bottom(), len] : [rect.y, -len];
			d = `M${rect.x} ${y}h${rect.width}`;
			for (const t of this.ticks) {
				d += ` M${tickX(t, this.edge, rect, len)} ${tickY(t, this.edge, rect, len)}v${height}`;
			}
		} else {
			const [x, width]: [number, number] = this.edge === "left" ? [rect.right(), len] : [rect.x, -len];
			d = `M${x} ${rect.y}v${rect.height}`;
			for (const t of this.ticks) {
				d += ` M${tickX(t, this.edge, rect, len)} ${tickY(t, this.edge, rect, len)}h${width}`;
			}
		}
		return `<path class="axis-line" d="${d}"/>`;
	}

	private renderTickLabels(rect: Rect, config: LayoutConfig): string {
		const hlen = config.tickLength + config.tickLabelGap;
		const vlen = config.tickLength * 2;
		const anchor = this.edge === "left" ? "end" : this.edge === "right" ? "start" : "middle";
		const spans = this.ticks.map((t) =>
			tspan({
				text: t.text,
				x: tickX(t, this.edge, rect, hlen),
				y: tickY(t, this.edge, rect, vlen),
				dy: 0.33,
			}),
		);
		return [textOpen({ edge: "top", anchor, className: "tick" }), ...spans, textClose()].join("\n");
	}
}
