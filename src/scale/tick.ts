/* TICKS
/*-----------------------------------------------------
/* One labeled mark on an axis and its pixel placement.
/* ==================================================== */

import type { Edge, Rect } from "../geometry/rect.ts";

export interface Tick {
	/** Normalized position along the axis, 0..1 */
	readonly value: number;
	readonly text: string;
}

export function tick(value: number, text: string): Tick {
	return { value, text };
}

export function formatTick(value: number): string {
	if (Object.is(value, -0)) return "0";
	return String(value);
}

/**
 * X pixel of a tick drawn along `edge` of `rect`.
 * Vertical axes place every tick `len` pixels in from the plot side.
 */
export function tickX(t: Tick, edge: Edge, rect: Rect, len: number): number {
	switch (edge) {
		case "left":
			return rect.right() - len;
		case "right":
			return rect.x + len;
		default:
			return rect.x + Math.round(t.value * rect.width);
	}
}

export function tickY(t: Tick, edge: Edge, rect: Rect, len: number): number {
	switch (edge) {
		case "top":
			return rect.bottom() - len;
		case "bottom":
			return rect.y + len;
		default:
			return rect.y + Math.round(t.value * rect.height);
	}
}
