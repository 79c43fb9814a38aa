/* POINTS
/*-----------------------------------------------------
/* Anything that can stand for an (x, y) data point.
/* ==================================================== */

export interface Point {
	readonly x: number;
	readonly y: number;
}

/**
 * Accepted point inputs. A bare number `v` is the point `(v, v)`.
 */
export type PointLike = number | readonly [number, number] | Point;

export function toPoint(pt: PointLike): Point {
	if (typeof pt === "number") return { x: pt, y: pt };
	if (isPair(pt)) return { x: pt[0], y: pt[1] };
	return { x: pt.x, y: pt.y };
}

export function pointX(pt: PointLike): number {
	return toPoint(pt).x;
}

export function pointY(pt: PointLike): number {
	return toPoint(pt).y;
}

function isPair(pt: readonly [number, number] | Point): pt is readonly [number, number] {
	return Array.isArray(pt);
}
