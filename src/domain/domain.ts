/* DOMAIN
/*-----------------------------------------------------
/* Paired X/Y scales and their binding to pixel space.
/* ==================================================== */

import { Axis } from "../chart/axis.ts";
import { pointX, pointY, type PointLike } from "../geometry/point.ts";
import type { Edge, Rect } from "../geometry/rect.ts";
import { isHorizontal } from "../geometry/rect.ts";
import { NumericScale } from "../scale/numeric.ts";
import type { Tick } from "../scale/tick.ts";

/**
 * Data domain in two dimensions.
 *
 * `yScale` is kept descending: larger values map to smaller pixel Y.
 */
export class Domain {
	readonly xScale: NumericScale;
	readonly yScale: NumericScale;

	private constructor(xScale: NumericScale, yScale: NumericScale) {
		this.xScale = xScale;
		this.yScale = yScale.direction === "descending" ? yScale : yScale.inverted();
	}

	/** Unit domain, `[0, 1]` on both axes */
	static default(): Domain {
		return new Domain(NumericScale.fit(0, 1), NumericScale.fit(0, 1));
	}

	static fromData(data: Iterable<PointLike>): Domain {
		const points = Array.from(data);
		return new Domain(xScaleOf(points), yScaleOf(points));
	}

	/** Build from explicit scales; the Y scale is stored descending either way */
	static fromScales(xScale: NumericScale, yScale: NumericScale): Domain {
		return new Domain(xScale, yScale);
	}

	/** Widen both axes to include `data` */
	including(data: Iterable<PointLike>): Domain {
		const points = Array.from(data);
		return new Domain(this.xScale.union(xScaleOf(points)), this.yScale.union(yScaleOf(points)));
	}

	/** Replace the X scale with one fitted to `data` */
	withX(data: Iterable<PointLike>): Domain {
		return new Domain(xScaleOf(data), this.yScale);
	}

	/** Replace the Y scale with one fitted to `data` */
	withY(data: Iterable<PointLike>): Domain {
		return new Domain(this.xScale, yScaleOf(data));
	}

	xTicks(): Tick[] {
		return this.xScale.ticks();
	}

	yTicks(): Tick[] {
		return this.yScale.ticks();
	}

	/**
	 * Axis along `edge`: top and bottom take X ticks, left and right Y ticks.
	 * An empty name leaves the axis unnamed.
	 */
	axis(name: string, edge: Edge): Axis {
		const ticks = isHorizontal(edge) ? this.xTicks() : this.yTicks();
		return new Axis(edge, ticks, name.length > 0 ? name : undefined);
	}

	bind(rect: Rect): BoundDomain {
		return new BoundDomain(this, rect);
	}
}

/**
 * A domain fixed to a pixel rectangle.
 */
export class BoundDomain {
	constructor(
		readonly domain: Domain,
		readonly rect: Rect,
	) {}

	xMap(x: number): number {
		return roundHalfAway(this.rect.x + this.rect.width * this.domain.xScale.normalize(x));
	}

	yMap(y: number): number {
		return roundHalfAway(this.rect.y + this.rect.height * this.domain.yScale.normalize(y));
	}

	withRect(rect: Rect): BoundDomain {
		return new BoundDomain(this.domain, rect);
	}
}

function xScaleOf(data: Iterable<PointLike>): NumericScale {
	return NumericScale.fromData(data, pointX);
}

function yScaleOf(data: Iterable<PointLike>): NumericScale {
	return NumericScale.fromData(data, pointY);
}

function roundHalfAway(value: number): number {
	const r = Math.round(Math.abs(value));
	return value < 0 && r !== 0 ? -r : r;
}
