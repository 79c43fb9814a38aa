/* RECT
/*-----------------------------------------------------
/* Axis-aligned pixel rectangle and the edge-relative
/* partitioning every layout decision runs on.
/* All operations return new rectangles.
/* ==================================================== */

export type Edge = "top" | "left" | "bottom" | "right";

export type AspectRatio = "landscape" | "square" | "portrait";

export class Rect {
	readonly x: number;
	readonly y: number;
	readonly width: number;
	readonly height: number;

	constructor(x: number, y: number, width: number, height: number) {
		this.x = Math.trunc(x);
		this.y = Math.trunc(y);
		this.width = dimension(width);
		this.height = dimension(height);
	}

	right(): number {
		return this.x + this.width;
	}

	bottom(): number {
		return this.y + this.height;
	}

	/** Shrink every side by `amount`, saturating at zero size */
	inset(amount: number): Rect {
		const v = dimension(amount);
		return new Rect(this.x + v, this.y + v, this.width - 2 * v, this.height - 2 * v);
	}

	/**
	 * Carve a strip of `amount` pixels off one edge.
	 *
	 * Returns `[remainder, carved]`; together they tile this rectangle.
	 * Asking for more than is available carves a zero-size strip and
	 * leaves the remainder whole.
	 */
	split(edge: Edge, amount: number): [Rect, Rect] {
		const v = dimension(amount);
		switch (edge) {
			case "top": {
				const h = carvable(v, this.height);
				return [
					new Rect(this.x, this.y + h, this.width, this.height - h),
					new Rect(this.x, this.y, this.width, h),
				];
			}
			case "left": {
				const w = carvable(v, this.width);
				return [
					new Rect(this.x + w, this.y, this.width - w, this.height),
					new Rect(this.x, this.y, w, this.height),
				];
			}
			case "bottom": {
				const h = carvable(v, this.height);
				const rest = this.height - h;
				return [
					new Rect(this.x, this.y, this.width, rest),
					new Rect(this.x, this.y + rest, this.width, h),
				];
			}
			case "right": {
				const w = carvable(v, this.width);
				const rest = this.width - w;
				return [
					new Rect(this.x, this.y, rest, this.height),
					new Rect(this.x + rest, this.y, w, this.height),
				];
			}
		}
	}

	/** Clip to the horizontal extent of `other` */
	intersectHoriz(other: Rect): Rect {
		const x = Math.max(this.x, other.x);
		const x2 = Math.min(this.right(), other.right());
		return new Rect(x, this.y, x2 - x, this.height);
	}

	/** Clip to the vertical extent of `other` */
	intersectVert(other: Rect): Rect {
		const y = Math.max(this.y, other.y);
		const y2 = Math.min(this.bottom(), other.bottom());
		return new Rect(this.x, y, this.width, y2 - y);
	}

	equals(other: Rect): boolean {
		return (
			this.x === other.x &&
			this.y === other.y &&
			this.width === other.width &&
			this.height === other.height
		);
	}

	toString(): string {
		return `Rect(${this.x}, ${this.y}, ${this.width}x${this.height})`;
	}
}

export function isHorizontal(edge: Edge): boolean {
	return edge === "top" || edge === "bottom";
}

export function aspectRect(ratio: AspectRatio): Rect {
	switch (ratio) {
		case "landscape":
			return new Rect(0, 0, 2000, 1500);
		case "square":
			return new Rect(0, 0, 2000, 2000);
		case "portrait":
			return new Rect(0, 0, 1500, 2000);
	}
}

function carvable(amount: number, available: number): number {
	return amount > available ? 0 : amount;
}

// Widths and heights are whole pixels and never negative
function dimension(value: number): number {
	if (!Number.isFinite(value)) return 0;
	return Math.max(0, Math.trunc(value));
}
