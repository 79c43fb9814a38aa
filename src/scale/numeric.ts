/* NUMERIC SCALE
/*-----------------------------------------------------
/* Fits a numeric range to "nice" bounds and tick spacing,
/* and normalizes values into that range.
/* ==================================================== */

import { formatTick, tick, type Tick } from "./tick.ts";

export type Direction = "ascending" | "descending";

// Spans at or below single-precision epsilon normalize to the center
const DEGENERATE_SPAN = 1.1920929e-7;

// Quotients this close to an integer are treated as that integer
const SNAP_TOLERANCE = 1e-9;

export class NumericScale {
	private constructor(
		readonly start: number,
		readonly stop: number,
		/** Distance between ticks; 0 only for a single-value scale */
		readonly tickSpacing: number,
		readonly direction: Direction,
		private readonly decimals: number,
	) {}

	/**
	 * Fit a scale around `[min, max]`.
	 *
	 * A first pass at the span's power of ten counts coarse steps; the count
	 * picks the final spacing out of spc/10, spc/4, spc/2 or spc, which is
	 * then applied again to find the bounds. This yields 4 to 10 intervals
	 * whatever the magnitude of the data.
	 */
	static fit(min: number, max: number): NumericScale {
		if (!Number.isFinite(min) || !Number.isFinite(max)) {
			return NumericScale.fit(0, 1);
		}
		if (min > max) [min, max] = [max, min];
		const span = max - min;
		if (!(span > 0) || !Number.isFinite(span)) {
			return new NumericScale(min, min, 0, "ascending", 0);
		}
		const power = decimalPower(span);
		const decimals = Math.max(0, 2 - power);
		const spacing = roundTo(niceSpacing(min, max, power), decimals);
		let start = roundTo(floorIndex(min / spacing) * spacing, decimals);
		let stop = roundTo(ceilIndex(max / spacing) * spacing, decimals);
		// A snapped quotient may land one step inside the data
		if (start > min) start = roundTo(start - spacing, decimals);
		if (stop < max) stop = roundTo(stop + spacing, decimals);
		return new NumericScale(start, stop, spacing, "ascending", decimals);
	}

	/** Scale over the finite values `get` extracts; `[0, 1]` when there are none */
	static fromData<T>(data: Iterable<T>, get: (item: T) => number): NumericScale {
		let min = Number.POSITIVE_INFINITY;
		let max = Number.NEGATIVE_INFINITY;
		for (const item of data) {
			const v = get(item);
			if (!Number.isFinite(v)) continue;
			if (v < min) min = v;
			if (v > max) max = v;
		}
		if (min > max) return NumericScale.fit(0, 1);
		return NumericScale.fit(min, max);
	}

	/** Refit over both ranges so the combined spacing stays nice */
	union(other: NumericScale): NumericScale {
		const merged = NumericScale.fit(
			Math.min(this.start, other.start),
			Math.max(this.stop, other.stop),
		);
		return this.direction === "descending" ? merged.inverted() : merged;
	}

	inverted(): NumericScale {
		return new NumericScale(
			this.start,
			this.stop,
			this.tickSpacing,
			this.direction === "ascending" ? "descending" : "ascending",
			this.decimals,
		);
	}

	normalize(value: number): number {
		const span = this.stop - this.start;
		if (span <= DEGENERATE_SPAN) return 0.5;
		return this.direction === "ascending"
			? (value - this.start) / span
			: (this.stop - value) / span;
	}

	ticks(): Tick[] {
		if (this.tickSpacing === 0) {
			return [tick(this.normalize(this.start), formatTick(this.start))];
		}
		const first = Math.round(this.start / this.tickSpacing);
		const last = Math.round(this.stop / this.tickSpacing);
		const ticks: Tick[] = [];
		if (this.direction === "ascending") {
			for (let k = first; k <= last; k++) ticks.push(this.tickAt(k));
		} else {
			for (let k = last; k >= first; k--) ticks.push(this.tickAt(k));
		}
		return ticks;
	}

	private tickAt(k: number): Tick {
		const v = roundTo(k * this.tickSpacing, this.decimals);
		return tick(this.normalize(v), formatTick(v));
	}
}

function niceSpacing(min: number, max: number, power: number): number {
	const spc = pow10(power);
	const steps = ceilIndex(max / spc) - floorIndex(min / spc);
	if (steps <= 1) return spc / 10;
	if (steps <= 2) return spc / 4;
	if (steps < 5) return spc / 2;
	return spc;
}

// floor(log10(span)), corrected where log10 lands just off an exact power
function decimalPower(span: number): number {
	let p = Math.floor(Math.log10(span));
	if (pow10(p + 1) <= span) p++;
	else if (pow10(p) > span) p--;
	return p;
}

function pow10(p: number): number {
	return p >= 0 ? 10 ** p : 1 / 10 ** -p;
}

function floorIndex(q: number): number {
	const r = Math.round(q);
	return Math.abs(q - r) <= SNAP_TOLERANCE * Math.max(1, Math.abs(q)) ? r : Math.floor(q);
}

function ceilIndex(q: number): number {
	const r = Math.round(q);
	return Math.abs(q - r) <= SNAP_TOLERANCE * Math.max(1, Math.abs(q)) ? r : Math.ceil(q);
}

// toFixed takes at most 100 digits; finer values are left as they are
function roundTo(value: number, decimals: number): number {
	if (decimals > 100) return value;
	return Number(value.toFixed(decimals));
}
