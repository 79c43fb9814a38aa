/* LAYOUT CONFIG
/*-----------------------------------------------------
/* Pixel budgets for margins, titles, axes and ticks.
/* ==================================================== */

import { ConfigError } from "../errors/index.ts";

export interface LayoutConfig {
	/** Inset on every side of the canvas */
	margin: number;
	/** Band reserved per title */
	titleSpace: number;
	/** Band reserved per unnamed axis */
	axisSpace: number;
	/** Band reserved per named axis */
	namedAxisSpace: number;
	tickLength: number;
	/** Gap between a tick's end and its label on vertical axes */
	tickLabelGap: number;
}

export const DEFAULT_LAYOUT: Readonly<LayoutConfig> = {
	margin: 40,
	titleSpace: 100,
	axisSpace: 80,
	namedAxisSpace: 160,
	tickLength: 20,
	tickLabelGap: 8,
} as const;

export function resolveLayoutConfig(overrides: Partial<LayoutConfig> = {}): LayoutConfig {
	const config: LayoutConfig = { ...DEFAULT_LAYOUT, ...overrides };
	for (const [key, value] of Object.entries(config)) {
		if (!Number.isInteger(value) || value < 0) {
			throw new ConfigError(key, value);
		}
	}
	return config;
}
