/* MARKERS
/*-----------------------------------------------------
/* Per-series marker glyphs and style classes,
/* assigned round-robin by series index.
/* ==================================================== */

export const MARKERS = [
	'<circle r="1"/>',
	'<rect x="-1" y="-1" width="2" height="2"/>',
	'<path d="M0 -1 1 1 -1 1z"/>',
	'<path d="M1 0 -1 1 -1 -1z"/>',
	'<path d="M0 1 -1 -1 1 -1z"/>',
	'<path d="M-1 0 1 -1 1 1z"/>',
	'<path d="M0 -1 1 0 0 1 -1 0z"/>',
	'<path d="M-1 -1 0 -0.5 1 -1 0.5 0 1 1 0 0.5 -1 1 -0.5 0z"/>',
] as const;

/** Series colors, matching the `plot-N` classes of the stylesheet */
export const STYLE_COLORS = [
	"#4e79a7",
	"#f28e2b",
	"#e15759",
	"#76b7b2",
	"#59a14f",
	"#edc948",
	"#b07aa1",
	"#ff9da7",
	"#9c755f",
	"#bab0ac",
] as const;

export const STYLE_CLASSES = STYLE_COLORS.length;

export function markerIndex(num: number): number {
	return num % MARKERS.length;
}

export function styleIndex(num: number): number {
	return num % STYLE_CLASSES;
}

export function markerDef(num: number, idPrefix = ""): string {
	return [
		`<marker id="${idPrefix}marker-${markerIndex(num)}" viewBox="-1 -1 2 2" markerWidth="5" markerHeight="5">`,
		`  ${MARKERS[markerIndex(num)] ?? MARKERS[0]}`,
		"</marker>",
	].join("\n");
}
