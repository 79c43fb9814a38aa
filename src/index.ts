/**
 * tickplot - nice-number scales, rectangle layout and SVG geometry
 * for line, area and scatter charts.
 *
 * Main entry point for the library.
 */

// Geometry
export { toPoint, type Point, type PointLike } from "./geometry/point.ts";
export { aspectRect, isHorizontal, Rect, type AspectRatio, type Edge } from "./geometry/rect.ts";
// Scales
export { NumericScale, type Direction } from "./scale/numeric.ts";
export { formatTick, tickX, tickY, type Tick } from "./scale/tick.ts";
// Domain
export { BoundDomain, Domain } from "./domain/domain.ts";
// Charts
export { Axis } from "./chart/axis.ts";
export { AxisStage, ChartBuilder, PlotStage, TitleStage } from "./chart/builder.ts";
export {
	Chart,
	type BoundPlot,
	type ChartPhase,
	type ChartResult,
	type PlacedAxis,
	type PlacedTitle,
} from "./chart/chart.ts";
export { DEFAULT_LAYOUT, resolveLayoutConfig, type LayoutConfig } from "./chart/config.ts";
export { MARKERS, STYLE_COLORS, markerIndex, styleIndex } from "./chart/markers.ts";
export { Page, renderLegend } from "./chart/page.ts";
export { Plot, plotPath, toPathData, type PathCommand, type PlotKind } from "./chart/plot.ts";
export { renderSvg, type SvgOptions } from "./chart/svg.ts";
export { Title, type TitleLike } from "./chart/title.ts";
export type { Anchor } from "./chart/text.ts";
// Adapters
export { renderVegaLite, toVegaLiteSpec, type VegaLiteSpec } from "./adapters/vega-lite.ts";
// Errors and results
export { ConfigError, FileError, InvalidOperationError, TickplotError } from "./errors/index.ts";
export { andThen, err, ok, unwrap, unwrapErr, type Result } from "./types/result.ts";
