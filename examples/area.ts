/**
 * Area plot, printed as a standalone SVG document.
 *
 * Usage: npm run example:area > area.svg
 */

import { Chart, Domain, Plot } from "../src/index.ts";

const dataA = [[13, 74], [111, 37], [125, 52], [190, 66]] as const;
const dataB = [[22, 50], [105, 44], [120, 67], [180, 39]] as const;

const chart = Chart.builder()
	.aspectRatio("square")
	.domain(Domain.fromData(dataA).including(dataB))
	.title("Area Plot")
	.axis("X Axis", "bottom")
	.axis("Y Axis", "left")
	.plot(Plot.area("Series A", dataA))
	.plot(Plot.area("Series B", dataB))
	.build();

console.log(chart.toSvg());
