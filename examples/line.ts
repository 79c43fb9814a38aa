/**
 * Line plot of two series sharing one domain.
 *
 * Usage: npm run example:line > line.html
 */

import { Chart, Domain, Page, Plot } from "../src/index.ts";

const dataA = [[13, 74], [111, 37], [125, 52], [190, 66]] as const;
const dataB = [[22, 50], [105, 44], [120, 67], [180, 39], [210, 43]] as const;

const chart = Chart.builder()
	.domain(Domain.fromData(dataA).including(dataB))
	.title("Line Plot")
	.axis("X Axis", "bottom")
	.axis("Y Axis", "left")
	.axis("", "right")
	.plot(Plot.labelled(Plot.line("Series A", dataA)))
	.plot(Plot.line("Series B", dataB))
	.build();

console.log(Page.create().chart(chart).toHtml());
