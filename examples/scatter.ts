/**
 * Scatter plot built through the Result-returning chart transitions,
 * the way a chart assembled from runtime input would be.
 *
 * Usage: npm run example:scatter > scatter.html
 */

import { andThen, Chart, Domain, Page, Plot } from "../src/index.ts";

const dataA = [{ x: 13, y: 74 }, { x: 111, y: 37 }, { x: 125, y: 52 }, { x: 190, y: 66 }];
const dataB = [{ x: 22, y: 50 }, { x: 105, y: 44 }, { x: 120, y: 67 }, { x: 180, y: 39 }];

const domain = Domain.fromData(dataA);
let result = Chart.create().withDomain(domain);
result = andThen(result, (c) => c.withTitle("Scatter Plot"));
result = andThen(result, (c) => c.withAxis(domain.axis("X Axis", "bottom")));
result = andThen(result, (c) => c.withAxis(domain.axis("Y Axis", "left")));
result = andThen(result, (c) => c.withPlot(Plot.scatter("Series A", dataA)));
result = andThen(result, (c) => c.withPlot(Plot.scatter("Series B", dataB)));

if (result.ok) {
	console.log(Page.create().chart(result.data).toHtml());
} else {
	console.error(result.error.format());
	process.exitCode = 1;
}
