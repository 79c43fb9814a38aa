import { mkdtemp, readFile, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { describe, expect, it } from "vitest";
import { Chart } from "../src/chart/chart.ts";
import type { PlotStage } from "../src/chart/builder.ts";
import { Plot } from "../src/chart/plot.ts";
import { Domain } from "../src/domain/domain.ts";
import { ConfigError, FileError, InvalidOperationError } from "../src/errors/index.ts";
import { Rect } from "../src/geometry/rect.ts";
import { unwrap, unwrapErr } from "../src/types/result.ts";

const seriesA = [
	[13, 74],
	[111, 37],
	[125, 52],
	[190, 66],
] as const;

function lineChart(): Chart {
	return Chart.builder()
		.domain(Domain.fromData(seriesA))
		.title("Line Plot")
		.axis("X Axis", "bottom")
		.axis("Y Axis", "left")
		.plot(Plot.line("Series A", seriesA))
		.build();
}

/* LAYOUT
/*----------------------------------------------------- */

describe("Chart layout", () => {
	it("should inset the landscape canvas by the margin", () => {
		const chart = Chart.create();
		expect(chart.canvas()).toEqual(new Rect(0, 0, 2000, 1500));
		expect(chart.area()).toEqual(new Rect(40, 40, 1920, 1420));
		expect(chart.phase).toBe("aspect");
	});

	it("should carve titles and axes off the area in order", () => {
		const chart = Chart.builder().title("T").axis("X", "bottom").axis("Y", "left").build();
		expect(chart.titles[0]?.rect).toEqual(new Rect(40, 40, 1920, 100));
		expect(chart.axes[0]?.rect).toEqual(new Rect(40, 1300, 1920, 160));
		expect(chart.axes[1]?.rect).toEqual(new Rect(40, 140, 160, 1160));
		expect(chart.area()).toEqual(new Rect(200, 140, 1760, 1160));
	});

	it("should reserve less for unnamed axes", () => {
		const chart = Chart.builder().axis("", "bottom").build();
		expect(chart.area()).toEqual(new Rect(40, 40, 1920, 1340));
	});

	it("should size the canvas by aspect ratio", () => {
		const chart = Chart.builder().aspectRatio("portrait").build();
		expect(chart.aspectRatio).toBe("portrait");
		expect(chart.canvas()).toEqual(new Rect(0, 0, 1500, 2000));
		expect(chart.area()).toEqual(new Rect(40, 40, 1420, 1920));
	});

	it("should bind plots to the final plot area", () => {
		const chart = lineChart();
		expect(chart.plots[0]?.bound.rect).toEqual(chart.area());
		expect(chart.plots[0]?.num).toBe(0);
	});

	it("should apply layout overrides", () => {
		expect(Chart.builder({ margin: 0 }).build().area()).toEqual(new Rect(0, 0, 2000, 1500));
		const chart = Chart.builder({ titleSpace: 60 }).title("T").build();
		expect(chart.area()).toEqual(new Rect(40, 100, 1920, 1360));
	});

	it("should reject unusable layout values", () => {
		expect(() => Chart.create({ margin: -1 })).toThrow(ConfigError);
		expect(() => Chart.create({ tickLength: 2.5 })).toThrow(ConfigError);
	});
});

/* PHASES
/*----------------------------------------------------- */

describe("Chart phases", () => {
	it("should reject an axis once a plot is bound", () => {
		const chart = unwrap(Chart.create().withPlot(Plot.line("s", [1])));
		const result = chart.withAxis(chart.domain.axis("X", "bottom"));
		expect(result.ok).toBe(false);

		const error = unwrapErr(result);
		expect(error).toBeInstanceOf(InvalidOperationError);
		expect(error.operation).toBe("withAxis");
		expect(error.reason).toBe("cannot run in the axes phase once the chart has reached the plots phase");
	});

	it("should reject every backward transition", () => {
		const withDomain = unwrap(Chart.create().withDomain(Domain.default()));
		expect(withDomain.withAspectRatio("square").ok).toBe(false);

		const withTitle = unwrap(withDomain.withTitle("T"));
		expect(withTitle.withDomain(Domain.default()).ok).toBe(false);

		const withAxis = unwrap(withTitle.withAxis(withTitle.domain.axis("", "left")));
		expect(withAxis.withTitle("U").ok).toBe(false);
	});

	it("should allow repeating a phase and skipping ahead", () => {
		const chart = unwrap(Chart.create().withTitle("A"));
		expect(unwrap(chart.withTitle("B")).titles).toHaveLength(2);
		expect(Chart.create().withPlot(Plot.area("s", [])).ok).toBe(true);
		expect(unwrap(unwrap(Chart.create().withDomain(Domain.default())).withDomain(Domain.default())).phase).toBe(
			"domain",
		);
	});

	it("should leave the receiver unchanged", () => {
		const chart = Chart.create();
		unwrap(chart.withTitle("T"));
		expect(chart.titles).toHaveLength(0);
		expect(chart.area()).toEqual(new Rect(40, 40, 1920, 1420));
	});

	it("should format the rejection with the phase order", () => {
		const chart = unwrap(Chart.create().withPlot(Plot.line("s", [1])));
		const report = unwrapErr(chart.withTitle("T")).format().split("\n");
		expect(report[0]?.startsWith("error: invalid operation")).toBe(true);
		expect(report[1]).toBe("  --> chart.withTitle(...)");
		expect(report[3]).toBe(
			"   └── 'withTitle' cannot run in the titles phase once the chart has reached the plots phase",
		);
		expect(report[5]).toBe("help: build charts in the order aspect → domain → titles → axes → plots");
	});

	it("should only expose legal steps on builder stages", () => {
		const plotted = Chart.builder().plot(Plot.line("s", [1]));
		expect(Reflect.has(plotted, "axis")).toBe(false);
		expect(Reflect.has(plotted, "title")).toBe(false);

		const axed = Chart.builder().axis("", "left");
		expect(Reflect.has(axed, "title")).toBe(false);
		expect(Reflect.has(axed, "plot")).toBe(true);
	});
});

/* SVG OUTPUT
/*----------------------------------------------------- */

describe("Chart.toSvg", () => {
	it("should wrap the chart in a standalone svg document", () => {
		const svg = lineChart().toSvg();
		expect(svg.startsWith('<svg xmlns="http://www.w3.org/2000/svg" viewBox="0 0 2000 1500">')).toBe(true);
		expect(svg.endsWith("</g>\n</svg>")).toBe(true);
		expect(svg).toContain("<style>");
		expect(svg).toContain('<clipPath id="clip-chart">\n<rect x="200" y="140" width="1760" height="1160"/>');
	});

	it("should emit parts in drawing order", () => {
		const svg = lineChart().toSvg();
		const order = [
			"<defs>",
			'<text class="title" transform="translate(1000 90)" text-anchor="middle">Line Plot</text>',
			'<path class="grid-x"',
			'<path class="grid-y"',
			'<path class="axis-line" d="M200 1300h1760',
			'<g clip-path="url(#clip-chart)">',
			'<path class="plot-0 plot-line"',
		].map((part) => svg.indexOf(part));
		expect(order.every((index) => index >= 0)).toBe(true);
		expect([...order].sort((a, b) => a - b)).toEqual(order);
	});

	it("should leave out the stylesheet for embedded charts", () => {
		expect(lineChart().toSvg({ standalone: false })).not.toContain("<style>");
	});

	it("should prefix element ids", () => {
		const svg = lineChart().toSvg({ idPrefix: "p-" });
		expect(svg).toContain('<clipPath id="p-clip-chart">');
		expect(svg).toContain('<marker id="p-marker-0"');
		expect(svg).toContain('marker-end="url(#p-marker-0)"');
	});

	it("should define each used marker once", () => {
		let stage: PlotStage = Chart.builder();
		for (let i = 0; i < 10; i++) {
			stage = stage.plot(Plot.scatter(`s${i}`, [[i, i]]));
		}
		const svg = stage.build().toSvg();
		expect(svg.split("<marker id=").length - 1).toBe(8);
		expect(svg).toContain('class="plot-9 plot-scatter"');
		expect(svg).toContain('marker-end="url(#marker-1)"');
	});

	it("should escape title text", () => {
		const svg = Chart.builder().title("Sales <2024> & Revenue").build().toSvg();
		expect(svg).toContain(">Sales &lt;2024&gt; &amp; Revenue</text>");
	});

	it("should render the same document from toString", () => {
		const chart = lineChart();
		expect(chart.toString()).toBe(chart.toSvg());
	});
});

describe("Chart.toFile", () => {
	it("should write the svg document", async () => {
		const dir = await mkdtemp(join(tmpdir(), "tickplot-"));
		try {
			const chart = lineChart();
			const path = join(dir, "chart.svg");
			await chart.toFile(path);
			expect(await readFile(path, "utf8")).toBe(chart.toSvg());
			await expect(chart.toFile(join(dir, "missing", "chart.svg"))).rejects.toBeInstanceOf(FileError);
		} finally {
			await rm(dir, { recursive: true, force: true });
		}
	});
});
