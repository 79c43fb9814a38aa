/* TEXT
/*-----------------------------------------------------
/* SVG text elements placed relative to a rectangle edge.
/* ==================================================== */

import type { Edge, Rect } from "../geometry/rect.ts";

export type Anchor = "start" | "middle" | "end";

export interface TextOptions {
	edge: Edge;
	anchor?: Anchor;
	rect?: Rect;
	className?: string;
}

export interface Tspan {
	text: string;
	x?: number;
	y?: number;
	/** Offset in em */
	dy?: number;
}

/** Opening `<text>` tag; side edges rotate the text to run along them */
export function textOpen(options: TextOptions): string {
	const anchor = options.anchor ?? "middle";
	let tag = "<text";
	if (options.className) tag += ` class="${options.className}"`;
	if (options.rect) tag += ` transform="${transform(options.edge, anchor, options.rect)}"`;
	return `${tag} text-anchor="${anchor}">`;
}

export function textClose(): string {
	return "</text>";
}

export function textElement(options: TextOptions, content: string): string {
	return `${textOpen(options)}${escapeXml(content)}${textClose()}`;
}

export function tspan(span: Tspan): string {
	let tag = "<tspan";
	if (span.x !== undefined) tag += ` x="${span.x}"`;
	if (span.y !== undefined) tag += ` y="${span.y}"`;
	if (span.dy !== undefined) tag += ` dy="${span.dy}em"`;
	return `${tag}>${escapeXml(span.text)}</tspan>`;
}

function transform(edge: Edge, anchor: Anchor, rect: Rect): string {
	const horizontal = edge === "top" || edge === "bottom";
	let x = rect.x + Math.trunc(rect.width / 2);
	if (horizontal && anchor === "start") x = rect.x;
	if (horizontal && anchor === "end") x = rect.right();

	let y = rect.y + Math.trunc(rect.height / 2);
	if ((edge === "left" && anchor === "end") || (edge === "right" && anchor === "start")) {
		y = rect.y;
	}
	if ((edge === "left" && anchor === "start") || (edge === "right" && anchor === "end")) {
		y = rect.bottom();
	}

	const translate = `translate(${x} ${y})`;
	if (edge === "left") return `${translate} rotate(-90)`;
	if (edge === "right") return `${translate} rotate(90)`;
	return translate;
}

export function escapeXml(text: string): string {
	return text
		.replace(/&/g, "&amp;")
		.replace(/</g, "&lt;")
		.replace(/>/g, "&gt;")
		.replace(/"/g, "&quot;");
}
