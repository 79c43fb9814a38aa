/* TITLE
/*-----------------------------------------------------
/* Chart title occupying a band on one edge.
/* ==================================================== */

import type { Edge, Rect } from "../geometry/rect.ts";
import { textElement, type Anchor } from "./text.ts";

export class Title {
	constructor(
		readonly text: string,
		readonly edge: Edge = "top",
		readonly anchor: Anchor = "middle",
	) {}

	/** Accepts a title, plain text, or `[text, edge]` */
	static from(title: TitleLike): Title {
		if (title instanceof Title) return title;
		if (typeof title === "string") return new Title(title);
		return new Title(title[0], title[1]);
	}

	atStart(): Title {
		return new Title(this.text, this.edge, "start");
	}

	atEnd(): Title {
		return new Title(this.text, this.edge, "end");
	}

	onEdge(edge: Edge): Title {
		return new Title(this.text, edge, this.anchor);
	}

	render(rect: Rect): string {
		return textElement({ edge: this.edge, anchor: this.anchor, rect, className: "title" }, this.text);
	}
}

export type TitleLike = Title | string | readonly [string, Edge];
