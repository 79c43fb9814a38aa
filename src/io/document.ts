/* DOCUMENT OUTPUT
/*-----------------------------------------------------
/* Writes rendered SVG/HTML documents to disk.
/* ==================================================== */

import { writeFile } from "node:fs/promises";
import { FileError } from "../errors/index.ts";

export async function writeDocument(path: string, content: string): Promise<void> {
	try {
		await writeFile(path, content, "utf8");
	} catch (error) {
		const reason = error instanceof Error ? error.message : String(error);
		throw new FileError(path, reason, "check that the directory exists and is writable");
	}
}
