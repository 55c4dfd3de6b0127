/**
 * ASCII "P3" PPM serialization of a Canvas.
 */

import { mkdir, writeFile } from "node:fs/promises";
import { dirname } from "node:path";
import { CoreConstants } from "../core/Constants";
import { formatColor } from "./Color";
import type { Canvas } from "../core/Canvas";

export function encodePPM(canvas: Canvas): string {
	const lines = [
		"P3",
		`${canvas.width} ${canvas.height}`,
		`${CoreConstants.MAX_CHANNEL_VALUE}`,
	];

	for (let y = 0; y < canvas.height; y++) {
		lines.push(canvas.row(y).map(formatColor).join(" ").trim());
	}

	return lines.join("\n").trim();
}

/**
 * Writes the encoded canvas to `path`, creating parent directories.
 */
export async function writePPM(canvas: Canvas, path: string): Promise<void> {
	await mkdir(dirname(path), { recursive: true });
	await writeFile(path, encodePPM(canvas), "utf8");
}
