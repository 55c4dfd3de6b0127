import type { Transformation } from "../maths/Transformation";
import type { RGB } from "../utils/Color";

export interface Transformable {
	transformation: Transformation;
}

export interface RenderOptions {
	/** Colour returned for rays that hit nothing. */
	background?: RGB;
	/** Emit a `row` event after each finished scanline. */
	reportProgress?: boolean;
}

export interface RenderProgress {
	row: number;
	rows: number;
	/** Fraction of rows completed, 0..1 */
	ratio: number;
}

export interface RenderStats {
	width: number;
	height: number;
	pixels: number;
	durationMs: number;
}

export type RenderEvents = {
	renderstart: [{ width: number; height: number }];
	row: [RenderProgress];
	renderend: [RenderStats];
};
