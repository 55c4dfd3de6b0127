import { CanvasBoundsError, InvalidParameterError } from "./Errors";
import { Color, type RGB } from "../utils/Color";

/**
 * Row-major pixel buffer of linear colours.
 */
export class Canvas {
	public readonly width: number;
	public readonly height: number;
	public readonly pixels: Color[];

	constructor(width: number, height: number, background: RGB = Color.black()) {
		if (!Number.isInteger(width) || !Number.isInteger(height) || width <= 0 || height <= 0) {
			throw new InvalidParameterError(
				`Canvas: dimensions must be positive integers, got ${width}x${height}`
			);
		}
		this.width = width;
		this.height = height;
		this.pixels = Array.from({ length: width * height }, () => Color.from(background));
	}

	private _index(x: number, y: number): number {
		if (
			!Number.isInteger(x) ||
			!Number.isInteger(y) ||
			x < 0 ||
			y < 0 ||
			x >= this.width ||
			y >= this.height
		) {
			throw new CanvasBoundsError(x, y, this.width, this.height);
		}
		return y * this.width + x;
	}

	public write(x: number, y: number, color: RGB): void {
		this.pixels[this._index(x, y)] = Color.from(color);
	}

	public pixelAt(x: number, y: number): Color {
		return this.pixels[this._index(x, y)];
	}

	/** Fills every pixel with `background`. */
	public reset(background: RGB): void {
		for (let i = 0; i < this.pixels.length; i++) {
			this.pixels[i] = Color.from(background);
		}
	}

	public row(y: number): Color[] {
		const start = this._index(0, y);
		return this.pixels.slice(start, start + this.width);
	}
}
