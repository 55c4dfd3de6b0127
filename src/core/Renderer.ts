import { Canvas } from "./Canvas";
import { EventEmitter } from "./EventEmitter";
import { World } from "./World";
import { Color, type RGB } from "../utils/Color";
import { createLogger } from "../utils/Logger";
import { isPointMarker, type PointMarker } from "../shapes";
import type { Camera } from "../cameras/Camera";
import type { RenderEvents, RenderOptions } from "./types";

const log = createLogger("Renderer");

/**
 * RENDERING CONVENTIONS:
 * - One primary ray per pixel through the pixel centre
 * - Pixels are visited row by row, (0,0) top-left
 * - Any error aborts the whole render; no partial image is returned
 */

export class Renderer extends EventEmitter<RenderEvents> {
	public world: World;
	public camera: Camera;

	public params: {
		background: Color;
		reportProgress: boolean;
	};

	constructor(world: World, camera: Camera, options: RenderOptions = {}) {
		super();
		this.world = world;
		this.camera = camera;
		this.params = {
			background: Color.from(options.background ?? Color.black()),
			reportProgress: options.reportProgress ?? true,
		};
	}

	public setBackground(background: RGB): this {
		this.params.background = Color.from(background);
		return this;
	}

	public render(): Canvas {
		const { hsize: width, vsize: height } = this.camera;
		const canvas = new Canvas(width, height, this.params.background);
		const started = performance.now();

		this.world.validate();
		this.emit("renderstart", { width, height });
		log.debug(
			`rendering ${width}x${height}, ${this.world.shapes.length} shapes`
		);

		for (let y = 0; y < height; y++) {
			for (let x = 0; x < width; x++) {
				const ray = this.camera.rayForPixel(x, y);
				canvas.write(x, y, this.world.calc(ray, this.params.background));
			}
			if (this.params.reportProgress) {
				this.emit("row", { row: y, rows: height, ratio: (y + 1) / height });
			}
		}

		for (const shape of this.world.shapes) {
			if (isPointMarker(shape)) this.plot(canvas, shape);
		}

		const durationMs = performance.now() - started;
		this.emit("renderend", { width, height, pixels: width * height, durationMs });
		log.debug(`finished in ${durationMs.toFixed(1)} ms`);

		return canvas;
	}

	/**
	 * Draws a marker at its transformed position, rounded to the nearest pixel.
	 */
	public plot(canvas: Canvas, marker: PointMarker): void {
		const p = marker.transformedPosition();
		canvas.write(Math.round(p.x), Math.round(p.y), marker.material.color);
	}
}
