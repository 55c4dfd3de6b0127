/**
 * Error taxonomy of the renderer. Every failure that can abort a render
 * derives from RenderError so callers can tell them apart from I/O errors.
 */

export class RenderError extends Error {
	constructor(message: string) {
		super(message);
		this.name = "RenderError";
	}
}

/** A transform (shape, pattern or camera view) whose matrix has no inverse. */
export class NonInvertibleMatrixError extends RenderError {
	constructor(
		message: string,
		public readonly determinant: number
	) {
		super(message);
		this.name = "NonInvertibleMatrixError";
	}
}

/** Shadow testing and shading are defined for exactly one light source. */
export class LightCountError extends RenderError {
	constructor(public readonly lightCount: number) {
		super(`World: expected exactly one light source, found ${lightCount}`);
		this.name = "LightCountError";
	}
}

export class CanvasBoundsError extends RenderError {
	constructor(
		public readonly x: number,
		public readonly y: number,
		width: number,
		height: number
	) {
		super(`Canvas: pixel (${x}, ${y}) is outside ${width}x${height}`);
		this.name = "CanvasBoundsError";
	}
}

export class DivisionByZeroError extends RenderError {
	constructor(operation: string) {
		super(`${operation}: divisor is too close to zero`);
		this.name = "DivisionByZeroError";
	}
}

export class UnsupportedShapeOperationError extends RenderError {
	constructor(shape: string, operation: string) {
		super(`${shape} does not support ${operation}()`);
		this.name = "UnsupportedShapeOperationError";
	}
}

export class InvalidParameterError extends RenderError {
	constructor(message: string) {
		super(message);
		this.name = "InvalidParameterError";
	}
}
