import { Vector4 } from "../maths/Vector4";
import { Material } from "../materials";
import { UnsupportedShapeOperationError } from "../core/Errors";
import { Shape, ShapeType, type ShapeParams } from "./Shape";
import type { Ray } from "../core/Ray";
import type { RGB } from "../utils/Color";

export interface PointMarkerParams extends ShapeParams {
	position?: Vector4;
	color?: RGB;
}

/**
 * A single coloured dot plotted straight onto the canvas after ray casting.
 * Its transformation maps the position into canvas pixel coordinates;
 * rays pass through it.
 */
export class PointMarker extends Shape<ShapeType.PointMarker> {
	public position: Vector4;

	constructor(params: PointMarkerParams = {}) {
		super(ShapeType.PointMarker, params);
		this.position = params.position ?? Vector4.point(0, 0, 0);
		if (params.color) this.material = new Material({ color: params.color });
	}

	/** Position after the marker's transformation. */
	public transformedPosition(): Vector4 {
		return this.transformation.matrix.multiplyVector(this.position);
	}

	public localIntersect(_ray: Ray): number[] {
		return [];
	}

	public localNormal(_objectPoint: Vector4): Vector4 {
		throw new UnsupportedShapeOperationError("PointMarker", "localNormal");
	}
}
