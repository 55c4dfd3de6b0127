import { Vector4 } from "../maths/Vector4";
import { isNearZero } from "../maths/Common";
import { Shape, ShapeType, type ShapeParams } from "./Shape";
import type { Ray } from "../core/Ray";

/**
 * Infinite xz-plane through the local origin.
 */
export class Plane extends Shape<ShapeType.Plane> {
	constructor(params: ShapeParams = {}) {
		super(ShapeType.Plane, params);
	}

	public localIntersect(ray: Ray): number[] {
		// parallel and coplanar rays never hit
		if (isNearZero(ray.direction.y)) return [];
		return [-ray.origin.y / ray.direction.y];
	}

	public localNormal(_objectPoint: Vector4): Vector4 {
		return Vector4.vector(0, 1, 0);
	}
}
