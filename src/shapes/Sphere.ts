import { SceneConstants } from "../core/Constants";
import { Vector4 } from "../maths/Vector4";
import { Shape, ShapeType, type ShapeParams } from "./Shape";
import type { Ray } from "../core/Ray";

export interface SphereParams extends ShapeParams {
	center?: Vector4;
	radius?: number;
}

export class Sphere extends Shape<ShapeType.Sphere> {
	public center: Vector4;
	public radius: number;

	constructor(params: SphereParams = {}) {
		super(ShapeType.Sphere, params);
		this.center = params.center ?? Vector4.point(0, 0, 0);
		this.radius = params.radius ?? SceneConstants.DEFAULT_SPHERE_RADIUS;
	}

	/**
	 * Half-b form of the quadratic: both roots share the divisor
	 * c = dot(direction, direction), so the direction need not be unit length.
	 */
	public localIntersect(ray: Ray): number[] {
		const delta = Vector4.sub(ray.origin, this.center);

		const a = Vector4.dot(delta, delta) - this.radius * this.radius;
		const b = Vector4.dot(ray.direction, delta);
		const c = Vector4.dot(ray.direction, ray.direction);

		const discriminant = b * b - a * c;
		if (discriminant < 0) return [];

		const sqrtD = Math.sqrt(discriminant);
		return [(-b + sqrtD) / c, (-b - sqrtD) / c];
	}

	public localNormal(objectPoint: Vector4): Vector4 {
		return Vector4.sub(objectPoint, this.center);
	}
}
