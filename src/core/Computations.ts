import { CoreConstants } from "./Constants";
import { Vector4 } from "../maths/Vector4";
import type { Intersection } from "./Intersections";
import type { Ray } from "./Ray";
import type { Shape } from "../shapes";

/**
 * Per-hit values needed for shading.
 */
export interface Computations {
	t: number;
	shape: Shape;
	point: Vector4;
	/** `point` nudged along the normal; shadow rays start here to avoid acne. */
	overPoint: Vector4;
	eye: Vector4;
	normal: Vector4;
	inside: boolean;
}

export function prepareComputations(hit: Intersection, ray: Ray): Computations {
	const point = ray.position(hit.t);
	const eye = Vector4.negate(ray.direction);
	let normal = hit.shape.normal(point);
	let inside = false;

	if (Vector4.dot(normal, eye) < 0) {
		inside = true;
		normal = Vector4.negate(normal);
	}

	const overPoint = Vector4.add(point, Vector4.scale(normal, CoreConstants.EPSILON));

	return { t: hit.t, shape: hit.shape, point, overPoint, eye, normal, inside };
}
