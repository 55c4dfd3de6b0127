import { Matrix4 } from "../maths/Matrix4";
import { Vector4 } from "../maths/Vector4";

export class Ray {
	constructor(
		public readonly origin: Vector4,
		public readonly direction: Vector4
	) {}

	/**
	 * Point reached after travelling `t` units of direction from the origin.
	 */
	public position(t: number): Vector4 {
		return Vector4.add(this.origin, Vector4.scale(this.direction, t));
	}

	/**
	 * Applies the same matrix to origin and direction. The direction's
	 * w = 0 keeps translation out of it.
	 */
	public transform(m: Matrix4): Ray {
		return new Ray(m.multiplyVector(this.origin), m.multiplyVector(this.direction));
	}
}
