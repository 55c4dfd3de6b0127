/**
 * Homogeneous 4-component tuple. `w = 1` marks a point, `w = 0` a direction;
 * both share the same arithmetic.
 */

import { CoreConstants } from "../core/Constants";
import { DivisionByZeroError } from "../core/Errors";
import { feq, isNearZero } from "./Common";
import type { IVector4 } from "./types";

export class Vector4 implements IVector4 {
	constructor(
		public x: number = 0,
		public y: number = 0,
		public z: number = 0,
		public w: number = 0
	) {}

	public static point(x: number, y: number, z: number): Vector4 {
		return new Vector4(x, y, z, 1);
	}

	public static vector(x: number, y: number, z: number): Vector4 {
		return new Vector4(x, y, z, 0);
	}

	public static from(v: IVector4): Vector4 {
		return new Vector4(v.x, v.y, v.z, v.w);
	}

	public isPoint(): boolean {
		return feq(this.w, 1);
	}

	public isVector(): boolean {
		return feq(this.w, 0);
	}

	public clone(): Vector4 {
		return new Vector4(this.x, this.y, this.z, this.w);
	}

	public add(v: IVector4): this {
		this.x += v.x;
		this.y += v.y;
		this.z += v.z;
		this.w += v.w;
		return this;
	}

	public sub(v: IVector4): this {
		this.x -= v.x;
		this.y -= v.y;
		this.z -= v.z;
		this.w -= v.w;
		return this;
	}

	public scale(s: number): this {
		this.x *= s;
		this.y *= s;
		this.z *= s;
		this.w *= s;
		return this;
	}

	public negate(): this {
		return this.scale(-1);
	}

	public divide(s: number): this {
		if (isNearZero(s)) throw new DivisionByZeroError("Vector4.divide");
		return this.scale(1 / s);
	}

	public dot(v: IVector4): number {
		return Vector4.dot(this, v);
	}

	public length(): number {
		return Math.hypot(this.x, this.y, this.z, this.w);
	}

	public normalize(): this {
		const len = this.length();
		if (isNearZero(len)) throw new DivisionByZeroError("Vector4.normalize");
		return this.scale(1 / len);
	}

	/**
	 * Component-wise comparison within EPSILON.
	 */
	public equals(v: IVector4): boolean {
		return (
			feq(this.x, v.x) && feq(this.y, v.y) && feq(this.z, v.z) && feq(this.w, v.w)
		);
	}

	// Static methods for functional style
	public static add(a: IVector4, b: IVector4): Vector4 {
		return new Vector4(a.x + b.x, a.y + b.y, a.z + b.z, a.w + b.w);
	}

	public static sub(a: IVector4, b: IVector4): Vector4 {
		return new Vector4(a.x - b.x, a.y - b.y, a.z - b.z, a.w - b.w);
	}

	public static scale(v: IVector4, s: number): Vector4 {
		return new Vector4(v.x * s, v.y * s, v.z * s, v.w * s);
	}

	public static negate(v: IVector4): Vector4 {
		return new Vector4(-v.x, -v.y, -v.z, -v.w);
	}

	public static normalize(v: IVector4): Vector4 {
		return Vector4.from(v).normalize();
	}

	public static dot(a: IVector4, b: IVector4): number {
		return a.x * b.x + a.y * b.y + a.z * b.z + a.w * b.w;
	}

	/**
	 * Cross product of the x/y/z parts; the result is always a direction.
	 */
	public static cross(a: IVector4, b: IVector4): Vector4 {
		return Vector4.vector(
			a.y * b.z - a.z * b.y,
			a.z * b.x - a.x * b.z,
			a.x * b.y - a.y * b.x
		);
	}

	public static length(v: IVector4): number {
		return Math.hypot(v.x, v.y, v.z, v.w);
	}

	/**
	 * Reflects `v` around the normal `n`: v - 2 * n * dot(n, v).
	 */
	public static reflect(v: IVector4, n: IVector4): Vector4 {
		return Vector4.sub(v, Vector4.scale(n, 2 * Vector4.dot(n, v)));
	}

	/**
	 * Norm-based comparison: `|a - b| < EPSILON`.
	 */
	public static near(a: IVector4, b: IVector4): boolean {
		return Vector4.length(Vector4.sub(a, b)) < CoreConstants.EPSILON;
	}
}
