import { Matrix4 } from "../maths/Matrix4";
import { Vector4 } from "../maths/Vector4";
import { Ray } from "../core/Ray";
import { InvalidParameterError } from "../core/Errors";

export interface CameraParams {
	hsize: number;
	vsize: number;
	/** Horizontal or vertical field of view (whichever side is longer), radians. */
	fieldOfView: number;
	transform?: Matrix4;
}

/**
 * Pinhole camera. The canvas sits one unit in front of the eye at z = -1
 * in camera space; `transform` maps world space into camera space.
 */
export class Camera {
	public readonly hsize: number;
	public readonly vsize: number;
	public readonly fieldOfView: number;
	public readonly pixelSize: number;
	public readonly halfWidth: number;
	public readonly halfHeight: number;

	private _transform: Matrix4;
	private _inverse: Matrix4 | null = null;

	constructor(params: CameraParams) {
		const { hsize, vsize, fieldOfView } = params;
		if (!Number.isInteger(hsize) || !Number.isInteger(vsize) || hsize <= 0 || vsize <= 0) {
			throw new InvalidParameterError(
				`Camera: pixel counts must be positive integers, got ${hsize}x${vsize}`
			);
		}

		this.hsize = hsize;
		this.vsize = vsize;
		this.fieldOfView = fieldOfView;

		const halfView = Math.tan(fieldOfView / 2);
		const aspect = hsize / vsize;

		if (aspect >= 1) {
			this.halfWidth = halfView;
			this.halfHeight = halfView / aspect;
		} else {
			this.halfWidth = halfView * aspect;
			this.halfHeight = halfView;
		}

		this.pixelSize = (this.halfWidth * 2) / hsize;
		this._transform = params.transform ?? Matrix4.identity();
	}

	public get transform(): Matrix4 {
		return this._transform;
	}

	public set transform(m: Matrix4) {
		this._transform = m;
		this._inverse = null;
	}

	public setView(from: Vector4, to: Vector4, up: Vector4): this {
		this.transform = Camera.viewTransform(from, to, up);
		return this;
	}

	/**
	 * World-to-camera matrix for an eye at `from` looking at `to`.
	 */
	public static viewTransform(from: Vector4, to: Vector4, up: Vector4): Matrix4 {
		const forward = Vector4.sub(to, from).normalize();
		const left = Vector4.cross(forward, Vector4.normalize(up));
		const trueUp = Vector4.cross(left, forward);

		const orientation = new Matrix4([
			[left.x, left.y, left.z, 0],
			[trueUp.x, trueUp.y, trueUp.z, 0],
			[-forward.x, -forward.y, -forward.z, 0],
			[0, 0, 0, 1],
		]);

		return Matrix4.multiply(
			orientation,
			Matrix4.translation(-from.x, -from.y, -from.z)
		);
	}

	/**
	 * Ray from the eye through the centre of pixel (x, y).
	 * Throws NonInvertibleMatrixError for a degenerate view transform.
	 */
	public rayForPixel(x: number, y: number): Ray {
		const xOffset = (x + 0.5) * this.pixelSize;
		const yOffset = (y + 0.5) * this.pixelSize;

		// camera looks toward -z, so +x is to the left
		const worldX = this.halfWidth - xOffset;
		const worldY = this.halfHeight - yOffset;

		const inv = this._inverseTransform();
		const pixel = inv.multiplyVector(Vector4.point(worldX, worldY, -1));
		const origin = inv.multiplyVector(Vector4.point(0, 0, 0));
		const direction = Vector4.sub(pixel, origin).normalize();

		return new Ray(origin, direction);
	}

	private _inverseTransform(): Matrix4 {
		if (!this._inverse) {
			this._inverse = this._transform.inverse();
		}
		return this._inverse;
	}
}
