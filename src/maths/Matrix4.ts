/**
 * Matrix4 class and utility functions (4x4 Matrix)
 */

import { CoreConstants } from "../core/Constants";
import { NonInvertibleMatrixError } from "../core/Errors";
import { Vector4 } from "./Vector4";
import type { IVector4, Matrix4Arr } from "./types";

/**
 * MATRIX CONVENTIONS:
 * - Storage: row-major, elements[row][col]
 * - Vectors are columns: M × v
 * - Handedness: left-handed world, camera looks down -Z in view space
 */

export class Matrix4 {
	public elements: Matrix4Arr;

	constructor(elements?: Matrix4Arr) {
		this.elements = elements || [
			[1, 0, 0, 0],
			[0, 1, 0, 0],
			[0, 0, 1, 0],
			[0, 0, 0, 1],
		];
	}

	public static identity(): Matrix4 {
		return new Matrix4();
	}

	public static multiply(a: Matrix4, b: Matrix4): Matrix4 {
		const ae = a.elements;
		const be = b.elements;
		const res: Matrix4Arr = [[], [], [], []];

		for (let i = 0; i < 4; i++) {
			for (let j = 0; j < 4; j++) {
				res[i][j] =
					ae[i][0] * be[0][j] +
					ae[i][1] * be[1][j] +
					ae[i][2] * be[2][j] +
					ae[i][3] * be[3][j];
			}
		}

		return new Matrix4(res);
	}

	public multiply(other: Matrix4): this {
		this.elements = Matrix4.multiply(this, other).elements;
		return this;
	}

	/**
	 * Full homogeneous product M × v. Directions (w = 0) ignore the
	 * translation column.
	 */
	public static multiplyVector(m: Matrix4, v: IVector4): Vector4 {
		const me = m.elements;
		return new Vector4(
			me[0][0] * v.x + me[0][1] * v.y + me[0][2] * v.z + me[0][3] * v.w,
			me[1][0] * v.x + me[1][1] * v.y + me[1][2] * v.z + me[1][3] * v.w,
			me[2][0] * v.x + me[2][1] * v.y + me[2][2] * v.z + me[2][3] * v.w,
			me[3][0] * v.x + me[3][1] * v.y + me[3][2] * v.z + me[3][3] * v.w
		);
	}

	public multiplyVector(v: IVector4): Vector4 {
		return Matrix4.multiplyVector(this, v);
	}

	public transpose(): Matrix4 {
		const m = this.elements;
		return new Matrix4([
			[m[0][0], m[1][0], m[2][0], m[3][0]],
			[m[0][1], m[1][1], m[2][1], m[3][1]],
			[m[0][2], m[1][2], m[2][2], m[3][2]],
			[m[0][3], m[1][3], m[2][3], m[3][3]],
		]);
	}

	private _minor(row: number, col: number): number {
		const sub: number[][] = [];
		for (let i = 0; i < 4; i++) {
			if (i === row) continue;
			const r: number[] = [];
			for (let j = 0; j < 4; j++) {
				if (j !== col) r.push(this.elements[i][j]);
			}
			sub.push(r);
		}

		return (
			sub[0][0] * (sub[1][1] * sub[2][2] - sub[1][2] * sub[2][1]) -
			sub[0][1] * (sub[1][0] * sub[2][2] - sub[1][2] * sub[2][0]) +
			sub[0][2] * (sub[1][0] * sub[2][1] - sub[1][1] * sub[2][0])
		);
	}

	public cofactor(row: number, col: number): number {
		const minor = this._minor(row, col);
		return (row + col) % 2 === 0 ? minor : -minor;
	}

	public determinant(): number {
		let det = 0;
		for (let j = 0; j < 4; j++) {
			det += this.elements[0][j] * this.cofactor(0, j);
		}
		return det;
	}

	/** Largest absolute entry. */
	public maxAbs(): number {
		let max = 0;
		for (const row of this.elements) {
			for (const v of row) max = Math.max(max, Math.abs(v));
		}
		return max;
	}

	/**
	 * Whether the determinant is zero relative to the size of the entries,
	 * so uniformly small transforms stay invertible.
	 */
	public isSingular(): boolean {
		const det = this.determinant();
		const scale = this.maxAbs() ** 4;
		return (
			!Number.isFinite(det) ||
			Math.abs(det) <= CoreConstants.SINGULAR_TOLERANCE * scale
		);
	}

	/**
	 * Inverse via the adjugate. Returns null for a (numerically) singular matrix.
	 */
	public tryInverse(): Matrix4 | null {
		if (this.isSingular()) return null;
		const det = this.determinant();

		const res: Matrix4Arr = [[], [], [], []];
		for (let i = 0; i < 4; i++) {
			for (let j = 0; j < 4; j++) {
				// transposed on write
				res[j][i] = this.cofactor(i, j) / det;
			}
		}
		return new Matrix4(res);
	}

	public inverse(): Matrix4 {
		const inv = this.tryInverse();
		if (!inv) {
			throw new NonInvertibleMatrixError(
				"Matrix4.inverse: matrix is singular",
				this.determinant()
			);
		}
		return inv;
	}

	/**
	 * Equality by the Frobenius norm of the difference.
	 */
	public equals(other: Matrix4): boolean {
		let sum = 0;
		for (let i = 0; i < 4; i++) {
			for (let j = 0; j < 4; j++) {
				const d = this.elements[i][j] - other.elements[i][j];
				sum += d * d;
			}
		}
		return Math.sqrt(sum) < CoreConstants.EPSILON;
	}

	public clone(): Matrix4 {
		return new Matrix4(this.elements.map((row) => [...row]));
	}

	public static translation(dx: number, dy: number, dz: number): Matrix4 {
		const m = Matrix4.identity();
		m.elements[0][3] = dx;
		m.elements[1][3] = dy;
		m.elements[2][3] = dz;
		return m;
	}

	public static scaling(fx: number, fy: number, fz: number): Matrix4 {
		const m = Matrix4.identity();
		m.elements[0][0] = fx;
		m.elements[1][1] = fy;
		m.elements[2][2] = fz;
		return m;
	}

	public static rotationX(angle: number): Matrix4 {
		const c = Math.cos(angle),
			s = Math.sin(angle);
		return new Matrix4([
			[1, 0, 0, 0],
			[0, c, -s, 0],
			[0, s, c, 0],
			[0, 0, 0, 1],
		]);
	}

	public static rotationY(angle: number): Matrix4 {
		const c = Math.cos(angle),
			s = Math.sin(angle);
		return new Matrix4([
			[c, 0, s, 0],
			[0, 1, 0, 0],
			[-s, 0, c, 0],
			[0, 0, 0, 1],
		]);
	}

	public static rotationZ(angle: number): Matrix4 {
		const c = Math.cos(angle),
			s = Math.sin(angle);
		return new Matrix4([
			[c, -s, 0, 0],
			[s, c, 0, 0],
			[0, 0, 1, 0],
			[0, 0, 0, 1],
		]);
	}

	/**
	 * Each coefficient moves one axis in proportion to another, e.g. `xy`
	 * moves x in proportion to y.
	 */
	public static shearing(
		xy: number,
		xz: number,
		yx: number,
		yz: number,
		zx: number,
		zy: number
	): Matrix4 {
		return new Matrix4([
			[1, xy, xz, 0],
			[yx, 1, yz, 0],
			[zx, zy, 1, 0],
			[0, 0, 0, 1],
		]);
	}
}
