import { Matrix4 } from "./Matrix4";
import { unitMatrix, type TransformUnit } from "./TransformUnit";

/**
 * Ordered list of transform units with an incrementally cached composed
 * matrix. Units apply in the order they were added: the first-added unit
 * acts on a vector first.
 */
export class Transformation {
	private _units: TransformUnit[] = [];
	private _matrix: Matrix4 = Matrix4.identity();
	private _inverse: Matrix4 | null = null;

	public static of(...units: TransformUnit[]): Transformation {
		const t = new Transformation();
		for (const unit of units) t.add(unit);
		return t;
	}

	public get units(): readonly TransformUnit[] {
		return this._units;
	}

	/** Composed matrix of all units added so far. */
	public get matrix(): Matrix4 {
		return this._matrix;
	}

	public add(unit: TransformUnit): this {
		this._units.push(unit);
		this._matrix = Matrix4.multiply(unitMatrix(unit), this._matrix);
		this._inverse = null;
		return this;
	}

	/**
	 * Inverse of the composed matrix, memoized until the next `add`.
	 * Throws NonInvertibleMatrixError for a degenerate composition.
	 */
	public inverse(): Matrix4 {
		if (!this._inverse) {
			this._inverse = this._matrix.inverse();
		}
		return this._inverse;
	}

	public clone(): Transformation {
		return Transformation.of(...this._units);
	}
}
