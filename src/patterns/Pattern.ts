import { Transformation } from "../maths/Transformation";
import { Color, type RGB } from "../utils/Color";
import type { IVector4 } from "../maths/types";
import type { TransformUnit } from "../maths/TransformUnit";
import type { Transformable } from "../core/types";

export enum PatternType {
	Stripe = "stripe",
	Gradient = "gradient",
}

export interface PatternParams {
	a?: RGB;
	b?: RGB;
	transformation?: Transformation;
}

/**
 * A colour function over pattern space. Patterns carry their own
 * transformation, applied after the owning shape's.
 */
export abstract class Pattern<TType extends PatternType = PatternType>
	implements Transformable
{
	public readonly type: TType;
	public a: Color;
	public b: Color;
	public transformation: Transformation;

	protected constructor(type: TType, params: PatternParams = {}) {
		this.type = type;
		this.a = params.a ? Color.from(params.a) : Color.white();
		this.b = params.b ? Color.from(params.b) : Color.black();
		this.transformation = params.transformation ?? new Transformation();
	}

	public setColors(a: RGB, b: RGB): this {
		this.a = Color.from(a);
		this.b = Color.from(b);
		return this;
	}

	public addTransform(unit: TransformUnit): this {
		this.transformation.add(unit);
		return this;
	}

	/**
	 * Colour at a point already expressed in pattern space.
	 */
	abstract colorAt(patternPoint: IVector4): Color;

	/**
	 * Maps a world point through the shape's and then the pattern's inverse
	 * transforms before sampling.
	 */
	public colorAtShape(shape: Transformable, worldPoint: IVector4): Color {
		const objectPoint = shape.transformation.inverse().multiplyVector(worldPoint);
		const patternPoint = this.transformation.inverse().multiplyVector(objectPoint);
		return this.colorAt(patternPoint);
	}
}
