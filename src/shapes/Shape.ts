import { Transformation } from "../maths/Transformation";
import { Vector4 } from "../maths/Vector4";
import { Material, type MaterialParams } from "../materials";
import { IdGenerator } from "../utils/IdGenerator";
import type { Ray } from "../core/Ray";
import type { Transformable } from "../core/types";
import type { TransformUnit } from "../maths/TransformUnit";

export enum ShapeType {
	Sphere = "sphere",
	Plane = "plane",
	PointMarker = "pointMarker",
}

export interface ShapeParams {
	transformation?: Transformation;
	material?: Material | MaterialParams;
}

/**
 * Base of every drawable shape. Subclasses supply the object-space
 * geometry; world-space intersection and normals go through the inverse
 * of the shape's transformation here.
 */
export abstract class Shape<TType extends ShapeType = ShapeType>
	implements Transformable
{
	public readonly type: TType;
	public readonly id: string;
	public transformation: Transformation;
	public material: Material;

	protected constructor(type: TType, params: ShapeParams = {}) {
		this.type = type;
		this.id = IdGenerator.nextId(type);
		this.transformation = params.transformation ?? new Transformation();
		this.material =
			params.material instanceof Material ?
				params.material
			:	new Material(params.material);
	}

	public setTransform(transformation: Transformation): this {
		this.transformation = transformation;
		return this;
	}

	/**
	 * Replaces the current transformation with a single unit.
	 */
	public setTransformUnit(unit: TransformUnit): this {
		this.transformation = Transformation.of(unit);
		return this;
	}

	public addTransform(unit: TransformUnit): this {
		this.transformation.add(unit);
		return this;
	}

	public setMaterial(material: Material): this {
		this.material = material;
		return this;
	}

	/**
	 * t-values where a world-space ray meets the shape.
	 * Throws NonInvertibleMatrixError for a degenerate transformation.
	 */
	public intersect(worldRay: Ray): number[] {
		const objectRay = worldRay.transform(this.transformation.inverse());
		return this.localIntersect(objectRay);
	}

	/**
	 * Unit surface normal at a world-space point.
	 */
	public normal(worldPoint: Vector4): Vector4 {
		const inv = this.transformation.inverse();
		const objectPoint = inv.multiplyVector(worldPoint);
		const objectNormal = this.localNormal(objectPoint);

		const worldNormal = inv.transpose().multiplyVector(objectNormal);
		// drop whatever the translation column leaked into w
		worldNormal.w = 0;
		return worldNormal.normalize();
	}

	abstract localIntersect(objectRay: Ray): number[];

	abstract localNormal(objectPoint: Vector4): Vector4;
}
