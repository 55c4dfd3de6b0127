import { Color, type RGB } from "../utils/Color";
import type { Material } from "../materials";
import type { Vector4 } from "../maths/Vector4";
import type { Transformable } from "../core/types";

export enum LightType {
	Point = "point",
}

export interface LightParams {
	intensity?: RGB;
}

/**
 * Surface sample handed to a light for shading.
 */
export interface SurfaceSample {
	material: Material;
	point: Vector4;
	eye: Vector4;
	normal: Vector4;
	inShadow: boolean;
	/** Needed to evaluate a material pattern in object space. */
	shape?: Transformable;
}

export abstract class Light<TType extends LightType = LightType> {
	public readonly type: TType;
	public intensity: Color;

	protected constructor(type: TType, params: LightParams = {}) {
		this.type = type;
		this.intensity = params.intensity ? Color.from(params.intensity) : Color.white();
	}

	/**
	 * Colour reflected toward the eye at a surface sample.
	 */
	abstract shade(sample: SurfaceSample): Color;
}
