import { Vector4 } from "../maths/Vector4";
import { Color } from "../utils/Color";
import { Light, LightType, type LightParams, type SurfaceSample } from "./Light";

export interface PointLightParams extends LightParams {
	position?: Vector4;
}

export class PointLight extends Light<LightType.Point> {
	public position: Vector4;

	constructor(params: PointLightParams = {}) {
		super(LightType.Point, params);
		this.position = params.position ?? Vector4.point(0, 0, 0);
	}

	/**
	 * Phong reflection: ambient + diffuse + specular, unclamped.
	 * A shadowed sample keeps only the ambient term.
	 */
	public shade(sample: SurfaceSample): Color {
		const { material, point, eye, normal, inShadow, shape } = sample;

		const surfaceColor =
			material.pattern && shape ?
				material.pattern.colorAtShape(shape, point)
			:	material.color;

		const effectiveColor = Color.multiply(this.intensity, surfaceColor);
		const lightVector = Vector4.sub(this.position, point).normalize();
		const ambient = Color.scale(effectiveColor, material.ambient);

		if (inShadow) return ambient;

		// cosine between light and normal; negative means the light is behind the surface
		const lightDotNormal = Vector4.dot(lightVector, normal);
		if (lightDotNormal < 0) return ambient;

		const diffuse = Color.scale(
			effectiveColor,
			material.diffuse * lightDotNormal
		);

		const reflectVector = Vector4.reflect(Vector4.negate(lightVector), normal);
		const reflectDotEye = Vector4.dot(reflectVector, eye);

		let specular = Color.black();
		if (reflectDotEye > 0) {
			const factor = Math.pow(reflectDotEye, material.shininess);
			specular = Color.scale(this.intensity, material.specular * factor);
		}

		return Color.add(Color.add(ambient, diffuse), specular);
	}
}
