import { SceneConstants } from "../core/Constants";
import { InvalidParameterError } from "../core/Errors";
import { Color, type RGB } from "../utils/Color";
import type { Pattern } from "../patterns";

export interface MaterialParams {
	color?: RGB;
	ambient?: number;
	diffuse?: number;
	specular?: number;
	shininess?: number;
	pattern?: Pattern | null;
}

/**
 * Phong reflection coefficients of a surface.
 */
export class Material {
	public color: Color;
	public ambient: number;
	public diffuse: number;
	public specular: number;
	public shininess: number;
	public pattern: Pattern | null;

	constructor(params: MaterialParams = {}) {
		this.color = params.color ? Color.from(params.color) : Color.white();
		this.ambient = params.ambient ?? SceneConstants.DEFAULT_AMBIENT;
		this.diffuse = params.diffuse ?? SceneConstants.DEFAULT_DIFFUSE;
		this.specular = params.specular ?? SceneConstants.DEFAULT_SPECULAR;
		this.shininess = params.shininess ?? SceneConstants.DEFAULT_SHININESS;
		this.pattern = params.pattern ?? null;

		Material.validate(this);
	}

	public static validate(m: Material): void {
		const coefficients = {
			ambient: m.ambient,
			diffuse: m.diffuse,
			specular: m.specular,
			shininess: m.shininess,
		};
		for (const [name, value] of Object.entries(coefficients)) {
			if (!(value >= 0)) {
				throw new InvalidParameterError(
					`Material: ${name} must be a non-negative number, got ${value}`
				);
			}
		}
	}

	public changeColor(color: RGB): this {
		this.color = Color.from(color);
		return this;
	}

	public clone(): Material {
		return new Material({
			color: this.color,
			ambient: this.ambient,
			diffuse: this.diffuse,
			specular: this.specular,
			shininess: this.shininess,
			pattern: this.pattern,
		});
	}
}
