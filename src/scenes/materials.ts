import { Material } from "../materials";
import { Color } from "../utils/Color";

/** Matte off-white used for floors and walls. */
export function wallMaterial(): Material {
	return new Material({ color: new Color(1, 0.9, 0.9), specular: 0 });
}

export function sphereMaterial(color: Color): Material {
	return new Material({ color, diffuse: 0.7, specular: 0.3 });
}
