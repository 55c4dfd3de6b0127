import { World } from "../core/World";
import { TUnit } from "../maths/TransformUnit";
import { GradientPattern, StripePattern } from "../patterns";
import { Plane } from "../shapes";
import { Color } from "../utils/Color";
import { wallMaterial } from "./materials";
import { standardCamera, standardLight, trioOfSpheres } from "./spheres";
import type { SceneFactory } from "./types";

const gradients: [Color, Color][] = [
	[new Color(0, 0, 1), new Color(0.5, 0, 0.5)],
	[new Color(1, 0, 0), new Color(1, 0.65, 0)],
	[new Color(0, 0.5, 0), new Color(1, 1, 0)],
];

/**
 * Striped floor and gradient-shaded spheres.
 */
export const patternsScene: SceneFactory = (size) => {
	const world = new World();

	const floor = new Plane({ material: wallMaterial() });
	floor.material.pattern = new StripePattern({
		a: new Color(0.83, 0.83, 0.83),
		b: new Color(0.9, 1, 1),
	});

	const spheres = trioOfSpheres();
	spheres.forEach((sphere, i) => {
		const [a, b] = gradients[i];
		sphere.material.pattern = new GradientPattern({ a, b }).addTransform(
			TUnit.scale(2, 1, 1)
		);
	});

	world.addShapes([floor, ...spheres]);
	world.addLight(standardLight());

	return { world, camera: standardCamera(size), background: Color.black() };
};
