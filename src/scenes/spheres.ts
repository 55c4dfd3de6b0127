import { Camera } from "../cameras/Camera";
import { World } from "../core/World";
import { Transformation } from "../maths/Transformation";
import { TUnit } from "../maths/TransformUnit";
import { Vector4 } from "../maths/Vector4";
import { PointLight } from "../lights";
import { Plane, Sphere } from "../shapes";
import { Color } from "../utils/Color";
import { sphereMaterial, wallMaterial } from "./materials";
import type { SceneFactory, SceneSize } from "./types";

export function standardCamera({ width, height }: SceneSize): Camera {
	return new Camera({ hsize: width, vsize: height, fieldOfView: Math.PI / 3 }).setView(
		Vector4.point(0, 1.5, -5),
		Vector4.point(0, 1, 0),
		Vector4.vector(0, 1, 0)
	);
}

export function standardLight(): PointLight {
	return new PointLight({
		position: Vector4.point(-10, 10, -10),
		intensity: Color.white(),
	});
}

/** Middle, right and left spheres resting on the floor. */
export function trioOfSpheres(): Sphere[] {
	const middle = new Sphere({
		transformation: Transformation.of(TUnit.translate(-0.5, 1, 0.5)),
		material: sphereMaterial(new Color(0.1, 1, 0.5)),
	});
	const right = new Sphere({
		transformation: Transformation.of(
			TUnit.scale(0.5, 0.5, 0.5),
			TUnit.translate(1.5, 0.5, -0.5)
		),
		material: sphereMaterial(new Color(0.5, 1, 0.1)),
	});
	const left = new Sphere({
		transformation: Transformation.of(
			TUnit.scale(0.33, 0.33, 0.33),
			TUnit.translate(-1.5, 0.33, -0.75)
		),
		material: sphereMaterial(new Color(1, 0.8, 0.1)),
	});
	return [middle, right, left];
}

/**
 * Three spheres in a room whose floor and walls are flattened spheres.
 */
export const spheresScene: SceneFactory = (size) => {
	const world = new World();

	const floor = new Sphere({
		transformation: Transformation.of(TUnit.scale(10, 0.01, 10)),
		material: wallMaterial(),
	});
	const leftWall = new Sphere({
		transformation: Transformation.of(
			TUnit.scale(10, 0.01, 10),
			TUnit.rotateX(Math.PI / 2),
			TUnit.rotateY(-Math.PI / 4),
			TUnit.translate(0, 0, 5)
		),
		material: wallMaterial(),
	});
	const rightWall = new Sphere({
		transformation: Transformation.of(
			TUnit.scale(10, 0.01, 10),
			TUnit.rotateX(Math.PI / 2),
			TUnit.rotateY(Math.PI / 4),
			TUnit.translate(0, 0, 5)
		),
		material: wallMaterial(),
	});

	world.addShapes([floor, leftWall, rightWall, ...trioOfSpheres()]);
	world.addLight(standardLight());

	return { world, camera: standardCamera(size), background: Color.black() };
};

/** The same spheres standing on an infinite plane. */
export const planesScene: SceneFactory = (size) => {
	const world = new World();
	world.addShapes([new Plane({ material: wallMaterial() }), ...trioOfSpheres()]);
	world.addLight(standardLight());

	return { world, camera: standardCamera(size), background: Color.black() };
};
