import { Camera } from "../cameras/Camera";
import { World } from "../core/World";
import { Transformation } from "../maths/Transformation";
import { TUnit } from "../maths/TransformUnit";
import { Vector4 } from "../maths/Vector4";
import { d2r } from "../maths/Common";
import { PointLight } from "../lights";
import { PointMarker } from "../shapes";
import { Color } from "../utils/Color";
import type { SceneFactory } from "./types";

/**
 * Twelve hour marks around the canvas centre, plotted as point markers.
 */
export const clockScene: SceneFactory = ({ width, height }) => {
	const world = new World();
	const radius = Math.min(width, height) * 0.4;

	for (let hour = 0; hour < 12; hour++) {
		world.addShape(
			new PointMarker({
				color: new Color(1, 1, 1),
				transformation: Transformation.of(
					TUnit.translate(radius, 0, 0),
					TUnit.rotateZ(d2r(hour * 30)),
					TUnit.translate(width / 2, height / 2, 0)
				),
			})
		);
	}
	world.addLight(new PointLight({ position: Vector4.point(0, 0, -10) }));

	const camera = new Camera({ hsize: width, vsize: height, fieldOfView: Math.PI / 2 });
	return { world, camera, background: new Color(0.2, 0.2, 0.2) };
};
