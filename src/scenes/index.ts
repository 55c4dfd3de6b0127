import { Camera } from "../cameras/Camera";
import { World } from "../core/World";
import { Vector4 } from "../maths/Vector4";
import { Color } from "../utils/Color";
import { clockScene } from "./clock";
import { patternsScene } from "./patterns";
import { planesScene, spheresScene } from "./spheres";
import type { SceneFactory } from "./types";

export * from "./types";

/** The default two-sphere world seen from (0, 0, -5). */
export const defaultScene: SceneFactory = ({ width, height }) => ({
	world: World.createDefault(),
	camera: new Camera({ hsize: width, vsize: height, fieldOfView: Math.PI / 2 }).setView(
		Vector4.point(0, 0, -5),
		Vector4.point(0, 0, 0),
		Vector4.vector(0, 1, 0)
	),
	background: Color.black(),
});

export const scenes = {
	default: defaultScene,
	spheres: spheresScene,
	planes: planesScene,
	patterns: patternsScene,
	clock: clockScene,
} satisfies Record<string, SceneFactory>;

export type SceneName = keyof typeof scenes;

export function isSceneName(name: string): name is SceneName {
	return Object.prototype.hasOwnProperty.call(scenes, name);
}
