import type { Camera } from "../cameras/Camera";
import type { World } from "../core/World";
import type { RGB } from "../utils/Color";

export interface SceneSetup {
	world: World;
	camera: Camera;
	background: RGB;
}

export interface SceneSize {
	width: number;
	height: number;
}

export type SceneFactory = (size: SceneSize) => SceneSetup;
