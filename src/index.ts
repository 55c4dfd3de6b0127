export { Vector4 } from "./maths/Vector4";
export { Matrix4 } from "./maths/Matrix4";
export { Transformation } from "./maths/Transformation";
export { TUnit, unitMatrix } from "./maths/TransformUnit";
export type { TransformUnit, TransformUnitType } from "./maths/TransformUnit";
export * from "./maths/Common";
export type * from "./maths/types";
export { Color, channelToByte, formatColor, type RGB } from "./utils/Color";
export { encodePPM, writePPM } from "./utils/PPM";
export { createLogger, setDebug, type Logger } from "./utils/Logger";
export { CoreConstants, SceneConstants } from "./core/Constants";
export * from "./core/Errors";
export { Ray } from "./core/Ray";
export { Intersection, Intersections } from "./core/Intersections";
export { prepareComputations, type Computations } from "./core/Computations";
export { World } from "./core/World";
export { Canvas } from "./core/Canvas";
export { Renderer } from "./core/Renderer";
export { EventEmitter, type Listener } from "./core/EventEmitter";
export type {
	RenderOptions,
	RenderProgress,
	RenderStats,
	RenderEvents,
	Transformable,
} from "./core/types";
export { Camera, type CameraParams } from "./cameras/Camera";
export * from "./materials";
export * from "./lights";
export * from "./shapes";
export * from "./patterns";
export { scenes, isSceneName, type SceneName } from "./scenes";
