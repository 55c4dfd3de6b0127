import { Sphere } from "./Sphere";
import { Plane } from "./Plane";
import { PointMarker } from "./PointMarker";
import { ShapeType } from "./Shape";

export * from "./Shape";
export * from "./Sphere";
export * from "./Plane";
export * from "./PointMarker";

export type SceneShape = Sphere | Plane | PointMarker;

export function isPointMarker(shape: SceneShape): shape is PointMarker {
	return shape.type === ShapeType.PointMarker;
}
