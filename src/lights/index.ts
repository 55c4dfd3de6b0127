import { PointLight } from "./PointLight";

export * from "./Light";
export * from "./PointLight";

export type SceneLight = PointLight;
