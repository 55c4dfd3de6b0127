import { StripePattern } from "./StripePattern";
import { GradientPattern } from "./GradientPattern";

export * from "./Pattern";
export * from "./StripePattern";
export * from "./GradientPattern";

export type ScenePattern = StripePattern | GradientPattern;
