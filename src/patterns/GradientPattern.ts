import { Pattern, PatternType, type PatternParams } from "./Pattern";
import { Color } from "../utils/Color";
import type { IVector4 } from "../maths/types";

/** Linear blend from `a` to `b` repeating over each unit of x. */
export class GradientPattern extends Pattern<PatternType.Gradient> {
	constructor(params: PatternParams = {}) {
		super(PatternType.Gradient, params);
	}

	public colorAt(p: IVector4): Color {
		const fraction = p.x - Math.floor(p.x);
		return Color.add(this.a, Color.scale(Color.sub(this.b, this.a), fraction));
	}
}
