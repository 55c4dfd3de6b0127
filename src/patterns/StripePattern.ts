import { Pattern, PatternType, type PatternParams } from "./Pattern";
import type { Color } from "../utils/Color";
import type { IVector4 } from "../maths/types";

/** Alternates `a` and `b` in unit-wide bands along x. */
export class StripePattern extends Pattern<PatternType.Stripe> {
	constructor(params: PatternParams = {}) {
		super(PatternType.Stripe, params);
	}

	public colorAt(p: IVector4): Color {
		return Math.floor(p.x) % 2 === 0 ? this.a : this.b;
	}
}
