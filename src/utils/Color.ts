/**
 * Color utility functions
 */

import { CoreConstants } from "../core/Constants";
import { DivisionByZeroError } from "../core/Errors";
import { feq, isNearZero } from "../maths/Common";

export interface RGB {
	r: number;
	g: number;
	b: number;
}

/**
 * Linear RGB color. Channels are unbounded while shading; they are clamped
 * only when serialized.
 */
export class Color implements RGB {
	constructor(
		public r: number = 0,
		public g: number = 0,
		public b: number = 0
	) {}

	public static black(): Color {
		return new Color(0, 0, 0);
	}

	public static white(): Color {
		return new Color(1, 1, 1);
	}

	public static from(c: RGB): Color {
		return new Color(c.r, c.g, c.b);
	}

	public clone(): Color {
		return new Color(this.r, this.g, this.b);
	}

	public equals(c: RGB): boolean {
		return feq(this.r, c.r) && feq(this.g, c.g) && feq(this.b, c.b);
	}

	public static add(a: RGB, b: RGB): Color {
		return new Color(a.r + b.r, a.g + b.g, a.b + b.b);
	}

	public static sub(a: RGB, b: RGB): Color {
		return new Color(a.r - b.r, a.g - b.g, a.b - b.b);
	}

	public static scale(c: RGB, s: number): Color {
		return new Color(c.r * s, c.g * s, c.b * s);
	}

	public static divide(c: RGB, s: number): Color {
		if (isNearZero(s)) throw new DivisionByZeroError("Color.divide");
		return Color.scale(c, 1 / s);
	}

	/**
	 * Component-wise (Schur) product.
	 */
	public static multiply(a: RGB, b: RGB): Color {
		return new Color(a.r * b.r, a.g * b.g, a.b * b.b);
	}
}

/**
 * Maps one channel to 0..255: above 1 clamps to 255, below 0 to 0.
 */
export function channelToByte(value: number): number {
	const max = CoreConstants.MAX_CHANNEL_VALUE;
	if (value > 1) return max;
	if (value < 0) return 0;
	return Math.round(value * max);
}

export function formatColor(c: RGB): string {
	return `${channelToByte(c.r)} ${channelToByte(c.g)} ${channelToByte(c.b)}`;
}
