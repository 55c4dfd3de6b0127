import { compareNumbers, feq } from "../maths/Common";
import type { Shape } from "../shapes";

/**
 * A t-value along a ray paired with the shape it hit. The shape is shared,
 * not copied: many intersections may point at the same scene shape.
 */
export class Intersection {
	constructor(
		public readonly t: number,
		public readonly shape: Shape
	) {}
}

/**
 * Intersection list kept in ascending t order.
 */
export class Intersections implements Iterable<Intersection> {
	private _items: Intersection[];

	constructor(items: Intersection[] = []) {
		this._items = [...items];
		this.sort();
	}

	/**
	 * Pairs every t-value with the same shape.
	 */
	public static create(ts: number[], shape: Shape): Intersections {
		return new Intersections(ts.map((t) => new Intersection(t, shape)));
	}

	public static combine(...items: Intersection[]): Intersections {
		return new Intersections(items);
	}

	public get length(): number {
		return this._items.length;
	}

	public at(index: number): Intersection | undefined {
		return this._items[index];
	}

	public get items(): readonly Intersection[] {
		return this._items;
	}

	public [Symbol.iterator](): Iterator<Intersection> {
		return this._items[Symbol.iterator]();
	}

	/** Stable sort; NaN t-values go last and are never a hit. */
	public sort(): this {
		this._items.sort((a, b) => compareNumbers(a.t, b.t));
		return this;
	}

	public push(...items: Intersection[]): this {
		this._items.push(...items);
		return this.sort();
	}

	public contains(t: number): boolean {
		return this._items.some((i) => feq(i.t, t));
	}

	/**
	 * The visible intersection: smallest non-negative t, or null.
	 * Ties resolve to the first one in sorted order.
	 */
	public hit(): Intersection | null {
		for (const i of this._items) {
			if (i.t >= 0) return i;
		}
		return null;
	}
}
