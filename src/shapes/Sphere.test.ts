import { describe, it, expect } from "vitest";
import { Sphere } from "./Sphere";
import { Ray } from "../core/Ray";
import { Vector4 } from "../maths/Vector4";
import { Transformation } from "../maths/Transformation";
import { TUnit } from "../maths/TransformUnit";
import { NonInvertibleMatrixError } from "../core/Errors";

const ascending = (ts: number[]): number[] => [...ts].sort((a, b) => a - b);

describe("Sphere", () => {
	it("is hit at two points", () => {
		const ray = new Ray(Vector4.point(0, 0, -5), Vector4.vector(0, 0, 1));
		expect(ascending(new Sphere().intersect(ray))).toEqual([4, 6]);
	});

	it("is hit twice at the same t on a tangent", () => {
		const ray = new Ray(Vector4.point(0, 1, -5), Vector4.vector(0, 0, 1));
		expect(new Sphere().intersect(ray)).toEqual([5, 5]);
	});

	it("is missed", () => {
		const ray = new Ray(Vector4.point(0, 2, -5), Vector4.vector(0, 0, 1));
		expect(new Sphere().intersect(ray)).toEqual([]);
	});

	it("is hit behind and ahead from inside", () => {
		const ray = new Ray(Vector4.point(0, 0, 0), Vector4.vector(0, 0, 1));
		expect(ascending(new Sphere().intersect(ray))).toEqual([-1, 1]);
	});

	it("is hit at negative t when behind the ray", () => {
		const ray = new Ray(Vector4.point(0, 0, 5), Vector4.vector(0, 0, 1));
		expect(ascending(new Sphere().intersect(ray))).toEqual([-6, -4]);
	});

	it("respects a scaling transformation", () => {
		const ray = new Ray(Vector4.point(0, 0, -5), Vector4.vector(0, 0, 1));
		const s = new Sphere().setTransformUnit(TUnit.scale(2, 2, 2));
		expect(ascending(s.intersect(ray))).toEqual([3, 7]);
	});

	it("respects a translation", () => {
		const ray = new Ray(Vector4.point(0, 0, -5), Vector4.vector(0, 0, 1));
		const s = new Sphere().setTransformUnit(TUnit.translate(5, 0, 0));
		expect(s.intersect(ray)).toEqual([]);
	});

	it("throws for a degenerate transformation", () => {
		const ray = new Ray(Vector4.point(0, 0, -5), Vector4.vector(0, 0, 1));
		const s = new Sphere().setTransformUnit(TUnit.scale(0, 0, 0));
		expect(() => s.intersect(ray)).toThrow(NonInvertibleMatrixError);
	});

	it("has axis normals", () => {
		const s = new Sphere();
		expect(s.normal(Vector4.point(1, 0, 0)).equals(Vector4.vector(1, 0, 0))).toBe(true);
		expect(s.normal(Vector4.point(0, 1, 0)).equals(Vector4.vector(0, 1, 0))).toBe(true);
		expect(s.normal(Vector4.point(0, 0, 1)).equals(Vector4.vector(0, 0, 1))).toBe(true);
	});

	it("has a unit normal at a non-axial point", () => {
		const k = Math.sqrt(3) / 3;
		const n = new Sphere().normal(Vector4.point(k, k, k));
		expect(n.equals(Vector4.vector(k, k, k))).toBe(true);
		expect(n.length()).toBeCloseTo(1, 10);
	});

	it("computes the normal of a translated sphere", () => {
		const s = new Sphere().setTransformUnit(TUnit.translate(0, 1, 0));
		const n = s.normal(Vector4.point(0, 1.70711, -0.70711));
		expect(n.equals(Vector4.vector(0, 0.70711, -0.70711))).toBe(true);
	});

	it("computes the normal of a rotated and squashed sphere", () => {
		const s = new Sphere().setTransform(
			Transformation.of(TUnit.rotateZ(Math.PI / 5), TUnit.scale(1, 0.5, 1))
		);
		const h = Math.SQRT1_2;
		const n = s.normal(Vector4.point(0, h, -h));
		expect(n.equals(Vector4.vector(0, 0.97014, -0.24254))).toBe(true);
		expect(n.w).toBe(0);
	});

	it("gets a unique id", () => {
		expect(new Sphere().id).not.toBe(new Sphere().id);
	});
});
