import { describe, it, expect } from "vitest";
import { Plane } from "./Plane";
import { PointMarker } from "./PointMarker";
import { isPointMarker, type SceneShape } from "./index";
import { Sphere } from "./Sphere";
import { Ray } from "../core/Ray";
import { Vector4 } from "../maths/Vector4";
import { TUnit } from "../maths/TransformUnit";
import { UnsupportedShapeOperationError } from "../core/Errors";

describe("Plane", () => {
	it("has the same normal everywhere", () => {
		const p = new Plane();
		for (const pt of [Vector4.point(0, 0, 0), Vector4.point(10, 0, -10), Vector4.point(-5, 0, 150)]) {
			expect(p.normal(pt).equals(Vector4.vector(0, 1, 0))).toBe(true);
		}
	});

	it("is not hit by parallel or coplanar rays", () => {
		const p = new Plane();
		expect(p.intersect(new Ray(Vector4.point(0, 10, 0), Vector4.vector(0, 0, 1)))).toEqual([]);
		expect(p.intersect(new Ray(Vector4.point(0, 0, 0), Vector4.vector(0, 0, 1)))).toEqual([]);
	});

	it("is hit from above and below", () => {
		const p = new Plane();
		expect(p.intersect(new Ray(Vector4.point(0, 1, 0), Vector4.vector(0, -1, 0)))).toEqual([1]);
		expect(p.intersect(new Ray(Vector4.point(0, -1, 0), Vector4.vector(0, 1, 0)))).toEqual([1]);
	});

	it("moves with its transformation", () => {
		const p = new Plane().setTransformUnit(TUnit.translate(0, -2, 0));
		const ts = p.intersect(new Ray(Vector4.point(0, 3, 0), Vector4.vector(0, -1, 0)));
		expect(ts).toEqual([5]);
	});
});

describe("PointMarker", () => {
	it("is never hit by a ray", () => {
		const m = new PointMarker({ position: Vector4.point(0, 0, 0) });
		expect(m.intersect(new Ray(Vector4.point(0, 0, -5), Vector4.vector(0, 0, 1)))).toEqual([]);
	});

	it("has no normal", () => {
		const m = new PointMarker();
		expect(() => m.normal(Vector4.point(0, 0, 0))).toThrow(UnsupportedShapeOperationError);
	});

	it("transforms its position", () => {
		const m = new PointMarker({ position: Vector4.point(0, 1, 0) })
			.addTransform(TUnit.scale(10, 10, 10))
			.addTransform(TUnit.translate(50, 50, 0));
		expect(m.transformedPosition().equals(Vector4.point(50, 60, 0))).toBe(true);
	});

	it("takes its color into the material", () => {
		const m = new PointMarker({ color: { r: 1, g: 0, b: 0 } });
		expect(m.material.color.equals({ r: 1, g: 0, b: 0 })).toBe(true);
	});

	it("is told apart from other shapes", () => {
		const shapes: SceneShape[] = [new Sphere(), new Plane(), new PointMarker()];
		expect(shapes.map(isPointMarker)).toEqual([false, false, true]);
	});
});
