import { describe, it, expect } from "vitest";
import { Transformation } from "./Transformation";
import { TUnit, type TransformUnit } from "./TransformUnit";
import { Matrix4 } from "./Matrix4";
import { Vector4 } from "./Vector4";
import { NonInvertibleMatrixError } from "../core/Errors";
import { Ray } from "../core/Ray";
import { Sphere } from "../shapes";

describe("Transformation", () => {
	it("starts as the identity", () => {
		const t = new Transformation();
		expect(t.units).toHaveLength(0);
		expect(t.matrix.equals(Matrix4.identity())).toBe(true);
	});

	it("applies units in the order they were added", () => {
		const t = Transformation.of(
			TUnit.rotateX(Math.PI / 2),
			TUnit.scale(5, 5, 5),
			TUnit.translate(10, 5, 7)
		);
		const res = t.matrix.multiplyVector(Vector4.point(1, 0, 1));
		expect(res.equals(Vector4.point(15, 0, 7))).toBe(true);
	});

	it("matches the explicit reversed product", () => {
		const t = Transformation.of(TUnit.translate(1, 2, 3), TUnit.scale(2, 2, 2));
		const expected = Matrix4.multiply(
			Matrix4.scaling(2, 2, 2),
			Matrix4.translation(1, 2, 3)
		);
		expect(t.matrix.equals(expected)).toBe(true);
	});

	it("round-trips a point through every unit and its inverse", () => {
		const units: TransformUnit[] = [
			TUnit.identity(),
			TUnit.translate(3, -2, 1),
			TUnit.scale(2, 0.5, 4),
			TUnit.rotateX(0.3),
			TUnit.rotateY(-1.1),
			TUnit.rotateZ(2.4),
			TUnit.shear(1, 0, 0.5, 0, 0, 2),
		];
		const p = Vector4.point(-1.5, 2, 0.25);
		for (const unit of units) {
			const t = Transformation.of(unit);
			const back = t.inverse().multiplyVector(t.matrix.multiplyVector(p));
			expect(back.equals(p)).toBe(true);
		}
	});

	it("recomputes the inverse after another unit is added", () => {
		const t = Transformation.of(TUnit.translate(1, 0, 0));
		const first = t.inverse();
		t.add(TUnit.translate(0, 2, 0));
		const second = t.inverse();
		expect(second).not.toBe(first);
		expect(second.multiplyVector(Vector4.point(1, 2, 0)).equals(Vector4.point(0, 0, 0))).toBe(
			true
		);
	});

	it("throws when a zero scale makes it singular", () => {
		const t = Transformation.of(TUnit.scale(0, 1, 1));
		expect(() => t.inverse()).toThrow(NonInvertibleMatrixError);
	});

	it("inverts a uniformly tiny scale", () => {
		const t = Transformation.of(TUnit.scale(0.01, 0.01, 0.01));
		expect(t.inverse().equals(Matrix4.scaling(100, 100, 100))).toBe(true);

		const sphere = new Sphere().setTransform(t);
		const ts = sphere.intersect(new Ray(Vector4.point(0, 0, -5), Vector4.vector(0, 0, 1)));
		const [near, far] = [...ts].sort((a, b) => a - b);
		expect(near).toBeCloseTo(4.99, 10);
		expect(far).toBeCloseTo(5.01, 10);
	});

	it("clones independently", () => {
		const t = Transformation.of(TUnit.translate(1, 1, 1));
		const copy = t.clone();
		copy.add(TUnit.scale(2, 2, 2));
		expect(t.units).toHaveLength(1);
		expect(copy.units).toHaveLength(2);
	});
});
