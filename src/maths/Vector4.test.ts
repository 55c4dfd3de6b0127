import { describe, it, expect } from "vitest";
import { Vector4 } from "./Vector4";
import { DivisionByZeroError } from "../core/Errors";

describe("Vector4", () => {
	it("distinguishes points from vectors by w", () => {
		expect(Vector4.point(4, -4, 3).isPoint()).toBe(true);
		expect(Vector4.vector(4, -4, 3).isVector()).toBe(true);
		expect(Vector4.vector(4, -4, 3).isPoint()).toBe(false);
	});

	it("subtracting two points gives a vector", () => {
		const v = Vector4.sub(Vector4.point(3, 2, 1), Vector4.point(5, 6, 7));
		expect(v.equals(Vector4.vector(-2, -4, -6))).toBe(true);
	});

	it("subtracting a vector from a point gives a point", () => {
		const p = Vector4.sub(Vector4.point(3, 2, 1), Vector4.vector(5, 6, 7));
		expect(p.equals(Vector4.point(-2, -4, -6))).toBe(true);
	});

	it("negates, scales and divides every component", () => {
		const a = new Vector4(1, -2, 3, -4);
		expect(Vector4.negate(a).equals(new Vector4(-1, 2, -3, 4))).toBe(true);
		expect(Vector4.scale(a, 3.5).equals(new Vector4(3.5, -7, 10.5, -14))).toBe(true);
		expect(a.clone().divide(2).equals(new Vector4(0.5, -1, 1.5, -2))).toBe(true);
	});

	it("mutates in place through the instance methods", () => {
		const p = Vector4.point(1, 2, 3);
		const moved = p.clone().add(Vector4.vector(1, 1, 1)).sub(Vector4.vector(0, 0, 4));
		expect(moved.equals(Vector4.point(2, 3, 0))).toBe(true);
		expect(p.equals(Vector4.point(1, 2, 3))).toBe(true);
		expect(Vector4.vector(1, -1, 0).negate().equals(Vector4.vector(-1, 1, 0))).toBe(true);
		expect(Vector4.vector(1, 2, 3).dot(Vector4.vector(2, 3, 4))).toBe(20);
	});

	it("computes magnitude and normalizes", () => {
		expect(Vector4.vector(-1, -2, -3).length()).toBeCloseTo(Math.sqrt(14));
		const n = Vector4.normalize(Vector4.vector(1, 2, 3));
		expect(n.length()).toBeCloseTo(1);
		expect(n.x).toBeCloseTo(1 / Math.sqrt(14));
	});

	it("computes dot and cross products", () => {
		const a = Vector4.vector(1, 2, 3);
		const b = Vector4.vector(2, 3, 4);
		expect(Vector4.dot(a, b)).toBe(20);
		expect(Vector4.cross(a, b).equals(Vector4.vector(-1, 2, -1))).toBe(true);
		expect(Vector4.cross(b, a).equals(Vector4.vector(1, -2, 1))).toBe(true);
	});

	it("reflects around a slanted normal", () => {
		const v = Vector4.vector(0, -1, 0);
		const n = Vector4.vector(Math.SQRT1_2, Math.SQRT1_2, 0);
		expect(Vector4.reflect(v, n).equals(Vector4.vector(1, 0, 0))).toBe(true);
	});

	it("compares within epsilon", () => {
		const a = Vector4.point(1, 2, 3);
		expect(a.equals(Vector4.point(1.00001, 2, 3))).toBe(true);
		expect(a.equals(Vector4.point(1.001, 2, 3))).toBe(false);
		expect(Vector4.near(a, Vector4.point(1, 2.00005, 3))).toBe(true);
	});

	it("rejects near-zero divisors", () => {
		expect(() => Vector4.vector(0, 0, 0).normalize()).toThrow(DivisionByZeroError);
		expect(() => Vector4.vector(1, 1, 1).divide(1e-6)).toThrow(DivisionByZeroError);
	});
});
