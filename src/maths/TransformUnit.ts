/**
 * Primitive affine operations that a Transformation is composed from.
 */

import { Matrix4 } from "./Matrix4";

export type TransformUnit =
	| { type: "identity" }
	| { type: "translate"; dx: number; dy: number; dz: number }
	| { type: "scale"; fx: number; fy: number; fz: number }
	| { type: "rotateX"; angle: number }
	| { type: "rotateY"; angle: number }
	| { type: "rotateZ"; angle: number }
	| {
			type: "shear";
			xy: number;
			xz: number;
			yx: number;
			yz: number;
			zx: number;
			zy: number;
	  };

export type TransformUnitType = TransformUnit["type"];

/**
 * Constructors for each unit. Angles are in radians.
 */
export const TUnit = {
	identity: (): TransformUnit => ({ type: "identity" }),
	translate: (dx: number, dy: number, dz: number): TransformUnit => ({
		type: "translate",
		dx,
		dy,
		dz,
	}),
	scale: (fx: number, fy: number, fz: number): TransformUnit => ({
		type: "scale",
		fx,
		fy,
		fz,
	}),
	rotateX: (angle: number): TransformUnit => ({ type: "rotateX", angle }),
	rotateY: (angle: number): TransformUnit => ({ type: "rotateY", angle }),
	rotateZ: (angle: number): TransformUnit => ({ type: "rotateZ", angle }),
	shear: (
		xy: number,
		xz: number,
		yx: number,
		yz: number,
		zx: number,
		zy: number
	): TransformUnit => ({ type: "shear", xy, xz, yx, yz, zx, zy }),
};

export function unitMatrix(unit: TransformUnit): Matrix4 {
	switch (unit.type) {
		case "identity":
			return Matrix4.identity();
		case "translate":
			return Matrix4.translation(unit.dx, unit.dy, unit.dz);
		case "scale":
			return Matrix4.scaling(unit.fx, unit.fy, unit.fz);
		case "rotateX":
			return Matrix4.rotationX(unit.angle);
		case "rotateY":
			return Matrix4.rotationY(unit.angle);
		case "rotateZ":
			return Matrix4.rotationZ(unit.angle);
		case "shear":
			return Matrix4.shearing(
				unit.xy,
				unit.xz,
				unit.yx,
				unit.yz,
				unit.zx,
				unit.zy
			);
	}
}
