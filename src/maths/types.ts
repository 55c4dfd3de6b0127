export interface IVector3 {
	x: number;
	y: number;
	z: number;
}

export interface IVector4 extends IVector3 {
	w: number;
}

/** Row-major 4x4 matrix storage. */
export type Matrix4Arr = number[][];
