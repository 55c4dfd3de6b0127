/**
 * Shared constants for the ray-casting pipeline.
 */

/**
 * Core mathematical constants.
 */
export class CoreConstants {
	/** Tolerance for every floating-point comparison and near-zero divisor check. */
	static readonly EPSILON = 1e-4;
	/**
	 * A matrix is singular when |det| falls below this fraction of its
	 * largest entry to the fourth power.
	 */
	static readonly SINGULAR_TOLERANCE = 1e-12;
	static readonly MAX_CHANNEL_VALUE = 255;
}

/**
 * Defaults used when a scene is assembled without explicit values.
 */
export class SceneConstants {
	static readonly DEFAULT_AMBIENT = 0.1;
	static readonly DEFAULT_DIFFUSE = 0.9;
	static readonly DEFAULT_SPECULAR = 0.9;
	static readonly DEFAULT_SHININESS = 200.0;
	static readonly DEFAULT_SPHERE_RADIUS = 1.0;
}
