import { Vector4 } from "../maths/Vector4";
import { Transformation } from "../maths/Transformation";
import { TUnit } from "../maths/TransformUnit";
import { CoreConstants } from "./Constants";
import { LightCountError } from "./Errors";
import { Intersection, Intersections } from "./Intersections";
import { prepareComputations, type Computations } from "./Computations";
import { Ray } from "./Ray";
import { Material } from "../materials";
import { Color, type RGB } from "../utils/Color";
import { PointLight, type SceneLight } from "../lights";
import { Sphere, type SceneShape } from "../shapes";
import { createLogger } from "../utils/Logger";

const log = createLogger("World");

/**
 * Shapes and light sources of a scene, plus ray casting against them.
 * Contents change only while a scene is assembled, never during a render.
 */
export class World {
	public shapes: SceneShape[];
	public lights: SceneLight[];

	constructor() {
		this.shapes = [];
		this.lights = [];
	}

	/**
	 * Two concentric spheres lit from the upper left:
	 * an outer unit sphere and an inner one scaled by 0.5.
	 */
	public static createDefault(): World {
		const world = new World();
		world.addLight(
			new PointLight({
				position: Vector4.point(-10, 10, -10),
				intensity: Color.white(),
			})
		);
		world.addShape(
			new Sphere({
				material: new Material({
					color: { r: 0.8, g: 1.0, b: 0.6 },
					diffuse: 0.7,
					specular: 0.2,
				}),
			})
		);
		world.addShape(
			new Sphere({ transformation: Transformation.of(TUnit.scale(0.5, 0.5, 0.5)) })
		);
		return world;
	}

	public addShape<T extends SceneShape>(shape: T): T {
		this.shapes.push(shape);
		return shape;
	}

	public addShapes(shapes: SceneShape[]): void {
		this.shapes.push(...shapes);
	}

	public removeShape(shape: SceneShape): boolean {
		const index = this.shapes.indexOf(shape);
		if (index !== -1) {
			this.shapes.splice(index, 1);
			return true;
		}
		return false;
	}

	public addLight(light: SceneLight): SceneLight {
		this.lights.push(light);
		return light;
	}

	public removeLight(light: SceneLight): boolean {
		const index = this.lights.indexOf(light);
		if (index !== -1) {
			this.lights.splice(index, 1);
			return true;
		}
		return false;
	}

	public clear(): void {
		this.shapes = [];
		this.lights = [];
	}

	/**
	 * The single light source shading and shadows are defined for.
	 */
	public light(): SceneLight {
		if (this.lights.length !== 1) {
			throw new LightCountError(this.lights.length);
		}
		return this.lights[0];
	}

	/** Setup-time check; throws the same errors a render would. */
	public validate(): void {
		this.light();
		for (const shape of this.shapes) {
			try {
				shape.transformation.inverse();
			} catch (error) {
				log.error(`${shape.id} cannot be placed in the scene`, error);
				throw error;
			}
		}
	}

	/**
	 * All intersections of the ray with every shape, sorted once.
	 */
	public intersect(ray: Ray): Intersections {
		const items: Intersection[] = [];
		for (const shape of this.shapes) {
			for (const t of shape.intersect(ray)) {
				items.push(new Intersection(t, shape));
			}
		}
		return new Intersections(items);
	}

	public isShadowed(point: Vector4): boolean {
		const light = this.light();
		const toLight = Vector4.sub(light.position, point);
		const distance = toLight.length();

		const ray = new Ray(point, toLight.normalize());
		const hit = this.intersect(ray).hit();

		return hit !== null && hit.t < distance - CoreConstants.EPSILON;
	}

	public shadeHit(comps: Computations): Color {
		const shadowed = this.isShadowed(comps.overPoint);
		return this.light().shade({
			material: comps.shape.material,
			point: comps.point,
			eye: comps.eye,
			normal: comps.normal,
			inShadow: shadowed,
			shape: comps.shape,
		});
	}

	/**
	 * Colour seen along a ray: the shaded hit, or `background` on a miss.
	 */
	public calc(ray: Ray, background: RGB = Color.black()): Color {
		const hit = this.intersect(ray).hit();
		if (!hit) return Color.from(background);
		return this.shadeHit(prepareComputations(hit, ray));
	}
}
