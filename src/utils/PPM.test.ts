import { afterEach, describe, it, expect } from "vitest";
import { mkdtemp, readFile, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { encodePPM, writePPM } from "./PPM";
import { Canvas } from "../core/Canvas";
import { Color } from "./Color";

describe("encodePPM", () => {
	it("writes the header", () => {
		const lines = encodePPM(new Canvas(5, 3)).split("\n");
		expect(lines.slice(0, 3)).toEqual(["P3", "5 3", "255"]);
	});

	it("writes one clamped row per line", () => {
		const c = new Canvas(5, 3);
		c.write(0, 0, new Color(1.5, 0, 0));
		c.write(2, 1, new Color(0, 0.5, 0));
		c.write(4, 2, new Color(-0.5, 0, 1));
		const lines = encodePPM(c).split("\n");
		expect(lines.slice(3)).toEqual([
			"255 0 0 0 0 0 0 0 0 0 0 0 0 0 0",
			"0 0 0 0 0 0 0 128 0 0 0 0 0 0 0",
			"0 0 0 0 0 0 0 0 0 0 0 0 0 0 255",
		]);
	});

	it("has no trailing newline and encodes the same canvas identically", () => {
		const c = new Canvas(2, 1, { r: 1, g: 0.8, b: 0.6 });
		const out = encodePPM(c);
		expect(out).toBe("P3\n2 1\n255\n255 204 153 255 204 153");
		expect(encodePPM(c)).toBe(out);
	});
});

describe("writePPM", () => {
	let dir: string | null = null;

	afterEach(async () => {
		if (dir) await rm(dir, { recursive: true, force: true });
		dir = null;
	});

	it("creates missing directories and writes the encoded canvas", async () => {
		dir = await mkdtemp(join(tmpdir(), "ppm-"));
		const path = join(dir, "nested", "out.ppm");
		const canvas = new Canvas(1, 1, Color.white());
		await writePPM(canvas, path);
		expect(await readFile(path, "utf8")).toBe("P3\n1 1\n255\n255 255 255");
	});
});
