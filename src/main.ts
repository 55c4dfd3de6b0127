/**
 * Renders one of the bundled demo scenes to a PPM file.
 *
 *   npm run render -- spheres -w 400 -H 200 -o img/spheres.ppm
 */

import { Command, InvalidArgumentError } from "commander";
import { Renderer } from "./core/Renderer";
import { writePPM } from "./utils/PPM";
import { createLogger, setDebug } from "./utils/Logger";
import { isSceneName, scenes } from "./scenes";

const log = createLogger("CLI");

interface RenderCommandOptions {
	width: number;
	height: number;
	output?: string;
	quiet: boolean;
	verbose: boolean;
}

function parsePositiveInt(value: string): number {
	const parsed = Number(value);
	if (!Number.isInteger(parsed) || parsed <= 0) {
		throw new InvalidArgumentError("Expected a positive integer.");
	}
	return parsed;
}

const program = new Command();

program
	.name("raycaster")
	.description("Offline ray-casting renderer with Phong shading");

program
	.command("render")
	.argument("<scene>", `Scene to render (${Object.keys(scenes).join(", ")})`)
	.option("-w, --width <px>", "Image width", parsePositiveInt, 400)
	.option("-H, --height <px>", "Image height", parsePositiveInt, 200)
	.option("-o, --output <file>", "Output file (default img/<scene>.ppm)")
	.option("-q, --quiet", "Do not print progress", false)
	.option("-v, --verbose", "Enable debug logging", false)
	.action(async (sceneName: string, options: RenderCommandOptions) => {
		if (options.verbose) setDebug(true);

		if (!isSceneName(sceneName)) {
			log.error(`Unknown scene "${sceneName}"`);
			process.exitCode = 1;
			return;
		}

		const { world, camera, background } = scenes[sceneName]({
			width: options.width,
			height: options.height,
		});
		const renderer = new Renderer(world, camera, {
			background,
			reportProgress: !options.quiet,
		});

		let lastPercent = -1;
		renderer.on("row", ({ ratio }) => {
			const percent = Math.floor(ratio * 100);
			if (percent % 10 === 0 && percent !== lastPercent) {
				lastPercent = percent;
				console.log(`[Rendering] ${sceneName}: ${percent}%`);
			}
		});
		renderer.on("renderend", ({ pixels, durationMs }) => {
			log.info(`${pixels} pixels in ${durationMs.toFixed(0)} ms`);
		});

		const output = options.output ?? `img/${sceneName}.ppm`;
		try {
			const canvas = renderer.render();
			await writePPM(canvas, output);
			if (!options.quiet) console.log(`Wrote ${output}`);
		} catch (error) {
			log.error(`Failed to render "${sceneName}"`, error);
			process.exitCode = 1;
		}
	});

program.parseAsync(process.argv).catch((error: unknown) => {
	log.error("Unexpected failure", error);
	process.exitCode = 1;
});
