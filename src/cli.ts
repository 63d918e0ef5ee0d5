/**
 * Command-line entry point.
 *
 *   idx-dataset <images> <labels> [--index n] [--render] [--quiet]
 *
 * Loads the pair, prints its shape and the instance at --index (default 0).
 */

import { realpathSync } from "node:fs";
import { fileURLToPath } from "node:url";
import { parseArgs } from "node:util";
import { DatasetHandle } from "./dataset/handle.ts";
import { consoleLogger, type Logger, silentLogger } from "./dataset/logger.ts";
import { renderImage } from "./dataset/render.ts";
import { growableLayout } from "./idx/layout.ts";

export interface CliIo {
	out(line: string): void;
	err(line: string): void;
	logger?: Logger;
}

const USAGE = "usage: idx-dataset <images> <labels> [--index n] [--render] [--quiet]";

const defaultIo: CliIo = {
	out: (line) => console.log(line),
	err: (line) => console.error(line),
};

/** Runs the CLI and returns the process exit code. */
export function run(argv: string[], io: CliIo = defaultIo): number {
	let parsed: ReturnType<typeof parse>;
	try {
		parsed = parse(argv);
	} catch (e) {
		io.err(e instanceof Error ? e.message : String(e));
		io.err(USAGE);
		return 2;
	}

	const { values, positionals } = parsed;
	const [imagesPath, labelsPath] = positionals;
	if (imagesPath === undefined || labelsPath === undefined || positionals.length > 2) {
		io.err(USAGE);
		return 2;
	}

	const index = Number(values.index);
	if (!Number.isInteger(index) || index < 0) {
		io.err(`--index must be a non-negative integer, got '${values.index}'`);
		return 2;
	}

	const logger = io.logger ?? (values.quiet ? silentLogger : consoleLogger("info"));
	const loaded = DatasetHandle.load(imagesPath, labelsPath, growableLayout(), { logger });
	if (!loaded.ok) {
		io.err(loaded.error.format());
		return 1;
	}

	const handle = loaded.data;
	io.out(handle.formatShape());

	const instance = handle.tryInstanceAt(index);
	if (!instance.ok) {
		io.err(instance.error.format());
		return 1;
	}

	io.out(`Instance ${index}: label ${instance.data.label}`);
	if (values.render) {
		const side = Math.round(Math.sqrt(handle.shape.imageRecordLength));
		const columns = side * side === handle.shape.imageRecordLength ? side : handle.shape.imageRecordLength;
		io.out(renderImage(instance.data.image, columns).trimEnd());
	}
	return 0;
}

function parse(argv: string[]) {
	return parseArgs({
		args: argv,
		allowPositionals: true,
		options: {
			index: { type: "string", short: "i", default: "0" },
			render: { type: "boolean", short: "r", default: false },
			quiet: { type: "boolean", short: "q", default: false },
		},
	});
}

function isMain(): boolean {
	const entry = process.argv[1];
	if (entry === undefined) return false;
	try {
		return realpathSync(entry) === fileURLToPath(import.meta.url);
	} catch {
		return false;
	}
}

if (isMain()) {
	process.exitCode = run(process.argv.slice(2));
}
