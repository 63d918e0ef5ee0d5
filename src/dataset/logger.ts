/**
 * Leveled diagnostic sink used while loading datasets.
 */
export interface Logger {
	info(message: string): void;
	error(message: string): void;
}

export type LogLevel = "info" | "error" | "silent";

/** Writes to the console, dropping messages below `level`. */
export function consoleLogger(level: LogLevel = "info"): Logger {
	return {
		info(message) {
			if (level === "info") console.info(`[INFO] ${message}`);
		},
		error(message) {
			if (level !== "silent") console.error(`[ERROR] ${message}`);
		},
	};
}

export const silentLogger: Logger = {
	info() {},
	error() {},
};
