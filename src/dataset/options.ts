import { consoleLogger, type Logger, type LogLevel } from "./logger.ts";

/**
 * Dataset loading options.
 */
export interface DatasetOptions {
	/** Minimum level written by the default console logger (default: "info") */
	logLevel?: LogLevel;

	/** Custom sink; overrides logLevel when given */
	logger?: Logger;
}

/** Default dataset options */
export const DEFAULT_DATASET_OPTIONS = {
	logLevel: "info" as LogLevel,
	logger: undefined as Logger | undefined,
} as const;

/** Resolved options for internal use */
export interface ResolvedDatasetOptions {
	logger: Logger;
}

/** Convert user-facing options to internal options */
export function resolveOptions(options?: DatasetOptions): ResolvedDatasetOptions {
	const opts = { ...DEFAULT_DATASET_OPTIONS, ...options };
	return {
		logger: opts.logger ?? consoleLogger(opts.logLevel),
	};
}
