import { IdxError } from "./base.ts";

/**
 * Error thrown when a file cannot be opened or read.
 */
export class FileError extends IdxError {
	readonly path: string;
	readonly reason: string;

	constructor(path: string, reason: string, hint?: string) {
		super("file error", hint);
		this.name = "FileError";
		this.path = path;
		this.reason = reason;
	}

	protected override _getExpression(): string {
		return `readAllBytes('${this.path}')`;
	}

	protected override _getDetail(): string {
		return `cannot read '${this.path}': ${this.reason}`;
	}
}
