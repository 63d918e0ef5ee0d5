export interface SourceLocation {
	file: string;
	line: number;
	column: number;
}

const FRAME_WITH_NAME = /at .+? \((.+?):(\d+):(\d+)\)/;
const BARE_FRAME = /at (.+?):(\d+):(\d+)/;

/** First stack frame outside this package's error classes and dependencies. */
function callSite(stack: string | undefined): SourceLocation | undefined {
	for (const frame of stack?.split("\n") ?? []) {
		if (frame.includes("node_modules") || frame.includes("/errors/")) continue;

		const [, file, line, column] = FRAME_WITH_NAME.exec(frame) ?? BARE_FRAME.exec(frame) ?? [];
		if (file !== undefined && line !== undefined && column !== undefined) {
			return { file, line: Number(line), column: Number(column) };
		}
	}
	return undefined;
}

/**
 * Root of every failure raised while reading IDX files.
 *
 * Subclasses describe themselves through `_getExpression` (the call that
 * failed) and `_getDetail` (what was wrong with its input); `format` lays
 * both out for a terminal and `summary` for a single log line.
 */
export class IdxError extends Error {
	readonly hint?: string;
	readonly location?: SourceLocation;

	constructor(message: string, hint?: string) {
		super(message);
		this.name = "IdxError";
		this.hint = hint;
		this.location = callSite(this.stack);
	}

	format(): string {
		const where = this.location
			? ` at ${this.location.file.split("/").at(-1)}:${this.location.line}:${this.location.column}`
			: "";
		const lines = [
			`error: ${this.message}${where}`,
			`  --> ${this._getExpression()}`,
			"   |",
			`   └── ${this._getDetail()}`,
		];
		if (this.hint) lines.push("", `help: ${this.hint}`);
		return lines.join("\n");
	}

	summary(): string {
		return `${this.message}: ${this._getDetail()}`;
	}

	protected _getExpression(): string {
		return "(expression)";
	}

	protected _getDetail(): string {
		return this.message;
	}
}
