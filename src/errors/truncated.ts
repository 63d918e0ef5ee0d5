import { IdxError } from "./base.ts";

type Region = "header" | "payload";

abstract class TruncatedError extends IdxError {
	readonly required: number;
	readonly available: number;

	constructor(region: Region, required: number, available: number) {
		super(`truncated ${region}`, "the file is incomplete or was cut short during download");
		this.required = required;
		this.available = available;
	}

	protected override _getDetail(): string {
		return `needed ${this.required} bytes but only ${this.available} are available`;
	}
}

/**
 * Error thrown when a buffer ends before the header it declares.
 */
export class TruncatedHeaderError extends TruncatedError {
	constructor(required: number, available: number) {
		super("header", required, available);
		this.name = "TruncatedHeaderError";
	}

	protected override _getExpression(): string {
		return "decodeHeader(bytes)";
	}
}

/**
 * Error thrown when a buffer ends before the records its header declares.
 */
export class TruncatedPayloadError extends TruncatedError {
	constructor(required: number, available: number) {
		super("payload", required, available);
		this.name = "TruncatedPayloadError";
	}

	protected override _getExpression(): string {
		return "extract(bytes, header)";
	}
}
