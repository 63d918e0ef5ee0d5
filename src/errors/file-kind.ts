import { FileKind, IMAGE_MAGIC, LABEL_MAGIC } from "../idx/types.ts";
import { IdxError } from "./base.ts";

const hex = (value: number): string => `0x${value.toString(16).padStart(8, "0")}`;

/**
 * Error thrown when a file's magic word is not an unsigned-byte IDX word.
 */
export class UnknownFileKindError extends IdxError {
	readonly magic: number;

	constructor(magic: number) {
		super("unknown file kind", `expected magic ${hex(IMAGE_MAGIC)} (images) or ${hex(LABEL_MAGIC)} (labels)`);
		this.name = "UnknownFileKindError";
		this.magic = magic;
	}

	protected override _getExpression(): string {
		return "decodeHeader(bytes)";
	}

	protected override _getDetail(): string {
		return `magic word ${hex(this.magic)} is not an unsigned-byte IDX magic`;
	}
}

/**
 * Error thrown when a file of one kind is used where the other was expected.
 */
export class FileKindMismatchError extends IdxError {
	readonly expected: FileKind;
	readonly actual: FileKind;

	constructor(expected: FileKind, actual: FileKind) {
		super("file kind mismatch", "check that the images and labels paths are not swapped");
		this.name = "FileKindMismatchError";
		this.expected = expected;
		this.actual = actual;
	}

	protected override _getExpression(): string {
		return this.expected === FileKind.Image ? "extractImages(...)" : "extractLabels(...)";
	}

	protected override _getDetail(): string {
		return `expected ${this.expected} file, found ${this.actual} file`;
	}
}

/**
 * Error thrown when a header decodes but describes no usable layout.
 */
export class InvalidHeaderError extends IdxError {
	readonly reason: string;

	constructor(reason: string, hint?: string) {
		super("invalid header", hint);
		this.name = "InvalidHeaderError";
		this.reason = reason;
	}

	protected override _getExpression(): string {
		return "decodeHeader(bytes)";
	}

	protected override _getDetail(): string {
		return this.reason;
	}
}
