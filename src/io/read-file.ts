import * as fs from "node:fs";
import { FileError } from "../errors/file-error.ts";
import { err, ok, type Result } from "../types/result.ts";

/**
 * Reads a whole file into memory in one blocking call.
 */
export function readAllBytes(path: string): Result<Uint8Array, FileError> {
	try {
		const buffer = fs.readFileSync(path);
		return ok(new Uint8Array(buffer.buffer, buffer.byteOffset, buffer.byteLength));
	} catch (e) {
		return err(toFileError(path, e));
	}
}

function toFileError(path: string, cause: unknown): FileError {
	const code = cause instanceof Error && "code" in cause ? String(cause.code) : undefined;
	switch (code) {
		case "ENOENT":
			return new FileError(path, "no such file", "check the path or download the dataset first");
		case "EACCES":
			return new FileError(path, "permission denied");
		case "EISDIR":
			return new FileError(path, "is a directory", "pass the path of an IDX file, not its folder");
		default:
			return new FileError(path, cause instanceof Error ? cause.message : String(cause));
	}
}
