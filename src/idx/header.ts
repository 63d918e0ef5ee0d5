/**
 * Header decoding for IDX files.
 */

import type { IdxError } from "../errors/base.ts";
import { InvalidHeaderError, UnknownFileKindError } from "../errors/file-kind.ts";
import { TruncatedHeaderError } from "../errors/truncated.ts";
import { ByteCursor } from "../io/byte-cursor.ts";
import { err, ok, type Result } from "../types/result.ts";
import {
	FileKind,
	headerByteLength,
	type IdxHeader,
	instanceCount,
	recordLength,
	UBYTE_TYPE_TAG,
} from "./types.ts";

/**
 * Decodes the magic word and dimension sizes at the start of `bytes`.
 *
 * The upper three bytes of the magic must read 0x00 0x00 0x08; anything
 * else is an UnknownFileKindError. The low byte is the dimension count:
 * one dimension is a label file, more is an image file, zero is an
 * InvalidHeaderError. A buffer ending inside the header is a
 * TruncatedHeaderError.
 */
export function decodeHeader(bytes: Uint8Array): Result<IdxHeader, IdxError> {
	const cursor = new ByteCursor(bytes, (required, available) => new TruncatedHeaderError(required, available));

	const magicResult = cursor.readUint32BE();
	if (!magicResult.ok) return magicResult;
	const magic = magicResult.data;

	if (magic >>> 8 !== UBYTE_TYPE_TAG) return err(new UnknownFileKindError(magic));

	const dimensionCount = magic & 0xff;
	if (dimensionCount === 0) {
		return err(
			new InvalidHeaderError("header declares 0 dimensions", "label files declare one dimension, image files two or more"),
		);
	}
	// Kind follows the dimension count, not the exact MNIST words: 0x802 and
	// 0x804..0x8ff decode as images with one or three-plus axes per record.
	const kind = dimensionCount === 1 ? FileKind.Label : FileKind.Image;

	// Report the whole header size, not just the first missing word
	const byteLength = headerByteLength(dimensionCount);
	const check = cursor.ensure(byteLength - cursor.position);
	if (!check.ok) return check;

	const dimensionSizes: number[] = [];
	for (let i = 0; i < dimensionCount; i++) {
		const size = cursor.readUint32BE();
		if (!size.ok) return size;
		dimensionSizes.push(size.data);
	}

	const header: IdxHeader = { kind, dimensionCount, dimensionSizes, byteLength };
	const geometry = checkRecordGeometry(header);
	if (!geometry.ok) return geometry;
	return ok(header);
}

/**
 * Rejects record lengths that cannot be sliced: a product of extents past
 * 2^53, or zero-byte records under a non-zero instance count.
 */
export function checkRecordGeometry(header: IdxHeader): Result<void, IdxError> {
	const length = recordLength(header);
	if (!Number.isSafeInteger(length)) {
		const extents = header.dimensionSizes.slice(1).join(" x ");
		return err(new InvalidHeaderError(`record extents ${extents} overflow a record length`));
	}

	const count = instanceCount(header);
	if (length === 0 && count > 0) {
		return err(
			new InvalidHeaderError(`${count} records of zero bytes`, "every extent after the first must be non-zero"),
		);
	}
	return ok(undefined);
}
