/**
 * Payload extraction: slices the bytes after an IDX header into records.
 *
 * Payload values are single bytes and are copied verbatim; only header
 * fields are byte-order converted.
 */

import type { IdxError } from "../errors/base.ts";
import { RecordLengthMismatchError } from "../errors/dataset.ts";
import { FileKindMismatchError } from "../errors/file-kind.ts";
import { TruncatedPayloadError } from "../errors/truncated.ts";
import { ByteCursor } from "../io/byte-cursor.ts";
import { err, ok, type Result } from "../types/result.ts";
import { checkRecordGeometry } from "./header.ts";
import type { RecordLayout } from "./layout.ts";
import { FileKind, type IdxHeader, instanceCount, recordLength } from "./types.ts";

function payloadCursor(bytes: Uint8Array, header: IdxHeader, expected: FileKind): Result<ByteCursor, IdxError> {
	if (header.kind !== expected) {
		return err(new FileKindMismatchError(expected, header.kind));
	}

	const geometry = checkRecordGeometry(header);
	if (!geometry.ok) return geometry;

	const cursor = new ByteCursor(
		bytes,
		(required, available) => new TruncatedPayloadError(required, available),
		header.byteLength,
	);

	// Check the full payload once so a short file fails before any copying
	const check = cursor.ensure(instanceCount(header) * recordLength(header));
	if (!check.ok) return check;

	return ok(cursor);
}

/**
 * Reads every image record in file order.
 * Record i of the result is instance i of the file.
 */
export function extractImages<C>(
	bytes: Uint8Array,
	header: IdxHeader,
	layout: RecordLayout<C>,
): Result<C[], IdxError> {
	const cursorResult = payloadCursor(bytes, header, FileKind.Image);
	if (!cursorResult.ok) return cursorResult;
	const cursor = cursorResult.data;

	const length = recordLength(header);
	if (layout.length !== undefined && layout.length !== length) {
		return err(new RecordLengthMismatchError(layout.length, length));
	}

	const count = instanceCount(header);
	const images: C[] = new Array(count);
	for (let i = 0; i < count; i++) {
		const record = cursor.take(length);
		if (!record.ok) return record;
		images[i] = layout.fromValues(record.data);
	}
	return ok(images);
}

/**
 * Reads every label in file order, one byte per instance.
 */
export function extractLabels(bytes: Uint8Array, header: IdxHeader): Result<number[], IdxError> {
	const cursorResult = payloadCursor(bytes, header, FileKind.Label);
	if (!cursorResult.ok) return cursorResult;

	const labels = cursorResult.data.take(instanceCount(header));
	if (!labels.ok) return labels;
	return ok(Array.from(labels.data));
}
