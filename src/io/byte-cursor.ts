/**
 * ByteCursor: forward-only reader over a byte buffer.
 *
 * Every read checks the remaining length first and advances by exactly the
 * number of bytes it consumed. Multi-byte integers are always decoded as
 * big-endian, independent of host byte order.
 */

import type { IdxError } from "../errors/base.ts";
import { err, ok, type Result } from "../types/result.ts";

/** Builds the error reported when a read runs past the end of the buffer. */
export type UnderrunFactory = (required: number, available: number) => IdxError;

export class ByteCursor {
	private readonly view: DataView;
	private offset: number;

	constructor(
		private readonly bytes: Uint8Array,
		private readonly onUnderrun: UnderrunFactory,
		start = 0,
	) {
		this.view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
		this.offset = start;
	}

	/** Current read position, in bytes from the start of the buffer */
	get position(): number {
		return this.offset;
	}

	/** Bytes left after the current position */
	get remaining(): number {
		return Math.max(0, this.bytes.byteLength - this.offset);
	}

	/**
	 * Checks that `count` more bytes exist without consuming them.
	 * The reported requirement is absolute (position + count).
	 */
	ensure(count: number): Result<void, IdxError> {
		// Negated so a NaN count fails too
		if (!(count <= this.remaining)) {
			return err(this.onUnderrun(this.offset + count, this.bytes.byteLength));
		}
		return ok(undefined);
	}

	readUint32BE(): Result<number, IdxError> {
		const check = this.ensure(4);
		if (!check.ok) return check;

		const value = this.view.getUint32(this.offset, false);
		this.offset += 4;
		return ok(value);
	}

	/** Returns a view over the next `count` bytes (no copy). */
	take(count: number): Result<Uint8Array, IdxError> {
		const check = this.ensure(count);
		if (!check.ok) return check;

		const slice = this.bytes.subarray(this.offset, this.offset + count);
		this.offset += count;
		return ok(slice);
	}
}
