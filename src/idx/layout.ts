/**
 * Record layouts: how one image record is materialized.
 *
 * Extraction is written once against this interface. The layout chosen at
 * the call site decides the container and whether the record length is
 * pinned ahead of time.
 */

export interface RecordLayout<C> {
	readonly name: string;
	/** Record length the file must declare, or undefined to accept any */
	readonly length: number | undefined;
	/** Builds a record the caller cannot reach, copying `values` */
	fromValues(values: ArrayLike<number>): C;
	/** What a reader receives for a stored record; mutable containers hand out a copy */
	share(record: C): C;
}

/**
 * Fixed-length records as their own Uint8Array, e.g. fixedLayout(28 * 28).
 * Typed arrays cannot be frozen, so every read gets a fresh copy.
 */
export function fixedLayout(length: number): RecordLayout<Uint8Array> {
	if (!Number.isInteger(length) || length < 0) {
		throw new RangeError(`fixedLayout length must be a non-negative integer, got ${length}`);
	}
	return {
		name: `fixed(${length})`,
		length,
		fromValues: (values) => Uint8Array.from(values),
		share: (record) => record.slice(),
	};
}

/** Frozen number arrays of whatever length the file declares. */
export function growableLayout(): RecordLayout<readonly number[]> {
	return {
		name: "growable",
		length: undefined,
		fromValues: (values) => Object.freeze(Array.from(values)),
		share: (record) => record,
	};
}
