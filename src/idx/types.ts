/**
 * IDX container layout.
 *
 * offset 0..3      magic word (big-endian u32): 0x00, 0x00, type tag, dimension count
 *                  one dimension means labels, two or more mean images
 * offset 4..4+4N   N big-endian u32 dimension sizes
 * offset 4+4N..    payload, dimensionSizes[0] records read verbatim
 */

export enum FileKind {
	Image = "image",
	Label = "label",
}

/** Canonical magic words of the MNIST files */
export const IMAGE_MAGIC = 0x00000803;
export const LABEL_MAGIC = 0x00000801;

/** Byte width of the magic word and of every dimension size. */
export const WORD_BYTES = 4;

/** Type tag of unsigned byte payloads (third byte of the magic). */
export const UBYTE_TYPE_TAG = 0x08;

export interface IdxHeader {
	readonly kind: FileKind;
	/** Low byte of the magic word */
	readonly dimensionCount: number;
	/** dimensionSizes[0] is the instance count, the rest are per-instance extents */
	readonly dimensionSizes: readonly number[];
	/** Size of the header region; the payload starts here */
	readonly byteLength: number;
}

/** Byte size of a header declaring `dimensionCount` dimensions. */
export function headerByteLength(dimensionCount: number): number {
	return WORD_BYTES * (dimensionCount + 1);
}

export function instanceCount(header: IdxHeader): number {
	return header.dimensionSizes[0] ?? 0;
}

/**
 * Elements per record: the product of every extent after the first.
 * Labels have no extra axes, so their records are a single byte.
 */
export function recordLength(header: IdxHeader): number {
	let length = 1;
	for (let i = 1; i < header.dimensionSizes.length; i++) {
		length *= header.dimensionSizes[i] ?? 1;
	}
	return length;
}
