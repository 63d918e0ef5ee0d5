import { describe, expect, it } from "vitest";
import {
	FileKindMismatchError,
	InvalidHeaderError,
	RecordLengthMismatchError,
	TruncatedPayloadError,
} from "../src/errors/index.ts";
import { decodeHeader } from "../src/idx/header.ts";
import { fixedLayout, growableLayout } from "../src/idx/layout.ts";
import { extractImages, extractLabels } from "../src/idx/payload.ts";
import { FileKind } from "../src/idx/types.ts";
import { unwrap, unwrapErr } from "../src/types/result.ts";
import { imageFile, labelFile, SAMPLE_IMAGES, SAMPLE_LABELS } from "./test-utils.ts";

describe("extractImages", () => {
	const bytes = imageFile(SAMPLE_IMAGES, 2, 2);
	const header = unwrap(decodeHeader(bytes));

	it("slices records in file order into fixed-length arrays", () => {
		const images = unwrap(extractImages(bytes, header, fixedLayout(4)));

		expect(images).toHaveLength(3);
		expect(images[0]).toBeInstanceOf(Uint8Array);
		expect(images.map((image) => Array.from(image))).toEqual(SAMPLE_IMAGES);
	});

	it("produces the same values through the growable layout", () => {
		const images = unwrap(extractImages(bytes, header, growableLayout()));

		expect(images).toEqual(SAMPLE_IMAGES);
		expect(Object.isFrozen(images[1])).toBe(true);
	});

	it("copies records out of the source buffer", () => {
		const source = imageFile(SAMPLE_IMAGES, 2, 2);
		const images = unwrap(extractImages(source, unwrap(decodeHeader(source)), fixedLayout(4)));

		source[16] = 99;
		expect(images[0]?.[0]).toBe(0);
	});

	it("reads bytes verbatim, without byte-order conversion", () => {
		const file = imageFile([[0x01, 0x02, 0x03, 0x04]], 1, 4);
		const images = unwrap(extractImages(file, unwrap(decodeHeader(file)), growableLayout()));
		expect(images[0]).toEqual([1, 2, 3, 4]);
	});

	it("ignores trailing bytes", () => {
		const padded = new Uint8Array([...bytes, 1, 2, 3]);
		expect(unwrap(extractImages(padded, header, growableLayout()))).toHaveLength(3);
	});

	it("fails on a short payload", () => {
		const error = unwrapErr(extractImages(bytes.subarray(0, bytes.length - 1), header, fixedLayout(4)));

		expect(error).toBeInstanceOf(TruncatedPayloadError);
		expect(error).toMatchObject({ required: 28, available: 27 });
	});

	it("fails when the fixed layout length differs from the file", () => {
		const error = unwrapErr(extractImages(bytes, header, fixedLayout(784)));

		expect(error).toBeInstanceOf(RecordLengthMismatchError);
		expect(error).toMatchObject({ expected: 784, actual: 4 });
	});

	it("fails when handed a label header", () => {
		const labels = labelFile(SAMPLE_LABELS);
		const error = unwrapErr(extractImages(labels, unwrap(decodeHeader(labels)), fixedLayout(4)));

		expect(error).toBeInstanceOf(FileKindMismatchError);
		expect(error).toMatchObject({ expected: FileKind.Image, actual: FileKind.Label });
	});

	it("rejects a hand-built header with zero-byte records", () => {
		const zeroExtent = { kind: FileKind.Image, dimensionCount: 3, dimensionSizes: [4294967295, 0, 0], byteLength: 16 };
		const error = unwrapErr(extractImages(new Uint8Array(16), zeroExtent, growableLayout()));

		expect(error).toBeInstanceOf(InvalidHeaderError);
		expect(error.summary()).toBe("invalid header: 4294967295 records of zero bytes");
	});

	it("returns no records for a zero-count file", () => {
		const empty = imageFile([], 2, 2);
		expect(unwrap(extractImages(empty, unwrap(decodeHeader(empty)), growableLayout()))).toEqual([]);
	});
});

describe("extractLabels", () => {
	const bytes = labelFile(SAMPLE_LABELS);
	const header = unwrap(decodeHeader(bytes));

	it("reads one byte per instance", () => {
		expect(unwrap(extractLabels(bytes, header))).toEqual([7, 2, 9]);
	});

	it("fails on a short payload", () => {
		const error = unwrapErr(extractLabels(bytes.subarray(0, 9), header));

		expect(error).toBeInstanceOf(TruncatedPayloadError);
		expect(error).toMatchObject({ required: 11, available: 9 });
	});

	it("fails when handed an image header", () => {
		const images = imageFile(SAMPLE_IMAGES, 2, 2);
		const error = unwrapErr(extractLabels(images, unwrap(decodeHeader(images))));

		expect(error).toBeInstanceOf(FileKindMismatchError);
		expect(error.summary()).toBe("file kind mismatch: expected label file, found image file");
	});
});

describe("fixedLayout", () => {
	it("rejects a negative length", () => {
		expect(() => fixedLayout(-1)).toThrow(RangeError);
	});
});
