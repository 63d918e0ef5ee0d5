/**
 * Test utilities: synthetic IDX files.
 */

import * as fs from "node:fs/promises";
import * as os from "node:os";
import * as path from "node:path";
import { IMAGE_MAGIC, LABEL_MAGIC } from "../src/idx/types.ts";

/** Three 2x2 images and their labels, used across the suites */
export const SAMPLE_IMAGES = [
	[0, 1, 2, 3],
	[10, 11, 12, 13],
	[250, 251, 252, 255],
];
export const SAMPLE_LABELS = [7, 2, 9];

/** Magic word followed by big-endian dimension sizes. */
export function encodeHeader(magic: number, sizes: number[]): Uint8Array {
	const bytes = new Uint8Array(4 + 4 * sizes.length);
	const view = new DataView(bytes.buffer);
	view.setUint32(0, magic, false);
	sizes.forEach((size, i) => view.setUint32(4 + 4 * i, size, false));
	return bytes;
}

export function concatBytes(...parts: ArrayLike<number>[]): Uint8Array {
	const total = parts.reduce((sum, part) => sum + part.length, 0);
	const out = new Uint8Array(total);
	let offset = 0;
	for (const part of parts) {
		out.set(Array.from(part), offset);
		offset += part.length;
	}
	return out;
}

export function imageFile(records: number[][], rows: number, columns: number): Uint8Array {
	return concatBytes(encodeHeader(IMAGE_MAGIC, [records.length, rows, columns]), ...records);
}

export function labelFile(labels: number[]): Uint8Array {
	return concatBytes(encodeHeader(LABEL_MAGIC, [labels.length]), labels);
}

/** Creates a scratch directory and returns it with a cleanup function. */
export async function makeTempDir(): Promise<{ dir: string; cleanup: () => Promise<void> }> {
	const dir = await fs.mkdtemp(path.join(os.tmpdir(), "idx-dataset-"));
	return { dir, cleanup: () => fs.rm(dir, { recursive: true, force: true }) };
}

export async function writeFixture(dir: string, name: string, bytes: Uint8Array): Promise<string> {
	const file = path.join(dir, name);
	await fs.writeFile(file, bytes);
	return file;
}
