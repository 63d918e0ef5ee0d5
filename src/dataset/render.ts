const ASCII_RAMP = " .:-=+*#%@";

/**
 * Renders a flattened image as ASCII art, darkest byte values first.
 * `columns` is the image width; a newline ends every row.
 */
export function renderImage(record: ArrayLike<number>, columns: number): string {
	if (!Number.isInteger(columns) || columns < 1) {
		throw new RangeError(`columns must be a positive integer, got ${columns}`);
	}

	let out = "";
	for (let i = 0; i < record.length; i++) {
		const value = record[i] ?? 0;
		out += ASCII_RAMP[Math.floor((value * ASCII_RAMP.length) / 256)] ?? " ";
		if ((i + 1) % columns === 0) out += "\n";
	}
	return out;
}
