import { IdxError } from "./base.ts";

/**
 * Error thrown when accessing an instance outside the dataset.
 */
export class IndexOutOfBoundsError extends IdxError {
	readonly index: number;
	readonly min: number;
	readonly max: number;

	constructor(index: number, min: number, max: number) {
		const hint = max >= min ? `valid range is ${min} to ${max}` : "dataset is empty";

		super("index out of bounds", hint);
		this.name = "IndexOutOfBoundsError";
		this.index = index;
		this.min = min;
		this.max = max;
	}

	protected override _getExpression(): string {
		return `instanceAt(${this.index})`;
	}

	protected override _getDetail(): string {
		return `index ${this.index} is outside the valid range`;
	}
}
