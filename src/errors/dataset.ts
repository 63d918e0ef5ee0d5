import { IdxError } from "./base.ts";

/**
 * Error thrown when the images and labels files disagree on instance count.
 */
export class InstanceCountMismatchError extends IdxError {
	readonly imageCount: number;
	readonly labelCount: number;

	constructor(imageCount: number, labelCount: number) {
		super("instance count mismatch", "images and labels must come from the same split");
		this.name = "InstanceCountMismatchError";
		this.imageCount = imageCount;
		this.labelCount = labelCount;
	}

	protected override _getExpression(): string {
		return "buildDataset(imagesPath, labelsPath)";
	}

	protected override _getDetail(): string {
		return `${this.imageCount} images but ${this.labelCount} labels`;
	}
}

/**
 * Error thrown when records do not share the expected length: a file against
 * a fixed-length layout, or one record of a pre-built dataset against the first.
 */
export class RecordLengthMismatchError extends IdxError {
	readonly expected: number;
	readonly actual: number;
	/** Position of the offending record, when a single record is at fault */
	readonly index: number | undefined;

	constructor(expected: number, actual: number, index?: number) {
		super(
			"record length mismatch",
			index === undefined
				? "use growableLayout() to accept any record length"
				: "every image in a dataset must have the same length",
		);
		this.name = "RecordLengthMismatchError";
		this.expected = expected;
		this.actual = actual;
		this.index = index;
	}

	protected override _getExpression(): string {
		return this.index === undefined ? `fixedLayout(${this.expected})` : `dataset.images[${this.index}]`;
	}

	protected override _getDetail(): string {
		return this.index === undefined
			? `file records hold ${this.actual} values, layout expects ${this.expected}`
			: `record ${this.index} holds ${this.actual} values, expected ${this.expected}`;
	}
}

/**
 * Error thrown when a pre-built dataset carries a label that is not a byte value.
 */
export class InvalidLabelError extends IdxError {
	readonly index: number;
	readonly value: unknown;

	constructor(index: number, value: unknown) {
		super("invalid label", "labels are integers from 0 to 255");
		this.name = "InvalidLabelError";
		this.index = index;
		this.value = value;
	}

	protected override _getExpression(): string {
		return `dataset.labels[${this.index}]`;
	}

	protected override _getDetail(): string {
		return `label ${this.index} is ${String(this.value)}`;
	}
}

/**
 * Error thrown when a handle is requested over a dataset with no instances.
 */
export class EmptyDatasetError extends IdxError {
	constructor() {
		super("empty dataset", "a dataset handle needs at least one instance");
		this.name = "EmptyDatasetError";
	}

	protected override _getExpression(): string {
		return "DatasetHandle.fromDataset(dataset, layout)";
	}

	protected override _getDetail(): string {
		return "dataset contains no images";
	}
}
