/**
 * DatasetHandle: the read-only owner of one loaded dataset.
 *
 * A handle only exists over a valid, non-empty dataset. It is built by the
 * static factories below, caches its shape on construction and exposes no
 * way to mutate or duplicate what it owns.
 */

import type { IdxError } from "../errors/base.ts";
import {
	EmptyDatasetError,
	InstanceCountMismatchError,
	InvalidLabelError,
	RecordLengthMismatchError,
} from "../errors/dataset.ts";
import { IndexOutOfBoundsError } from "../errors/index-out-of-bounds.ts";
import type { RecordLayout } from "../idx/layout.ts";
import { andThen, err, ok, type Result, unwrap } from "../types/result.ts";
import { buildDataset, type Dataset } from "./assembler.ts";
import type { DatasetOptions } from "./options.ts";

export interface Shape {
	readonly imageCount: number;
	readonly imageRecordLength: number;
	readonly labelCount: number;
	readonly labelRecordWidth: 1;
}

export interface Instance<C> {
	readonly image: C;
	readonly label: number;
}

export class DatasetHandle<C extends ArrayLike<number>> {
	private readonly _dataset: Dataset<C>;
	private readonly _shape: Shape;
	private readonly _layout: RecordLayout<C>;

	private constructor(dataset: Dataset<C>, shape: Shape, layout: RecordLayout<C>) {
		this._dataset = dataset;
		this._shape = shape;
		this._layout = layout;
	}

	/**
	 * Wraps a dataset built elsewhere. Every record and label is checked and
	 * copied into `layout`, so the caller keeps no way to write into the handle.
	 */
	static fromDataset<C extends ArrayLike<number>>(
		dataset: Dataset<ArrayLike<number>>,
		layout: RecordLayout<C>,
	): Result<DatasetHandle<C>, IdxError> {
		const valid = validateDataset(dataset, layout);
		if (!valid.ok) return valid;

		return DatasetHandle.adopt(
			Object.freeze({
				images: Object.freeze(Array.from(dataset.images, (record) => layout.fromValues(record))),
				labels: Object.freeze(Array.from(dataset.labels)),
			}),
			layout,
		);
	}

	/** Loads both files and wraps the result. */
	static load<C extends ArrayLike<number>>(
		imagesPath: string,
		labelsPath: string,
		layout: RecordLayout<C>,
		options?: DatasetOptions,
	): Result<DatasetHandle<C>, IdxError> {
		// Assembled datasets are frozen, uniform and unshared already
		return andThen(buildDataset(imagesPath, labelsPath, layout, options), (dataset) =>
			DatasetHandle.adopt(dataset, layout),
		);
	}

	private static adopt<C extends ArrayLike<number>>(
		dataset: Dataset<C>,
		layout: RecordLayout<C>,
	): Result<DatasetHandle<C>, IdxError> {
		const first = dataset.images[0];
		if (first === undefined) return err(new EmptyDatasetError());

		const shape: Shape = Object.freeze({
			imageCount: dataset.images.length,
			imageRecordLength: first.length,
			labelCount: dataset.labels.length,
			labelRecordWidth: 1,
		});
		return ok(new DatasetHandle(dataset, shape, layout));
	}

	/**
	 * Throwing form of {@link DatasetHandle.load}.
	 * @throws IdxError describing the first failure
	 */
	static open<C extends ArrayLike<number>>(
		imagesPath: string,
		labelsPath: string,
		layout: RecordLayout<C>,
		options?: DatasetOptions,
	): DatasetHandle<C> {
		return unwrap(DatasetHandle.load(imagesPath, labelsPath, layout, options));
	}

	get shape(): Shape {
		return this._shape;
	}

	/**
	 * The owned dataset. Frozen throughout for growable records; Uint8Array
	 * records cannot be frozen, so read them through instanceAt for a copy.
	 */
	get dataset(): Dataset<C> {
		return this._dataset;
	}

	/** Number of instances */
	get size(): number {
		return this._shape.imageCount;
	}

	tryInstanceAt(index: number): Result<Instance<C>, IndexOutOfBoundsError> {
		const image = Number.isInteger(index) ? this._dataset.images[index] : undefined;
		const label = Number.isInteger(index) ? this._dataset.labels[index] : undefined;
		if (index < 0 || image === undefined || label === undefined) {
			return err(new IndexOutOfBoundsError(index, 0, this.size - 1));
		}
		return ok({ image: this._layout.share(image), label });
	}

	/**
	 * Returns the image and label at `index`.
	 * @throws IndexOutOfBoundsError unless 0 <= index < size
	 */
	instanceAt(index: number): Instance<C> {
		return unwrap(this.tryInstanceAt(index));
	}

	/** Random permutation of the instance indices (Fisher-Yates). */
	shuffledIndices(random: () => number = Math.random): number[] {
		const indices = Array.from({ length: this.size }, (_, i) => i);
		for (let i = indices.length - 1; i > 0; i--) {
			const j = Math.floor(random() * (i + 1));
			const swap = indices[j] ?? j;
			indices[j] = indices[i] ?? i;
			indices[i] = swap;
		}
		return indices;
	}

	*[Symbol.iterator](): IterableIterator<Instance<C>> {
		for (let i = 0; i < this.size; i++) {
			yield this.instanceAt(i);
		}
	}

	formatShape(): string {
		const { imageCount, imageRecordLength, labelCount, labelRecordWidth } = this._shape;
		return `Images shape: (${imageCount}, ${imageRecordLength})\nLabels shape: (${labelCount}, ${labelRecordWidth})`;
	}

	printShape(): void {
		console.log(this.formatShape());
	}
}

function validateDataset(dataset: Dataset<ArrayLike<number>>, layout: RecordLayout<unknown>): Result<void, IdxError> {
	const { images, labels } = dataset;
	const first = images[0];
	if (first === undefined) return err(new EmptyDatasetError());

	if (images.length !== labels.length) {
		return err(new InstanceCountMismatchError(images.length, labels.length));
	}

	if (layout.length !== undefined && layout.length !== first.length) {
		return err(new RecordLengthMismatchError(layout.length, first.length));
	}

	// Indexed loops so holes in sparse arrays are seen
	for (let i = 0; i < images.length; i++) {
		const record = images[i];
		if (record === undefined || record.length !== first.length) {
			return err(new RecordLengthMismatchError(first.length, record?.length ?? 0, i));
		}
	}

	for (let i = 0; i < labels.length; i++) {
		const label = labels[i];
		if (label === undefined || !Number.isInteger(label) || label < 0 || label > 255) {
			return err(new InvalidLabelError(i, label));
		}
	}
	return ok(undefined);
}
