/**
 * Dataset assembly: pairs an images file with a labels file.
 *
 * Construction is all-or-nothing. Callers receive either a complete,
 * frozen Dataset or the single error that stopped the build.
 */

import type { IdxError } from "../errors/base.ts";
import { InstanceCountMismatchError } from "../errors/dataset.ts";
import { decodeHeader } from "../idx/header.ts";
import type { RecordLayout } from "../idx/layout.ts";
import { extractImages, extractLabels } from "../idx/payload.ts";
import { readAllBytes } from "../io/read-file.ts";
import { andThen, err, ok, type Result } from "../types/result.ts";
import type { Logger } from "./logger.ts";
import { type DatasetOptions, resolveOptions } from "./options.ts";

export interface Dataset<C> {
	readonly images: readonly C[];
	readonly labels: readonly number[];
}

/**
 * Builds a Dataset from the raw bytes of an images file and a labels file.
 */
export function assembleDataset<C>(
	imageBytes: Uint8Array,
	labelBytes: Uint8Array,
	layout: RecordLayout<C>,
	logger: Logger,
): Result<Dataset<C>, IdxError> {
	logger.info(`Reading images (${layout.name} records)...`);
	const images = andThen(decodeHeader(imageBytes), (header) => extractImages(imageBytes, header, layout));
	if (!images.ok) return fail(logger, images.error);
	logger.info(`Read ${images.data.length} images`);

	logger.info("Reading labels...");
	const labels = andThen(decodeHeader(labelBytes), (header) => extractLabels(labelBytes, header));
	if (!labels.ok) return fail(logger, labels.error);
	logger.info(`Read ${labels.data.length} labels`);

	if (images.data.length !== labels.data.length) {
		return fail(logger, new InstanceCountMismatchError(images.data.length, labels.data.length));
	}

	return ok(
		Object.freeze({
			images: Object.freeze(images.data),
			labels: Object.freeze(labels.data),
		}),
	);
}

/**
 * Reads both files from disk and assembles them. Synchronous.
 *
 * @example
 * ```ts
 * const result = buildDataset("train-images-idx3-ubyte", "train-labels-idx1-ubyte", fixedLayout(784));
 * if (result.ok) console.log(result.data.images.length);
 * ```
 */
export function buildDataset<C>(
	imagesPath: string,
	labelsPath: string,
	layout: RecordLayout<C>,
	options?: DatasetOptions,
): Result<Dataset<C>, IdxError> {
	const { logger } = resolveOptions(options);

	const imageBytes = readAllBytes(imagesPath);
	if (!imageBytes.ok) return fail(logger, imageBytes.error);

	const labelBytes = readAllBytes(labelsPath);
	if (!labelBytes.ok) return fail(logger, labelBytes.error);

	return assembleDataset(imageBytes.data, labelBytes.data, layout, logger);
}

function fail(logger: Logger, error: IdxError): Result<never, IdxError> {
	logger.error(`Dataset build failed: ${error.summary()}`);
	return err(error);
}
