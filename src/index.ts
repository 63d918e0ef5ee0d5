/**
 * idx-dataset - IDX (MNIST) image and label files as typed, validated datasets.
 *
 * Main entry point for the library.
 */

// Re-export dataset
export { assembleDataset, buildDataset, type Dataset } from "./dataset/assembler.ts";
export { DatasetHandle, type Instance, type Shape } from "./dataset/handle.ts";
export { consoleLogger, type Logger, type LogLevel, silentLogger } from "./dataset/logger.ts";
export { DEFAULT_DATASET_OPTIONS, type DatasetOptions, resolveOptions } from "./dataset/options.ts";
export { renderImage } from "./dataset/render.ts";
// Re-export errors
export {
	EmptyDatasetError,
	FileError,
	FileKindMismatchError,
	IdxError,
	IndexOutOfBoundsError,
	InstanceCountMismatchError,
	InvalidHeaderError,
	InvalidLabelError,
	RecordLengthMismatchError,
	TruncatedHeaderError,
	TruncatedPayloadError,
	UnknownFileKindError,
} from "./errors/index.ts";
// Re-export IDX decoding
export { decodeHeader } from "./idx/header.ts";
export { fixedLayout, growableLayout, type RecordLayout } from "./idx/layout.ts";
export { extractImages, extractLabels } from "./idx/payload.ts";
export {
	FileKind,
	headerByteLength,
	IMAGE_MAGIC,
	type IdxHeader,
	instanceCount,
	LABEL_MAGIC,
	recordLength,
} from "./idx/types.ts";
export { ByteCursor, type UnderrunFactory } from "./io/byte-cursor.ts";
export { readAllBytes } from "./io/read-file.ts";
// Re-export Result
export { andThen, err, mapResult, ok, type Result, unwrap, unwrapErr } from "./types/result.ts";
