/**
 * Error module - exports all IDX dataset error types.
 */

export { IdxError } from "./base.ts";
export {
	EmptyDatasetError,
	InstanceCountMismatchError,
	InvalidLabelError,
	RecordLengthMismatchError,
} from "./dataset.ts";
export { FileError } from "./file-error.ts";
export { FileKindMismatchError, InvalidHeaderError, UnknownFileKindError } from "./file-kind.ts";
export { IndexOutOfBoundsError } from "./index-out-of-bounds.ts";
export { TruncatedHeaderError, TruncatedPayloadError } from "./truncated.ts";
