/**
 * Error taxonomy for a sync run.
 *
 * Row-level errors are collected and counted; everything else aborts the run
 * before the known SKU snapshot or the export file are touched.
 */

export enum SyncErrorCodeEnum {
  FEED_ROW_INVALID = 'FEED_ROW_INVALID',
  TRANSPORT_FAILURE = 'TRANSPORT_FAILURE',
  STORAGE_UNAVAILABLE = 'STORAGE_UNAVAILABLE',
  STORAGE_CORRUPT = 'STORAGE_CORRUPT',
  SERIALIZATION_FAILURE = 'SERIALIZATION_FAILURE',
  PARTIAL_FEED_SUSPECTED = 'PARTIAL_FEED_SUSPECTED',
  UNEXPECTED_ERROR = 'UNEXPECTED_ERROR',
}

export enum FeedRowInvalidReasonEnum {
  MISSING_SKU = 'MISSING_SKU',
  MISSING_PRICE = 'MISSING_PRICE',
  INVALID_PRICE = 'INVALID_PRICE',
  INVALID_STOCK = 'INVALID_STOCK',
  DUPLICATE_SKU = 'DUPLICATE_SKU',
}

export abstract class SyncError extends Error {
  abstract readonly code: SyncErrorCodeEnum;
  abstract readonly isFatal: boolean;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class FeedRowInvalid extends SyncError {
  readonly code = SyncErrorCodeEnum.FEED_ROW_INVALID;
  readonly isFatal = false;

  constructor(
    readonly row: number,
    readonly reason: FeedRowInvalidReasonEnum,
    message: string,
    readonly sku?: string
  ) {
    super(message);
  }
}

export class TransportFailure extends SyncError {
  readonly code = SyncErrorCodeEnum.TRANSPORT_FAILURE;
  readonly isFatal = true;
}

export class StorageUnavailable extends SyncError {
  readonly code = SyncErrorCodeEnum.STORAGE_UNAVAILABLE;
  readonly isFatal = true;
}

export class StorageCorrupt extends SyncError {
  readonly code = SyncErrorCodeEnum.STORAGE_CORRUPT;
  readonly isFatal = true;
}

export class SerializationFailure extends SyncError {
  readonly code = SyncErrorCodeEnum.SERIALIZATION_FAILURE;
  readonly isFatal = true;
  readonly sku?: string;

  constructor(message: string, options: { sku?: string; cause?: unknown } = {}) {
    super(message, { cause: options.cause });
    this.sku = options.sku;
  }
}

export class PartialFeedSuspected extends SyncError {
  readonly code = SyncErrorCodeEnum.PARTIAL_FEED_SUSPECTED;
  readonly isFatal = true;
}

export function isNodeError(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
