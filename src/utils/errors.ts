export type ErrorCode =
    | 'IMAGE_DECODE_ERROR'
    | 'RECOGNITION_ERROR'
    | 'STORAGE_WRITE_ERROR'
    | 'DURATION_LOOKUP_ERROR'
    | 'METRICS_PUSH_ERROR'
    | 'STORE_ERROR'
    | 'CONFIG_ERROR';

/**
 * Base class for every failure the gate controller knows how to classify.
 * The underlying failure, when there is one, is kept as `cause`.
 */
export class ParkingError extends Error {
    readonly code: ErrorCode;

    constructor(code: ErrorCode, message: string, cause?: unknown) {
        super(message, cause === undefined ? undefined : { cause });
        this.name = new.target.name;
        this.code = code;
    }
}

/** The request body could not be read as base64. Fatal to the request. */
export class ImageDecodeError extends ParkingError {
    constructor(message: string, cause?: unknown) {
        super('IMAGE_DECODE_ERROR', message, cause);
    }
}

/** Text detection failed; the plate degrades to UNKNOWN. */
export class RecognitionError extends ParkingError {
    constructor(message: string, cause?: unknown) {
        super('RECOGNITION_ERROR', message, cause);
    }
}

/** The debug copy of the image could not be uploaded. */
export class StorageWriteError extends ParkingError {
    constructor(message: string, cause?: unknown) {
        super('STORAGE_WRITE_ERROR', message, cause);
    }
}

/** The entry record for an exiting vehicle could not be used; duration falls back to 0. */
export class DurationLookupError extends ParkingError {
    constructor(message: string, cause?: unknown) {
        super('DURATION_LOOKUP_ERROR', message, cause);
    }
}

export class MetricsPushError extends ParkingError {
    constructor(message: string, cause?: unknown) {
        super('METRICS_PUSH_ERROR', message, cause);
    }
}

/** Occupancy or session table access failed. */
export class StoreError extends ParkingError {
    constructor(message: string, cause?: unknown) {
        super('STORE_ERROR', message, cause);
    }
}

export class ConfigError extends ParkingError {
    constructor(message: string) {
        super('CONFIG_ERROR', message);
    }
}

export function describeError(error: unknown): string {
    if (error instanceof Error) {
        return `${error.name}: ${error.message}`;
    }
    return String(error);
}
