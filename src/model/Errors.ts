export type PipelineErrorKind = 'DataUnavailable' | 'NoDataInRange' | 'InvalidQuery';

/**
 * Base class for the failures the pipeline is allowed to raise.
 * Missing values (undefined ratios, empty cells) are never errors; they are null.
 */
export abstract class PipelineError extends Error {
    abstract readonly kind: PipelineErrorKind;

    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = new.target.name;
    }
}

/**
 * The dataset could not be fetched or parsed. Fatal for the request, no retry.
 */
export class DataUnavailableError extends PipelineError {
    readonly kind = 'DataUnavailable';
}

/**
 * A filtered view is empty where a row was required.
 */
export class NoDataInRangeError extends PipelineError {
    readonly kind = 'NoDataInRange';

    constructor(
        readonly location: string,
        readonly start: Date,
        readonly end: Date
    ) {
        super(
            `No data for '${location}' between ${start.toISOString().slice(0, 10)} and ${end.toISOString().slice(0, 10)}`
        );
    }
}

/**
 * User-supplied controls are malformed or out of range.
 */
export class InvalidQueryError extends PipelineError {
    readonly kind = 'InvalidQuery';

    constructor(
        message: string,
        readonly parameter: string
    ) {
        super(message);
    }
}

export function isPipelineError(err: unknown): err is PipelineError {
    return err instanceof PipelineError;
}
