import type { BlacklistFinding } from '../semantic/types';

export type ErrorCode =
    | 'DATASET_NOT_FOUND'
    | 'SCHEMA_UNAVAILABLE'
    | 'UNKNOWN_COLUMN'
    | 'UNSUPPORTED_OPERATOR'
    | 'MALFORMED_OPERAND'
    | 'EXECUTION_FAILED'
    | 'INVALID_REQUEST'
    | 'ANALYSIS_BLOCKED';

export abstract class TabularGuardError extends Error {
    abstract readonly code: ErrorCode;

    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = new.target.name;
    }
}

export class DatasetNotFoundError extends TabularGuardError {
    readonly code = 'DATASET_NOT_FOUND';

    constructor(readonly datasetId: string) {
        super(`Dataset ${datasetId} not found`);
    }
}

export class SchemaUnavailableError extends TabularGuardError {
    readonly code = 'SCHEMA_UNAVAILABLE';

    constructor(readonly datasetId: string, cause?: unknown) {
        super(`Could not read the structure of dataset ${datasetId}`, { cause });
    }
}

export class UnknownColumnError extends TabularGuardError {
    readonly code = 'UNKNOWN_COLUMN';

    constructor(readonly column: string) {
        super(`Unknown column: ${column}`);
    }
}

export class UnsupportedOperatorError extends TabularGuardError {
    readonly code = 'UNSUPPORTED_OPERATOR';

    constructor(readonly operator: string) {
        super(`Unsupported operator: ${operator}`);
    }
}

export class MalformedOperandError extends TabularGuardError {
    readonly code = 'MALFORMED_OPERAND';

    constructor(readonly column: string, readonly operator: string, detail: string) {
        super(`Invalid value for ${operator} on ${column}: ${detail}`);
    }
}

export class ExecutionFailedError extends TabularGuardError {
    readonly code = 'EXECUTION_FAILED';

    constructor(message: string, cause?: unknown) {
        super(message, { cause });
    }
}

export class InvalidRequestError extends TabularGuardError {
    readonly code = 'INVALID_REQUEST';

    constructor(message: string, readonly issues: string[] = []) {
        super(message);
    }
}

export class AnalysisBlockedError extends TabularGuardError {
    readonly code = 'ANALYSIS_BLOCKED';

    constructor(readonly analysis: string, readonly findings: BlacklistFinding[]) {
        super(`Analysis ${analysis} is blocked at this dataset's grain: ${findings.map(f => f.reason).join('; ')}`);
    }
}

export const isTabularGuardError = (err: unknown): err is TabularGuardError =>
    err instanceof TabularGuardError;

/**
 * Maps an engine failure to a category-level message that is safe to show to
 * callers. The raw error stays attached as `cause`.
 */
export function sanitizeEngineError(err: unknown): ExecutionFailedError {
    if (err instanceof ExecutionFailedError) return err;

    const raw = err instanceof Error ? err.message : String(err);
    const name = err instanceof Error ? err.name : '';

    let message = 'Query execution failed';
    if (name === 'TimeoutError' || /timed? ?out/i.test(raw)) {
        message = 'Query execution timed out';
    } else if (name === 'AbortError' || /abort|interrupt/i.test(raw)) {
        message = 'Query execution was aborted';
    } else if (raw.includes('Out of Memory') || raw.includes('allocation failed')) {
        message = 'Query ran out of memory';
    } else if (/Conversion Error|Could not convert|Invalid Input Error/i.test(raw)) {
        message = 'A filter value could not be converted to the column type';
    } else if (/Binder Error|Catalog Error|Parser Error/i.test(raw)) {
        message = 'The query referenced a column or type the dataset does not have';
    } else if (/IO Error|No files found/i.test(raw)) {
        message = 'The dataset file could not be read';
    }

    return new ExecutionFailedError(message, err);
}
