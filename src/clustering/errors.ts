import { describeError } from '../utils/retry.js';

/**
 * Rejected request: empty phrase list, all phrases blank, or invalid options.
 * Raised before any pipeline stage runs.
 */
export class ClusteringInputError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'ClusteringInputError';
    }
}

/**
 * The embedding provider could not produce usable vectors.
 * Fatal, since the fallback clusterer cannot run without them.
 */
export class EmbeddingUnavailableError extends Error {
    constructor(message: string, cause?: unknown) {
        super(message, { cause });
        this.name = 'EmbeddingUnavailableError';
    }
}

/**
 * An AI response that is not valid JSON or does not match the expected shape.
 * Retried like a transient provider error.
 */
export class ResponseValidationError extends Error {
    constructor(
        message: string,
        public readonly issues: string[] = [],
        public readonly rawText?: string
    ) {
        super(issues.length > 0 ? `${message}: ${issues.join('; ')}` : message);
        this.name = 'ResponseValidationError';
    }
}

export type PipelineStage = 'strategy' | 'batch';

/**
 * An AI stage spent its retry budget. The orchestrator answers with the fallback.
 */
export class StageFailedError extends Error {
    constructor(
        public readonly stage: PipelineStage,
        public readonly attempts: number,
        cause: unknown,
        public readonly batchNumber?: number
    ) {
        const where = batchNumber === undefined ? stage : `${stage} ${batchNumber}`;
        super(`AI ${where} failed after ${attempts} attempt(s): ${describeError(cause)}`, { cause });
        this.name = 'StageFailedError';
    }
}

/**
 * The AI path did not finish within the session deadline.
 */
export class SessionTimeoutError extends Error {
    constructor(public readonly timeoutMs: number) {
        super(`AI clustering exceeded the ${timeoutMs}ms session budget`);
        this.name = 'SessionTimeoutError';
    }
}
