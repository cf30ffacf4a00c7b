/**
 * Custom Error Classes — Errors the environment raises to its caller.
 *
 * Backend restarts and step timeouts are not errors: they end the episode
 * with a LAST TimeStep. Only contract violations and misuse of the
 * environment object are thrown.
 */

/**
 * Thrown when a value fails the dtype, shape or bounds checks of its spec.
 * Values are never coerced to fit.
 */
export class SchemaViolationError extends Error {
    public readonly specName: string;
    public readonly issues: readonly string[];

    constructor(specName: string, issues: readonly string[]) {
        super(`Schema violation for "${specName}": ${issues.join("; ")}`);
        this.name = "SchemaViolationError";
        this.specName = specName;
        this.issues = issues;
    }
}

/**
 * Thrown when `reset()` or `step()` is called while another call on the same
 * environment has not settled yet.
 */
export class ConcurrentCallError extends Error {
    public readonly operation: string;
    public readonly inFlight: string;

    constructor(operation: string, inFlight: string) {
        super(`Cannot ${operation}() while ${inFlight}() is still in flight.`);
        this.name = "ConcurrentCallError";
        this.operation = operation;
        this.inFlight = inFlight;
    }
}

/**
 * Thrown when `reset()` or `step()` is called after `close()`.
 */
export class EnvironmentClosedError extends Error {
    public readonly operation: string;

    constructor(operation: string) {
        super(`Cannot ${operation}() on a closed environment.`);
        this.name = "EnvironmentClosedError";
        this.operation = operation;
    }
}
