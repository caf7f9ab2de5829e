/**
 * Result\<T\> — Non-Throwing Lowering Outcomes
 *
 * A discriminated union for callers that prefer to branch on failure
 * instead of catching: generators that lower hundreds of schemas and
 * report every broken one at the end.
 *
 * @example
 * ```typescript
 * const result = tryLowerForResource(schema, { config: { errorMode: 'collect' } });
 * if (!result.ok) {
 *     for (const e of result.errors) report(e.dottedPath, e.detail);
 *     return;
 * }
 * render(result.value);
 * ```
 *
 * @module
 */
import { LoweringAggregateError, LoweringError } from '../errors/LoweringError.js';

// ── Discriminated Union ──────────────────────────────────

export interface Success<T> {
    readonly ok: true;
    readonly value: T;
}

/** Every located error the run produced (one in `fail-fast` mode) */
export interface Failure {
    readonly ok: false;
    readonly errors: readonly LoweringError[];
}

export type Result<T> = Success<T> | Failure;

// ── Constructors ─────────────────────────────────────────

export function succeed<T>(value: T): Success<T> {
    return { ok: true, value };
}

export function fail(errors: readonly LoweringError[]): Failure {
    return { ok: false, errors };
}

/**
 * Run a throwing lowering call and capture its lowering errors.
 * Any other exception propagates.
 */
export function capture<T>(fn: () => T): Result<T> {
    try {
        return succeed(fn());
    } catch (err) {
        if (err instanceof LoweringAggregateError) return fail(err.errors);
        if (err instanceof LoweringError) return fail([err]);
        throw err;
    }
}
