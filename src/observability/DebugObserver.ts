/**
 * DebugObserver — Opt-In Observability for the Schema Mapper
 *
 * Structured, typed debug events emitted while a schema tree is lowered.
 * When no observer is passed (the default) nothing is built or emitted.
 *
 * Design principles:
 * - Pure function observer (no class hierarchy)
 * - Discriminated union events (exhaustive switch possible)
 * - Immutable event payloads (readonly)
 *
 * @example
 * ```typescript
 * import { createDebugObserver, lowerForResource } from 'openapi-provider-mapper';
 *
 * // Default: pretty console.debug output
 * lowerForResource(schema, { debug: createDebugObserver() });
 *
 * // Custom handler (e.g. collect notices for a generator report)
 * const notices: NoticeEvent[] = [];
 * lowerForResource(schema, {
 *     debug: createDebugObserver((event) => {
 *         if (event.type === 'notice') notices.push(event);
 *     }),
 * });
 * ```
 *
 * @module
 */
import type { AttributeKindName, Computability, OutputTarget } from '../ir/types.js';

// ============================================================================
// Event Types (Discriminated Union)
// ============================================================================

/** Emitted for every attribute produced, after its children */
export interface AttributeEvent {
    readonly type: 'attribute';
    readonly target: OutputTarget;
    /** Dotted attribute path */
    readonly path: string;
    readonly kind: AttributeKindName;
    readonly computability: Computability;
    readonly timestamp: number;
}

export type NoticeCode =
    | 'float-precision'
    | 'additional-properties-ignored'
    | 'override-ignored';

/**
 * Emitted when the mapper makes a lossy or policy-driven choice that
 * does not fail the run.
 */
export interface NoticeEvent {
    readonly type: 'notice';
    readonly target: OutputTarget;
    readonly path: string;
    readonly code: NoticeCode;
    readonly message: string;
    readonly timestamp: number;
}

/** Emitted once per lowering error, before it is thrown or collected */
export interface ErrorEvent {
    readonly type: 'error';
    readonly target: OutputTarget;
    readonly path: string;
    /** Error class name, e.g. `UnsupportedSchemaError` */
    readonly errorName: string;
    /** Error detail without the path prefix */
    readonly detail: string;
    readonly timestamp: number;
}

/** Emitted when an entry point finishes without throwing */
export interface CompleteEvent {
    readonly type: 'complete';
    readonly target: OutputTarget;
    /** Number of top-level attributes returned */
    readonly count: number;
    readonly durationMs: number;
    readonly timestamp: number;
}

export type DebugEvent =
    | AttributeEvent
    | NoticeEvent
    | ErrorEvent
    | CompleteEvent;

export type DebugObserverFn = (event: DebugEvent) => void;

// ============================================================================
// Factory
// ============================================================================

/**
 * Create a debug observer with pretty console output.
 *
 * If a custom handler is provided, events are forwarded to it instead.
 * The default handler produces compact, readable output:
 *
 * ```
 * [oas-mapper] attr      resource settings.token string computed_optional
 * [oas-mapper] notice    resource settings.ratio float-precision ...
 * [oas-mapper] complete  resource 4 attributes 0.8ms
 * ```
 */
export function createDebugObserver(handler?: DebugObserverFn): DebugObserverFn {
    if (handler) return handler;

    return (event: DebugEvent): void => {
        const prefix = '[oas-mapper]';
        const path = 'path' in event ? (event.path || '(root)') : '';

        switch (event.type) {
            case 'attribute':
                console.debug(`${prefix} attr      ${event.target} ${path} ${event.kind} ${event.computability}`);
                break;

            case 'notice':
                console.debug(`${prefix} notice    ${event.target} ${path} ${event.code} ${event.message}`);
                break;

            case 'error':
                console.debug(`${prefix} ERROR     ${event.target} ${path} [${event.errorName}] ${event.detail}`);
                break;

            case 'complete':
                console.debug(`${prefix} complete  ${event.target} ${event.count} attributes ${event.durationMs.toFixed(1)}ms`);
                break;
        }
    };
}
