/**
 * LoweringError — Path-Aware Mapping Errors
 *
 * Every failure raised while lowering a schema tree names the dotted
 * attribute path where it happened, so a generator run on a large
 * document points straight at the offending property:
 *
 * ```
 * 'settings.limits.burst': schema type ["object"] (format: none) matches no attribute kind
 * ```
 *
 * Errors raised by the schema facade have no path yet; the mapper
 * locates them at the attribute being lowered via {@link LoweringError.locate}.
 *
 * @example
 * ```typescript
 * try {
 *     lowerForResource(schema);
 * } catch (e) {
 *     if (e instanceof UnsupportedSchemaError) {
 *         console.log(e.dottedPath); // "settings.limits.burst"
 *         console.log(e.types);      // ["object"]
 *     }
 * }
 * ```
 *
 * @module
 */

// ── Path Formatting ──────────────────────────────────────

/** Render an attribute path the way error messages show it */
export function formatAttributePath(path: readonly string[]): string {
    return path.length > 0 ? `'${path.join('.')}'` : '(root)';
}

// ── Base Class ───────────────────────────────────────────

/**
 * Base class of every error the mapper raises for a schema problem.
 *
 * Terminal for the subtree being built: the input is static data,
 * so there is nothing to retry.
 */
export abstract class LoweringError extends Error {
    /** What went wrong, without the location prefix */
    readonly detail: string;
    private _path: readonly string[] | undefined;

    protected constructor(detail: string, path?: readonly string[], options?: ErrorOptions) {
        super(LoweringError.compose(detail, path), options);
        this.detail = detail;
        this._path = path;
    }

    /** Attribute path from the document root, `undefined` until located */
    get path(): readonly string[] | undefined {
        return this._path;
    }

    /** The path joined with dots (`''` for the root or an unlocated error) */
    get dottedPath(): string {
        return this._path?.join('.') ?? '';
    }

    /**
     * Attach the attribute path to an error raised without one.
     * An error that already has a path keeps it.
     */
    locate(path: readonly string[]): this {
        if (this._path === undefined) {
            this._path = path;
            this.message = LoweringError.compose(this.detail, path);
        }
        return this;
    }

    private static compose(detail: string, path: readonly string[] | undefined): string {
        return path === undefined ? detail : `${formatAttributePath(path)}: ${detail}`;
    }
}

// ── Error Kinds ──────────────────────────────────────────

/** A node is malformed for the shape requested of it */
export class SchemaError extends LoweringError {
    constructor(detail: string, path?: readonly string[], options?: ErrorOptions) {
        super(detail, path, options);
        this.name = 'SchemaError';
    }
}

/** A node's shape matches no attribute kind */
export class UnsupportedSchemaError extends LoweringError {
    /** Declared type tags of the offending node */
    readonly types: readonly string[];
    /** Declared format, `''` when none */
    readonly format: string;

    constructor(types: readonly string[], format: string, reason: string, path?: readonly string[]) {
        super(
            `schema type ${JSON.stringify(types)} (format: ${format || 'none'}) matches no attribute kind: ${reason}`,
            path,
        );
        this.name = 'UnsupportedSchemaError';
        this.types = types;
        this.format = format;
    }
}

/** Nesting went deeper than the configured ceiling */
export class RecursionLimitError extends LoweringError {
    readonly limit: number;

    constructor(limit: number, path?: readonly string[]) {
        super(`schema nesting exceeds the maximum depth of ${limit}`, path);
        this.name = 'RecursionLimitError';
        this.limit = limit;
    }
}

/** Two sibling properties normalize to the same attribute name */
export class NameCollisionError extends LoweringError {
    /** The attribute name both properties map to */
    readonly attributeName: string;
    /** Source property names, in declaration order */
    readonly propertyNames: readonly [string, string];

    constructor(attributeName: string, first: string, second: string, path?: readonly string[]) {
        super(
            `properties "${first}" and "${second}" both map to attribute name "${attributeName}"`,
            path,
        );
        this.name = 'NameCollisionError';
        this.attributeName = attributeName;
        this.propertyNames = [first, second];
    }
}

// ── Aggregate ────────────────────────────────────────────

/**
 * Thrown in `collect` error mode once the whole tree has been walked.
 * Lists every located error in the order it was hit.
 */
export class LoweringAggregateError extends Error {
    readonly errors: readonly LoweringError[];

    constructor(errors: readonly LoweringError[]) {
        const lines = errors.map(e => `  • ${e.message}`).join('\n');
        super(`Schema lowering failed with ${errors.length} error(s):\n${lines}`);
        this.name = 'LoweringAggregateError';
        this.errors = errors;
    }
}
