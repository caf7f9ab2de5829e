/**
 * AttributeMapper — Schema Tree → Provider Attribute IR
 *
 * Recursive lowering of an object schema into ordered attributes. One
 * generic traversal serves both output targets; the {@link TargetPolicy}
 * only decides what a scalar leaf carries.
 *
 * Per property, in declaration order:
 *   1. Normalize the name and reject sibling collisions
 *   2. Read the override at the dotted path (`ignore` skips the property)
 *   3. Resolve computability against the parent's `required`
 *   4. Classify, then build the leaf / collection / nested attribute
 *
 * Errors are located at the dotted attribute path. In `collect` mode a
 * failing property is skipped and the run ends with a
 * {@link LoweringAggregateError} listing every failure.
 *
 * @example
 * ```typescript
 * import { lowerForResource } from 'openapi-provider-mapper';
 *
 * const attributes = lowerForResource({
 *     type: 'object',
 *     required: ['name'],
 *     properties: {
 *         name: { type: 'string' },
 *         apiToken: { type: 'string', format: 'password' },
 *     },
 * });
 * // → [{ name: 'name', kind: 'string', computability: 'required' },
 * //    { name: 'api_token', kind: 'string', computability: 'computed_optional', sensitive: true }]
 * ```
 *
 * @module
 */
import {
    Computability,
    type Attribute, type AttributeBase, type DataSourceAttribute, type OutputTarget,
    type ResourceAttribute, type ScalarAttribute, type ScalarKind, type SingleNestedAttribute,
} from '../ir/types.js';
import { parseConfig, type AttributeOverride, type MapperConfig, type PartialConfig } from '../config/MapperConfig.js';
import {
    LoweringAggregateError, LoweringError, NameCollisionError, RecursionLimitError, SchemaError,
} from '../errors/LoweringError.js';
import type { DebugObserverFn, NoticeCode } from '../observability/DebugObserver.js';
import { classify, isNestedObject, type AttributeKind, type ClassifyOptions } from '../schema/Classifier.js';
import { SchemaNode, toSchemaNode } from '../schema/SchemaNode.js';
import type { RawSchema } from '../schema/types.js';
import { resolveComputability } from './Computability.js';
import { attributeNamer } from './NamingHelpers.js';
import { capture, type Result } from './result.js';
import { dataSourcePolicy, resourcePolicy, type TargetPolicy } from './TargetPolicy.js';

// ── Public Types ─────────────────────────────────────────

export interface LoweringOptions {
    /**
     * Full config or a partial merged over the defaults. Validated like a
     * config file; an invalid value throws {@link ConfigValidationError}.
     */
    readonly config?: PartialConfig;
    readonly debug?: DebugObserverFn;
}

// ── Internal Types ───────────────────────────────────────

/** Per-run state shared by every recursive call */
interface Scope<T extends OutputTarget> {
    readonly policy: TargetPolicy<T>;
    readonly config: MapperConfig;
    readonly naming: (propertyName: string) => string;
    readonly debug: DebugObserverFn | undefined;
    /** Error sink; present only in `collect` mode */
    readonly errors: LoweringError[] | undefined;
    /** Override keys that matched an attribute */
    readonly usedOverrides: Set<string>;
}

/** Where an object node sits in the tree */
interface Position {
    readonly path: readonly string[];
    readonly depth: number;
    readonly parentComputed: boolean;
}

type ScalarKindInfo = Extract<AttributeKind, { kind: 'scalar' }>;

// ── Public API ───────────────────────────────────────────

/** Lower an object schema's properties into resource attributes */
export function lowerForResource(
    schema: RawSchema | SchemaNode,
    options: LoweringOptions = {},
): readonly ResourceAttribute[] {
    return lowerAttributes(resourcePolicy, schema, options);
}

/** Lower an object schema's properties into data-source attributes */
export function lowerForDataSource(
    schema: RawSchema | SchemaNode,
    options: LoweringOptions = {},
): readonly DataSourceAttribute[] {
    return lowerAttributes(dataSourcePolicy, schema, options);
}

/** Lower an object schema that is itself one property of a parent resource */
export function lowerSingleNestedForResource(
    name: string,
    schema: RawSchema | SchemaNode,
    computability: Computability,
    options: LoweringOptions = {},
): ResourceAttribute {
    return lowerSingleNested(resourcePolicy, name, schema, computability, options);
}

/** Lower an object schema that is itself one property of a parent data source */
export function lowerSingleNestedForDataSource(
    name: string,
    schema: RawSchema | SchemaNode,
    computability: Computability,
    options: LoweringOptions = {},
): DataSourceAttribute {
    return lowerSingleNested(dataSourcePolicy, name, schema, computability, options);
}

/** {@link lowerForResource} returning a {@link Result} instead of throwing */
export function tryLowerForResource(
    schema: RawSchema | SchemaNode,
    options: LoweringOptions = {},
): Result<readonly ResourceAttribute[]> {
    return capture(() => lowerForResource(schema, options));
}

/** {@link lowerForDataSource} returning a {@link Result} instead of throwing */
export function tryLowerForDataSource(
    schema: RawSchema | SchemaNode,
    options: LoweringOptions = {},
): Result<readonly DataSourceAttribute[]> {
    return capture(() => lowerForDataSource(schema, options));
}

/**
 * The shared traversal behind every entry point.
 *
 * @param policy - Output target policy ({@link resourcePolicy}, {@link dataSourcePolicy})
 * @param schema - Object schema whose properties become sibling attributes
 */
export function lowerAttributes<T extends OutputTarget>(
    policy: TargetPolicy<T>,
    schema: RawSchema | SchemaNode,
    options: LoweringOptions = {},
): readonly Attribute<T>[] {
    return run(policy, options, scope => {
        const node = toSchemaNode(schema);
        const root: Position = { path: [], depth: 0, parentComputed: false };

        assertObjectSchema(node);
        if (!isNestedObject(node, classifyOptions(scope, root.path, root.depth))) {
            return [];
        }
        return lowerProperties(node, root, scope);
    }, attributes => attributes.length);
}

function lowerSingleNested<T extends OutputTarget>(
    policy: TargetPolicy<T>,
    name: string,
    schema: RawSchema | SchemaNode,
    computability: Computability,
    options: LoweringOptions,
): Attribute<T> {
    return run(policy, options, scope => {
        const node = toSchemaNode(schema);
        const at: Position = {
            path: [name],
            depth: 1,
            parentComputed: computability === Computability.Computed,
        };

        return locate(at.path, () => {
            assertObjectSchema(node);
            // Applies the mixed-object policy; an empty object still lowers
            isNestedObject(node, classifyOptions(scope, at.path, at.depth));

            const override = useOverride(scope, at.path);
            checkOverride({ kind: 'single_nested', node }, override, at.path, scope);
            if (override?.computability !== undefined) {
                emitNotice(scope, at.path, 'override-ignored', '"computability" of this attribute is set by the caller');
            }
            if (override?.ignore === true) {
                emitNotice(scope, at.path, 'override-ignored', '"ignore" cannot drop the attribute being lowered');
            }

            const attribute: SingleNestedAttribute<T> = {
                ...attributeBase(name, computability, override?.description ?? node.description()),
                kind: 'single_nested',
                attributes: lowerProperties(node, at, scope),
            };
            emitAttribute(scope, at.path, attribute);
            return attribute;
        });
    }, () => 1);
}

// ── Run Lifecycle ────────────────────────────────────────

function run<T extends OutputTarget, R>(
    policy: TargetPolicy<T>,
    options: LoweringOptions,
    body: (scope: Scope<T>) => R,
    count: (result: R) => number,
): R {
    const config = parseConfig(options.config ?? {}, 'options.config');
    const scope: Scope<T> = {
        policy,
        config,
        naming: attributeNamer(config.naming.style),
        debug: options.debug,
        errors: config.errorMode === 'collect' ? [] : undefined,
        usedOverrides: new Set(),
    };
    const startTime = performance.now();

    let result: R;
    try {
        result = body(scope);
    } catch (err) {
        if (!(err instanceof LoweringError)) throw err;
        err.locate([]);
        emitError(scope, err);
        if (scope.errors === undefined) throw err;
        scope.errors.push(err);
        throw new LoweringAggregateError(scope.errors);
    }

    if (scope.errors !== undefined && scope.errors.length > 0) {
        throw new LoweringAggregateError(scope.errors);
    }

    for (const key of Object.keys(config.overrides)) {
        if (!scope.usedOverrides.has(key)) {
            emitNotice(scope, [key], 'override-ignored', 'override matches no attribute');
        }
    }

    scope.debug?.({
        type: 'complete',
        target: policy.target,
        count: count(result),
        durationMs: performance.now() - startTime,
        timestamp: Date.now(),
    });
    return result;
}

// ── Traversal ────────────────────────────────────────────

function lowerProperties<T extends OutputTarget>(
    node: SchemaNode,
    at: Position,
    scope: Scope<T>,
): Attribute<T>[] {
    const required = node.requiredNames();
    const sources = new Map<string, string>();
    const attributes: Attribute<T>[] = [];

    for (const [propertyName, child] of node.properties()) {
        const name = scope.naming(propertyName);
        const path = [...at.path, name];

        guard(scope, path, () => {
            if (name === '') {
                throw new SchemaError(`property "${propertyName}" yields an empty attribute name`, path);
            }
            if (name.includes('.')) {
                throw new SchemaError(`property "${propertyName}" yields an attribute name containing "."`, path);
            }

            // Ignored properties never take part in collision checks
            const override = useOverride(scope, path);
            if (override?.ignore === true) return;

            const previous = sources.get(name);
            if (previous !== undefined) {
                throw new NameCollisionError(name, previous, propertyName, path);
            }
            sources.set(name, propertyName);

            const computability = resolveComputability(required, propertyName, at.parentComputed, {
                fallback: scope.config.defaultComputability,
                ...(override?.computability !== undefined ? { override: override.computability } : {}),
            });

            attributes.push(lowerAttribute(name, child, computability, path, at.depth + 1, override, scope));
        });
    }
    return attributes;
}

function lowerAttribute<T extends OutputTarget>(
    name: string,
    node: SchemaNode,
    computability: Computability,
    path: readonly string[],
    depth: number,
    override: AttributeOverride | undefined,
    scope: Scope<T>,
): Attribute<T> {
    return locate(path, () => {
        const kind = classify(node, {
            ...classifyOptions(scope, path, depth),
            collection: override?.collection,
        });
        checkOverride(kind, override, path, scope);

        const base = attributeBase(name, computability, override?.description ?? node.description());
        const children: Position = {
            path,
            depth,
            parentComputed: computability === Computability.Computed,
        };

        let attribute: Attribute<T>;
        switch (kind.kind) {
            case 'scalar':
                attribute = buildLeaf(kind, base, node, override, scope.policy);
                break;
            case 'list':
            case 'set':
            case 'map':
                attribute = { ...base, kind: kind.kind, elementType: kind.elementType };
                break;
            case 'single_nested':
                attribute = { ...base, kind: 'single_nested', attributes: lowerProperties(kind.node, children, scope) };
                break;
            case 'list_nested':
            case 'set_nested':
                attribute = {
                    ...base,
                    kind: kind.kind,
                    nestedObject: { attributes: lowerProperties(kind.item, deeper(children), scope) },
                };
                break;
            case 'map_nested':
                attribute = {
                    ...base,
                    kind: 'map_nested',
                    nestedObject: { attributes: lowerProperties(kind.value, deeper(children), scope) },
                };
                break;
        }

        emitAttribute(scope, path, attribute);
        return attribute;
    });
}

function buildLeaf<T extends OutputTarget>(
    kind: ScalarKindInfo,
    base: AttributeBase,
    node: SchemaNode,
    override: AttributeOverride | undefined,
    policy: TargetPolicy<T>,
): ScalarAttribute<T> {
    const extras = policy.leafExtras(kind.scalar, node);
    const scalar: ScalarKind = kind.scalar;

    switch (scalar) {
        case 'string': {
            const sensitive = override?.sensitive ?? kind.sensitive;
            return {
                ...base,
                ...extras,
                kind: 'string' as const,
                ...(sensitive ? { sensitive: true as const } : {}),
            };
        }
        case 'bool':
            return { ...base, ...extras, kind: 'bool' as const };
        case 'int64':
        case 'float64':
        case 'number':
            return { ...base, ...extras, kind: scalar };
    }
}

// ── Helpers ──────────────────────────────────────────────

function attributeBase(name: string, computability: Computability, description: string | undefined): AttributeBase {
    return description === undefined
        ? { name, computability }
        : { name, computability, description };
}

/** Look up the override for an attribute path and mark it as matched */
function useOverride<T extends OutputTarget>(
    scope: Scope<T>,
    path: readonly string[],
): AttributeOverride | undefined {
    const key = path.join('.');
    const override = scope.config.overrides[key];
    if (override !== undefined) scope.usedOverrides.add(key);
    return override;
}

/** Nested objects inside a collection sit one level below the collection */
function deeper(at: Position): Position {
    return { ...at, depth: at.depth + 1 };
}

/** The root of a lowering call must be an object (or untyped) schema */
function assertObjectSchema(node: SchemaNode): void {
    const type = node.primaryType();
    if (type !== undefined && type !== 'object') {
        throw new SchemaError(`expected an object schema, found type "${type}"`);
    }
}

function classifyOptions<T extends OutputTarget>(
    scope: Scope<T>,
    path: readonly string[],
    depth: number,
): ClassifyOptions {
    return {
        depth,
        maxDepth: scope.config.maxDepth,
        mixedObjects: scope.config.mixedObjects,
        attributeName: scope.naming,
        onNotice: notice => emitNotice(scope, path, notice.code, notice.message),
    };
}

/** Overrides that cannot apply to the classified kind are reported, not fatal */
function checkOverride<T extends OutputTarget>(
    kind: AttributeKind,
    override: AttributeOverride | undefined,
    path: readonly string[],
    scope: Scope<T>,
): void {
    if (override === undefined) return;

    const isString = kind.kind === 'scalar' && kind.scalar === 'string';
    if (override.sensitive !== undefined && !isString) {
        emitNotice(scope, path, 'override-ignored', '"sensitive" applies to string attributes only');
    }

    const isArray = kind.kind === 'list' || kind.kind === 'set'
        || kind.kind === 'list_nested' || kind.kind === 'set_nested';
    if (override.collection !== undefined && !isArray) {
        emitNotice(scope, path, 'override-ignored', '"collection" applies to array attributes only');
    }
}

/** Attach `path` to any lowering error raised without one */
function locate<R>(path: readonly string[], fn: () => R): R {
    try {
        return fn();
    } catch (err) {
        if (err instanceof LoweringError) throw err.locate(path);
        throw err;
    }
}

/**
 * Run one property's lowering. In `collect` mode a lowering error is
 * recorded and the caller moves on to the next sibling. A recursion
 * limit ends the run in either mode.
 */
function guard<T extends OutputTarget>(scope: Scope<T>, path: readonly string[], fn: () => void): void {
    if (scope.errors === undefined) {
        fn();
        return;
    }
    try {
        fn();
    } catch (err) {
        if (!(err instanceof LoweringError) || err instanceof RecursionLimitError) throw err;
        err.locate(path);
        emitError(scope, err);
        scope.errors.push(err);
    }
}

// ── Debug Events ─────────────────────────────────────────

function emitAttribute<T extends OutputTarget>(
    scope: Scope<T>,
    path: readonly string[],
    attribute: Attribute<T>,
): void {
    scope.debug?.({
        type: 'attribute',
        target: scope.policy.target,
        path: path.join('.'),
        kind: attribute.kind,
        computability: attribute.computability,
        timestamp: Date.now(),
    });
}

function emitNotice<T extends OutputTarget>(
    scope: Scope<T>,
    path: readonly string[],
    code: NoticeCode,
    message: string,
): void {
    scope.debug?.({
        type: 'notice',
        target: scope.policy.target,
        path: path.join('.'),
        code,
        message,
        timestamp: Date.now(),
    });
}

function emitError<T extends OutputTarget>(scope: Scope<T>, err: LoweringError): void {
    scope.debug?.({
        type: 'error',
        target: scope.policy.target,
        path: err.dottedPath,
        errorName: err.name,
        detail: err.detail,
        timestamp: Date.now(),
    });
}
