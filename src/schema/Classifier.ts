/**
 * Classifier — Schema Node → Attribute Kind
 *
 * Decides which attribute shape a node lowers to. The full tag set is
 * consumed here and never carried forward: callers only ever see one
 * {@link AttributeKind}.
 *
 * Decision order (first match wins):
 *   1. Scalar type, or no type and no shape → scalar by (type, format)
 *   2. `array` + `items` → list / set, or list-nested / set-nested for object items
 *   3. `object` + `additionalProperties` without properties → map / map-nested
 *   4. `object` + properties → single-nested
 *   5. Anything else → {@link UnsupportedSchemaError}
 *
 * @module
 */
import type { ElementType, ObjectAttributeType, ScalarKind } from '../ir/types.js';
import {
    NameCollisionError, RecursionLimitError, SchemaError, UnsupportedSchemaError,
} from '../errors/LoweringError.js';
import type { SchemaNode } from './SchemaNode.js';
import { isScalarTypeTag, type ScalarTypeTag, type SchemaTypeTag } from './types.js';

// ── Public Types ─────────────────────────────────────────

export type AttributeKind =
    | { readonly kind: 'scalar'; readonly scalar: ScalarKind; readonly sensitive: boolean }
    | { readonly kind: 'list' | 'set' | 'map'; readonly elementType: ElementType }
    | { readonly kind: 'list_nested' | 'set_nested'; readonly item: SchemaNode }
    | { readonly kind: 'map_nested'; readonly value: SchemaNode }
    | { readonly kind: 'single_nested'; readonly node: SchemaNode };

/** What to do with a node declaring both `properties` and `additionalProperties` */
export type MixedObjectPolicy = 'properties' | 'error';

export type ClassifierNoticeCode = 'float-precision' | 'additional-properties-ignored';

export interface ClassifierNotice {
    readonly code: ClassifierNoticeCode;
    readonly message: string;
}

export interface ClassifyOptions {
    /** Nesting depth of the node being classified */
    readonly depth: number;
    readonly maxDepth: number;
    /** Forces list or set semantics for an array node; otherwise `uniqueItems` decides */
    readonly collection?: 'list' | 'set' | undefined;
    readonly mixedObjects?: MixedObjectPolicy | undefined;
    /** Maps property names onto attribute names inside `object` element types */
    readonly attributeName?: ((propertyName: string) => string) | undefined;
    readonly onNotice?: ((notice: ClassifierNotice) => void) | undefined;
}

// ── Classification ───────────────────────────────────────

export function classify(node: SchemaNode, options: ClassifyOptions): AttributeKind {
    if (options.depth > options.maxDepth) {
        throw new RecursionLimitError(options.maxDepth);
    }

    const declared = node.primaryType();
    const type = declared ?? inferType(node);

    if (type === 'array') return classifyArray(node, options);
    if (type === 'object') return classifyObject(node, options);

    if (declared === undefined && node.types().has('null')) {
        throw unsupported(node, 'a null-only schema carries no value');
    }
    if (isScalarTypeTag(type) || type === undefined) {
        if (!node.hasProperties() && node.additionalProperties() === undefined) {
            return classifyScalar(type, node.format(), options);
        }
        throw unsupported(node, 'scalar schemas cannot declare properties');
    }
    throw unsupported(node, 'unrecognized schema shape');
}

/** Untyped nodes are classified by the shape they declare */
function inferType(node: SchemaNode): SchemaTypeTag | undefined {
    if (node.hasProperties() || node.additionalProperties() !== undefined) return 'object';
    if (node.items() !== undefined) return 'array';
    return undefined;
}

function classifyScalar(
    type: ScalarTypeTag | undefined,
    format: string,
    options: ClassifyOptions,
): AttributeKind {
    switch (type) {
        case 'integer':
            return scalar('int64');
        case 'boolean':
            return scalar('bool');
        case 'string':
            return scalar('string', format === 'password');
        case 'number':
            return isFloatFormat(format) ? float64(format, options) : scalar('number');
        case undefined:
            // No declared type: the format alone decides
            if (format === 'int32' || format === 'int64') return scalar('int64');
            if (isFloatFormat(format)) return float64(format, options);
            return scalar('string', format === 'password');
    }
}

function classifyArray(node: SchemaNode, options: ClassifyOptions): AttributeKind {
    const items = node.items();
    if (items === undefined) {
        throw unsupported(node, 'array schema declares no items');
    }

    const asSet = (options.collection ?? (node.uniqueItems() ? 'set' : 'list')) === 'set';
    const child = descend(options);

    if (isNestedObject(items, child)) {
        return { kind: asSet ? 'set_nested' : 'list_nested', item: items };
    }
    return { kind: asSet ? 'set' : 'list', elementType: buildElementType(items, child) };
}

function classifyObject(node: SchemaNode, options: ClassifyOptions): AttributeKind {
    if (isNestedObject(node, options)) {
        return { kind: 'single_nested', node };
    }

    const additional = node.additionalProperties();
    if (additional === undefined) {
        throw unsupported(node, 'object schema declares neither properties nor additionalProperties');
    }

    const child = descend(options);
    if (isNestedObject(additional, child)) {
        return { kind: 'map_nested', value: additional };
    }
    return { kind: 'map', elementType: buildElementType(additional, child) };
}

/**
 * A node with properties lowers to a nested object. When it also declares
 * `additionalProperties`, the mixed-object policy applies: properties win,
 * or the node is rejected.
 */
export function isNestedObject(node: SchemaNode, options: ClassifyOptions): boolean {
    if (!node.isStructural()) return false;
    if (options.depth > options.maxDepth) {
        throw new RecursionLimitError(options.maxDepth);
    }

    if (node.additionalProperties() !== undefined) {
        if (options.mixedObjects === 'error') {
            throw new SchemaError('schema declares both "properties" and "additionalProperties"');
        }
        options.onNotice?.({
            code: 'additional-properties-ignored',
            message: '"additionalProperties" ignored because "properties" are declared',
        });
    }
    return true;
}

// ── Element Types ────────────────────────────────────────

/**
 * Build the element type of a collection or map value. Nested objects
 * become `object` element types with one entry per property.
 */
export function buildElementType(node: SchemaNode, options: ClassifyOptions): ElementType {
    const kind = classify(node, options);
    const child = descend(options);

    switch (kind.kind) {
        case 'scalar':
            return { kind: kind.scalar };
        case 'list':
        case 'set':
        case 'map':
            return { kind: kind.kind, elementType: kind.elementType };
        case 'list_nested':
            return { kind: 'list', elementType: buildObjectType(kind.item, child) };
        case 'set_nested':
            return { kind: 'set', elementType: buildObjectType(kind.item, child) };
        case 'map_nested':
            return { kind: 'map', elementType: buildObjectType(kind.value, child) };
        case 'single_nested':
            return buildObjectType(kind.node, options);
    }
}

function buildObjectType(node: SchemaNode, options: ClassifyOptions): ElementType {
    const naming = options.attributeName ?? ((name: string) => name);
    const child = descend(options);
    const sources = new Map<string, string>();
    const attributeTypes: ObjectAttributeType[] = [];

    for (const [propertyName, property] of node.properties()) {
        const name = naming(propertyName);
        const previous = sources.get(name);
        if (previous !== undefined) {
            throw new NameCollisionError(name, previous, propertyName);
        }
        sources.set(name, propertyName);
        attributeTypes.push({ name, type: buildElementType(property, child) });
    }
    return { kind: 'object', attributeTypes };
}

// ── Helpers ──────────────────────────────────────────────

function scalar(kind: ScalarKind, sensitive = false): AttributeKind {
    return { kind: 'scalar', scalar: kind, sensitive };
}

function float64(format: string, options: ClassifyOptions): AttributeKind {
    if (format === 'float') {
        options.onNotice?.({
            code: 'float-precision',
            message: 'single-precision "float" widened to a 64-bit float attribute',
        });
    }
    return scalar('float64');
}

function isFloatFormat(format: string): boolean {
    return format === 'double' || format === 'float';
}

/** Options for a child node; set semantics never leak past one level */
function descend(options: ClassifyOptions): ClassifyOptions {
    return { ...options, collection: undefined, depth: options.depth + 1 };
}

function unsupported(node: SchemaNode, reason: string): UnsupportedSchemaError {
    return new UnsupportedSchemaError(node.declaredTypes(), node.format(), reason);
}
