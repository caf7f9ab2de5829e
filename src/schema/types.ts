/**
 * Schema Input Types
 *
 * Structural shape of one node of the external OpenAPI document model.
 * Nodes arrive parsed and with every `$ref` already resolved; the mapper
 * only ever reads them.
 *
 * @module
 */

// ── Type Tags ────────────────────────────────────────────

/** Type tags a schema node may declare */
export const SCHEMA_TYPE_TAGS = [
    'string', 'integer', 'number', 'boolean', 'array', 'object', 'null',
] as const;

export type SchemaTypeTag = typeof SCHEMA_TYPE_TAGS[number];

/** Tags that lower to a single scalar attribute */
export type ScalarTypeTag = 'string' | 'integer' | 'number' | 'boolean';

export function isSchemaTypeTag(value: unknown): value is SchemaTypeTag {
    return SCHEMA_TYPE_TAGS.some(tag => tag === value);
}

export function isScalarTypeTag(tag: SchemaTypeTag | undefined): tag is ScalarTypeTag {
    return tag === 'string' || tag === 'integer' || tag === 'number' || tag === 'boolean';
}

// ── Raw Schema ───────────────────────────────────────────

/**
 * One JSON Schema definition unit from the OpenAPI document.
 *
 * `type` may be a single tag (OpenAPI 3.0) or a list (OpenAPI 3.1).
 * `properties` keeps the document's declaration order.
 */
export interface RawSchema {
    readonly type?: string | readonly string[];
    readonly format?: string;
    readonly description?: string;
    readonly properties?: Readonly<Record<string, RawSchema>>;
    readonly additionalProperties?: RawSchema | boolean;
    readonly items?: RawSchema;
    readonly required?: readonly string[];
    readonly uniqueItems?: boolean;
    readonly nullable?: boolean;
    readonly default?: unknown;
}
