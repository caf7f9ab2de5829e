/**
 * openapi-provider-mapper — Root Barrel Export
 *
 * Public API for programmatic usage.
 *
 * @example
 * ```typescript
 * import { lowerForResource, lowerForDataSource, loadConfig } from 'openapi-provider-mapper';
 *
 * const config = loadConfig();
 * const resource = lowerForResource(createRequestSchema, { config });
 * const dataSource = lowerForDataSource(readResponseSchema, { config });
 * ```
 *
 * @module
 */

// ── Config ───────────────────────────────────────────────
export { mergeConfig, parseConfig, DEFAULT_CONFIG, partialConfigSchema } from './config/MapperConfig.js';
export type {
    MapperConfig, PartialConfig, AttributeOverride, NamingConfig, ErrorMode,
} from './config/MapperConfig.js';
export { loadConfig, CONFIG_FILENAMES } from './config/ConfigLoader.js';
export { ConfigValidationError } from './config/ConfigValidationError.js';

// ── Schema Input ─────────────────────────────────────────
export type { RawSchema, SchemaTypeTag, ScalarTypeTag } from './schema/types.js';
export { SCHEMA_TYPE_TAGS } from './schema/types.js';
export { SchemaNode, toSchemaNode } from './schema/SchemaNode.js';
export { classify, buildElementType, isNestedObject } from './schema/Classifier.js';
export type {
    AttributeKind, ClassifyOptions, ClassifierNotice, MixedObjectPolicy,
} from './schema/Classifier.js';

// ── Attribute IR ─────────────────────────────────────────
export { Computability } from './ir/types.js';
export type {
    Attribute, AttributeBase, AttributeKindName, ResourceAttribute, DataSourceAttribute,
    ScalarAttribute, StringAttribute, NumericAttribute, BoolAttribute,
    CollectionAttribute, SingleNestedAttribute, CollectionNestedAttribute, NestedAttributeObject,
    ElementType, ObjectAttributeType, ScalarKind, StaticDefault, OutputTarget, TargetLeafExtras,
} from './ir/types.js';

// ── Mapper ───────────────────────────────────────────────
export {
    lowerForResource, lowerForDataSource,
    lowerSingleNestedForResource, lowerSingleNestedForDataSource,
    tryLowerForResource, tryLowerForDataSource,
    lowerAttributes,
} from './mapper/AttributeMapper.js';
export type { LoweringOptions } from './mapper/AttributeMapper.js';
export { resolveComputability } from './mapper/Computability.js';
export type { ComputabilityPolicy } from './mapper/Computability.js';
export { resourcePolicy, dataSourcePolicy, staticDefault } from './mapper/TargetPolicy.js';
export type { TargetPolicy } from './mapper/TargetPolicy.js';
export { toSnakeCase, attributeNamer } from './mapper/NamingHelpers.js';
export type { NamingStyle } from './mapper/NamingHelpers.js';
export { succeed, fail, capture } from './mapper/result.js';
export type { Result, Success, Failure } from './mapper/result.js';

// ── Errors ───────────────────────────────────────────────
export {
    LoweringError, SchemaError, UnsupportedSchemaError, RecursionLimitError,
    NameCollisionError, LoweringAggregateError, formatAttributePath,
} from './errors/LoweringError.js';

// ── Observability ────────────────────────────────────────
export { createDebugObserver } from './observability/DebugObserver.js';
export type {
    DebugEvent, DebugObserverFn, AttributeEvent, NoticeEvent, ErrorEvent, CompleteEvent, NoticeCode,
} from './observability/DebugObserver.js';
