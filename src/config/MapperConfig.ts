/**
 * MapperConfig — Lowering Policy
 *
 * One explicit value threaded through every recursive call: the
 * computability default, the recursion ceiling, error collection,
 * naming, and per-attribute overrides keyed by dotted path.
 *
 * Can be loaded from a YAML file (`oas-mapper.yaml`) or passed programmatically.
 *
 * @module
 */
import { z } from 'zod';
import { Computability } from '../ir/types.js';
import type { MixedObjectPolicy } from '../schema/Classifier.js';
import type { NamingStyle } from '../mapper/NamingHelpers.js';
import { ConfigValidationError } from './ConfigValidationError.js';

// ── Overrides ────────────────────────────────────────────

/**
 * Forced settings for one attribute, keyed in {@link MapperConfig.overrides}
 * by its dotted attribute path (e.g. `'settings.api_token'`).
 */
export interface AttributeOverride {
    /** Status to use unless the parent lists the property as required */
    readonly computability?: Computability | undefined;
    /** Marks a string leaf sensitive, or clears an inferred flag */
    readonly sensitive?: boolean | undefined;
    /** Replaces the schema description */
    readonly description?: string | undefined;
    /** List or set semantics for an array property */
    readonly collection?: 'list' | 'set' | undefined;
    /** Leave the attribute out of the output */
    readonly ignore?: boolean | undefined;
}

// ── Full Config ──────────────────────────────────────────

export type ErrorMode = 'fail-fast' | 'collect';

export interface NamingConfig {
    /** `snake_case` normalizes property names; `preserve` keeps them verbatim */
    readonly style: NamingStyle;
}

export interface MapperConfig {
    /** Status of properties with no required flag and no override */
    readonly defaultComputability: Computability;
    /** Deepest nesting level accepted before failing */
    readonly maxDepth: number;
    /**
     * - `'fail-fast'` — the first error propagates
     * - `'collect'`   — failing siblings are skipped and reported together
     */
    readonly errorMode: ErrorMode;
    readonly naming: NamingConfig;
    /** Precedence for nodes that declare both properties and additionalProperties */
    readonly mixedObjects: MixedObjectPolicy;
    /**
     * Keyed by the dotted path of attribute names. Attribute names may not
     * contain `.` themselves, so every key names exactly one attribute.
     */
    readonly overrides: Readonly<Record<string, AttributeOverride>>;
}

// ── Defaults ─────────────────────────────────────────────

export const DEFAULT_CONFIG: MapperConfig = {
    defaultComputability: Computability.ComputedOptional,
    maxDepth: 32,
    errorMode: 'fail-fast',
    naming: {
        style: 'snake_case',
    },
    mixedObjects: 'properties',
    overrides: {},
};

// ── Validation ───────────────────────────────────────────

const computabilitySchema = z.enum(['required', 'optional', 'computed', 'computed_optional']);

const overrideSchema = z.object({
    computability: computabilitySchema.optional(),
    sensitive: z.boolean().optional(),
    description: z.string().optional(),
    collection: z.enum(['list', 'set']).optional(),
    ignore: z.boolean().optional(),
}).strict();

/** Shape accepted from config files; every field is optional */
export const partialConfigSchema = z.object({
    defaultComputability: computabilitySchema.optional(),
    maxDepth: z.number().int().positive().optional(),
    errorMode: z.enum(['fail-fast', 'collect']).optional(),
    naming: z.object({
        style: z.enum(['snake_case', 'preserve']).optional(),
    }).strict().optional(),
    mixedObjects: z.enum(['properties', 'error']).optional(),
    overrides: z.record(overrideSchema).optional(),
}).strict();

/** Partial config shape for merging */
export interface PartialConfig {
    readonly defaultComputability?: Computability | undefined;
    readonly maxDepth?: number | undefined;
    readonly errorMode?: ErrorMode | undefined;
    readonly naming?: { readonly style?: NamingStyle | undefined } | undefined;
    readonly mixedObjects?: MixedObjectPolicy | undefined;
    readonly overrides?: Readonly<Record<string, AttributeOverride>> | undefined;
}

// ── Merge Helper ─────────────────────────────────────────

/**
 * Merge a partial config with defaults.
 * Partial values override defaults at each level; overrides are merged by path.
 */
export function mergeConfig(partial: PartialConfig, base: MapperConfig = DEFAULT_CONFIG): MapperConfig {
    return {
        defaultComputability: partial.defaultComputability ?? base.defaultComputability,
        maxDepth: partial.maxDepth ?? base.maxDepth,
        errorMode: partial.errorMode ?? base.errorMode,
        naming: {
            style: partial.naming?.style ?? base.naming.style,
        },
        mixedObjects: partial.mixedObjects ?? base.mixedObjects,
        overrides: {
            ...base.overrides,
            ...(partial.overrides ?? {}),
        },
    };
}

// ── Parse Helper ─────────────────────────────────────────

/**
 * Validate a config value (parsed from a file, embedded in a larger
 * generator config, or passed to a lowering call) and merge it with defaults.
 *
 * @param source - Names the origin in error messages
 * @throws {ConfigValidationError}
 */
export function parseConfig(raw: unknown, source = 'config'): MapperConfig {
    // An empty YAML document parses to null
    const result = partialConfigSchema.safeParse(raw ?? {});
    if (!result.success) {
        throw new ConfigValidationError(source, result.error);
    }
    const partial: PartialConfig = result.data;
    return mergeConfig(partial);
}
