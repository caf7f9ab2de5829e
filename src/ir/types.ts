/**
 * Provider Attribute IR
 *
 * Output of the mapper and the single contract with the code-rendering
 * stage. Each attribute is a discriminated union on `kind`, so exactly
 * one variant is populated by construction.
 *
 * Resource and data-source attributes share every variant; they differ
 * only in what a scalar leaf may carry ({@link TargetLeafExtras}).
 *
 * @module
 */

// ── Computability ────────────────────────────────────────

/** Controls the accessor semantics the generated provider code gets */
export const Computability = {
    Required: 'required',
    Optional: 'optional',
    Computed: 'computed',
    ComputedOptional: 'computed_optional',
} as const;

export type Computability = typeof Computability[keyof typeof Computability];

// ── Output Targets ───────────────────────────────────────

export type OutputTarget = 'resource' | 'datasource';

/** A literal default value, recorded on resource leaves only */
export interface StaticDefault {
    readonly static: string | number | boolean;
}

/** Extra fields a scalar leaf may carry, per output target */
export interface TargetLeafExtras {
    readonly resource: { readonly default?: StaticDefault };
    readonly datasource: Record<never, never>;
}

// ── Element Types ────────────────────────────────────────

export type ScalarKind = 'string' | 'int64' | 'float64' | 'bool' | 'number';

export type ElementType =
    | { readonly kind: ScalarKind }
    | { readonly kind: 'list' | 'set' | 'map'; readonly elementType: ElementType }
    | { readonly kind: 'object'; readonly attributeTypes: readonly ObjectAttributeType[] };

/** One named field of an `object` element type */
export interface ObjectAttributeType {
    readonly name: string;
    readonly type: ElementType;
}

// ── Attributes ───────────────────────────────────────────

export interface AttributeBase {
    /** Unique among siblings */
    readonly name: string;
    readonly computability: Computability;
    readonly description?: string;
}

export type StringAttribute<T extends OutputTarget> = AttributeBase & TargetLeafExtras[T] & {
    readonly kind: 'string';
    /** Present, and `true`, only for secret values */
    readonly sensitive?: true;
};

export type NumericAttribute<T extends OutputTarget> = AttributeBase & TargetLeafExtras[T] & {
    readonly kind: 'int64' | 'float64' | 'number';
};

export type BoolAttribute<T extends OutputTarget> = AttributeBase & TargetLeafExtras[T] & {
    readonly kind: 'bool';
};

export interface CollectionAttribute extends AttributeBase {
    readonly kind: 'list' | 'set' | 'map';
    readonly elementType: ElementType;
}

export interface NestedAttributeObject<T extends OutputTarget> {
    readonly attributes: readonly Attribute<T>[];
}

export interface SingleNestedAttribute<T extends OutputTarget> extends AttributeBase {
    readonly kind: 'single_nested';
    readonly attributes: readonly Attribute<T>[];
}

export interface CollectionNestedAttribute<T extends OutputTarget> extends AttributeBase {
    readonly kind: 'list_nested' | 'set_nested' | 'map_nested';
    readonly nestedObject: NestedAttributeObject<T>;
}

export type ScalarAttribute<T extends OutputTarget> =
    | StringAttribute<T>
    | NumericAttribute<T>
    | BoolAttribute<T>;

export type Attribute<T extends OutputTarget> =
    | ScalarAttribute<T>
    | CollectionAttribute
    | SingleNestedAttribute<T>
    | CollectionNestedAttribute<T>;

export type AttributeKindName = Attribute<OutputTarget>['kind'];

export type ResourceAttribute = Attribute<'resource'>;
export type DataSourceAttribute = Attribute<'datasource'>;
