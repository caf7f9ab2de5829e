/**
 * TargetPolicy — Resource vs Data-Source Leaf Construction
 *
 * The recursive traversal is shared by both output targets; only the
 * scalar leaf step is parameterized. Resource leaves record the schema
 * `default` as a static default; data-source attributes are read-only
 * and never carry one.
 *
 * @module
 */
import type { OutputTarget, ScalarKind, StaticDefault, TargetLeafExtras } from '../ir/types.js';
import type { SchemaNode } from '../schema/SchemaNode.js';

export interface TargetPolicy<T extends OutputTarget> {
    readonly target: T;
    /** Target-specific fields of a scalar leaf */
    leafExtras(kind: ScalarKind, node: SchemaNode): TargetLeafExtras[T];
}

export const resourcePolicy: TargetPolicy<'resource'> = {
    target: 'resource',
    leafExtras(kind, node) {
        const value = staticDefault(kind, node.defaultValue());
        return value === undefined ? {} : { default: value };
    },
};

export const dataSourcePolicy: TargetPolicy<'datasource'> = {
    target: 'datasource',
    leafExtras() {
        return {};
    },
};

/** A schema default is kept only when its JSON type matches the leaf kind */
export function staticDefault(kind: ScalarKind, value: unknown): StaticDefault | undefined {
    switch (kind) {
        case 'string':
            return typeof value === 'string' ? { static: value } : undefined;
        case 'bool':
            return typeof value === 'boolean' ? { static: value } : undefined;
        case 'int64':
            return typeof value === 'number' && Number.isSafeInteger(value) ? { static: value } : undefined;
        case 'float64':
        case 'number':
            return typeof value === 'number' && Number.isFinite(value) ? { static: value } : undefined;
    }
}
