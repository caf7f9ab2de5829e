/**
 * SchemaNode — Read-Only Facade over a Raw Schema Node
 *
 * Normalizes the loosely-typed document model into the handful of
 * accessors the classifier and mapper need. Nothing here mutates
 * the underlying document, and child facades are created on demand.
 *
 * Accessors that find a node malformed for the requested shape throw
 * {@link SchemaError} without a path; the mapper adds the location.
 *
 * @module
 */
import { SchemaError } from '../errors/LoweringError.js';
import { isSchemaTypeTag, type RawSchema, type SchemaTypeTag } from './types.js';

export class SchemaNode {
    readonly raw: RawSchema;

    constructor(raw: RawSchema) {
        this.raw = raw;
    }

    // ── Type & Format ────────────────────────────────────

    /**
     * Declared type tags. Empty when the node declares no type.
     * A `nullable: true` node also reports `null`.
     */
    types(): ReadonlySet<SchemaTypeTag> {
        const tags = new Set<SchemaTypeTag>();
        for (const tag of this.typeList()) {
            if (!isSchemaTypeTag(tag)) {
                throw new SchemaError(`unknown schema type ${JSON.stringify(tag)}`);
            }
            tags.add(tag);
        }
        if (this.raw.nullable === true) tags.add('null');
        return tags;
    }

    /**
     * The one non-`null` tag the node declares, or `undefined` for
     * untyped nodes. Several non-`null` tags conflict.
     */
    primaryType(): SchemaTypeTag | undefined {
        const tags = [...this.types()].filter(t => t !== 'null');
        if (tags.length > 1) {
            throw new SchemaError(`conflicting schema types ${JSON.stringify(tags)}`);
        }
        return tags[0];
    }

    /** Declared tags as written, for error messages */
    declaredTypes(): readonly string[] {
        return this.typeList().map(String);
    }

    private typeList(): readonly unknown[] {
        const declared: unknown = this.raw.type;
        if (declared === undefined) return [];
        if (typeof declared === 'string') return [declared];
        if (Array.isArray(declared)) return declared;
        throw new SchemaError('"type" must be a type name or a list of type names');
    }

    format(): string {
        return typeof this.raw.format === 'string' ? this.raw.format : '';
    }

    description(): string | undefined {
        const desc = this.raw.description;
        return typeof desc === 'string' && desc.length > 0 ? desc : undefined;
    }

    // ── Shape ────────────────────────────────────────────

    /** Child nodes by property name, in declaration order */
    properties(): ReadonlyMap<string, SchemaNode> {
        const props: unknown = this.raw.properties;
        const result = new Map<string, SchemaNode>();
        if (props === undefined) return result;
        if (!isRecord(props)) {
            throw new SchemaError('"properties" must be an object');
        }

        for (const [name, child] of Object.entries(props)) {
            if (!isPlainObject(child)) {
                throw new SchemaError(`property "${name}" is not a schema object`);
            }
            result.set(name, new SchemaNode(child));
        }
        return result;
    }

    hasProperties(): boolean {
        return this.properties().size > 0;
    }

    /**
     * The map value schema. A boolean `additionalProperties` carries no
     * value schema and reads as absent.
     */
    additionalProperties(): SchemaNode | undefined {
        const additional: unknown = this.raw.additionalProperties;
        if (additional === undefined || typeof additional === 'boolean') return undefined;
        if (!isPlainObject(additional)) {
            throw new SchemaError('"additionalProperties" must be a schema object or a boolean');
        }

        const type = this.primaryType();
        if (type !== undefined && type !== 'object') {
            throw new SchemaError(`"additionalProperties" declared on a schema of type "${type}"`);
        }
        return new SchemaNode(additional);
    }

    /** Array item schema; absent on any node not typed as an array */
    items(): SchemaNode | undefined {
        const type = this.primaryType();
        if (type !== undefined && type !== 'array') return undefined;

        const items: unknown = this.raw.items;
        if (items === undefined) return undefined;
        if (!isPlainObject(items)) {
            throw new SchemaError('"items" must be a schema object');
        }
        return new SchemaNode(items);
    }

    requiredNames(): ReadonlySet<string> {
        const required: unknown = this.raw.required;
        if (required === undefined) return new Set();
        if (!Array.isArray(required) || !required.every((n): n is string => typeof n === 'string')) {
            throw new SchemaError('"required" must be a list of property names');
        }
        return new Set(required);
    }

    uniqueItems(): boolean {
        return this.raw.uniqueItems === true;
    }

    defaultValue(): unknown {
        return this.raw.default;
    }

    /**
     * Whether the node lowers to a structural object: it has properties
     * and is typed `object` or untyped.
     */
    isStructural(): boolean {
        const type = this.primaryType();
        return (type === undefined || type === 'object') && this.hasProperties();
    }
}

/** Wrap a raw node, passing facades through unchanged */
export function toSchemaNode(schema: RawSchema | SchemaNode): SchemaNode {
    return schema instanceof SchemaNode ? schema : new SchemaNode(schema);
}

function isRecord(value: unknown): value is Readonly<Record<string, unknown>> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Any non-array object is accepted as a schema; its fields are checked per accessor */
function isPlainObject(value: unknown): value is RawSchema {
    return isRecord(value);
}
