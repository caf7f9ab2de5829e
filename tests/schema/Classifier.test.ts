import { describe, it, expect } from 'vitest';
import { classify, buildElementType, isNestedObject, type ClassifierNotice, type ClassifyOptions } from '../../src/schema/Classifier.js';
import { SchemaNode } from '../../src/schema/SchemaNode.js';
import {
    NameCollisionError, RecursionLimitError, SchemaError, UnsupportedSchemaError,
} from '../../src/errors/LoweringError.js';
import { toSnakeCase } from '../../src/mapper/NamingHelpers.js';
import type { RawSchema } from '../../src/schema/types.js';

// ============================================================================
// Classifier Tests
// ============================================================================

const base: ClassifyOptions = { depth: 0, maxDepth: 32 };

function kindOf(raw: RawSchema, options: Partial<ClassifyOptions> = {}) {
    return classify(new SchemaNode(raw), { ...base, ...options });
}

describe('Classifier', () => {
    // ── Scalars ──

    describe('Scalars', () => {
        it('should map integer to int64 whatever the format', () => {
            expect(kindOf({ type: 'integer' })).toEqual({ kind: 'scalar', scalar: 'int64', sensitive: false });
            expect(kindOf({ type: 'integer', format: 'int32' })).toEqual({ kind: 'scalar', scalar: 'int64', sensitive: false });
        });

        it('should map number by format', () => {
            expect(kindOf({ type: 'number', format: 'double' })).toEqual({ kind: 'scalar', scalar: 'float64', sensitive: false });
            expect(kindOf({ type: 'number', format: 'float' })).toEqual({ kind: 'scalar', scalar: 'float64', sensitive: false });
            expect(kindOf({ type: 'number' })).toEqual({ kind: 'scalar', scalar: 'number', sensitive: false });
        });

        it('should map boolean to bool', () => {
            expect(kindOf({ type: 'boolean' })).toEqual({ kind: 'scalar', scalar: 'bool', sensitive: false });
        });

        it('should flag password strings as sensitive', () => {
            expect(kindOf({ type: 'string', format: 'password' })).toEqual({ kind: 'scalar', scalar: 'string', sensitive: true });
            expect(kindOf({ type: 'string', format: 'uuid' })).toEqual({ kind: 'scalar', scalar: 'string', sensitive: false });
        });

        it('should ignore a null tag next to one real type', () => {
            expect(kindOf({ type: ['string', 'null'] })).toEqual({ kind: 'scalar', scalar: 'string', sensitive: false });
            expect(kindOf({ type: 'integer', nullable: true })).toEqual({ kind: 'scalar', scalar: 'int64', sensitive: false });
        });

        it('should classify untyped nodes by format', () => {
            expect(kindOf({})).toEqual({ kind: 'scalar', scalar: 'string', sensitive: false });
            expect(kindOf({ format: 'int32' })).toEqual({ kind: 'scalar', scalar: 'int64', sensitive: false });
            expect(kindOf({ format: 'double' })).toEqual({ kind: 'scalar', scalar: 'float64', sensitive: false });
            expect(kindOf({ format: 'password' })).toEqual({ kind: 'scalar', scalar: 'string', sensitive: true });
        });

        it('should report single-precision floats', () => {
            const notices: ClassifierNotice[] = [];
            kindOf({ type: 'number', format: 'float' }, { onNotice: n => notices.push(n) });
            kindOf({ type: 'number', format: 'double' }, { onNotice: n => notices.push(n) });
            expect(notices).toEqual([{
                code: 'float-precision',
                message: 'single-precision "float" widened to a 64-bit float attribute',
            }]);
        });
    });

    // ── Arrays ──

    describe('Arrays', () => {
        it('should map arrays to lists and unique arrays to sets', () => {
            expect(kindOf({ type: 'array', items: { type: 'string' } }))
                .toEqual({ kind: 'list', elementType: { kind: 'string' } });
            expect(kindOf({ type: 'array', uniqueItems: true, items: { type: 'integer' } }))
                .toEqual({ kind: 'set', elementType: { kind: 'int64' } });
        });

        it('should let the collection option win over uniqueItems', () => {
            expect(kindOf({ type: 'array', uniqueItems: true, items: { type: 'boolean' } }, { collection: 'list' }))
                .toEqual({ kind: 'list', elementType: { kind: 'bool' } });
            expect(kindOf({ type: 'array', items: { type: 'boolean' } }, { collection: 'set' }))
                .toEqual({ kind: 'set', elementType: { kind: 'bool' } });
        });

        it('should not pass the collection option down to inner arrays', () => {
            expect(kindOf(
                { type: 'array', items: { type: 'array', items: { type: 'string' } } },
                { collection: 'set' },
            )).toEqual({ kind: 'set', elementType: { kind: 'list', elementType: { kind: 'string' } } });
        });

        it('should classify arrays of objects as nested collections', () => {
            const items: RawSchema = { type: 'object', properties: { id: { type: 'string' } } };
            const list = kindOf({ type: 'array', items });
            const set = kindOf({ type: 'array', uniqueItems: true, items });

            expect(list.kind).toBe('list_nested');
            expect(set.kind).toBe('set_nested');
            if (list.kind === 'list_nested') {
                expect(list.item.raw).toBe(items);
            }
        });

        it('should infer an array from items alone', () => {
            expect(kindOf({ items: { type: 'number' } })).toEqual({ kind: 'list', elementType: { kind: 'number' } });
        });

        it('should reject arrays without items', () => {
            expect(() => kindOf({ type: 'array' })).toThrow(UnsupportedSchemaError);
            expect(() => kindOf({ type: 'array' })).toThrow(
                'schema type ["array"] (format: none) matches no attribute kind: array schema declares no items',
            );
        });
    });

    // ── Objects ──

    describe('Objects', () => {
        it('should map objects with properties to single nested', () => {
            const raw: RawSchema = { type: 'object', properties: { a: { type: 'string' } } };
            const kind = kindOf(raw);
            expect(kind.kind).toBe('single_nested');
            if (kind.kind === 'single_nested') {
                expect(kind.node.raw).toBe(raw);
            }
        });

        it('should infer an object from properties alone', () => {
            expect(kindOf({ properties: { a: { type: 'string' } } }).kind).toBe('single_nested');
        });

        it('should map additionalProperties of a scalar to a map', () => {
            expect(kindOf({ type: 'object', additionalProperties: { type: 'integer' } }))
                .toEqual({ kind: 'map', elementType: { kind: 'int64' } });
        });

        it('should map additionalProperties of an object to a nested map', () => {
            const value: RawSchema = { type: 'object', properties: { host: { type: 'string' } } };
            const kind = kindOf({ type: 'object', additionalProperties: value });
            expect(kind.kind).toBe('map_nested');
            if (kind.kind === 'map_nested') {
                expect(kind.value.raw).toBe(value);
            }
        });

        it('should reject an object with neither properties nor additionalProperties', () => {
            expect(() => kindOf({ type: ['object'] })).toThrow(UnsupportedSchemaError);
            expect(() => kindOf({ type: 'object', additionalProperties: true })).toThrow(UnsupportedSchemaError);
        });

        it('should apply the mixed-object policy', () => {
            const raw: RawSchema = {
                type: 'object',
                properties: { a: { type: 'string' } },
                additionalProperties: { type: 'string' },
            };
            const notices: ClassifierNotice[] = [];

            expect(kindOf(raw, { onNotice: n => notices.push(n) }).kind).toBe('single_nested');
            expect(notices.map(n => n.code)).toEqual(['additional-properties-ignored']);
            expect(() => kindOf(raw, { mixedObjects: 'error' })).toThrow(SchemaError);
        });
    });

    // ── Rejections ──

    describe('Rejections', () => {
        it('should reject conflicting type tags', () => {
            expect(() => kindOf({ type: ['string', 'integer'] }))
                .toThrow('conflicting schema types ["string","integer"]');
        });

        it('should reject a null-only schema', () => {
            expect(() => kindOf({ type: 'null' })).toThrow(
                'schema type ["null"] (format: none) matches no attribute kind: a null-only schema carries no value',
            );
        });

        it('should reject scalars that declare properties', () => {
            expect(() => kindOf({ type: 'string', properties: { a: { type: 'string' } } }))
                .toThrow(UnsupportedSchemaError);
        });

        it('should reject additionalProperties on a scalar', () => {
            expect(() => kindOf({ type: 'string', additionalProperties: { type: 'string' } }))
                .toThrow('"additionalProperties" declared on a schema of type "string"');
        });

        it('should enforce the depth ceiling', () => {
            expect(() => kindOf({ type: 'string' }, { depth: 3, maxDepth: 2 })).toThrow(RecursionLimitError);
            expect(() => kindOf({ type: 'string' }, { depth: 2, maxDepth: 2 })).not.toThrow();
        });

        it('should enforce the depth ceiling inside collections', () => {
            expect(() => kindOf(
                { type: 'array', items: { type: 'array', items: { type: 'string' } } },
                { depth: 1, maxDepth: 2 },
            )).toThrow(RecursionLimitError);
        });
    });

    // ── Element Types ──

    describe('buildElementType', () => {
        it('should build object element types with normalized names', () => {
            const node = new SchemaNode({
                type: 'object',
                properties: {
                    hostName: { type: 'string' },
                    ports: { type: 'array', items: { type: 'integer' } },
                },
            });
            expect(buildElementType(node, { ...base, attributeName: toSnakeCase })).toEqual({
                kind: 'object',
                attributeTypes: [
                    { name: 'host_name', type: { kind: 'string' } },
                    { name: 'ports', type: { kind: 'list', elementType: { kind: 'int64' } } },
                ],
            });
        });

        it('should keep property names without a naming function', () => {
            const node = new SchemaNode({ type: 'object', properties: { hostName: { type: 'string' } } });
            expect(buildElementType(node, base)).toEqual({
                kind: 'object',
                attributeTypes: [{ name: 'hostName', type: { kind: 'string' } }],
            });
        });

        it('should turn a map of objects into a map of object types', () => {
            const node = new SchemaNode({
                type: 'object',
                additionalProperties: { type: 'object', properties: { weight: { type: 'number' } } },
            });
            expect(buildElementType(node, base)).toEqual({
                kind: 'map',
                elementType: { kind: 'object', attributeTypes: [{ name: 'weight', type: { kind: 'number' } }] },
            });
        });

        it('should reject object element fields that collide', () => {
            const node = new SchemaNode({
                type: 'object',
                properties: { hostName: { type: 'string' }, host_name: { type: 'string' } },
            });
            expect(() => buildElementType(node, { ...base, attributeName: toSnakeCase }))
                .toThrow(NameCollisionError);
        });
    });

    // ── isNestedObject ──

    describe('isNestedObject', () => {
        it('should accept typed and untyped objects with properties', () => {
            expect(isNestedObject(new SchemaNode({ type: 'object', properties: { a: {} } }), base)).toBe(true);
            expect(isNestedObject(new SchemaNode({ properties: { a: {} } }), base)).toBe(true);
        });

        it('should refuse maps, empty objects and scalars', () => {
            expect(isNestedObject(new SchemaNode({ type: 'object', additionalProperties: { type: 'string' } }), base)).toBe(false);
            expect(isNestedObject(new SchemaNode({ type: 'object', properties: {} }), base)).toBe(false);
            expect(isNestedObject(new SchemaNode({ type: 'string' }), base)).toBe(false);
        });
    });
});
