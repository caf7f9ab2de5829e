import { describe, it, expect, vi, afterEach } from 'vitest';
import { createDebugObserver, type DebugEvent } from '../../src/observability/DebugObserver.js';

// ============================================================================
// DebugObserver Tests
// ============================================================================

describe('createDebugObserver', () => {
    afterEach(() => {
        vi.restoreAllMocks();
    });

    it('should return a custom handler unchanged', () => {
        const handler = (_event: DebugEvent): void => {};
        expect(createDebugObserver(handler)).toBe(handler);
    });

    // ── Default Output ──

    describe('default console output', () => {
        function printed(event: DebugEvent): string {
            const spy = vi.spyOn(console, 'debug').mockImplementation(() => {});
            createDebugObserver()(event);
            expect(spy).toHaveBeenCalledTimes(1);
            return String(spy.mock.calls[0]?.[0]);
        }

        it('should print attribute events', () => {
            expect(printed({
                type: 'attribute', target: 'resource', path: 'a.b',
                kind: 'string', computability: 'required', timestamp: 0,
            })).toBe('[oas-mapper] attr      resource a.b string required');
        });

        it('should print notices', () => {
            expect(printed({
                type: 'notice', target: 'datasource', path: 'ratio',
                code: 'float-precision', message: 'widened', timestamp: 0,
            })).toBe('[oas-mapper] notice    datasource ratio float-precision widened');
        });

        it('should print errors with (root) for an empty path', () => {
            expect(printed({
                type: 'error', target: 'resource', path: '',
                errorName: 'SchemaError', detail: 'bad', timestamp: 0,
            })).toBe('[oas-mapper] ERROR     resource (root) [SchemaError] bad');
        });

        it('should print completion with the duration', () => {
            expect(printed({
                type: 'complete', target: 'resource', count: 3, durationMs: 1.234, timestamp: 0,
            })).toBe('[oas-mapper] complete  resource 3 attributes 1.2ms');
        });
    });
});
