import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { loadConfig, CONFIG_FILENAMES } from '../../src/config/ConfigLoader.js';
import { ConfigValidationError } from '../../src/config/ConfigValidationError.js';
import { DEFAULT_CONFIG } from '../../src/config/MapperConfig.js';

// ============================================================================
// ConfigLoader Tests
// ============================================================================

describe('ConfigLoader', () => {
    let dir: string;

    beforeEach(() => {
        dir = mkdtempSync(join(tmpdir(), 'oas-mapper-'));
    });

    afterEach(() => {
        rmSync(dir, { recursive: true, force: true });
    });

    // ── Auto-detection ──

    describe('auto-detection', () => {
        it('should fall back to the defaults without a config file', () => {
            expect(loadConfig(undefined, dir)).toEqual(DEFAULT_CONFIG);
        });

        it('should read oas-mapper.yaml from the working directory', () => {
            writeFileSync(join(dir, 'oas-mapper.yaml'), [
                'defaultComputability: optional',
                'errorMode: collect',
                'overrides:',
                '  settings.api_token:',
                '    sensitive: true',
            ].join('\n'));

            const config = loadConfig(undefined, dir);
            expect(config.defaultComputability).toBe('optional');
            expect(config.errorMode).toBe('collect');
            expect(config.maxDepth).toBe(32);
            expect(config.overrides).toEqual({ 'settings.api_token': { sensitive: true } });
        });

        it('should read a JSON config', () => {
            writeFileSync(join(dir, 'oas-mapper.json'), JSON.stringify({ maxDepth: 4 }));
            expect(loadConfig(undefined, dir).maxDepth).toBe(4);
        });

        it('should prefer the first file in the lookup order', () => {
            writeFileSync(join(dir, 'oas-mapper.yml'), 'maxDepth: 5\n');
            writeFileSync(join(dir, 'oas-mapper.json'), JSON.stringify({ maxDepth: 6 }));
            expect(CONFIG_FILENAMES.indexOf('oas-mapper.yml')).toBeLessThan(CONFIG_FILENAMES.indexOf('oas-mapper.json'));
            expect(loadConfig(undefined, dir).maxDepth).toBe(5);
        });

        it('should treat an empty YAML file as defaults', () => {
            writeFileSync(join(dir, 'oas-mapper.yaml'), '');
            expect(loadConfig(undefined, dir)).toEqual(DEFAULT_CONFIG);
        });
    });

    // ── Explicit path ──

    describe('explicit path', () => {
        it('should load a path relative to the working directory', () => {
            writeFileSync(join(dir, 'custom.yaml'), 'naming:\n  style: preserve\n');
            expect(loadConfig('custom.yaml', dir).naming.style).toBe('preserve');
        });

        it('should fail on a missing file', () => {
            expect(() => loadConfig('missing.yaml', dir))
                .toThrow(`Config file not found: "${join(dir, 'missing.yaml')}"`);
        });

        it('should name the file in validation errors', () => {
            writeFileSync(join(dir, 'bad.yaml'), 'errorMode: sometimes\n');
            expect(() => loadConfig('bad.yaml', dir)).toThrow(ConfigValidationError);
            expect(() => loadConfig('bad.yaml', dir)).toThrow('[bad.yaml] Invalid mapper config:');
        });
    });
});
