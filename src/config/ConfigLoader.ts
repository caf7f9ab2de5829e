/**
 * ConfigLoader — YAML Configuration File Reader
 *
 * Loads `oas-mapper.yaml` from cwd or a specified path, validates
 * the structure, and merges with defaults.
 *
 * @module
 */
import { readFileSync, existsSync } from 'node:fs';
import { resolve, join, basename } from 'node:path';
import { parse as parseYaml } from 'yaml';
import { mergeConfig, parseConfig, type MapperConfig } from './MapperConfig.js';

// ── Filename Conventions ─────────────────────────────────

export const CONFIG_FILENAMES = [
    'oas-mapper.yaml',
    'oas-mapper.yml',
    'oas-mapper.json',
] as const;

// ── Public API ───────────────────────────────────────────

/**
 * Load configuration from a YAML/JSON file.
 *
 * Priority:
 *   1. Explicit `configPath` argument
 *   2. Auto-detect `oas-mapper.yaml` in `cwd`
 *   3. Fall back to all defaults
 *
 * @param configPath - Explicit path to config file (optional)
 * @param cwd - Working directory for auto-detection (default: process.cwd())
 * @throws {ConfigValidationError} When the file content does not match the config shape
 */
export function loadConfig(configPath?: string, cwd?: string): MapperConfig {
    const workDir = cwd ?? process.cwd();

    if (configPath) {
        const absPath = resolve(workDir, configPath);
        if (!existsSync(absPath)) {
            throw new Error(`Config file not found: "${absPath}"`);
        }
        return parseConfigFile(absPath);
    }

    for (const filename of CONFIG_FILENAMES) {
        const candidate = join(workDir, filename);
        if (existsSync(candidate)) {
            return parseConfigFile(candidate);
        }
    }

    return mergeConfig({});
}

// ── Internal ─────────────────────────────────────────────

function parseConfigFile(filePath: string): MapperConfig {
    const content = readFileSync(filePath, 'utf-8');
    const raw: unknown = filePath.endsWith('.json')
        ? JSON.parse(content)
        : parseYaml(content);

    return parseConfig(raw, basename(filePath));
}
