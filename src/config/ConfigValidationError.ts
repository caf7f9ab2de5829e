/**
 * ConfigValidationError — Readable Config File Errors
 *
 * Wraps the raw Zod validation error with the file it came from, so a
 * typo in `oas-mapper.yaml` reads as:
 *
 * ```
 * [oas-mapper.yaml] Invalid mapper config:
 *   • 'overrides.settings.token.computability': Invalid enum value. ...
 * ```
 *
 * @module
 */
import type { ZodError } from 'zod';

export class ConfigValidationError extends Error {
    /** The config file that failed validation */
    readonly source: string;

    constructor(source: string, zodError: ZodError) {
        const fieldErrors = zodError.issues
            .map(issue => {
                const path = issue.path.length > 0
                    ? `'${issue.path.join('.')}'`
                    : '(root)';
                return `  • ${path}: ${issue.message}`;
            })
            .join('\n');

        super(`[${source}] Invalid mapper config:\n${fieldErrors}`, { cause: zodError });
        this.name = 'ConfigValidationError';
        this.source = source;
    }
}
