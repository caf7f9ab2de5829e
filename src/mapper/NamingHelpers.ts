/**
 * NamingHelpers — Property Name → Attribute Name
 *
 * Provider attribute names are lowercase with underscores. OpenAPI
 * property names arrive in any convention (`createdAt`, `max-retries`,
 * `IPAddress`), so the mapper normalizes them before checking sibling
 * uniqueness.
 *
 * @module
 */

export type NamingStyle = 'snake_case' | 'preserve';

/**
 * Convert a camelCase, PascalCase, kebab-case or dotted name to snake_case.
 *
 * @example
 * toSnakeCase('createdAt')    → 'created_at'
 * toSnakeCase('IPAddress')    → 'ip_address'
 * toSnakeCase('max-retries')  → 'max_retries'
 * toSnakeCase('nested_float64') → 'nested_float64'
 */
export function toSnakeCase(str: string): string {
    return str
        // Insert underscore before uppercase letters (camelCase boundaries)
        .replace(/([a-z0-9])([A-Z])/g, '$1_$2')
        // Insert underscore between consecutive uppercase followed by lowercase
        .replace(/([A-Z]+)([A-Z][a-z])/g, '$1_$2')
        .toLowerCase()
        // Separators and anything else an identifier cannot hold
        .replace(/[^a-z0-9_]+/g, '_')
        // Collapse multiple underscores
        .replace(/_+/g, '_')
        // Trim leading/trailing underscores
        .replace(/^_|_$/g, '');
}

/** Build the name function for a naming style */
export function attributeNamer(style: NamingStyle): (propertyName: string) => string {
    return style === 'snake_case' ? toSnakeCase : (name: string) => name;
}
