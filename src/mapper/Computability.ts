/**
 * Computability Resolver
 *
 * OpenAPI has no notion of a computed value, so every property the
 * parent does not list as required defaults to computed-optional. That
 * default is policy, not a schema fact: it is configurable, and single
 * attributes can be overridden by path.
 *
 * @module
 */
import { Computability } from '../ir/types.js';

export interface ComputabilityPolicy {
    /** Status for properties with no other signal */
    readonly fallback: Computability;
    /** Explicit status configured for this attribute's path */
    readonly override?: Computability;
}

const DEFAULT_POLICY: ComputabilityPolicy = { fallback: Computability.ComputedOptional };

/**
 * Resolve the status of one child property.
 *
 * Precedence:
 *   1. Listed in the parent's `required` → `required` (overrides ignored)
 *   2. Path override
 *   3. Parent is fully computed → `computed`
 *   4. Policy fallback
 */
export function resolveComputability(
    requiredNames: ReadonlySet<string>,
    childName: string,
    parentIsFullyComputed: boolean,
    policy: ComputabilityPolicy = DEFAULT_POLICY,
): Computability {
    if (requiredNames.has(childName)) return Computability.Required;
    if (policy.override !== undefined) return policy.override;
    if (parentIsFullyComputed) return Computability.Computed;
    return policy.fallback;
}
