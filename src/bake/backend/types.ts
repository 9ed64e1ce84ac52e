/**
 * @file Build Backend Types
 *
 * Contract between the resolver and the external system that builds
 * images. The resolver hands over one finished, immutable plan; the
 * backend runs one build per EffectiveTarget using the values verbatim.
 *
 * @module bake/backend
 */

import type { BuildPlan } from '../types.js';

export interface BuildBackend {
    plan_submit(plan: BuildPlan): Promise<void>;
}

/**
 * @property targets - Target or group names (empty = default group)
 * @property overrides - Variable overrides for this invocation
 */
export interface BakeRequest {
    targets: readonly string[];
    overrides?: Readonly<Record<string, string>>;
}
