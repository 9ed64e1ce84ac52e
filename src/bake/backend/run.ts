/**
 * @file Bake Run
 *
 * Resolve a declaration document with host settings and hand the plan
 * to a build backend. Resolution completes before submission, so a
 * failing resolve never reaches the backend.
 *
 * @module bake/backend
 */

import { SettingsService, type Environment, type ResolverSettings } from '../../config/settings.js';
import type { Logger } from '../../log/logger.js';
import { error_format } from '../errors.js';
import { BakeResolver, type ResolveOptions } from '../resolver.js';
import type { BuildPlan } from '../types.js';
import type { BakeRequest, BuildBackend } from './types.js';

/**
 * Derive resolver options from effective settings.
 */
export function resolveOptions_fromSettings(
    settings: ResolverSettings,
    logger: Logger,
    env: Environment = process.env,
): ResolveOptions {
    return {
        logger,
        defaultGroup: settings.defaultGroup,
        environment: settings.environmentOverrides ? env : undefined,
    };
}

/**
 * @property settings - Defaults to the process-wide settings
 * @property env - Source of variable overrides when enabled in settings
 * @property logger - Defaults to a console logger at the configured level
 */
export interface BakeRunOptions {
    settings?: SettingsService;
    env?: Environment;
    logger?: Logger;
}

/**
 * Parse, resolve and submit.
 *
 * @returns The submitted plan
 * @throws DeclarationError / ResolveError from resolution, or whatever
 *   the backend rejects with
 */
export async function bake_run(
    source: string,
    request: BakeRequest,
    backend: BuildBackend,
    options: BakeRunOptions = {},
): Promise<BuildPlan> {
    const settings: SettingsService = options.settings ?? SettingsService.instance_get();
    const logger: Logger = options.logger ?? settings.logger_build();
    let plan: BuildPlan;
    try {
        const resolver: BakeResolver = BakeResolver.source_load(
            source,
            resolveOptions_fromSettings(settings.snapshot(), logger, options.env ?? process.env),
        );
        plan = resolver.resolve(request.targets, request.overrides);
    } catch (err: unknown) {
        logger.error(error_format(err));
        throw err;
    }

    logger.info(`submitting ${plan.targets.length} target(s) to the build backend`);
    await backend.plan_submit(plan);
    return plan;
}
