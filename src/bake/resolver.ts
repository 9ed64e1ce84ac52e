/**
 * @file Bake Resolver
 *
 * Entry point of the resolve pipeline:
 *
 *   Parse → Validate → Flatten → Emit
 *
 * Construction covers parse and validate: the function registry and the
 * declared variables are built once and sealed, and the target/group
 * graphs are checked for unknown references and cycles. Each `resolve`
 * call forks the variable store, applies its own overrides and emits a
 * plan. A failure at any step aborts the call; there is no partial plan.
 *
 * @module bake
 */

import { ExpressionEvaluator } from './expression/evaluator.js';
import { FunctionRegistry } from './functions/FunctionRegistry.js';
import { declaration_validate } from './graph/validator.js';
import { GROUP_PREFIX } from './groups/expand.js';
import { InheritanceResolver } from './inheritance/flatten.js';
import { declaration_parse } from './parser/declaration.js';
import { PlanEmitter } from './plan/emitter.js';
import type { BuildPlan, DeclarationSet } from './types.js';
import { environmentOverrides_collect, VariableStore } from './variables/VariableStore.js';
import { silentLogger, type Logger } from '../log/logger.js';

export type Overrides = Readonly<Record<string, string>>;

/**
 * @property logger - Receives phase diagnostics at debug level
 * @property defaultGroup - Resolved when no names are requested
 * @property environment - Environment-like map; entries naming a
 *   declared variable become overrides (explicit overrides win)
 */
export interface ResolveOptions {
    logger?: Logger;
    defaultGroup?: string;
    environment?: Readonly<Record<string, string | undefined>>;
}

export class BakeResolver {
    private readonly logger: Logger;
    private readonly defaultGroup: string;
    private readonly environment: Readonly<Record<string, string | undefined>>;
    private readonly variables: VariableStore;
    private readonly functions: FunctionRegistry;

    /**
     * @throws ResolveError on duplicate declarations, recursive
     *   functions, unknown references or cycles
     */
    constructor(
        private readonly declaration: DeclarationSet,
        options: ResolveOptions = {},
    ) {
        this.logger = options.logger ?? silentLogger;
        this.defaultGroup = options.defaultGroup ?? 'default';
        this.environment = options.environment ?? {};

        this.variables = VariableStore.definitions_load(declaration.variables).seal();
        this.functions = FunctionRegistry.definitions_load(declaration.functions);
        this.logger.debug(
            `parsed ${declaration.variables.length} variable(s), ${declaration.functions.length} function(s), ` +
            `${declaration.targets.size} target(s), ${declaration.groups.size} group(s)`,
        );

        const validation = declaration_validate(declaration);
        if (!validation.valid) {
            this.logger.debug(`validation found ${validation.errors.length} error(s)`);
            throw validation.errors[0];
        }
    }

    /**
     * Parse a YAML/JSON declaration document and build a resolver.
     */
    public static source_load(source: string, options: ResolveOptions = {}): BakeResolver {
        return new BakeResolver(declaration_parse(source), options);
    }

    /**
     * Resolve requested target/group names into a build plan.
     *
     * @param requested - Target or group names; empty means the default
     *   group, looked up as a group only
     * @param overrides - Variable values taking precedence over defaults
     * @throws ResolveError `UndeclaredVariable` for an override of an
     *   undeclared variable, plus any expansion or flattening error
     */
    public resolve(requested: readonly string[], overrides: Overrides = {}): BuildPlan {
        const names: readonly string[] = requested.length > 0 ? requested : [`${GROUP_PREFIX}${this.defaultGroup}`];

        const variables: VariableStore = this.variables.fork();
        for (const [name, value] of environmentOverrides_collect(this.environment, variables)) {
            variables.override(name, value);
        }
        for (const [name, value] of Object.entries(overrides)) {
            variables.override(name, value);
        }
        variables.seal();

        const evaluator = new ExpressionEvaluator(variables, this.functions);
        const inheritance = new InheritanceResolver(this.declaration.targets, evaluator);
        const plan: BuildPlan = new PlanEmitter(this.declaration, inheritance).plan_resolve(names);

        this.logger.debug(
            `resolved [${names.join(', ')}] into ${plan.targets.length} target(s): ` +
            plan.targets.map((t): string => t.name).join(', '),
        );
        return plan;
    }
}

/**
 * One-shot resolve: `resolve(requestedNames, overrides) -> plan`.
 */
export function plan_resolve(
    declaration: DeclarationSet,
    requested: readonly string[],
    overrides: Overrides = {},
    options: ResolveOptions = {},
): BuildPlan {
    return new BakeResolver(declaration, options).resolve(requested, overrides);
}
