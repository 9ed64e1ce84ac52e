/**
 * @file Variable Store
 *
 * Holds declared variables with optional defaults. Overrides (from the
 * environment or the caller) take precedence over defaults. The store
 * is sealed once resolution starts and never changes afterwards.
 *
 * @module bake/variables
 */

import { BakeError, ResolveError } from '../errors.js';
import type { VariableDefinition } from '../types.js';

export type VariableSource = 'override' | 'default' | 'unset';

/**
 * A variable's raw value and where it came from. Default values may
 * contain placeholders; override values are literal.
 */
export interface ResolvedVariable {
    name: string;
    value: string;
    source: VariableSource;
}

export class VariableStore {
    private readonly declared: Map<string, string | null> = new Map();
    private readonly overrides: Map<string, string> = new Map();
    private sealed: boolean = false;

    /**
     * Build a store from declarations, in order.
     *
     * @throws ResolveError `DuplicateVariable`
     */
    public static definitions_load(definitions: readonly VariableDefinition[]): VariableStore {
        const store = new VariableStore();
        for (const definition of definitions) {
            store.declare(definition.name, definition.defaultValue);
        }
        return store;
    }

    public declare(name: string, defaultValue: string | null = null): void {
        this.mutable_assert();
        if (this.declared.has(name)) {
            throw new ResolveError('DuplicateVariable', name, `variable '${name}' is already declared`);
        }
        this.declared.set(name, defaultValue);
    }

    public override(name: string, value: string): void {
        this.mutable_assert();
        this.declared_assert(name);
        this.overrides.set(name, value);
    }

    /**
     * Override value, else declared default, else the empty string.
     */
    public resolve(name: string): string {
        return this.variable_resolve(name).value;
    }

    public variable_resolve(name: string): ResolvedVariable {
        this.declared_assert(name);
        const override: string | undefined = this.overrides.get(name);
        if (override !== undefined) {
            return { name, value: override, source: 'override' };
        }
        const fallback: string | null | undefined = this.declared.get(name);
        if (fallback === null || fallback === undefined) {
            return { name, value: '', source: 'unset' };
        }
        return { name, value: fallback, source: 'default' };
    }

    public has(name: string): boolean {
        return this.declared.has(name);
    }

    public names(): string[] {
        return Array.from(this.declared.keys());
    }

    /**
     * Unsealed copy with the same declarations and overrides. Each
     * resolve call forks the parsed store and applies its own overrides.
     */
    public fork(): VariableStore {
        const copy = new VariableStore();
        for (const [name, value] of this.declared) copy.declared.set(name, value);
        for (const [name, value] of this.overrides) copy.overrides.set(name, value);
        return copy;
    }

    public seal(): this {
        this.sealed = true;
        return this;
    }

    public isSealed(): boolean {
        return this.sealed;
    }

    /**
     * Raw values keyed by name (overrides applied, defaults unevaluated).
     */
    public snapshot(): Readonly<Record<string, string>> {
        const out: Record<string, string> = {};
        for (const name of this.declared.keys()) {
            out[name] = this.resolve(name);
        }
        return Object.freeze(out);
    }

    private declared_assert(name: string): void {
        if (!this.declared.has(name)) {
            throw new ResolveError('UndeclaredVariable', name, `variable '${name}' is not declared`);
        }
    }

    private mutable_assert(): void {
        if (this.sealed) {
            throw new BakeError('variable store is sealed');
        }
    }
}

/**
 * Pick the entries of an environment-like map that name a declared
 * variable. Only own string-valued entries count; everything else
 * in the environment is ignored.
 */
export function environmentOverrides_collect(
    env: Readonly<Record<string, string | undefined>>,
    store: VariableStore,
): Map<string, string> {
    const picked = new Map<string, string>();
    for (const name of store.names()) {
        if (!Object.hasOwn(env, name)) continue;
        const value: string | undefined = env[name];
        if (typeof value === 'string') picked.set(name, value);
    }
    return picked;
}
