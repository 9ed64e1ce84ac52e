/**
 * @file Shared Parsing Utilities
 *
 * Helpers used by the declaration parser.
 *
 * @module bake/parser
 */

import yaml from 'js-yaml';
import { DeclarationError } from '../errors.js';

/**
 * Parse a YAML (or JSON) string into a JS value.
 *
 * @throws DeclarationError when the text is not well-formed
 */
export function yaml_parse(yamlStr: string): unknown {
    try {
        return yaml.load(yamlStr);
    } catch (err: unknown) {
        const reason: string = err instanceof Error ? err.message : String(err);
        throw new DeclarationError(`Invalid declaration document: ${reason}`, err);
    }
}

/**
 * Normalize a "one or many" field into the canonical list form.
 * - undefined → undefined (not declared)
 * - string → [string]
 * - array → copy
 */
export function list_normalize(raw: string | readonly string[] | undefined): string[] | undefined {
    if (raw === undefined) return undefined;
    if (typeof raw === 'string') return [raw];
    return [...raw];
}
