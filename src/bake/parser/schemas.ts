/**
 * @file Declaration Schemas
 *
 * Zod runtime schemas for the declaration document. Each schema matches
 * one section: variables, functions, groups and targets, each a list of
 * entries carrying a `name`.
 *
 * Optional target attributes stay optional (no defaults) so that the
 * inheritance resolver can tell "not declared" from "declared empty".
 *
 * @module bake/parser/schemas
 */

import { z } from 'zod';

// ─── Names ────────────────────────────────────────────────────────────────────

/**
 * Variables, functions and parameters are referenced from expressions,
 * so their names must be identifiers.
 */
const IdentifierSchema = z
    .string()
    .regex(/^[A-Za-z_][A-Za-z0-9_]*$/, 'must be an identifier (letters, digits, underscore)');

/** Targets and groups are only referenced by name lists. */
const EntityNameSchema = z
    .string()
    .regex(/^[A-Za-z0-9_][A-Za-z0-9_.-]*$/, 'must contain only letters, digits, and . _ -');

/**
 * YAML turns `8080` or `true` into non-strings; values are strings
 * everywhere past the boundary.
 */
const ScalarStringSchema = z
    .union([z.string(), z.number(), z.boolean()])
    .transform((value: string | number | boolean): string => String(value));

/** A single entry or a list of entries. */
const OneOrManySchema = z.union([z.string(), z.array(z.string())]);

// ─── Sections ─────────────────────────────────────────────────────────────────

export const VariableSchema = z.object({
    name:    IdentifierSchema,
    default: ScalarStringSchema.nullable().optional(),
});

export const FunctionSchema = z.object({
    name:   IdentifierSchema,
    params: z
        .array(IdentifierSchema)
        .default([])
        .refine((params: string[]): boolean => new Set(params).size === params.length, 'parameter names must be unique'),
    result: OneOrManySchema,
});

export const GroupSchema = z.object({
    name:    EntityNameSchema,
    targets: z.array(EntityNameSchema).default([]),
});

export const TargetSchema = z
    .object({
        name:       EntityNameSchema,
        inherits:   z.union([EntityNameSchema, z.array(EntityNameSchema)]).optional(),
        dockerfile: z.string().optional(),
        context:    z.string().optional(),
        target:     z.string().optional(),
        labels:     z.record(z.string(), ScalarStringSchema).optional(),
        args:       z.record(z.string(), ScalarStringSchema).optional(),
        tags:       OneOrManySchema.optional(),
        platforms:  OneOrManySchema.optional(),
    })
    .strict();

// ─── Declaration (full document) ──────────────────────────────────────────────

export const DeclarationSchema = z.object({
    variables: z.array(VariableSchema).default([]),
    functions: z.array(FunctionSchema).default([]),
    groups:    z.array(GroupSchema).default([]),
    targets:   z.array(TargetSchema).default([]),
});

export type RawDeclaration = z.infer<typeof DeclarationSchema>;
export type RawVariable    = z.infer<typeof VariableSchema>;
export type RawFunction    = z.infer<typeof FunctionSchema>;
export type RawTarget      = z.infer<typeof TargetSchema>;
