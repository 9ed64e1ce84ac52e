/**
 * @file Bake Layer Re-exports
 *
 * @module bake
 */

export * from './types.js';
export { BakeError, DeclarationError, ResolveError, RESOLVE_ERROR_CODES, resolveError_is, error_format } from './errors.js';
export type { ResolveErrorCode } from './errors.js';
export { VariableStore, environmentOverrides_collect } from './variables/VariableStore.js';
export type { ResolvedVariable, VariableSource } from './variables/VariableStore.js';
export { FunctionRegistry } from './functions/FunctionRegistry.js';
export type { TemplateEvaluator } from './functions/FunctionRegistry.js';
export { BUILTIN_FUNCTIONS } from './functions/builtins.js';
export type { BuiltinFunction } from './functions/builtins.js';
export { ExpressionEvaluator } from './expression/evaluator.js';
export { template_parse, template_escape } from './expression/template.js';
export type { Expr, Template, TemplatePart } from './expression/template.js';
export { declaration_parse, declarationFile_load } from './parser/declaration.js';
export { declaration_validate } from './graph/validator.js';
export { InheritanceResolver, target_fromEffective, effectiveTarget_freeze } from './inheritance/flatten.js';
export { MERGE_POLICIES, ATTRIBUTE_KINDS, attributes_merge } from './inheritance/policy.js';
export type { MergePolicy } from './inheritance/policy.js';
export { groups_expand, GROUP_PREFIX } from './groups/expand.js';
export { PlanEmitter } from './plan/emitter.js';
export { plan_render, plan_print, target_render } from './plan/render.js';
export type { RenderedPlan, RenderedTarget } from './plan/render.js';
export { BakeResolver, plan_resolve } from './resolver.js';
export type { ResolveOptions, Overrides } from './resolver.js';
export { bake_run, resolveOptions_fromSettings } from './backend/run.js';
export type { BakeRunOptions } from './backend/run.js';
export type { BuildBackend, BakeRequest } from './backend/types.js';
