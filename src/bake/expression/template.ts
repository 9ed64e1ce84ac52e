/**
 * @file Template Parser
 *
 * Recursive-descent parser for interpolated strings:
 *
 *   template := ( text | "$${" | "${" expr "}" )*
 *   expr     := identifier | identifier "(" [ arg ( "," arg )* ] ")"
 *   arg      := expr | '"' template '"'
 *
 * `$${` is a literal `${`. Inside quoted arguments `\"` and `\\` are
 * escapes, and placeholders may nest to any depth.
 *
 * @module bake/expression
 */

import { ResolveError } from '../errors.js';

// ─── AST ─────────────────────────────────────────────────────────

export type Expr =
    | { kind: 'ref'; name: string }
    | { kind: 'call'; name: string; args: Expr[] }
    | { kind: 'literal'; parts: TemplatePart[] };

export type TemplatePart =
    | { kind: 'text'; text: string }
    | { kind: 'placeholder'; expr: Expr };

export interface Template {
    source: string;
    parts: TemplatePart[];
}

const IDENTIFIER_START: RegExp = /[A-Za-z_]/;
const IDENTIFIER_PART: RegExp = /[A-Za-z0-9_]/;

// ─── Parser ──────────────────────────────────────────────────────

class TemplateParser {
    private pos: number = 0;

    constructor(private readonly source: string) {}

    template_parse(): Template {
        const parts: TemplatePart[] = this.parts_read(null);
        return { source: this.source, parts };
    }

    /**
     * Read template parts up to `terminator` (left unconsumed) or the
     * end of input. Inside a quoted argument the terminator is `"`.
     */
    private parts_read(terminator: '"' | null): TemplatePart[] {
        const parts: TemplatePart[] = [];
        let text: string = '';

        const text_flush = (): void => {
            if (text.length > 0) {
                parts.push({ kind: 'text', text });
                text = '';
            }
        };

        while (this.pos < this.source.length) {
            const ch: string = this.source.charAt(this.pos);

            if (terminator !== null && ch === terminator) break;

            if (terminator !== null && ch === '\\') {
                const next: string = this.source.charAt(this.pos + 1);
                if (next === '"' || next === '\\') {
                    text += next;
                    this.pos += 2;
                    continue;
                }
            }

            if (this.source.startsWith('$${', this.pos)) {
                text += '${';
                this.pos += 3;
                continue;
            }

            if (this.source.startsWith('${', this.pos)) {
                text_flush();
                this.pos += 2;
                const expr: Expr = this.expr_read();
                this.whitespace_skip();
                this.char_expect('}');
                parts.push({ kind: 'placeholder', expr });
                continue;
            }

            text += ch;
            this.pos++;
        }

        if (terminator !== null && this.pos >= this.source.length) {
            throw this.error_create('unterminated string literal');
        }

        text_flush();
        return parts;
    }

    private expr_read(): Expr {
        this.whitespace_skip();

        if (this.source.charAt(this.pos) === '"') {
            this.pos++;
            const parts: TemplatePart[] = this.parts_read('"');
            this.pos++;
            return { kind: 'literal', parts };
        }

        const name: string = this.identifier_read();
        this.whitespace_skip();

        if (this.source.charAt(this.pos) !== '(') {
            return { kind: 'ref', name };
        }

        this.pos++;
        const args: Expr[] = [];
        this.whitespace_skip();
        if (this.source.charAt(this.pos) === ')') {
            this.pos++;
            return { kind: 'call', name, args };
        }

        for (;;) {
            args.push(this.expr_read());
            this.whitespace_skip();
            const ch: string = this.source.charAt(this.pos);
            if (ch === ',') {
                this.pos++;
                continue;
            }
            if (ch === ')') {
                this.pos++;
                return { kind: 'call', name, args };
            }
            throw this.error_create(`expected ',' or ')' in call to '${name}'`);
        }
    }

    private identifier_read(): string {
        const start: number = this.pos;
        if (!IDENTIFIER_START.test(this.source.charAt(this.pos))) {
            throw this.error_create('expected an identifier or a quoted string');
        }
        this.pos++;
        while (this.pos < this.source.length && IDENTIFIER_PART.test(this.source.charAt(this.pos))) {
            this.pos++;
        }
        return this.source.slice(start, this.pos);
    }

    private whitespace_skip(): void {
        while (this.pos < this.source.length && /\s/.test(this.source.charAt(this.pos))) {
            this.pos++;
        }
    }

    private char_expect(expected: string): void {
        if (this.source.charAt(this.pos) !== expected) {
            throw this.error_create(`expected '${expected}'`);
        }
        this.pos++;
    }

    private error_create(problem: string): ResolveError {
        const found: string = this.pos < this.source.length ? `'${this.source.charAt(this.pos)}'` : 'end of input';
        return new ResolveError(
            'ExpressionSyntax',
            this.source,
            `${problem} at offset ${this.pos} (found ${found}) in "${this.source}"`,
        );
    }
}

// ─── Public API ──────────────────────────────────────────────────

/**
 * Parse an interpolated string.
 *
 * @throws ResolveError `ExpressionSyntax` on a malformed placeholder
 */
export function template_parse(source: string): Template {
    return new TemplateParser(source).template_parse();
}

/**
 * Escape literal text so that parsing it yields the text unchanged.
 */
export function template_escape(text: string): string {
    return text.split('${').join('$${');
}

/**
 * Names of every function called anywhere in a template, nested
 * arguments included.
 */
export function templateCalls_collect(template: Template): Set<string> {
    const calls = new Set<string>();

    const expr_walk = (expr: Expr): void => {
        if (expr.kind === 'call') {
            calls.add(expr.name);
            expr.args.forEach(expr_walk);
        } else if (expr.kind === 'literal') {
            parts_walk(expr.parts);
        }
    };

    const parts_walk = (parts: TemplatePart[]): void => {
        for (const part of parts) {
            if (part.kind === 'placeholder') expr_walk(part.expr);
        }
    };

    parts_walk(template.parts);
    return calls;
}

/**
 * Names of every bare reference anywhere in a template, call
 * arguments and quoted arguments included.
 */
export function templateRefs_collect(template: Template): Set<string> {
    const refs = new Set<string>();

    const expr_walk = (expr: Expr): void => {
        if (expr.kind === 'ref') {
            refs.add(expr.name);
        } else if (expr.kind === 'call') {
            expr.args.forEach(expr_walk);
        } else {
            parts_walk(expr.parts);
        }
    };

    const parts_walk = (parts: TemplatePart[]): void => {
        for (const part of parts) {
            if (part.kind === 'placeholder') expr_walk(part.expr);
        }
    };

    parts_walk(template.parts);
    return refs;
}

/**
 * If the template is exactly one placeholder with no surrounding text,
 * return its expression. Such templates keep the shape of their value.
 */
export function template_soleExpr(template: Template): Expr | null {
    if (template.parts.length !== 1) return null;
    const only: TemplatePart = template.parts[0];
    return only.kind === 'placeholder' ? only.expr : null;
}
