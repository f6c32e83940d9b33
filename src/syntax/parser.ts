/**
 * Recursive-descent reader for module source and expression text.
 *
 * Produces the abstract syntax of `ast.ts`. Preprocessor features are not
 * expanded: `-define`, `-include` and other attributes are skipped, and the
 * only macro understood is `?MODULE`.
 */

import { ParseError } from '../core/errors.js';
import { tokenize, type Token } from './tokenizer.js';
import type {
  BinarySegment,
  Clause,
  Expr,
  Form,
  FunctionForm,
  MapAssoc,
  ModuleForms,
  RecordDefForm,
  RecordFieldDef,
  RecordFieldInit,
} from './ast.js';

interface OperatorInfo {
  prec: number;
  right: boolean;
}

export const BINARY_OPERATORS: Record<string, OperatorInfo> = {
  '=': { prec: 100, right: true },
  '!': { prec: 100, right: true },
  orelse: { prec: 150, right: true },
  andalso: { prec: 160, right: true },
  '==': { prec: 200, right: false },
  '/=': { prec: 200, right: false },
  '=<': { prec: 200, right: false },
  '<': { prec: 200, right: false },
  '>=': { prec: 200, right: false },
  '>': { prec: 200, right: false },
  '=:=': { prec: 200, right: false },
  '=/=': { prec: 200, right: false },
  '++': { prec: 300, right: true },
  '--': { prec: 300, right: true },
  '+': { prec: 400, right: false },
  '-': { prec: 400, right: false },
  bor: { prec: 400, right: false },
  bxor: { prec: 400, right: false },
  bsl: { prec: 400, right: false },
  bsr: { prec: 400, right: false },
  or: { prec: 400, right: false },
  xor: { prec: 400, right: false },
  '/': { prec: 500, right: false },
  '*': { prec: 500, right: false },
  div: { prec: 500, right: false },
  rem: { prec: 500, right: false },
  band: { prec: 500, right: false },
  and: { prec: 500, right: false },
};

export const PREFIX_PRECEDENCE = 600;
export const PREFIX_OPERATORS = new Set(['+', '-', 'bnot', 'not']);

class Parser {
  private pos = 0;
  private moduleName?: string;

  constructor(private readonly tokens: Token[], private readonly src: string) {}

  // ---------------------------------------------------------------------------
  // Token helpers
  // ---------------------------------------------------------------------------

  private peek(offset = 0): Token {
    return this.tokens[Math.min(this.pos + offset, this.tokens.length - 1)];
  }

  private next(): Token {
    const tok = this.peek();
    if (this.pos < this.tokens.length - 1) this.pos++;
    return tok;
  }

  /** Punctuation or keyword with the given text. */
  private is(text: string, offset = 0): boolean {
    const tok = this.peek(offset);
    return (tok.kind === 'punct' || tok.kind === 'keyword') && tok.text === text;
  }

  private accept(text: string): boolean {
    if (this.is(text)) {
      this.next();
      return true;
    }
    return false;
  }

  private expect(text: string): Token {
    const tok = this.peek();
    if (!this.is(text)) {
      throw new ParseError(`Expected '${text}' but found '${tok.text || tok.kind}'`, tok.line);
    }
    return this.next();
  }

  private expectKind(kind: Token['kind']): Token {
    const tok = this.peek();
    if (tok.kind !== kind) {
      throw new ParseError(`Expected ${kind} but found '${tok.text || tok.kind}'`, tok.line);
    }
    return this.next();
  }

  atEnd(): boolean {
    return this.peek().kind === 'eof';
  }

  parseSequence(): Expr[] {
    if (this.atEnd()) return [];
    const exprs = this.parseExprList();
    if (this.peek().kind === 'dot') this.next();
    if (!this.atEnd()) {
      const tok = this.peek();
      throw new ParseError(`Unexpected '${tok.text}' after expression`, tok.line);
    }
    return exprs;
  }

  // ---------------------------------------------------------------------------
  // Forms
  // ---------------------------------------------------------------------------

  parseModule(): ModuleForms {
    const forms: Form[] = [];
    while (!this.atEnd()) {
      if (this.is('-')) {
        forms.push(this.parseAttribute());
      } else {
        forms.push(this.parseFunction());
      }
    }
    return { module: this.moduleName, forms };
  }

  private parseAttribute(): Form {
    const dash = this.expect('-');
    const nameTok = this.peek();
    if (nameTok.kind !== 'atom' && nameTok.kind !== 'keyword') {
      throw new ParseError('Expected attribute name', nameTok.line);
    }
    this.next();

    if (nameTok.value === 'module') {
      this.expect('(');
      this.moduleName = this.expectKind('atom').value;
      this.expect(')');
      this.expectKind('dot');
      return { type: 'attribute', line: dash.line, name: 'module' };
    }

    if (nameTok.value === 'record') {
      return this.parseRecordDefinition(dash.line);
    }

    // Any other attribute is skipped up to its terminating dot
    while (this.peek().kind !== 'dot') {
      if (this.atEnd()) throw new ParseError(`Unterminated attribute -${nameTok.value}`, nameTok.line);
      this.next();
    }
    this.next();
    return { type: 'attribute', line: dash.line, name: nameTok.value };
  }

  private parseRecordDefinition(line: number): RecordDefForm {
    this.expect('(');
    const name = this.expectKind('atom').value;
    this.expect(',');
    this.expect('{');
    const fields: RecordFieldDef[] = [];
    if (!this.is('}')) {
      do {
        const fieldTok = this.expectKind('atom');
        const field: RecordFieldDef = { name: fieldTok.value, line: fieldTok.line };
        if (this.accept('=')) {
          field.default = this.parseExpr();
        }
        if (this.accept('::')) {
          this.skipType();
        }
        fields.push(field);
      } while (this.accept(','));
    }
    this.expect('}');
    this.expect(')');
    this.expectKind('dot');
    return { type: 'record_def', line, name, fields };
  }

  /** Skips a type annotation up to the next top-level `,` or `}`. */
  private skipType(): void {
    let depth = 0;
    while (!this.atEnd()) {
      if (depth === 0 && (this.is(',') || this.is('}'))) return;
      if (this.is('(') || this.is('{') || this.is('[') || this.is('<<')) depth++;
      if (this.is(')') || this.is('}') || this.is(']') || this.is('>>')) depth--;
      this.next();
    }
  }

  private parseFunction(): FunctionForm {
    const first = this.peek();
    const nameTok = this.expectKind('atom');
    const clauses: Clause[] = [this.parseFunctionClause(nameTok)];
    while (this.accept(';')) {
      const tok = this.expectKind('atom');
      if (tok.value !== nameTok.value) {
        throw new ParseError(`Clause of '${tok.value}' inside definition of '${nameTok.value}'`, tok.line);
      }
      clauses.push(this.parseFunctionClause(tok));
    }
    const dot = this.expectKind('dot');
    const arity = clauses[0].patterns.length;
    for (const clause of clauses) {
      if (clause.patterns.length !== arity) {
        throw new ParseError(`Head mismatch in ${nameTok.value}/${arity}`, clause.line);
      }
    }
    return {
      type: 'function',
      line: first.line,
      endLine: dot.line,
      name: nameTok.value,
      arity,
      clauses,
      text: this.src.slice(first.offset, dot.offset + 1),
    };
  }

  private parseFunctionClause(nameTok: Token): Clause {
    this.expect('(');
    const patterns = this.is(')') ? [] : this.parseExprList();
    this.expect(')');
    return this.parseClauseRest(nameTok.line, patterns);
  }

  // ---------------------------------------------------------------------------
  // Clauses
  // ---------------------------------------------------------------------------

  private parseClauseRest(line: number, patterns: Expr[]): Clause {
    const guards = this.accept('when') ? this.parseGuards() : [];
    this.expect('->');
    const body = this.parseExprList();
    return { line, patterns, guards, body };
  }

  private parseGuards(): Expr[][] {
    const guards: Expr[][] = [this.parseExprList()];
    while (this.accept(';')) {
      guards.push(this.parseExprList());
    }
    return guards;
  }

  /** Pattern clauses of case, receive and try, separated by `;`. */
  private parsePatternClauses(): Clause[] {
    const clauses: Clause[] = [];
    do {
      const line = this.peek().line;
      const pattern = this.parseExpr();
      clauses.push(this.parseClauseRest(line, [pattern]));
    } while (this.accept(';'));
    return clauses;
  }

  private parseFunClauses(): Clause[] {
    const clauses: Clause[] = [];
    do {
      const line = this.peek().line;
      // Named funs repeat their variable name on every clause
      if (this.peek().kind === 'var' && this.is('(', 1)) this.next();
      this.expect('(');
      const patterns = this.is(')') ? [] : this.parseExprList();
      this.expect(')');
      clauses.push(this.parseClauseRest(line, patterns));
    } while (this.accept(';'));
    return clauses;
  }

  // ---------------------------------------------------------------------------
  // Expressions
  // ---------------------------------------------------------------------------

  parseExprList(): Expr[] {
    const exprs = [this.parseExpr()];
    while (this.accept(',')) {
      exprs.push(this.parseExpr());
    }
    return exprs;
  }

  parseExpr(): Expr {
    if (this.is('catch')) {
      const tok = this.next();
      return { type: 'catch', line: tok.line, expr: this.parseExpr() };
    }
    return this.parseBinary(0);
  }

  private parseBinary(minPrec: number): Expr {
    let left = this.parseUnary();
    while (true) {
      const tok = this.peek();
      if (tok.kind !== 'punct' && tok.kind !== 'keyword') break;
      const info = BINARY_OPERATORS[tok.text];
      if (!info || info.prec < minPrec) break;
      this.next();
      const right = this.is('catch') ? this.parseExpr() : this.parseBinary(info.right ? info.prec : info.prec + 1);
      left = tok.text === '='
        ? { type: 'match', line: tok.line, left, right }
        : { type: 'binop', line: tok.line, op: tok.text, left, right };
    }
    return left;
  }

  private parseUnary(): Expr {
    const tok = this.peek();
    if ((tok.kind === 'punct' || tok.kind === 'keyword') && PREFIX_OPERATORS.has(tok.text)) {
      this.next();
      return { type: 'unop', line: tok.line, op: tok.text, operand: this.parseUnary() };
    }
    return this.parsePostfix(this.parsePrimary());
  }

  private parsePostfix(start: Expr): Expr {
    let expr = start;
    while (true) {
      const tok = this.peek();
      if (this.is('(')) {
        this.next();
        const args = this.is(')') ? [] : this.parseExprList();
        this.expect(')');
        expr = { type: 'call', line: expr.line, callee: expr, args };
      } else if (this.is(':')) {
        this.next();
        const fn = this.parsePrimary();
        if (this.is('(')) {
          expr = { type: 'remote', line: tok.line, module: expr, fn };
        } else {
          // `Class:Reason` in catch clause patterns
          expr = { type: 'binop', line: tok.line, op: ':', left: expr, right: fn };
        }
      } else if (this.is('#') && this.is('{', 1)) {
        this.next();
        expr = this.parseMap(tok.line, expr);
      } else if (this.is('#') && this.peek(1).kind === 'atom') {
        this.next();
        const name = this.next().value;
        if (this.accept('.')) {
          const field = this.expectKind('atom').value;
          expr = { type: 'record_field', line: tok.line, record: expr, name, field };
        } else {
          expr = { type: 'record', line: tok.line, name, base: expr, fields: this.parseRecordFields() };
        }
      } else {
        return expr;
      }
    }
  }

  private parsePrimary(): Expr {
    const tok = this.peek();
    switch (tok.kind) {
      case 'integer':
        this.next();
        return { type: 'integer', line: tok.line, value: BigInt(tok.value) };
      case 'float':
        this.next();
        return { type: 'float', line: tok.line, value: Number(tok.value) };
      case 'char':
        this.next();
        return { type: 'char', line: tok.line, value: tok.value };
      case 'string': {
        this.next();
        let value = tok.value;
        while (this.peek().kind === 'string') value += this.next().value;
        return { type: 'string', line: tok.line, value };
      }
      case 'atom':
        this.next();
        return { type: 'atom', line: tok.line, value: tok.value };
      case 'var':
        this.next();
        return { type: 'var', line: tok.line, name: tok.value };
      case 'keyword':
        return this.parseKeywordExpr(tok);
      case 'punct':
        return this.parsePunctExpr(tok);
      default:
        throw new ParseError(`Unexpected '${tok.text || tok.kind}'`, tok.line);
    }
  }

  private parsePunctExpr(tok: Token): Expr {
    switch (tok.text) {
      case '(': {
        this.next();
        const inner = this.parseExpr();
        this.expect(')');
        return inner;
      }
      case '{': {
        this.next();
        const elements = this.is('}') ? [] : this.parseExprList();
        this.expect('}');
        return { type: 'tuple', line: tok.line, elements };
      }
      case '[':
        return this.parseList();
      case '<<':
        return this.parseBitString();
      case '#': {
        this.next();
        if (this.is('{')) return this.parseMap(tok.line);
        const name = this.expectKind('atom').value;
        if (this.accept('.')) {
          const field = this.expectKind('atom').value;
          return { type: 'record_index', line: tok.line, name, field };
        }
        return { type: 'record', line: tok.line, name, fields: this.parseRecordFields() };
      }
      case '?': {
        this.next();
        const macro = this.next();
        if (macro.value === 'MODULE' && this.moduleName) {
          return { type: 'atom', line: tok.line, value: this.moduleName };
        }
        throw new ParseError(`Unsupported macro ?${macro.value}`, tok.line);
      }
      default:
        throw new ParseError(`Unexpected '${tok.text}'`, tok.line);
    }
  }

  private parseKeywordExpr(tok: Token): Expr {
    switch (tok.text) {
      case 'case': {
        this.next();
        const subject = this.parseExpr();
        this.expect('of');
        const clauses = this.parsePatternClauses();
        this.expect('end');
        return { type: 'case', line: tok.line, subject, clauses };
      }
      case 'if': {
        this.next();
        const clauses: Clause[] = [];
        do {
          const line = this.peek().line;
          const guards = this.parseGuards();
          this.expect('->');
          clauses.push({ line, patterns: [], guards, body: this.parseExprList() });
        } while (this.accept(';'));
        this.expect('end');
        return { type: 'if', line: tok.line, clauses };
      }
      case 'receive': {
        this.next();
        const clauses = this.is('after') ? [] : this.parsePatternClauses();
        let after: { timeout: Expr; body: Expr[] } | undefined;
        if (this.accept('after')) {
          const timeout = this.parseExpr();
          this.expect('->');
          after = { timeout, body: this.parseExprList() };
        }
        this.expect('end');
        return { type: 'receive', line: tok.line, clauses, after };
      }
      case 'try': {
        this.next();
        const body = this.parseExprList();
        const clauses = this.accept('of') ? this.parsePatternClauses() : [];
        const catchClauses = this.accept('catch') ? this.parsePatternClauses() : [];
        const after = this.accept('after') ? this.parseExprList() : [];
        this.expect('end');
        return { type: 'try', line: tok.line, body, clauses, catchClauses, after };
      }
      case 'begin': {
        this.next();
        const body = this.parseExprList();
        this.expect('end');
        return { type: 'block', line: tok.line, body };
      }
      case 'fun':
        return this.parseFun();
      default:
        throw new ParseError(`Unexpected keyword '${tok.text}'`, tok.line);
    }
  }

  private parseFun(): Expr {
    const tok = this.expect('fun');
    if (this.is('(') || (this.peek().kind === 'var' && this.is('(', 1))) {
      const clauses = this.parseFunClauses();
      this.expect('end');
      return { type: 'fun', line: tok.line, clauses };
    }
    let module: string | undefined;
    let name = this.expectKind('atom').value;
    if (this.accept(':')) {
      module = name;
      name = this.expectKind('atom').value;
    }
    this.expect('/');
    const arity = Number(this.expectKind('integer').value);
    return { type: 'fun_ref', line: tok.line, module, name, arity };
  }

  private parseList(): Expr {
    const open = this.expect('[');
    if (this.accept(']')) return { type: 'nil', line: open.line };

    const first = this.parseExpr();
    if (this.accept('||')) {
      const qualifiers: Expr[] = [];
      do {
        const qualifier = this.parseExpr();
        if (this.is('<-')) {
          const arrow = this.next();
          qualifiers.push({ type: 'generate', line: arrow.line, pattern: qualifier, source: this.parseExpr() });
        } else {
          qualifiers.push(qualifier);
        }
      } while (this.accept(','));
      this.expect(']');
      return { type: 'lc', line: open.line, template: first, qualifiers };
    }

    const elements = [first];
    while (this.accept(',')) elements.push(this.parseExpr());
    const tail: Expr = this.accept('|') ? this.parseExpr() : { type: 'nil', line: open.line };
    this.expect(']');

    let result = tail;
    for (let i = elements.length - 1; i >= 0; i--) {
      result = { type: 'cons', line: elements[i].line, head: elements[i], tail: result };
    }
    return result;
  }

  private parseBitString(): Expr {
    const open = this.expect('<<');
    const segments: BinarySegment[] = [];
    if (!this.is('>>')) {
      do {
        segments.push(this.parseBinarySegment());
      } while (this.accept(','));
    }
    this.expect('>>');
    return { type: 'bin', line: open.line, segments };
  }

  private parseBinarySegment(): BinarySegment {
    const tok = this.peek();
    let value: Expr;
    if ((tok.kind === 'punct' || tok.kind === 'keyword') && PREFIX_OPERATORS.has(tok.text)) {
      this.next();
      value = { type: 'unop', line: tok.line, op: tok.text, operand: this.parsePrimary() };
    } else {
      value = this.parsePrimary();
    }
    const segment: BinarySegment = { value, types: [] };
    if (this.accept(':')) {
      segment.size = this.parsePrimary();
    }
    if (this.accept('/')) {
      do {
        let type = this.expectKind('atom').value;
        if (this.accept(':')) type += `:${this.expectKind('integer').value}`;
        segment.types.push(type);
      } while (this.accept('-'));
    }
    return segment;
  }

  private parseMap(line: number, base?: Expr): Expr {
    this.expect('{');
    const assocs: MapAssoc[] = [];
    if (!this.is('}')) {
      do {
        const key = this.parseExpr();
        let exact: boolean;
        if (this.accept('=>')) {
          exact = false;
        } else {
          this.expect(':=');
          exact = true;
        }
        assocs.push({ key, value: this.parseExpr(), exact });
      } while (this.accept(','));
    }
    this.expect('}');
    return { type: 'map', line, base, assocs };
  }

  private parseRecordFields(): RecordFieldInit[] {
    this.expect('{');
    const fields: RecordFieldInit[] = [];
    if (!this.is('}')) {
      do {
        const tok = this.next();
        if (tok.kind !== 'atom' && !(tok.kind === 'var' && tok.value === '_')) {
          throw new ParseError(`Expected record field name but found '${tok.text}'`, tok.line);
        }
        this.expect('=');
        fields.push({ line: tok.line, field: tok.value, value: this.parseExpr() });
      } while (this.accept(','));
    }
    this.expect('}');
    return fields;
  }
}

/** Parse a whole module source. */
export function parseModule(source: string): ModuleForms {
  return new Parser(tokenize(source), source).parseModule();
}

/**
 * Parse a comma-separated expression sequence, optionally terminated by a
 * dot, e.g. `"X + 1, {ok, Y}"`.
 */
export function parseExpressions(text: string): Expr[] {
  return new Parser(tokenize(text), text).parseSequence();
}

/** Parse exactly one expression. */
export function parseExpression(text: string): Expr {
  const exprs = parseExpressions(text);
  if (exprs.length !== 1) {
    throw new ParseError(`Expected a single expression, got ${exprs.length}`, 1);
  }
  return exprs[0];
}
