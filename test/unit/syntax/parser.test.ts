import { describe, it, expect } from 'vitest';
import { parseExpression, parseExpressions, parseModule } from '../../../src/syntax/parser.js';
import { tokenize } from '../../../src/syntax/tokenizer.js';
import { ParseError } from '../../../src/core/errors.js';
import type { FunctionForm, RecordDefForm } from '../../../src/syntax/ast.js';
import { loadFixture } from '../../helpers/fixtures.js';

function functions(source: string): FunctionForm[] {
  return parseModule(source).forms.filter((f): f is FunctionForm => f.type === 'function');
}

describe('tokenize', () => {
  it('should track line numbers across comments and newlines', () => {
    const tokens = tokenize('a. % comment\n\nB');
    expect(tokens.map((t) => [t.kind, t.line])).toEqual([
      ['atom', 1],
      ['dot', 1],
      ['var', 3],
      ['eof', 3],
    ]);
  });

  it('should decode quoted atoms, chars and based integers', () => {
    const tokens = tokenize("'hello world' $\\n 16#FF");
    expect(tokens.slice(0, 3).map((t) => t.value)).toEqual(['hello world', '\n', '255']);
  });

  it('should decode based integers beyond double precision', () => {
    expect(tokenize('16#FFFFFFFFFFFFFFFFFF 2#101')[0].value).toBe('4722366482869645213695');
    expect(tokenize('2#101')[0].value).toBe('5');
  });

  it('should reject digits outside the base', () => {
    expect(() => tokenize('8#19')).toThrow("Digit '9' out of range for base 8 (line 1)");
    expect(() => tokenize('1#0')).toThrow('Invalid integer base 1 (line 1)');
  });

  it('should keep a dot inside a float or a record access', () => {
    const kinds = tokenize('1.5 R#r.f').map((t) => t.kind);
    expect(kinds).toEqual(['float', 'var', 'punct', 'atom', 'punct', 'atom', 'eof']);
  });

  it('should reject an unterminated string', () => {
    expect(() => tokenize('"abc')).toThrow(ParseError);
  });
});

describe('parseModule', () => {
  it('should read the module name and every function', () => {
    const module = parseModule(loadFixture('scenarios.erl'));
    expect(module.module).toBe('scenarios');
    expect(functions(loadFixture('scenarios.erl')).map((f) => `${f.name}/${f.arity}`)).toEqual([
      'f/1',
      'fact/2',
      'outer/1',
      'inner/1',
      'apply_all/2',
      'classify/1',
    ]);
  });

  it('should record the line span and source text of a function', () => {
    const [f] = functions(loadFixture('scenarios.erl'));
    expect(f.line).toBe(4);
    expect(f.endLine).toBe(6);
    expect(f.text).toBe('f(X) ->\n    Y = X + 1,\n    Y.');
  });

  it('should give each clause of a choice construct its own line', () => {
    const fact = functions(loadFixture('scenarios.erl'))[1];
    const body = fact.clauses[0].body[0];
    expect(body.type).toBe('case');
    if (body.type !== 'case') return;
    expect(body.clauses.map((c) => c.line)).toEqual([10, 12]);
  });

  it('should parse guards of function clauses', () => {
    const classify = functions(loadFixture('scenarios.erl'))[5];
    expect(classify.clauses).toHaveLength(2);
    expect(classify.clauses[0].guards).toHaveLength(1);
    expect(classify.clauses[0].guards[0][0]).toMatchObject({ type: 'binop', op: '>' });
    expect(classify.clauses[1].guards).toEqual([]);
  });

  it('should read record definitions with defaults and type annotations', () => {
    const records = parseModule(loadFixture('shapes.erl')).forms.filter(
      (f): f is RecordDefForm => f.type === 'record_def',
    );
    expect(records.map((r) => r.name)).toEqual(['point', 'segment']);
    expect(records[0].fields.map((f) => f.name)).toEqual(['x', 'y']);
    expect(records[0].fields[0].default).toMatchObject({ type: 'integer', value: 0n });
    expect(records[1].fields[0].default).toMatchObject({ type: 'record', name: 'point', fields: [] });
    expect(records[1].fields[1]).toEqual({ name: 'to', line: 5 });
  });

  it('should parse catch clauses as class:reason pairs', () => {
    const safeDiv = functions(loadFixture('misc.erl'))[1];
    const body = safeDiv.clauses[0].body[0];
    expect(body.type).toBe('try');
    if (body.type !== 'try') return;
    expect(body.clauses.map((c) => c.line)).toEqual([14]);
    expect(body.catchClauses[0].patterns[0]).toMatchObject({
      type: 'binop',
      op: ':',
      left: { type: 'atom', value: 'error' },
      right: { type: 'atom', value: 'badarith' },
    });
  });

  it('should parse the after branch of a receive', () => {
    const wait = functions(loadFixture('misc.erl'))[0];
    const body = wait.clauses[0].body[0];
    expect(body.type).toBe('receive');
    if (body.type !== 'receive') return;
    expect(body.after?.timeout).toMatchObject({ type: 'integer', value: 1000n, line: 8 });
  });

  it('should expand ?MODULE to the module name', () => {
    const [form] = functions('-module(m).\nname() -> ?MODULE.');
    expect(form.clauses[0].body[0]).toMatchObject({ type: 'atom', value: 'm' });
  });

  it('should reject clauses of another function inside a definition', () => {
    expect(() => parseModule('f(X) -> X;\ng(Y) -> Y.')).toThrow("Clause of 'g' inside definition of 'f'");
  });

  it('should reject clauses with different arities', () => {
    expect(() => parseModule('f(X) -> X;\nf(X, Y) -> Y.')).toThrow(ParseError);
  });
});

describe('parseExpressions', () => {
  it('should split a comma-separated sequence and accept a trailing dot', () => {
    const exprs = parseExpressions('1, {a, B}.');
    expect(exprs).toHaveLength(2);
    expect(exprs[1]).toMatchObject({ type: 'tuple', elements: [{ type: 'atom' }, { type: 'var', name: 'B' }] });
  });

  it('should return nothing for empty text', () => {
    expect(parseExpressions('   ')).toEqual([]);
  });

  it('should concatenate adjacent string literals', () => {
    expect(parseExpression('"ab" "cd"')).toMatchObject({ type: 'string', value: 'abcd' });
  });

  it('should bind multiplication tighter than addition', () => {
    expect(parseExpression('1 + 2 * 3')).toMatchObject({
      type: 'binop',
      op: '+',
      right: { type: 'binop', op: '*' },
    });
  });

  it('should read list comprehensions with generators and filters', () => {
    const lc = parseExpression('[X || X <- Xs, X > 1]');
    expect(lc).toMatchObject({
      type: 'lc',
      template: { type: 'var', name: 'X' },
      qualifiers: [{ type: 'generate' }, { type: 'binop', op: '>' }],
    });
  });

  it('should read record construction, update, access and index', () => {
    expect(parseExpression('#point{x = 1}')).toMatchObject({ type: 'record', name: 'point', fields: [{ field: 'x' }] });
    expect(parseExpression('P#point{y = 2}')).toMatchObject({ type: 'record', base: { type: 'var', name: 'P' } });
    expect(parseExpression('P#point.x')).toMatchObject({ type: 'record_field', name: 'point', field: 'x' });
    expect(parseExpression('#point.y')).toMatchObject({ type: 'record_index', name: 'point', field: 'y' });
  });

  it('should read function references', () => {
    expect(parseExpression('fun lists:reverse/1')).toEqual({
      type: 'fun_ref',
      line: 1,
      module: 'lists',
      name: 'reverse',
      arity: 1,
    });
  });

  it('should report the line of a syntax error', () => {
    expect(() => parseExpression('{a,\n b')).toThrow("Expected '}' but found 'eof' (line 2)");
  });

  it('should reject more than one expression where one is expected', () => {
    expect(() => parseExpression('a, b')).toThrow('Expected a single expression, got 2');
  });
});
