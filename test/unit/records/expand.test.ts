import { describe, it, expect, beforeEach } from 'vitest';
import { RecordExpander, isRecordSyntax } from '../../../src/records/expand.js';
import { RecordStore } from '../../../src/records/store.js';
import { parseExpression } from '../../../src/syntax/parser.js';
import { printExpr } from '../../../src/syntax/printer.js';
import type { Expr } from '../../../src/syntax/ast.js';
import { fixtureCatalog } from '../../helpers/fixtures.js';

describe('RecordExpander', () => {
  let store: RecordStore;
  let expander: RecordExpander;

  const expand = (text: string, pattern = false) => printExpr(expander.expand(parseExpression(text), pattern));

  beforeEach(async () => {
    store = new RecordStore(fixtureCatalog('shapes'));
    await store.load('shapes');
    expander = new RecordExpander(store);
  });

  describe('construction', () => {
    it('should fill unmentioned fields with their defaults', () => {
      expect(expand('#point{x = 1}')).toBe('{point, 1, 0}');
      expect(expand('#point{}')).toBe('{point, 0, 0}');
    });

    it('should expand record defaults and use undefined for fields without one', () => {
      expect(expand('#segment{}')).toBe('{segment, {point, 0, 0}, undefined}');
    });

    it('should apply the _ initializer to every unmentioned field', () => {
      expect(expand('#point{y = 2, _ = 7}')).toBe('{point, 7, 2}');
    });

    it('should match anything for unmentioned fields in patterns', () => {
      expect(expand('#point{x = X}', true)).toBe('{point, X, _}');
    });

    it('should expand records nested in other expressions', () => {
      expect(expand('[#point{x = #point.y} | T]')).toBe('[{point, 3, 0} | T]');
    });
  });

  describe('update, access and index', () => {
    it('should turn an update into nested setelement calls', () => {
      expect(expand('P#point{x = 1, y = 2}')).toBe('setelement(3, setelement(2, P, 1), 2)');
    });

    it('should turn field access into element', () => {
      expect(expand('P#point.y')).toBe('element(3, P)');
      expect(expand('(P#segment.from)#point.x')).toBe('element(2, element(2, P))');
    });

    it('should turn a field index into its tuple position', () => {
      expect(expand('#point.x')).toBe('2');
      expect(expand('#segment.to')).toBe('3');
    });
  });

  describe('unresolved records', () => {
    it('should leave a record without definition as written', () => {
      expect(expand('#line{a = 1}')).toBe('#line{a = 1}');
      expect(expand('L#line.a')).toBe('L#line.a');
    });

    it('should leave a record with an unknown field as written', () => {
      expect(expand('#point{z = 1}')).toBe('#point{z = 1}');
      expect(expand('#point.z')).toBe('#point.z');
    });

    it('should still expand known records inside an unresolved one', () => {
      expect(expand('#line{a = #point{}}')).toBe('#line{a = {point, 0, 0}}');
    });

    it('should stop expanding once definitions are forgotten', async () => {
      await store.forgetAll();
      expect(expand('#point{x = 1}')).toBe('#point{x = 1}');
    });
  });

  describe('expandNode', () => {
    it('should pass subexpressions through the supplied rewriter', () => {
      const expr = parseExpression('#point{x = X}');
      expect(isRecordSyntax(expr)).toBe(true);
      if (!isRecordSyntax(expr)) return;

      const rewrite = (e: Expr): Expr => (e.type === 'var' ? { type: 'integer', line: e.line, value: 5n } : e);
      expect(printExpr(expander.expandNode(expr, rewrite, false))).toBe('{point, 5, 0}');
    });
  });
});
