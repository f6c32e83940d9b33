import { describe, it, expect, beforeEach } from 'vitest';
import {
  indentBlock,
  indentPrefix,
  renderFunction,
  substituteFunction,
  type RenderFunctionOptions,
} from '../../../src/trace/substitute.js';
import { extractClauseStructure, markReached } from '../../../src/trace/clauses.js';
import { RecordStore } from '../../../src/records/store.js';
import { parseModule } from '../../../src/syntax/parser.js';
import { printFunction } from '../../../src/syntax/printer.js';
import type { ModuleCatalog } from '../../../src/source/catalog.js';
import type { FunctionForm } from '../../../src/syntax/ast.js';
import type { Term } from '../../../src/syntax/terms.js';
import type { Bindings, ClauseNode } from '../../../src/trace/types.js';
import { bindings, fixtureCatalog } from '../../helpers/fixtures.js';

function reach(form: FunctionForm, lines: number[]): ClauseNode[] {
  return lines.reduce((clauses, line) => markReached(clauses, line), extractClauseStructure(form));
}

describe('renderFunction', () => {
  let catalog: ModuleCatalog;
  let records: RecordStore;

  const render = async (
    module: string,
    name: string,
    arity: number,
    lines: number[],
    values: Bindings | Record<string, string>,
    options: Partial<RenderFunctionOptions> = {},
  ): Promise<string> => {
    const form = await catalog.getFunction(module, name, arity);
    const vars = values instanceof Map ? values : bindings(values);
    return renderFunction(form, reach(form, lines), vars, { records, ...options });
  };

  beforeEach(async () => {
    catalog = fixtureCatalog('scenarios', 'shapes', 'misc');
    records = new RecordStore(catalog);
    await records.load('shapes');
  });

  // ---------------------------------------------------------------------------
  // Variables
  // ---------------------------------------------------------------------------

  describe('variables', () => {
    it('should substitute the values bound at the last stop', async () => {
      expect(await render('scenarios', 'f', 1, [5, 6], { X: '2', Y: '3' })).toBe(
        'f(2) ->\n    Y = 2 + 1,\n    3.',
      );
    });

    it('should leave variables without a value as written', async () => {
      expect(await render('scenarios', 'f', 1, [5], { X: '2' })).toBe('f(2) ->\n    Y = 2 + 1,\n    Y.');
      expect(await render('scenarios', 'f', 1, [5], {})).toBe('f(X) ->\n    Y = X + 1,\n    Y.');
    });

    it('should write opaque values as tagged strings', async () => {
      const vars = new Map<string, Term>([['State', { type: 'pid', value: '<0.85.0>' }]]);
      expect(await render('misc', 'server', 1, [29], vars)).toBe(
        'server("pid: <0.85.0>") ->\n' +
          '    Handler = fun(Msg) -> {"pid: <0.85.0>", Msg} end,\n' +
          '    Handler(ping).',
      );
    });

    it('should not substitute a fun parameter that shadows an outer variable', async () => {
      expect(await render('scenarios', 'apply_all', 2, [24], { X: '5', Xs: '[1, 2]' })).toBe(
        'apply_all(5, [1, 2]) ->\n    lists:map(fun(X) -> X * 2 end, [1, 2]) ++ [5].',
      );
    });

    it('should not substitute comprehension variables bound by a generator', async () => {
      expect(await render('misc', 'evens', 1, [26], { Xs: '[1, 2, 3, 4]', X: '4' })).toBe(
        'evens([1, 2, 3, 4]) ->\n    [X || X <- [1, 2, 3, 4], X rem 2 =:= 0].',
      );
    });
  });

  // ---------------------------------------------------------------------------
  // Touched and untouched clauses
  // ---------------------------------------------------------------------------

  describe('clauses', () => {
    it('should rewrite only the branch that was taken', async () => {
      expect(await render('scenarios', 'fact', 2, [9, 13], { N: '3', Acc: '1' })).toBe(
        [
          'fact(3, 1) ->',
          '    case 3 of',
          '        0 ->',
          '            Acc;',
          '        _ ->',
          '            fact(3 - 1, 1 * 3)',
          '    end.',
        ].join('\n'),
      );
    });

    it('should emit untouched function clauses as written', async () => {
      expect(await render('scenarios', 'classify', 1, [27], { X: '5' })).toBe(
        [
          'classify(5) when 5 > 0 ->',
          '    positive;',
          'classify(X) ->',
          '    if',
          '        X < 0 ->',
          '            negative;',
          '        true ->',
          '            zero',
          '    end.',
        ].join('\n'),
      );
    });

    it('should keep the original clause objects for untouched clauses', async () => {
      const form = await catalog.getFunction('scenarios', 'classify', 1);
      const result = substituteFunction(form, reach(form, [27]), bindings({ X: '5' }), records);
      expect(result.clauses[1]).toBe(form.clauses[1]);
      expect(result.clauses[0]).not.toBe(form.clauses[0]);
    });

    it('should rewrite the received message clause', async () => {
      expect(await render('misc', 'wait', 1, [5, 7], { Ref: 'r1', Reply: '42' })).toBe(
        [
          'wait(r1) ->',
          '    receive',
          '        {r1, 42} ->',
          '            42',
          '    after',
          '        1000 ->',
          '            timeout',
          '    end.',
        ].join('\n'),
      );
    });

    it('should leave the message clause alone when the receive timed out', async () => {
      expect(await render('misc', 'wait', 1, [5, 9], { Ref: 'r1' })).toBe(
        [
          'wait(r1) ->',
          '    receive',
          '        {Ref, Reply} ->',
          '            Reply',
          '    after',
          '        1000 ->',
          '            timeout',
          '    end.',
        ].join('\n'),
      );
    });

    it('should rewrite the catch clause that handled the error', async () => {
      expect(await render('misc', 'safe_div', 2, [13, 18], { A: '1', B: '0' })).toBe(
        [
          'safe_div(1, 0) ->',
          '    try',
          '        1 div 0',
          '    of',
          '        Q ->',
          '            {ok, Q}',
          '    catch',
          '        error:badarith ->',
          '            {error, 0}',
          '    end.',
        ].join('\n'),
      );
    });
  });

  // ---------------------------------------------------------------------------
  // Records
  // ---------------------------------------------------------------------------

  describe('records', () => {
    it('should expand record construction with stored defaults', async () => {
      expect(await render('shapes', 'make', 1, [8], { X: '1' })).toBe('make(1) ->\n    {point, 1, 0}.');
    });

    it('should expand record update and field access', async () => {
      expect(await render('shapes', 'move', 2, [11], { P: '{point, 1, 2}', Dx: '3' })).toBe(
        'move({point, 1, 2}, 3) ->\n    setelement(2, {point, 1, 2}, element(2, {point, 1, 2}) + 3).',
      );
    });

    it('should expand a record pattern on the left of a match', async () => {
      expect(await render('shapes', 'norm', 1, [14, 15], { P: '{point, 3, 4}', X: '3', Y: '4' })).toBe(
        'norm({point, 3, 4}) ->\n    {point, X, Y} = {point, 3, 4},\n    3 * 3 + 4 * 4.',
      );
    });

    it('should expand a field index', async () => {
      expect(await render('shapes', 'x_index', 0, [18], {})).toBe('x_index() ->\n    2.');
    });

    it('should leave records as written once their definitions are forgotten', async () => {
      await records.forgetAll();
      expect(await render('shapes', 'make', 1, [8], { X: '1' })).toBe('make(1) ->\n    #point{x = 1}.');
    });
  });

  // ---------------------------------------------------------------------------
  // Layout
  // ---------------------------------------------------------------------------

  describe('indentation', () => {
    it('should indent every line by call depth', async () => {
      expect(await render('scenarios', 'f', 1, [6], { X: '2', Y: '3' }, { depth: 3 })).toBe(
        '        f(2) ->\n            Y = 2 + 1,\n            3.',
      );
    });

    it('should use the configured indent unit and width', async () => {
      const options = { depth: 2, render: { indentUnit: '.', indentWidth: 1 } };
      expect(await render('scenarios', 'f', 1, [6], { X: '2', Y: '3' }, options)).toBe(
        '.f(2) ->\n.    Y = 2 + 1,\n.    3.',
      );
    });

    it('should compute prefixes from depth', () => {
      const unit = { indentUnit: ' ', indentWidth: 4 };
      expect(indentPrefix(0, unit)).toBe('');
      expect(indentPrefix(1, unit)).toBe('');
      expect(indentPrefix(2, unit)).toBe('    ');
      expect(indentBlock('a\nb', '> ')).toBe('> a\n> b');
    });
  });

  describe('maps and binaries', () => {
    it('should substitute into map constructions', async () => {
      expect(await render('misc', 'lookup', 2, [22, 23], { Key: 'a', Value: '1' })).toBe(
        'lookup(a, Map) ->\n    Value = maps:get(a, Map),\n    #{found => 1}.',
      );
    });

    it('should substitute map keys and leave an unbound base as written', async () => {
      expect(await render('misc', 'tag', 2, [48], { Key: 'a' })).toBe('tag(Map, a) ->\n    Map#{a => -1}.');
    });

    it('should substitute binary segment values', async () => {
      expect(await render('misc', 'frame', 2, [45], { Payload: '<<1, 200>>', Size: '-1' })).toBe(
        'frame(<<1, 200>>, -1) ->\n    <<(-1):16, (<<1, 200>>)/binary>>.',
      );
    });
  });

  describe('printed values', () => {
    const reprint = (text: string): string => {
      const form = parseModule(text).forms.find((f): f is FunctionForm => f.type === 'function');
      if (!form) throw new Error('No function in rendered text');
      return printFunction(form);
    };

    it('should keep integers beyond double precision exact', async () => {
      expect(
        await render('scenarios', 'fact', 2, [9, 13], { N: '5', Acc: '15511210043330985984000000' }),
      ).toBe(
        [
          'fact(5, 15511210043330985984000000) ->',
          '    case 5 of',
          '        0 ->',
          '            Acc;',
          '        _ ->',
          '            fact(5 - 1, 15511210043330985984000000 * 5)',
          '    end.',
        ].join('\n'),
      );
      expect(await render('misc', 'neg', 1, [33], { X: '9007199254740993' })).toBe('neg(9007199254740993) ->\n    -9007199254740993.');
    });

    it('should separate a negated negative value from its operator', async () => {
      const text = await render('misc', 'neg', 1, [33], { X: '-1' });

      expect(text).toBe('neg(-1) ->\n    - -1.');
      expect(reprint(text)).toBe(text);
    });

    it('should render text that parses back to the same function', async () => {
      const rendered = [
        await render('misc', 'describe', 3, [36, 37, 39], {
          Name: "'hello world'",
          Score: '15511210043330985984000000',
          Ratio: '-2.5',
          Label: "{'hello world', 15511210043330985984000000}",
        }),
        await render('misc', 'describe', 3, [36, 37, 41], {
          Name: '"a\\"b\\n"',
          Score: '-3',
          Ratio: '1.0e25',
        }),
        await render('misc', 'frame', 2, [45], { Payload: '<<"hi">>', Size: '-1' }),
        await render('misc', 'neg', 1, [33], { X: '-2.5' }),
        await render('scenarios', 'fact', 2, [9, 13], { N: '-9007199254740993', Acc: '1' }),
      ];

      for (const text of rendered) {
        expect(reprint(text)).toBe(text);
      }
      expect(rendered[0]).toBe(
        [
          "describe('hello world', 15511210043330985984000000, -2.5) ->",
          "    Label = {'hello world', 15511210043330985984000000},",
          '    case 15511210043330985984000000 > 0 of',
          '        true ->',
          "            {ok, {'hello world', 15511210043330985984000000}, -2.5 * 2.0, -15511210043330985984000000};",
          '        false ->',
          '            {error, Name}',
          '    end.',
        ].join('\n'),
      );
      expect(rendered[1]).toBe(
        [
          'describe("a\\"b\\n", -3, 1.0e25) ->',
          '    Label = {"a\\"b\\n", -3},',
          '    case -3 > 0 of',
          '        true ->',
          '            {ok, Label, Ratio * 2.0, -Score};',
          '        false ->',
          '            {error, "a\\"b\\n"}',
          '    end.',
        ].join('\n'),
      );
      expect(rendered[3]).toBe('neg(-2.5) ->\n    - -2.5.');
    });
  });
});
