import { describe, it, expect, vi } from 'vitest';
import { ModuleCatalog, collectFuns, parseLambdaName } from '../../../src/source/catalog.js';
import { InMemorySourceLocator } from '../../../src/source/locator.js';
import { FunctionNotFoundError, SourceNotFoundError } from '../../../src/core/errors.js';
import { fixtureCatalog } from '../../helpers/fixtures.js';

describe('parseLambdaName', () => {
  it('should split a lambda name into its parent and index', () => {
    expect(parseLambdaName('-server/1-fun-0-')).toEqual({ parent: 'server', parentArity: 1, index: 0 });
    expect(parseLambdaName('-handle_call/3-fun-12-')).toEqual({ parent: 'handle_call', parentArity: 3, index: 12 });
  });

  it('should reject plain function names', () => {
    expect(parseLambdaName('server')).toBeNull();
    expect(parseLambdaName('-server/x-fun-0-')).toBeNull();
  });
});

describe('ModuleCatalog', () => {
  it('should find a function by name and arity', async () => {
    const form = await fixtureCatalog('scenarios').getFunction('scenarios', 'outer', 1);

    expect(form.line).toBe(16);
    expect(form.endLine).toBe(18);
    expect(form.clauses).toHaveLength(1);
  });

  it('should reject an unknown function or arity', async () => {
    const catalog = fixtureCatalog('scenarios');

    await expect(catalog.getFunction('scenarios', 'f', 2)).rejects.toBeInstanceOf(FunctionNotFoundError);
    await expect(catalog.getFunction('scenarios', 'missing', 0)).rejects.toThrow('Function scenarios:missing/0 not found');
  });

  it('should report a module without source', async () => {
    await expect(fixtureCatalog().getModule('nowhere')).rejects.toBeInstanceOf(SourceNotFoundError);
  });

  it('should resolve a lambda name to its anonymous fun', async () => {
    const form = await fixtureCatalog('misc').getFunction('misc', '-server/1-fun-0-', 1);

    expect(form.name).toBe('-server/1-fun-0-');
    expect(form.arity).toBe(1);
    expect(form.line).toBe(29);
    expect(form.text).toBe('fun(Msg) -> {State, Msg} end');
  });

  it('should reject a lambda index past the funs of its parent', async () => {
    const catalog = fixtureCatalog('misc');
    await expect(catalog.getFunction('misc', '-server/1-fun-1-', 1)).rejects.toThrow(
      'Function misc:-server/1-fun-1-/1 not found',
    );
  });

  it('should list record definitions', async () => {
    const defs = await fixtureCatalog('shapes').getRecordDefinitions('shapes');
    expect(defs.map((d) => d.name)).toEqual(['point', 'segment']);
  });

  it('should parse each module once until invalidated', async () => {
    const locator = new InMemorySourceLocator({ m: 'a() -> 1.\n' });
    const locate = vi.spyOn(locator, 'locate');
    const catalog = new ModuleCatalog(locator);

    await catalog.getModule('m');
    await catalog.getFunction('m', 'a', 0);
    expect(locate).toHaveBeenCalledTimes(1);

    locator.set('m', 'a() -> 1.\nb() -> 2.\n');
    catalog.invalidate('m');
    await expect(catalog.getFunction('m', 'b', 0)).resolves.toMatchObject({ name: 'b', line: 2 });
    expect(locate).toHaveBeenCalledTimes(2);

    catalog.invalidate();
    await catalog.getModule('m');
    expect(locate).toHaveBeenCalledTimes(3);
  });
});

describe('collectFuns', () => {
  it('should collect anonymous funs in line order', async () => {
    const catalog = new ModuleCatalog(
      new InMemorySourceLocator({
        m: ['go(L) ->', '    F = fun(X) -> X end,', '    lists:map(fun(Y) -> Y + 1 end, lists:map(F, L)).', ''].join('\n'),
      }),
    );
    const form = await catalog.getFunction('m', 'go', 1);

    expect(collectFuns(form).map((fun) => fun.line)).toEqual([2, 3]);
  });
});
