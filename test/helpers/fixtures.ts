/**
 * Test helpers: fixture modules and stop-event builders.
 */

import { readFileSync } from 'fs';
import { dirname, join } from 'path';
import { fileURLToPath } from 'url';
import type { BreakAt } from '../../src/debugger/types.js';
import { ModuleCatalog } from '../../src/source/catalog.js';
import { InMemorySourceLocator } from '../../src/source/locator.js';
import { parseExpression } from '../../src/syntax/parser.js';
import { termFromExpr, type Term } from '../../src/syntax/terms.js';
import type { Bindings } from '../../src/trace/types.js';

export const FIXTURES_DIR = join(dirname(fileURLToPath(import.meta.url)), '..', 'fixtures');

export function loadFixture(name: string): string {
  return readFileSync(join(FIXTURES_DIR, name), 'utf-8');
}

/** Catalog over the named `test/fixtures/<module>.erl` files. */
export function fixtureCatalog(...modules: string[]): ModuleCatalog {
  const locator = new InMemorySourceLocator();
  for (const module of modules) {
    locator.set(module, loadFixture(`${module}.erl`));
  }
  return new ModuleCatalog(locator);
}

/** Bindings from term text, e.g. `{ X: '2', L: '[1, 2]' }`. */
export function bindings(values: Record<string, string> = {}): Bindings {
  return new Map(
    Object.entries(values).map(([name, text]): [string, Term] => [name, termFromExpr(parseExpression(text))]),
  );
}

export function breakAt(
  module: string,
  fn: string,
  arity: number,
  line: number,
  depth: number,
  values: Record<string, string> = {},
): BreakAt {
  return { type: 'break_at', module, function: fn, arity, line, depth, bindings: bindings(values) };
}
