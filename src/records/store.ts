/**
 * Record definition store.
 *
 * Holds field layouts by record name for the lifetime of a session. Loading
 * a module merges its definitions in; nothing is cleared implicitly.
 */

import { AsyncMutex } from '../core/mutex.js';
import { UnresolvedRecordError } from '../core/errors.js';
import { getLogger } from '../core/logger.js';
import { forEachChild, type Expr, type RecordDefForm } from '../syntax/ast.js';
import type { ModuleCatalog } from '../source/catalog.js';

export interface RecordField {
  name: string;
  default?: Expr;
}

export interface RecordDefinition {
  name: string;
  fields: RecordField[];
  module: string;
  line: number;
}

/** Read access used by record expansion. */
export interface RecordLookup {
  get(name: string): RecordDefinition | undefined;
}

function referencedRecords(def: RecordDefinition): Set<string> {
  const names = new Set<string>();
  const walk = (expr: Expr): void => {
    if (expr.type === 'record' || expr.type === 'record_field' || expr.type === 'record_index') {
      names.add(expr.name);
    }
    forEachChild(expr, walk);
  };
  for (const field of def.fields) {
    if (field.default) walk(field.default);
  }
  names.delete(def.name);
  return names;
}

/**
 * Orders definitions so that a record used in another record's field
 * defaults comes first. Otherwise input order is kept.
 */
export function orderByDependency(defs: RecordDefinition[]): RecordDefinition[] {
  const byName = new Map(defs.map((d): [string, RecordDefinition] => [d.name, d]));
  const ordered: RecordDefinition[] = [];
  const visited = new Set<string>();

  const visit = (def: RecordDefinition): void => {
    if (visited.has(def.name)) return;
    visited.add(def.name);
    for (const dep of referencedRecords(def)) {
      const target = byName.get(dep);
      if (target) visit(target);
    }
    ordered.push(def);
  };

  defs.forEach(visit);
  return ordered;
}

export class RecordStore implements RecordLookup {
  private records = new Map<string, RecordDefinition>();
  private lock = new AsyncMutex();

  constructor(private readonly catalog: ModuleCatalog) {}

  /**
   * Read the `-record` declarations of `module` into the store.
   * Returns the sorted names the module declares.
   */
  async load(module: string): Promise<string[]> {
    const forms = await this.catalog.getRecordDefinitions(module);
    const defs = orderByDependency(forms.map((form) => toDefinition(form, module)));

    return this.lock.withLock(() => {
      for (const def of defs) {
        // Re-insert so a reloaded definition moves after its dependencies
        this.records.delete(def.name);
        this.records.set(def.name, def);
      }
      const names = [...new Set(defs.map((d) => d.name))].sort();
      getLogger().debug({ module, records: names }, 'Loaded record definitions');
      return names;
    });
  }

  /** All stored names, dependencies first. */
  list(): string[] {
    return orderByDependency([...this.records.values()]).map((d) => d.name);
  }

  get(name: string): RecordDefinition | undefined {
    return this.records.get(name);
  }

  require(name: string): RecordDefinition {
    const def = this.records.get(name);
    if (!def) throw new UnresolvedRecordError(name);
    return def;
  }

  get size(): number {
    return this.records.size;
  }

  async forget(name: string): Promise<'ok' | 'not_found'> {
    return this.lock.withLock((): 'ok' | 'not_found' => {
      if (!this.records.delete(name)) return 'not_found';
      getLogger().debug({ record: name }, 'Forgot record definition');
      return 'ok';
    });
  }

  async forgetAll(): Promise<'ok'> {
    return this.lock.withLock((): 'ok' => {
      const count = this.records.size;
      this.records.clear();
      getLogger().debug({ count }, 'Forgot all record definitions');
      return 'ok';
    });
  }
}

function toDefinition(form: RecordDefForm, module: string): RecordDefinition {
  return {
    name: form.name,
    fields: form.fields.map((f) => (f.default ? { name: f.name, default: f.default } : { name: f.name })),
    module,
    line: form.line,
  };
}
