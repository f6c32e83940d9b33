import { FunctionNotFoundError } from '../core/errors.js';
import { getLogger } from '../core/logger.js';
import { forEachChild, type Expr, type FunExpr, type FunctionForm, type ModuleForms, type RecordDefForm } from '../syntax/ast.js';
import { parseModule } from '../syntax/parser.js';
import { printExpr } from '../syntax/printer.js';
import type { SourceLocator } from './locator.js';

/** `-Parent/Arity-fun-N-`, the name a debugger reports for an anonymous fun. */
const LAMBDA_NAME = /^-(.+)\/(\d+)-fun-(\d+)-$/;

export interface LambdaName {
  parent: string;
  parentArity: number;
  index: number;
}

export function parseLambdaName(name: string): LambdaName | null {
  const match = LAMBDA_NAME.exec(name);
  if (!match) return null;
  return { parent: match[1], parentArity: Number(match[2]), index: Number(match[3]) };
}

/** Anonymous funs anywhere in a function, ordered by line. */
export function collectFuns(form: FunctionForm): FunExpr[] {
  const funs: FunExpr[] = [];
  const walk = (expr: Expr): void => {
    if (expr.type === 'fun') funs.push(expr);
    forEachChild(expr, walk);
  };
  for (const clause of form.clauses) {
    clause.guards.forEach((conj) => conj.forEach(walk));
    clause.body.forEach(walk);
  }
  // Array.prototype.sort is stable, so funs on one line keep source order
  return funs.sort((a, b) => a.line - b.line);
}

/**
 * Parsed modules by name. Each module is read and parsed once.
 */
export class ModuleCatalog {
  private modules = new Map<string, ModuleForms>();

  constructor(private readonly locator: SourceLocator) {}

  async getModule(module: string): Promise<ModuleForms> {
    const cached = this.modules.get(module);
    if (cached) return cached;

    const source = await this.locator.locate(module);
    const parsed = parseModule(source);
    this.modules.set(module, parsed);
    getLogger().debug({ module, forms: parsed.forms.length }, 'Parsed module');
    return parsed;
  }

  /**
   * The definition of `module:fn/arity`. Lambda names resolve to the
   * anonymous fun they denote, presented as a function of that name.
   */
  async getFunction(module: string, fn: string, arity: number): Promise<FunctionForm> {
    const lambda = parseLambdaName(fn);
    if (lambda) {
      return this.getLambda(module, fn, lambda);
    }

    const { forms } = await this.getModule(module);
    const form = forms.find((f): f is FunctionForm => f.type === 'function' && f.name === fn && f.arity === arity);
    if (!form) throw new FunctionNotFoundError(module, fn, arity);
    return form;
  }

  async getRecordDefinitions(module: string): Promise<RecordDefForm[]> {
    const { forms } = await this.getModule(module);
    return forms.filter((f): f is RecordDefForm => f.type === 'record_def');
  }

  /** Drop cached parses so the next lookup re-reads the source. */
  invalidate(module?: string): void {
    if (module === undefined) {
      this.modules.clear();
    } else {
      this.modules.delete(module);
    }
  }

  private async getLambda(module: string, name: string, lambda: LambdaName): Promise<FunctionForm> {
    const parent = await this.getFunction(module, lambda.parent, lambda.parentArity);
    const fun = collectFuns(parent)[lambda.index];
    if (!fun) {
      throw new FunctionNotFoundError(module, name, lambda.parentArity);
    }
    return {
      type: 'function',
      line: fun.line,
      endLine: parent.endLine,
      name,
      arity: fun.clauses[0]?.patterns.length ?? 0,
      clauses: fun.clauses,
      text: printExpr(fun),
    };
  }
}
