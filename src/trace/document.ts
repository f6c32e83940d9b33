import { UnsupportedExpressionError } from '../core/errors.js';
import { getLogger } from '../core/logger.js';
import type { RenderOptions } from '../core/types.js';
import { printAtom } from '../syntax/printer.js';
import type { RecordLookup } from '../records/store.js';
import type { CallTree } from './call-tree.js';
import { indentBlock, indentPrefix, renderFunction } from './substitute.js';
import { formatKey, type CallKey, type TraceNode } from './types.js';

export const BANNER_TITLE = '%% ========== Generated by RTE ==========';

export function renderBanner(entry: CallKey, result: string): string {
  return `${BANNER_TITLE}\n%% ${formatKey(entry)} ---> ${result}\n\n`;
}

export function renderHeader(key: CallKey, prefix: string): string {
  const mfa = `{${printAtom(key.module)}, ${printAtom(key.function)}, ${key.arity}}`;
  return `${prefix}%% MFA   : ${mfa}:\n${prefix}%% Level : ${key.depth}\n`;
}

/**
 * Rendered text of one trace node. A function the substitution cannot handle
 * is shown as its original source.
 */
export function renderNode(node: TraceNode, records: RecordLookup, render: RenderOptions): string {
  if (!node.key || !node.form) return '';
  const prefix = indentPrefix(node.key.depth, render);
  try {
    return renderFunction(node.form, node.clauses, node.bindings, { records, depth: node.key.depth, render });
  } catch (err) {
    if (!(err instanceof UnsupportedExpressionError)) throw err;
    getLogger().warn(
      { call: formatKey(node.key), expression: err.expressionType, line: err.line },
      'Falling back to original source',
    );
    return indentBlock(node.form.text, prefix);
  }
}

export interface DocumentOptions {
  records: RecordLookup;
  render: RenderOptions;
  /** Call that started the run and its printed outcome, for the banner. */
  entry?: CallKey;
  result?: string;
}

/** The reconstruction document: every node in pre-order with its header. */
export function buildDocument(tree: CallTree, options: DocumentOptions): string {
  let document = '';
  if (options.render.banner && options.entry && options.result !== undefined) {
    document += renderBanner(options.entry, options.result);
  }
  for (const node of tree.preorder()) {
    if (!node.key) continue;
    document += renderHeader(node.key, indentPrefix(node.key.depth, options.render));
    document += `${renderNode(node, options.records, options.render)}\n`;
  }
  return document;
}
