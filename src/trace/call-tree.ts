/**
 * CallTree — incremental call-tree builder.
 *
 * Turns the stream of breakpoint stops of one run into a tree of trace nodes.
 * Nodes live in an arena addressed by index; `parent` and `children` hold
 * indices. The node executing right now is found by following `isCurrent`
 * children down from the root, and every node on that path is current.
 */

import type { FunctionForm } from '../syntax/ast.js';
import { TraceCorruptionError } from '../core/errors.js';
import { getLogger } from '../core/logger.js';
import { clauseAt, countTouched, extractClauseStructure, isRepeatPass, markReached } from './clauses.js';
import { formatKey, keysEqual, nodeDepth, type Bindings, type CallKey, type TraceNode } from './types.js';

/** Supplies the definition a new node renders; fetched once per node. */
export type FormProvider = (key: CallKey) => Promise<FunctionForm>;

export type UpdateAction = 'child' | 'sibling' | 'repeat' | 'in_place' | 'top_level';

export interface UpdateOutcome {
  node: TraceNode;
  action: UpdateAction;
}

export class CallTree {
  private nodes: TraceNode[] = [];

  constructor(private readonly resolveForm: FormProvider) {
    this.nodes.push({
      id: 0,
      key: null,
      line: 0,
      bindings: new Map(),
      form: null,
      clauses: [],
      isCurrent: true,
      parent: null,
      children: [],
    });
  }

  get root(): TraceNode {
    return this.nodes[0];
  }

  /** Number of call nodes, not counting the root. */
  get size(): number {
    return this.nodes.length - 1;
  }

  childrenOf(node: TraceNode): TraceNode[] {
    return node.children.map((id) => this.nodes[id]);
  }

  /** The deepest node on the current path. */
  current(): TraceNode {
    let node = this.root;
    while (true) {
      const next = this.childrenOf(node).find((child) => child.isCurrent);
      if (!next) return node;
      node = next;
    }
  }

  /** Call nodes in document order: each node before its children. */
  preorder(): TraceNode[] {
    const out: TraceNode[] = [];
    const stack = [...this.root.children].reverse();
    while (stack.length > 0) {
      const id = stack.pop();
      if (id === undefined) break;
      const node = this.nodes[id];
      out.push(node);
      for (let i = node.children.length - 1; i >= 0; i--) stack.push(node.children[i]);
    }
    return out;
  }

  /**
   * Apply one breakpoint stop. Starting from the current node, walks up
   * until the event's depth places it, then appends a node or updates the
   * matching one in place.
   */
  async update(key: CallKey, line: number, bindings: Bindings): Promise<UpdateOutcome> {
    let node = this.current();

    while (true) {
      if (node.key === null) {
        const top = this.childrenOf(node);
        if (top.length > 0 && key.depth < nodeDepth(top[0])) {
          throw new TraceCorruptionError(`Return to depth ${key.depth} above the traced call`, line, key);
        }
        return { node: await this.append(node, key, line, bindings), action: 'top_level' };
      }

      if (keysEqual(node.key, key)) {
        if (!clauseAt(node.clauses, line)) {
          throw new TraceCorruptionError('Line outside the function clauses', line, key);
        }
        if (isRepeatPass(node.clauses, node.line, line)) {
          return { node: await this.append(this.parentOf(node), key, line, bindings), action: 'repeat' };
        }
        node.line = line;
        node.bindings = bindings;
        node.clauses = markReached(node.clauses, line);
        this.makeCurrent(node);
        getLogger().trace({ id: node.id, line, touched: countTouched(node.clauses) }, 'Trace node advanced');
        return { node, action: 'in_place' };
      }

      if (key.depth > node.key.depth) {
        return { node: await this.append(node, key, line, bindings), action: 'child' };
      }
      if (key.depth === node.key.depth) {
        return { node: await this.append(this.parentOf(node), key, line, bindings), action: 'sibling' };
      }

      node = this.parentOf(node);
    }
  }

  private parentOf(node: TraceNode): TraceNode {
    if (node.parent === null) {
      throw new TraceCorruptionError('Walked above the root', node.line, node.key ?? undefined);
    }
    return this.nodes[node.parent];
  }

  private async append(parent: TraceNode, key: CallKey, line: number, bindings: Bindings): Promise<TraceNode> {
    // Resolve before touching the tree so a failed lookup leaves it intact
    const form = await this.resolveForm(key);
    const structure = extractClauseStructure(form);
    if (!clauseAt(structure, line)) {
      throw new TraceCorruptionError('Line outside the function clauses', line, key);
    }

    this.clearSubtree(parent);
    const node: TraceNode = {
      id: this.nodes.length,
      key: { ...key },
      line,
      bindings,
      form,
      clauses: markReached(structure, line),
      isCurrent: true,
      parent: parent.id,
      children: [],
    };
    this.nodes.push(node);
    parent.children.push(node.id);
    this.markPath(parent);

    getLogger().debug({ id: node.id, parent: parent.id, call: formatKey(key), depth: key.depth, line }, 'Trace node added');
    return node;
  }

  private makeCurrent(node: TraceNode): void {
    this.clearSubtree(node);
    node.isCurrent = true;
    this.markPath(node);
  }

  /** Sets `isCurrent` on `node` and all its ancestors. */
  private markPath(node: TraceNode): void {
    let cur: TraceNode | undefined = node;
    while (cur) {
      cur.isCurrent = true;
      cur = cur.parent === null ? undefined : this.nodes[cur.parent];
    }
  }

  /** Clears `isCurrent` on every descendant of `node`. */
  private clearSubtree(node: TraceNode): void {
    for (const child of this.childrenOf(node)) {
      child.isCurrent = false;
      this.clearSubtree(child);
    }
  }
}
