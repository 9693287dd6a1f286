/**
 * Resolution Scopes
 *
 * Scopes form a tree held in an arena: each node knows its parent by index
 * and carries its own module source. A scope handle is only meaningful in
 * the arena that created it.
 */

import * as path from 'path';
import { DirectoryModuleSource, type ModuleSource } from './sources.js';

export interface ResolutionScope {
  readonly index: number;
  readonly name: string;
}

interface ScopeNode {
  scope: ResolutionScope;
  parent: number | null;
  source: ModuleSource;
}

export class ScopeArena {
  private readonly nodes: ScopeNode[] = [];

  /**
   * Create a scope. Without a parent it becomes a root.
   */
  createScope(name: string, source: ModuleSource, parent?: ResolutionScope): ResolutionScope {
    if (parent) this.node(parent);

    const scope: ResolutionScope = Object.freeze({ index: this.nodes.length, name });
    this.nodes.push({ scope, parent: parent ? parent.index : null, source });
    return scope;
  }

  parentOf(scope: ResolutionScope): ResolutionScope | undefined {
    const parent = this.node(scope).parent;
    return parent === null ? undefined : this.nodes[parent].scope;
  }

  sourceOf(scope: ResolutionScope): ModuleSource {
    return this.node(scope).source;
  }

  /** Scopes from the root down to the given one */
  chain(scope: ResolutionScope): ResolutionScope[] {
    const result: ResolutionScope[] = [];
    for (let s: ResolutionScope | undefined = scope; s; s = this.parentOf(s)) {
      result.unshift(s);
    }
    return result;
  }

  contains(scope: ResolutionScope): boolean {
    return this.nodes[scope.index]?.scope === scope;
  }

  get size(): number {
    return this.nodes.length;
  }

  private node(scope: ResolutionScope): ScopeNode {
    const node = this.nodes[scope.index];
    if (!node || node.scope !== scope) {
      throw new Error(`Scope ${scope.name} does not belong to this arena`);
    }
    return node;
  }
}

/**
 * Build a linear chain of directory scopes. The first path becomes the
 * root; the scope of the last path is returned.
 */
export function scopeChainFromPaths(arena: ScopeArena, paths: readonly string[]): ResolutionScope {
  if (paths.length === 0) {
    throw new Error('At least one scope path is required');
  }

  let scope: ResolutionScope | undefined;
  for (const dir of paths) {
    const root = path.resolve(dir);
    scope = arena.createScope(root, new DirectoryModuleSource(root), scope);
  }
  // paths is non-empty, so the loop ran
  if (!scope) throw new Error('At least one scope path is required');
  return scope;
}
