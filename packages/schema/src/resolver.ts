/**
 * Type Resolver
 *
 * Resolves qualified type names against a chain of resolution scopes. The
 * root is authoritative: a module is looked up in the root first and a
 * descendant is only consulted when every ancestor lacks the module.
 *
 * Each (module, scope) pair owns one memo slot holding the promise of its
 * load, so concurrent first callers share a single load.
 */

import {
  ExternalName,
  MissingModuleException,
  MissingTypeException,
  ResourceException,
  gatherReferences,
  requiresNativeForm,
  type ModuleDefinition,
  type TypeModel,
} from '@carp/protocol';
import { TraceCollector } from '@carp/trace';
import { parseModuleDescriptor } from './descriptor.js';
import type { ResolutionScope, ScopeArena } from './scopes.js';

// =============================================================================
// Records
// =============================================================================

/** Native binding of a type: the target it was generated for and its symbol */
export interface NativeHandle {
  readonly target: string;
  readonly symbol: string;
}

export interface TypeRecord {
  readonly name: ExternalName;
  readonly model: TypeModel;
  /** Null for types without a native declaration of their own */
  readonly native: NativeHandle | null;
  /** Scope whose module application defines the type */
  readonly scope: ResolutionScope;
}

/**
 * One scope's view of a module. Immutable; created at most once per
 * (module, scope).
 */
export interface ModuleApplication {
  readonly module: ExternalName;
  readonly target: string;
  readonly scope: ResolutionScope;
  readonly records: ReadonlyMap<string, TypeRecord>;
}

/**
 * Synchronous lookup of types already brought in by `resolveClosure`.
 */
export interface LinkContext {
  readonly scope: ResolutionScope;
  seek(name: ExternalName): TypeRecord;
}

export interface TypeResolverOptions {
  trace?: TraceCollector;
}

function applyModule(definition: ModuleDefinition, scope: ResolutionScope): ModuleApplication {
  const records = new Map<string, TypeRecord>();
  for (const [key, model] of definition.types) {
    const name = ExternalName.parse(key);
    records.set(key, Object.freeze({
      name,
      model,
      native: requiresNativeForm(model)
        ? Object.freeze({ target: definition.target, symbol: name.asClassName() })
        : null,
      scope,
    }));
  }
  return Object.freeze({ module: definition.name, target: definition.target, scope, records });
}

// =============================================================================
// Resolver
// =============================================================================

export class TypeResolver {
  private readonly trace: TraceCollector;
  /** Scope index → module name → load in flight or done */
  private readonly slots = new Map<number, Map<string, Promise<ModuleApplication | undefined>>>();
  /** Scope index → module name → settled load, null when absent */
  private readonly settled = new Map<number, Map<string, ModuleApplication | null>>();
  private readonly links = new Map<number, LinkContext>();

  constructor(readonly arena: ScopeArena, options: TypeResolverOptions = {}) {
    this.trace = options.trace ?? new TraceCollector({ component: 'carp.schema' });
  }

  /**
   * Resolve a type name starting at a scope.
   *
   * @throws MissingModuleException if no scope in the chain defines the module
   * @throws MissingTypeException if the module lacks the type
   * @throws ResourceException if a descriptor is unreadable or malformed
   */
  async resolve(typeName: ExternalName | string, scope: ResolutionScope): Promise<TypeRecord> {
    const name = typeof typeName === 'string' ? ExternalName.parse(typeName) : typeName;
    const moduleName = name.parent;
    if (!moduleName) {
      throw new MissingTypeException(name.toString(), true, `Type name ${name} has no module`);
    }

    const application = await this.findApplication(moduleName, scope);
    if (!application) {
      throw new MissingModuleException(name.toString(), moduleName.toString());
    }
    return this.recordOf(application, name);
  }

  /**
   * Look up a type among modules already loaded. Never loads anything.
   *
   * @throws MissingTypeException if the type is absent or its module has not
   * been resolved from this scope yet
   */
  lookup(typeName: ExternalName | string, scope: ResolutionScope): TypeRecord {
    const name = typeof typeName === 'string' ? ExternalName.parse(typeName) : typeName;
    const moduleName = name.parent;
    if (!moduleName) {
      throw new MissingTypeException(name.toString(), true, `Type name ${name} has no module`);
    }

    const key = moduleName.toString();
    for (const s of this.arena.chain(scope)) {
      const state = this.settled.get(s.index)?.get(key);
      if (state === undefined) {
        throw new MissingTypeException(
          name.toString(),
          false,
          `Type ${name} has not been resolved in scope ${scope.name}`
        );
      }
      if (state) return this.recordOf(state, name);
    }
    throw new MissingModuleException(name.toString(), key);
  }

  /**
   * Resolve a type and every type reachable from it. Each referenced type is
   * resolved from the scope of the record that refers to it.
   */
  async resolveClosure(typeName: ExternalName | string, scope: ResolutionScope): Promise<TypeRecord> {
    const root = await this.resolve(typeName, scope);
    const seen = new Set<string>([`${root.scope.index}:${root.name}`]);

    let frontier: TypeRecord[] = [root];
    while (frontier.length > 0) {
      const pending: Promise<TypeRecord>[] = [];
      for (const record of frontier) {
        for (const ref of gatherReferences(record.model)) {
          const key = `${record.scope.index}:${ref}`;
          if (seen.has(key)) continue;
          seen.add(key);
          pending.push(this.resolve(ref, record.scope));
        }
      }
      frontier = await Promise.all(pending);
    }

    return root;
  }

  linkContext(scope: ResolutionScope): LinkContext {
    let link = this.links.get(scope.index);
    if (!link) {
      link = Object.freeze({
        scope,
        seek: (name: ExternalName) => this.lookup(name, scope),
      });
      this.links.set(scope.index, link);
    }
    return link;
  }

  // ---------------------------------------------------------------------------

  private recordOf(application: ModuleApplication, name: ExternalName): TypeRecord {
    const record = application.records.get(name.toString());
    if (!record) {
      throw new MissingTypeException(
        name.toString(),
        false,
        `Module ${application.module} has no type ${name.leaf}`
      );
    }
    return record;
  }

  /** Ancestors first; an ancestor's result short-circuits this scope */
  private async findApplication(
    moduleName: ExternalName,
    scope: ResolutionScope
  ): Promise<ModuleApplication | undefined> {
    const parent = this.arena.parentOf(scope);
    if (parent) {
      const inherited = await this.findApplication(moduleName, parent);
      if (inherited) return inherited;
    }
    return this.applicationAt(moduleName, scope);
  }

  private applicationAt(
    moduleName: ExternalName,
    scope: ResolutionScope
  ): Promise<ModuleApplication | undefined> {
    const key = moduleName.toString();
    let slots = this.slots.get(scope.index);
    if (!slots) {
      slots = new Map();
      this.slots.set(scope.index, slots);
    }

    const existing = slots.get(key);
    if (existing) return existing;

    const slot = this.load(moduleName, scope);
    slots.set(key, slot);

    const owner = slots;
    void slot.then(
      application => {
        let done = this.settled.get(scope.index);
        if (!done) {
          done = new Map();
          this.settled.set(scope.index, done);
        }
        done.set(key, application ?? null);
      },
      () => {
        // Failed loads are not memoized
        if (owner.get(key) === slot) owner.delete(key);
      }
    );
    return slot;
  }

  private async load(
    moduleName: ExternalName,
    scope: ResolutionScope
  ): Promise<ModuleApplication | undefined> {
    const source = this.arena.sourceOf(scope);
    try {
      const text = await source.locate(moduleName);
      if (!text) {
        this.trace.record('schema.module.missing', {
          module: moduleName.toString(),
          scope: scope.name,
        }, { severity: 'debug', component: 'carp.schema' });
        return undefined;
      }

      const application = applyModule(parseModuleDescriptor(moduleName, text), scope);
      this.trace.record('schema.module.loaded', {
        module: moduleName.toString(),
        scope: scope.name,
        location: text.location,
        target: application.target,
        types: application.records.size,
      }, { component: 'carp.schema' });
      return application;
    } catch (error) {
      if (error instanceof ResourceException) {
        this.trace.record('schema.module.failed', {
          module: moduleName.toString(),
          scope: scope.name,
          errors: [...error.errors],
        }, { severity: 'error', component: 'carp.schema' });
      }
      throw error;
    }
  }
}
