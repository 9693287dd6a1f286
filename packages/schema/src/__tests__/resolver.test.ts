/**
 * Type Resolver Tests
 */

import { describe, it, expect, beforeEach } from 'vitest';
import {
  ExternalName,
  MissingModuleException,
  MissingTypeException,
  ResourceException,
} from '@carp/protocol';
import { TraceCollector } from '@carp/trace';
import type { ModuleDescriptorText } from '../descriptor.js';
import { MemoryModuleSource, type ModuleSource } from '../sources.js';
import { ScopeArena, type ResolutionScope } from '../scopes.js';
import { TypeResolver } from '../resolver.js';

/** Counts every descriptor lookup made against the wrapped source */
class CountingSource implements ModuleSource {
  readonly description: string;
  locates = 0;

  constructor(readonly inner: MemoryModuleSource) {
    this.description = inner.description;
  }

  async locate(moduleName: ExternalName): Promise<ModuleDescriptorText | undefined> {
    this.locates++;
    // Let concurrent callers pile up before answering
    await new Promise(resolve => setImmediate(resolve));
    return this.inner.locate(moduleName);
  }
}

const EXAMPLE = {
  target: 'root-bindings',
  types: {
    'echo-service': {
      kind: 'interface',
      calls: {
        say: {
          params: { message: 'org.shared.message' },
          responses: { said: { fields: { echo: 'string' } } },
        },
      },
    },
    alias: 'string',
  },
};

const SHARED = {
  target: 'shared-bindings',
  types: {
    message: { kind: 'structure', fields: { text: 'string', next: { type: 'message', required: false } } },
  },
};

describe('TypeResolver', () => {
  let arena: ScopeArena;
  let trace: TraceCollector;
  let rootSource: CountingSource;
  let midSource: CountingSource;
  let leafSource: CountingSource;
  let root: ResolutionScope;
  let mid: ResolutionScope;
  let leaf: ResolutionScope;
  let resolver: TypeResolver;

  beforeEach(() => {
    arena = new ScopeArena();
    trace = new TraceCollector();
    rootSource = new CountingSource(new MemoryModuleSource({ 'org.example': EXAMPLE, 'org.shared': SHARED }, 'root'));
    midSource = new CountingSource(new MemoryModuleSource({}, 'mid'));
    leafSource = new CountingSource(new MemoryModuleSource({}, 'leaf'));
    root = arena.createScope('root', rootSource);
    mid = arena.createScope('mid', midSource, root);
    leaf = arena.createScope('leaf', leafSource, mid);
    resolver = new TypeResolver(arena, { trace });
  });

  describe('resolve', () => {
    it('should load a root module once under concurrent callers', async () => {
      const records = await Promise.all(
        Array.from({ length: 10 }, () => resolver.resolve('org.example.echo-service', leaf))
      );

      expect(rootSource.locates).toBe(1);
      expect(midSource.locates).toBe(0);
      expect(leafSource.locates).toBe(0);
      for (const record of records) {
        expect(record).toBe(records[0]);
      }
      expect(records[0].scope).toBe(root);
      expect(trace.getEventsOfType('schema.module.loaded')).toHaveLength(1);
    });

    it('should give interface, structure and enumerated types a native handle', async () => {
      const service = await resolver.resolve('org.example.echo-service', leaf);
      expect(service.native).toEqual({ target: 'root-bindings', symbol: 'EchoService' });

      const alias = await resolver.resolve('org.example.alias', leaf);
      expect(alias.native).toBeNull();
      expect(alias.model).toEqual({ kind: 'string' });
    });

    it('should tell a missing module from a missing type', async () => {
      const missingModule = await resolver.resolve('org.nowhere.foo', leaf).catch((e: unknown) => e);
      expect(missingModule).toBeInstanceOf(MissingModuleException);
      expect(missingModule instanceof MissingTypeException && missingModule.moduleMissing).toBe(true);

      const missingType = await resolver.resolve('org.example.bar', leaf).catch((e: unknown) => e);
      expect(missingType).toBeInstanceOf(MissingTypeException);
      expect(missingType).not.toBeInstanceOf(MissingModuleException);
      expect(missingType instanceof MissingTypeException && missingType.moduleMissing).toBe(false);
    });

    it('should reject names without a module', async () => {
      await expect(resolver.resolve('lonely', leaf)).rejects.toThrow('Type name lonely has no module');
    });

    it('should fall through to descendants when ancestors lack the module', async () => {
      leafSource.inner.define('org.local', { target: 'leaf-bindings', types: { thing: 'uuid' } });

      const record = await resolver.resolve('org.local.thing', leaf);
      expect(record.scope).toBe(leaf);
      expect([rootSource.locates, midSource.locates, leafSource.locates]).toEqual([1, 1, 1]);

      // Absence is memoized, so nothing is looked up again
      await resolver.resolve('org.local.thing', leaf);
      expect([rootSource.locates, midSource.locates, leafSource.locates]).toEqual([1, 1, 1]);
    });

    it('should keep the root authoritative over descendants', async () => {
      leafSource.inner.define('org.example', { target: 'leaf-bindings', types: { other: 'string' } });

      const record = await resolver.resolve('org.example.echo-service', leaf);
      expect(record.native?.target).toBe('root-bindings');
      await expect(resolver.resolve('org.example.other', leaf)).rejects.toBeInstanceOf(MissingTypeException);
      expect(leafSource.locates).toBe(0);
    });

    it('should not touch descendants when resolving from an ancestor', async () => {
      await resolver.resolve('org.example.alias', root);
      expect([rootSource.locates, midSource.locates, leafSource.locates]).toEqual([1, 0, 0]);
    });

    it('should retry a module whose descriptor failed to load', async () => {
      rootSource.inner.define('org.broken', { types: {} });

      const first = await resolver.resolve('org.broken.thing', leaf).catch((e: unknown) => e);
      expect(first).toBeInstanceOf(ResourceException);
      expect(trace.getEventsOfType('schema.module.failed')[0].payload.module).toBe('org.broken');

      const again = await resolver.resolve('org.broken.thing', leaf).catch((e: unknown) => e);
      expect(again).toBeInstanceOf(ResourceException);

      rootSource.inner.define('org.broken', { target: 'fixed', types: { thing: 'real' } });
      const fixed = await resolver.resolve('org.broken.thing', leaf);
      expect(fixed.model).toEqual({ kind: 'real' });
    });
  });

  describe('lookup', () => {
    it('should refuse types whose module has not been resolved', () => {
      expect(() => resolver.lookup('org.example.alias', leaf)).toThrow(MissingTypeException);
    });

    it('should return the resolved record', async () => {
      const record = await resolver.resolve('org.example.alias', leaf);
      expect(resolver.lookup('org.example.alias', leaf)).toBe(record);
      expect(resolver.lookup(ExternalName.parse('org.example.echo-service'), leaf).native?.symbol).toBe('EchoService');
    });
  });

  describe('resolveClosure', () => {
    it('should resolve every reachable type, including cycles', async () => {
      const service = await resolver.resolveClosure('org.example.echo-service', leaf);
      expect(service.name.toString()).toBe('org.example.echo-service');

      const link = resolver.linkContext(root);
      const message = link.seek(ExternalName.parse('org.shared.message'));
      expect(message.native).toEqual({ target: 'shared-bindings', symbol: 'Message' });
      expect(message.scope).toBe(root);
    });

    it('should fail when a referenced type is missing', async () => {
      rootSource.inner.define('org.dangling', {
        target: 't',
        types: { holder: { kind: 'structure', fields: { x: 'org.nowhere.x' } } },
      });
      await expect(resolver.resolveClosure('org.dangling.holder', leaf)).rejects.toBeInstanceOf(
        MissingModuleException
      );
    });
  });

  describe('linkContext', () => {
    it('should hand out one context per scope', () => {
      expect(resolver.linkContext(leaf)).toBe(resolver.linkContext(leaf));
      expect(resolver.linkContext(leaf).scope).toBe(leaf);
    });
  });
});
