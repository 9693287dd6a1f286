/**
 * Module Sources
 *
 * Where a resolution scope finds module descriptors. A source answers only
 * for itself; walking the scope chain is the resolver's job.
 */

import * as fs from 'fs';
import * as path from 'path';
import { ResourceException, stringifyWire, type ExternalName } from '@carp/protocol';
import type { DescriptorFormat, ModuleDescriptorText } from './descriptor.js';

export interface ModuleSource {
  /** Human-readable description for logs */
  readonly description: string;

  /**
   * Find the descriptor of a module. Resolves to undefined when this source
   * does not define the module.
   *
   * @throws ResourceException if a descriptor exists but cannot be read
   */
  locate(moduleName: ExternalName): Promise<ModuleDescriptorText | undefined>;
}

const DESCRIPTOR_FILES: ReadonlyArray<[string, DescriptorFormat]> = [
  ['carp.json', 'json'],
  ['carp.yaml', 'yaml'],
  ['carp.yml', 'yaml'],
];

function isNotFound(error: unknown): boolean {
  return error instanceof Error && 'code' in error &&
    (error.code === 'ENOENT' || error.code === 'ENOTDIR');
}

/**
 * Descriptors laid out on disk as `<root>/<module path>/carp.{json,yaml}`,
 * e.g. module `org.example` lives in `<root>/org/example/`.
 */
export class DirectoryModuleSource implements ModuleSource {
  readonly description: string;

  constructor(readonly root: string) {
    this.description = `directory ${root}`;
  }

  async locate(moduleName: ExternalName): Promise<ModuleDescriptorText | undefined> {
    const dir = path.join(this.root, ...moduleName.asPathElements().split('/'));

    for (const [file, format] of DESCRIPTOR_FILES) {
      const location = path.join(dir, file);
      try {
        const text = await fs.promises.readFile(location, 'utf-8');
        return { text, format, location };
      } catch (error) {
        if (isNotFound(error)) continue;
        throw new ResourceException(moduleName.toString(), [`${location}: ${String(error)}`], {
          cause: error,
        });
      }
    }

    return undefined;
  }
}

/**
 * Descriptors held in memory, keyed by module name. String entries are read
 * as YAML, anything else is serialized as JSON.
 */
export class MemoryModuleSource implements ModuleSource {
  private readonly descriptors = new Map<string, ModuleDescriptorText>();

  constructor(
    descriptors: Record<string, string | object> = {},
    readonly description = 'memory'
  ) {
    for (const [name, descriptor] of Object.entries(descriptors)) {
      this.define(name, descriptor);
    }
  }

  /** Add or replace a module descriptor */
  define(moduleName: string, descriptor: string | object): void {
    const location = `${this.description}:${moduleName}`;
    this.descriptors.set(
      moduleName,
      typeof descriptor === 'string'
        ? { text: descriptor, format: 'yaml', location }
        : { text: stringifyWire(descriptor), format: 'json', location }
    );
  }

  async locate(moduleName: ExternalName): Promise<ModuleDescriptorText | undefined> {
    const found = this.descriptors.get(moduleName.toString());
    return found ? { ...found } : undefined;
  }
}
