/**
 * Module Descriptors
 *
 * A module is described by a `carp.yaml` or `carp.json` document:
 *
 * ```yaml
 * module: org.example
 * target: example-bindings
 * types:
 *   echo-service:
 *     kind: interface
 *     calls:
 *       say:
 *         params: { text: string }
 *         responses:
 *           said: { fields: { text: string } }
 *           silence: null
 * ```
 *
 * Type expressions are either a builtin kind name, a type name (dotted names
 * are qualified, bare names refer to the same module), or an object with a
 * `kind`. Members are a type expression or `{ type, required }`.
 */

import { parse as parseYaml } from 'yaml';
import {
  ExternalName,
  ResourceException,
  parseWireJson,
  type CallModel,
  type InterfaceModel,
  type Member,
  type ModuleDefinition,
  type ResponseModel,
  type TypeModel,
} from '@carp/protocol';

export type DescriptorFormat = 'yaml' | 'json';

export interface ModuleDescriptorText {
  text: string;
  format: DescriptorFormat;
  /** Where the text came from, for error messages */
  location: string;
}

export interface ValidationError {
  path: string;
  message: string;
}

export interface ValidationResult {
  valid: boolean;
  errors: ValidationError[];
}

const BUILTIN_KINDS = ['boolean', 'integer', 'real', 'string', 'uuid'] as const;
type BuiltinKind = typeof BUILTIN_KINDS[number];

const MAP_KEY_KINDS: ReadonlySet<string> = new Set(['string', 'uuid', 'enumerated', 'reference']);

function isBuiltinKind(value: string): value is BuiltinKind {
  return (BUILTIN_KINDS as readonly string[]).includes(value);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

// =============================================================================
// Reader
// =============================================================================

/**
 * Turns a raw descriptor document into a module definition, collecting
 * every problem found along the way.
 */
class DescriptorReader {
  readonly errors: ValidationError[] = [];

  constructor(private readonly moduleName: ExternalName) {}

  private fail(path: string, message: string): void {
    this.errors.push({ path, message });
  }

  read(raw: unknown): ModuleDefinition {
    const types = new Map<string, TypeModel>();

    if (!isRecord(raw)) {
      this.fail('', 'Descriptor must be an object');
      return { name: this.moduleName, target: '', types };
    }

    if (raw.module !== undefined) {
      const declared = this.name(raw.module, 'module');
      if (declared && !declared.equals(this.moduleName)) {
        this.fail('module', `Declares ${declared} but was found as ${this.moduleName}`);
      }
    }

    let target = '';
    const rawTarget = raw.target;
    if (typeof rawTarget === 'string' && rawTarget.length > 0) {
      target = rawTarget;
    } else {
      this.fail('target', 'Missing required field: target');
    }

    const rawTypes = raw.types ?? {};
    if (!isRecord(rawTypes)) {
      this.fail('types', 'Must be an object');
    } else {
      for (const [key, value] of Object.entries(rawTypes)) {
        const path = `types.${key}`;
        const leaf = this.leafName(key, path);
        const model = this.typeExpr(value, path, true);
        if (leaf && model) {
          types.set(this.moduleName.resolve(leaf).toString(), model);
        }
      }
    }

    return { name: this.moduleName, target, types };
  }

  private name(value: unknown, path: string): ExternalName | undefined {
    if (typeof value !== 'string') {
      this.fail(path, 'Must be a name');
      return undefined;
    }
    try {
      return ExternalName.parse(value);
    } catch (error) {
      this.fail(path, error instanceof Error ? error.message : String(error));
      return undefined;
    }
  }

  private leafName(value: unknown, path: string): ExternalName | undefined {
    const name = this.name(value, path);
    if (name && !name.isLeaf()) {
      this.fail(path, `${name} must not be qualified`);
      return undefined;
    }
    return name;
  }

  /** Bare names are local to the module, dotted ones are qualified */
  private typeName(value: unknown, path: string): ExternalName | undefined {
    const name = this.name(value, path);
    if (!name) return undefined;
    return name.isLeaf() ? this.moduleName.resolve(name) : name;
  }

  private typeExpr(value: unknown, path: string, named = false): TypeModel | undefined {
    if (typeof value === 'string') {
      if (isBuiltinKind(value)) {
        return { kind: value };
      }
      const name = this.typeName(value, path);
      return name ? { kind: 'reference', name } : undefined;
    }

    if (!isRecord(value)) {
      this.fail(path, 'Type must be a name or an object with a kind');
      return undefined;
    }

    const kind = value.kind;
    switch (kind) {
      case 'boolean':
      case 'real':
      case 'string':
      case 'uuid':
        return { kind };

      case 'integer':
        return this.integer(value, path);

      case 'sequence':
      case 'set': {
        const element = this.typeExpr(value.element, `${path}.element`);
        return element ? { kind, element } : undefined;
      }

      case 'map': {
        const key = this.typeExpr(value.key, `${path}.key`);
        const mapped = this.typeExpr(value.value, `${path}.value`);
        if (key && !MAP_KEY_KINDS.has(key.kind)) {
          this.fail(`${path}.key`, `Map keys cannot be of kind ${key.kind}`);
          return undefined;
        }
        return key && mapped ? { kind: 'map', key, value: mapped } : undefined;
      }

      case 'structure': {
        const fields = this.members(value.fields, `${path}.fields`);
        return fields ? { kind: 'structure', fields } : undefined;
      }

      case 'enumerated':
        return this.enumerated(value, path);

      case 'reference': {
        const name = this.typeName(value.name, `${path}.name`);
        return name ? { kind: 'reference', name } : undefined;
      }

      case 'interface':
        if (!named) {
          this.fail(path, 'Interface types must be named');
          return undefined;
        }
        return this.interface(value, path);

      default:
        this.fail(`${path}.kind`, `Unknown kind: ${String(kind)}`);
        return undefined;
    }
  }

  private integer(value: Record<string, unknown>, path: string): TypeModel | undefined {
    const bound = (key: 'min' | 'max'): number | bigint | undefined => {
      const b = value[key];
      if (b === undefined) return undefined;
      if (typeof b === 'bigint') {
        return Number.isSafeInteger(Number(b)) ? Number(b) : b;
      }
      if (typeof b !== 'number' || !Number.isSafeInteger(b)) {
        this.fail(`${path}.${key}`, 'Must be an integer');
        return undefined;
      }
      return b;
    };
    const min = bound('min');
    const max = bound('max');
    if (min !== undefined && max !== undefined && BigInt(min) > BigInt(max)) {
      this.fail(path, `Empty range ${min}..${max}`);
      return undefined;
    }
    return { kind: 'integer', min, max };
  }

  private enumerated(value: Record<string, unknown>, path: string): TypeModel | undefined {
    const constants = value.constants;
    if (!Array.isArray(constants) || constants.length === 0) {
      this.fail(`${path}.constants`, 'Must be a non-empty list');
      return undefined;
    }
    const seen = new Set<string>();
    for (const [i, constant] of constants.entries()) {
      const name = this.leafName(constant, `${path}.constants[${i}]`);
      if (!name) return undefined;
      if (seen.has(name.toString())) {
        this.fail(`${path}.constants[${i}]`, `Duplicate constant: ${name}`);
        return undefined;
      }
      seen.add(name.toString());
    }
    return { kind: 'enumerated', constants: [...seen] };
  }

  private members(value: unknown, path: string): Member[] | undefined {
    if (value === undefined || value === null) return [];
    if (!isRecord(value)) {
      this.fail(path, 'Must be an object');
      return undefined;
    }

    const members: Member[] = [];
    let ok = true;
    for (const [key, entry] of Object.entries(value)) {
      const memberPath = `${path}.${key}`;
      const name = this.leafName(key, memberPath);

      let type: TypeModel | undefined;
      let required = true;
      if (isRecord(entry) && entry.kind === undefined && 'type' in entry) {
        type = this.typeExpr(entry.type, `${memberPath}.type`);
        const flag = entry.required;
        if (flag !== undefined) {
          if (typeof flag === 'boolean') {
            required = flag;
          } else {
            this.fail(`${memberPath}.required`, 'Must be a boolean');
          }
        }
      } else {
        type = this.typeExpr(entry, memberPath);
      }

      if (name && type) {
        members.push({ name, type, required });
      } else {
        ok = false;
      }
    }
    return ok ? members : undefined;
  }

  private interface(value: Record<string, unknown>, path: string): InterfaceModel | undefined {
    const calls: CallModel[] = [];
    const inherits: ExternalName[] = [];

    const rawCalls = value.calls ?? {};
    if (!isRecord(rawCalls)) {
      this.fail(`${path}.calls`, 'Must be an object');
      return undefined;
    }
    for (const [key, entry] of Object.entries(rawCalls)) {
      const call = this.call(key, entry, `${path}.calls.${key}`);
      if (call) calls.push(call);
    }

    const rawInherits: unknown = value.inherits ?? [];
    if (!Array.isArray(rawInherits)) {
      this.fail(`${path}.inherits`, 'Must be a list');
      return undefined;
    }
    for (const [i, entry] of rawInherits.entries()) {
      const name = this.typeName(entry, `${path}.inherits[${i}]`);
      if (name) inherits.push(name);
    }

    return { kind: 'interface', calls, inherits };
  }

  private call(key: string, value: unknown, path: string): CallModel | undefined {
    const name = this.leafName(key, path);
    if (value === null || value === undefined) {
      return name ? { name, params: [], responses: [] } : undefined;
    }
    if (!isRecord(value)) {
      this.fail(path, 'Call must be an object');
      return undefined;
    }

    const params = this.members(value.params, `${path}.params`);
    const responses: ResponseModel[] = [];

    const rawResponses = value.responses ?? {};
    if (!isRecord(rawResponses)) {
      this.fail(`${path}.responses`, 'Must be an object');
    } else {
      for (const [variant, entry] of Object.entries(rawResponses)) {
        const variantPath = `${path}.responses.${variant}`;
        const variantName = this.leafName(variant, variantPath);
        let fields: Member[] | undefined = [];
        if (isRecord(entry)) {
          fields = this.members(entry.fields, `${variantPath}.fields`);
        } else if (entry !== null) {
          this.fail(variantPath, 'Response must be an object or null');
          fields = undefined;
        }
        if (variantName && fields) {
          responses.push({ name: variantName, fields });
        }
      }
    }

    return name && params ? { name, params, responses } : undefined;
  }
}

// =============================================================================
// Entry points
// =============================================================================

/**
 * Validate a raw descriptor document without building anything from it.
 */
export function validateModuleDescriptor(moduleName: ExternalName, raw: unknown): ValidationResult {
  const reader = new DescriptorReader(moduleName);
  reader.read(raw);
  return { valid: reader.errors.length === 0, errors: reader.errors };
}

/**
 * Parse descriptor text into a module definition.
 *
 * @throws ResourceException if the text does not parse or fails validation
 */
export function parseModuleDescriptor(
  moduleName: ExternalName,
  source: ModuleDescriptorText
): ModuleDefinition {
  let raw: unknown;
  try {
    raw = source.format === 'json'
      ? parseWireJson(source.text)
      : parseYaml(source.text, { intAsBigInt: true });
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new ResourceException(moduleName.toString(), [`${source.location}: ${message}`], {
      cause: error,
    });
  }

  const reader = new DescriptorReader(moduleName);
  const definition = reader.read(raw);
  if (reader.errors.length > 0) {
    const where = (e: ValidationError) => (e.path ? `${source.location} ${e.path}` : source.location);
    throw new ResourceException(
      moduleName.toString(),
      reader.errors.map(e => `${where(e)}: ${e.message}`)
    );
  }
  return definition;
}
