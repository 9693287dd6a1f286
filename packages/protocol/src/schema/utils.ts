/**
 * Schema model utilities
 */

import type { ExternalName } from '../names.js';
import type { Member, TypeKind, TypeModel } from './types.js';

const NATIVE_KINDS: ReadonlySet<TypeKind> = new Set<TypeKind>([
  'interface',
  'structure',
  'enumerated',
]);

/**
 * Whether a type needs a native declaration of its own.
 */
export function requiresNativeForm(model: TypeModel): boolean {
  return NATIVE_KINDS.has(model.kind);
}

function gatherMembers(members: readonly Member[], dest: ExternalName[]): void {
  for (const member of members) {
    gatherReferences(member.type, dest);
  }
}

/**
 * Collect the qualified names a type refers to directly, including
 * inherited interfaces. Referenced types are not followed.
 */
export function gatherReferences(model: TypeModel, dest: ExternalName[] = []): ExternalName[] {
  switch (model.kind) {
    case 'reference':
      dest.push(model.name);
      break;
    case 'sequence':
    case 'set':
      gatherReferences(model.element, dest);
      break;
    case 'map':
      gatherReferences(model.key, dest);
      gatherReferences(model.value, dest);
      break;
    case 'structure':
      gatherMembers(model.fields, dest);
      break;
    case 'interface':
      dest.push(...model.inherits);
      for (const call of model.calls) {
        gatherMembers(call.params, dest);
        for (const response of call.responses) {
          gatherMembers(response.fields, dest);
        }
      }
      break;
    default:
      break;
  }
  return dest;
}

/**
 * Render a type model in a compact, descriptor-like form.
 */
export function describeType(model: TypeModel): string {
  switch (model.kind) {
    case 'integer': {
      const range = model.min !== undefined || model.max !== undefined
        ? `[${model.min ?? ''}..${model.max ?? ''}]`
        : '';
      return `integer${range}`;
    }
    case 'sequence':
      return `sequence<${describeType(model.element)}>`;
    case 'set':
      return `set<${describeType(model.element)}>`;
    case 'map':
      return `map<${describeType(model.key)}, ${describeType(model.value)}>`;
    case 'structure':
      return `{ ${model.fields.map(f => `${f.name}${f.required ? '' : '?'}: ${describeType(f.type)}`).join(', ')} }`;
    case 'enumerated':
      return model.constants.join(' | ');
    case 'reference':
      return model.name.toString();
    case 'interface':
      return `interface(${model.calls.length} calls)`;
    default:
      return model.kind;
  }
}
