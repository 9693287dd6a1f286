/**
 * Type reports
 *
 * Plain-data descriptions of resolved types for `carp inspect`, and the
 * JSON form of decoded call results for `carp call`.
 */

import { describeType, type Member } from '@carp/protocol';
import { isCarpProxy } from '@carp/runtime';
import type { NativeHandle, TypeRecord } from '@carp/schema';

export interface MemberReport {
  name: string;
  type: string;
  required: boolean;
}

export interface CallReport {
  name: string;
  method: string;
  params: MemberReport[];
  responses: Array<{ name: string; fields: MemberReport[] }>;
}

export interface TypeReport {
  name: string;
  kind: string;
  scope: string;
  native: NativeHandle | null;
  /** Compact form of non-interface types */
  type?: string;
  inherits?: string[];
  calls?: CallReport[];
}

function memberReports(members: readonly Member[]): MemberReport[] {
  return members.map(m => ({
    name: m.name.toString(),
    type: describeType(m.type),
    required: m.required,
  }));
}

export function reportType(record: TypeRecord): TypeReport {
  const base = {
    name: record.name.toString(),
    kind: record.model.kind,
    scope: record.scope.name,
    native: record.native,
  };

  if (record.model.kind !== 'interface') {
    return { ...base, type: describeType(record.model) };
  }

  return {
    ...base,
    inherits: record.model.inherits.map(n => n.toString()),
    calls: record.model.calls.map(call => ({
      name: call.name.toString(),
      method: call.name.asMethodName(),
      params: memberReports(call.params),
      responses: call.responses.map(r => ({ name: r.name.toString(), fields: memberReports(r.fields) })),
    })),
  };
}

/**
 * Convert a decoded value to plain JSON data. Proxies print as their
 * `carp:` string, sets as arrays and maps as objects.
 */
export function toJsonValue(value: unknown): unknown {
  if (isCarpProxy(value)) return String(value);
  if (value instanceof Set) return [...value].map(toJsonValue);
  if (value instanceof Map) {
    return Object.fromEntries([...value].map(([k, v]) => [String(k), toJsonValue(v)]));
  }
  if (Array.isArray(value)) return value.map(toJsonValue);
  if (typeof value === 'object' && value !== null) {
    return Object.fromEntries(Object.entries(value).map(([k, v]) => [k, toJsonValue(v)]));
  }
  return value;
}
