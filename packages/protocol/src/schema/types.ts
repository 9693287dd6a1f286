/**
 * Schema model
 *
 * The compiled form of schema types, as supplied by module descriptors.
 * Lists are ordered as declared.
 */

import type { ExternalName } from '../names.js';

export interface Member {
  name: ExternalName;
  type: TypeModel;
  required: boolean;
}

export interface BooleanModel {
  kind: 'boolean';
}

/** Bounds beyond the safe range of a double are bigint */
export interface IntegerModel {
  kind: 'integer';
  min?: number | bigint;
  max?: number | bigint;
}

export interface RealModel {
  kind: 'real';
}

export interface StringModel {
  kind: 'string';
}

export interface UuidModel {
  kind: 'uuid';
}

export interface SequenceModel {
  kind: 'sequence';
  element: TypeModel;
}

export interface SetModel {
  kind: 'set';
  element: TypeModel;
}

export interface MapModel {
  kind: 'map';
  key: TypeModel;
  value: TypeModel;
}

export interface StructureModel {
  kind: 'structure';
  fields: readonly Member[];
}

export interface EnumeratedModel {
  kind: 'enumerated';
  constants: readonly string[];
}

/** A named type defined elsewhere, qualified */
export interface ReferenceModel {
  kind: 'reference';
  name: ExternalName;
}

export interface ResponseModel {
  name: ExternalName;
  fields: readonly Member[];
}

export interface CallModel {
  name: ExternalName;
  params: readonly Member[];
  responses: readonly ResponseModel[];
}

export interface InterfaceModel {
  kind: 'interface';
  calls: readonly CallModel[];
  /** Qualified names of inherited interface types */
  inherits: readonly ExternalName[];
}

export type TypeModel =
  | BooleanModel
  | IntegerModel
  | RealModel
  | StringModel
  | UuidModel
  | SequenceModel
  | SetModel
  | MapModel
  | StructureModel
  | EnumeratedModel
  | ReferenceModel
  | InterfaceModel;

export type TypeKind = TypeModel['kind'];

/**
 * A module's type table, keyed by qualified type name.
 */
export interface ModuleDefinition {
  name: ExternalName;
  /** Native binding target the module is applied to */
  target: string;
  types: ReadonlyMap<string, TypeModel>;
}
