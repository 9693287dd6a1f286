/**
 * CARP Schema Package
 *
 * Module descriptors, resolution scopes and type resolution.
 */

export {
  parseModuleDescriptor,
  validateModuleDescriptor,
  type DescriptorFormat,
  type ModuleDescriptorText,
  type ValidationError,
  type ValidationResult,
} from './descriptor.js';

export {
  DirectoryModuleSource,
  MemoryModuleSource,
  type ModuleSource,
} from './sources.js';

export {
  ScopeArena,
  scopeChainFromPaths,
  type ResolutionScope,
} from './scopes.js';

export {
  TypeResolver,
  type TypeResolverOptions,
  type TypeRecord,
  type NativeHandle,
  type ModuleApplication,
  type LinkContext,
} from './resolver.js';
