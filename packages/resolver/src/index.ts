// packages/resolver/src/index.ts
export { FieldIndex } from './field-index';
export { Registry, type RelationConnector, type RegistryInput } from './registry';
export { ResultAccumulator } from './result';
export { seedsFromQuery } from './seeds';
export { resolveLinks, traverse, unitKey, type ResolveOptions, type Traversal } from './resolve';
