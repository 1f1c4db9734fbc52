export { FactoryRegistry, type FactoryRegistryDeps } from "./core/factory-registry"
export { MetadataRegistry } from "./core/metadata-registry"
export { RegistryError, type RegistryErrorCode } from "./core/registry-error"
export type { Factory, MetadataTarget, TaggedTarget } from "./ports/registry"
