export type { RegisterInput } from './store-registry'
export { parseRegistryFile, REGISTRY_FILE, StoreRegistry } from './store-registry'
