/**
 * Store Registry Types
 */

export interface StoreRegistration {
  /** User-chosen name, unique in the registry */
  readonly label: string
  /** Source collection id (Notion database id) */
  readonly collectionId: string
  /** Vector-store handle returned at creation (fileSearchStores/...) */
  readonly storeHandle: string
  readonly createdAt: string
}

/** On-disk layout of stores.json */
export interface RegistryFile {
  readonly version: 1
  readonly stores: Readonly<Record<string, Omit<StoreRegistration, 'label'>>>
}
