/**
 * Inventory exports
 */

export * from './device-validator';
export { HttpInventorySource, HttpInventoryOptions, InventoryHttpClient } from './http-inventory-source';
export { FileInventorySource } from './file-inventory-source';
