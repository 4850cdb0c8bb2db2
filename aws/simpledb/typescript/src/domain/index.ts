/**
 * Domains and Items
 */

export { Domain } from './domain.js';
export { Item, setAttribute } from './item.js';
export type { AttributeValue, ItemAttributes, ItemStore } from './item.js';
