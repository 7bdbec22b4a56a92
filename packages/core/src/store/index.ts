export { JsonDocument, type JsonDocumentOptions } from './jsonDocument.js';
export { IndexStore, fromDocument, toDocument, type IndexDocument } from './indexStore.js';
export { TokenStore } from './tokenStore.js';
