export * from './types.js';
export * from './embeddings.js';
export * from './similarity.js';
export * from './index-store.js';
