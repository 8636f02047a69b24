export * from './schemas/article.js';
export * from './schemas/source.js';
export * from './schemas/subscription.js';
