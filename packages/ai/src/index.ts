export * from './provider.js';
export * from './openrouter.js';
export * from './config.js';
export * from './router.js';
export * from './tool-schema.js';

