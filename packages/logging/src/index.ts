export * from './logger.js';
export * from './tool-logger.js';
