export * from './tool-call-agent.js';
export * from './searcher.js';
export * from './executor.js';
