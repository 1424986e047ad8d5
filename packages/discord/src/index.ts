export * from './router.js';
export * from './voiceBridge.js';
