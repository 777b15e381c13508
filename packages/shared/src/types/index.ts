export * from './swipe.js';
export * from './generation.js';
