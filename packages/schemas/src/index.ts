export * from './cv.js';
export * from './pipeline.js';
