export * from './config.js';
export * from './fs.js';
export * from './progress.js';
export * from './size.js';
