export * from './fs.js';
export * from './config.js';
export * from './prompt.js';
export * from './reporter.js';
