export * from './types/project.js';
export * from './types/deployment.js';
export * from './types/compose.js';
export * from './types/stream.js';
export * from './schemas/project.js';
