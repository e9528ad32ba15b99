export * from './commandBuilder.js';
export * from './composeExecutor.js';
export * from './logParser.js';
export * from './processRunner.js';
export * from './statusParser.js';
