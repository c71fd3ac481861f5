export type { GraphWriter } from './interface.js';
export { TurtleWriter } from './turtle.js';
export { createGraphWriter, parseOutputFormat, isOutputFormat } from './registry.js';
