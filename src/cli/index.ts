export { createProgram, run, formatError, type CliDependencies } from './program.js';
