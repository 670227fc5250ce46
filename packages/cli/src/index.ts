// Programmatic entry point: the commander program and the commands behind it.
export { createProgram } from './program.js';
export type { ProgramIO } from './program.js';
export { createContext, loadConfigFile, reportError } from './context.js';
export type { CliContext, GlobalOptions } from './context.js';
export * from './commands/index.js';
