export * from './rl';
export * from './utils/errors';
export { GridWorldState, DEFAULT_LAYOUT, MOVES } from './environments/grid-world';
export type { Move, Cell, GridLayout } from './environments/grid-world';
export { Logger, LogLevel, createLogger } from './utils/logger';
export { CONFIG, getConfig, validateConfig } from './utils/config';
export type { AppConfig } from './utils/config';
