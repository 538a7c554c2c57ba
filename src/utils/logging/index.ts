/**
 * Focused logging facade.
 */
export { log, shouldLog } from '../logger.ts';
export type { LogLevel } from '../logger.ts';
