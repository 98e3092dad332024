import { Logger } from '../utils/logger.js';

/**
 * Per-run state handed to every stage instead of process-wide singletons
 */
export interface RunContext {
  logger: Logger;
  /** Clock used for timestamps and backup ids */
  now: () => Date;
}

export function createRunContext(overrides: Partial<RunContext> = {}): RunContext {
  return {
    logger: overrides.logger ?? new Logger(),
    now: overrides.now ?? (() => new Date()),
  };
}
