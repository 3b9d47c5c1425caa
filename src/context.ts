import type { Config } from './config';
import type { Logger } from './logger';

/**
 * Handed to every component at construction. There are no module-level
 * config or logger singletons.
 */
export interface AppContext {
  config: Config;
  logger: Logger;
}
