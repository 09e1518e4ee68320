/**
 * Configuration Module
 *
 * Usage:
 * ```typescript
 * import { loadAgentConfig } from './config';
 *
 * const config = loadAgentConfig(); // throws ConfigInvalidError
 * ```
 */

export * from "./schema";
export {
  loadAgentConfig,
  validateAgentConfig,
  formatAgentConfig,
  CONFIG_DEFAULTS,
  DEFAULT_CLOB_HOST,
  DEFAULT_GAMMA_API_URL,
} from "./loadConfig";
