export type { CheckerConfig, ResolvedCheckerConfig } from './CheckerConfig.js';
export {
  CheckerConfigDefaults,
  loadCheckerConfig,
  toCheckerConfig,
  withDefaults,
} from './CheckerConfig.js';
