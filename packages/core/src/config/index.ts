export {
  validateEnv,
  loadTypeHashingConfig,
  DEFAULT_TYPE_HASHING_CONFIG,
} from './env-schema';
export type { EnvConfig, TypeHashingConfig } from './env-schema';
