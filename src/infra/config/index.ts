export {
  parseEnv,
  createConfig,
  EnvSchema,
  DEFAULT_SOURCE_FILES,
  type Env,
  type AppConfig,
} from './env.js';
