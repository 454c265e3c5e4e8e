import { cleanEnv, str } from 'envalid';

export const env = cleanEnv(process.env, {
  // NODE_ENV
  NODE_ENV: str({ choices: ['development', 'production', 'test'], default: 'development' }),

  // LOGGING
  LOG_LEVEL: str({ choices: ['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly'], default: 'info' }),

  // GAME CONFIG
  GAME_CONFIG_PATH: str({ default: '' }),
});
