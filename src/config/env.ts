import dotenv from 'dotenv';

dotenv.config();

interface EnvConfig {
  // Suggestion store
  SUGGESTIONS_PROJECT_ROOT: string;
  SUGGESTIONS_STATE_DIR: string;
  SUGGESTIONS_FILE: string;
  SUGGESTIONS_LIST_LIMIT: string;

  // Environment
  NODE_ENV: string;
  LOG_LEVEL: string;
}

const getEnv = (key: keyof EnvConfig, defaultValue?: string, required: boolean = false): string => {
  const value = process.env[key] || defaultValue;
  if (!value && required) {
    throw new Error(`Missing required environment variable: ${key}`);
  }
  return value || '';
};

export const env: EnvConfig = {
  // Suggestion store
  SUGGESTIONS_PROJECT_ROOT: getEnv('SUGGESTIONS_PROJECT_ROOT', process.cwd()),
  SUGGESTIONS_STATE_DIR: getEnv('SUGGESTIONS_STATE_DIR', '.refactor-review'),
  SUGGESTIONS_FILE: getEnv('SUGGESTIONS_FILE', 'suggestions.json'),
  SUGGESTIONS_LIST_LIMIT: getEnv('SUGGESTIONS_LIST_LIMIT', '10'),

  // Environment
  NODE_ENV: getEnv('NODE_ENV', 'development'),
  LOG_LEVEL: getEnv('LOG_LEVEL', 'info')
};

/**
 * Parse a positive integer setting, falling back when the raw value is
 * missing, non-numeric or not positive.
 */
export const positiveInt = (raw: string, fallback: number): number => {
  const parsed = Number(raw);
  return Number.isInteger(parsed) && parsed > 0 ? parsed : fallback;
};
