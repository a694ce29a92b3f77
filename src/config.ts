import path from 'node:path';
import envPaths from 'env-paths';
import { UsageError } from './errors';
import { ConfigOverridesSchema, type ConfigOverrides } from './schemas';

export const APP_NAME = 'sealbox';
export const DATA_FILE_NAME = 'secrets.json';
export const KEY_FILE_NAME = 'master.key';

export const DATA_FILE_ENV = 'SEALBOX_DATA_FILE';
export const KEY_FILE_ENV = 'SEALBOX_KEY_FILE';

export interface StoreConfig {
  dataFile: string;
  keyFile: string;
}

// App-specific paths for key and data storage
const paths = envPaths(APP_NAME, { suffix: '' });

export const defaultConfig = (): StoreConfig => ({
  dataFile: path.join(paths.data, DATA_FILE_NAME),
  keyFile: path.join(paths.config, KEY_FILE_NAME),
});

/**
 * Command-line overrides win over environment variables, which win over the
 * per-user defaults. Relative paths resolve against the working directory.
 */
export const resolveConfig = (overrides: ConfigOverrides = {}, env: NodeJS.ProcessEnv = process.env): StoreConfig => {
  const parsed = ConfigOverridesSchema.safeParse(overrides);
  if (!parsed.success) {
    throw new UsageError(parsed.error.issues.map((issue) => issue.message).join('; '));
  }

  const defaults = defaultConfig();
  const dataFile = parsed.data.dataFile ?? (env[DATA_FILE_ENV] || defaults.dataFile);
  const keyFile = parsed.data.keyFile ?? (env[KEY_FILE_ENV] || defaults.keyFile);

  return {
    dataFile: path.resolve(dataFile),
    keyFile: path.resolve(keyFile),
  };
};
