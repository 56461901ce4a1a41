import * as fs from 'fs';
import * as yaml from 'js-yaml';
import { AppConfig, configValidationSchema } from '../../config/config.schema';
import { errorMessage } from './error-message';

export const DEFAULT_CONFIG_PATH = './config.yaml';

export function loadConfig(configPath: string): AppConfig {
  const file = fs.readFileSync(configPath, 'utf8');
  const parsed = yaml.load(file);

  const { error, value } = configValidationSchema.validate(parsed, {
    abortEarly: false,
  });

  if (error) {
    throw new Error(`Config validation error:\n${error.message}`);
  }

  return value;
}

export default (): AppConfig => {
  const configPath = process.env.LOGBOOK_CONFIG || DEFAULT_CONFIG_PATH;
  try {
    return loadConfig(configPath);
  } catch (e) {
    console.error(errorMessage(e));
    process.exit(1);
  }
};
