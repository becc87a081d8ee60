import * as path from 'node:path';
import * as os from 'node:os';
import * as fs from 'node:fs/promises';
import { z } from 'zod';
import { getCountries, type CountryCode } from 'libphonenumber-js';
import { DEFAULT_PREFS_NAMESPACE } from './store/index.js';
import { ConfigError, errnoCode, logger } from './utils/index.js';

export interface AppConfig {
  storePath: string;
  /** Preference namespace that holds the `ENS_<contactId>` overrides. */
  preferencesNamespace: string;
  /** Region used to normalise phone numbers written without a country code. */
  defaultCountry: CountryCode;
}

const configFileSchema = z.object({
  storePath: z.string().min(1).optional(),
  preferencesNamespace: z.string().regex(/^[\w.-]+$/).optional(),
  defaultCountry: z.string().optional(),
});

const CONFIG_DIR = path.join(os.homedir(), '.ethcontacts');
const DEFAULT_STORE_PATH = path.join(CONFIG_DIR, 'store');

export async function loadConfig(env: NodeJS.ProcessEnv = process.env): Promise<AppConfig> {
  const configPath = env.ETHCONTACTS_CONFIG ?? path.join(CONFIG_DIR, 'config.json');
  const file = await readConfigFile(configPath);

  const countryCode = (file.defaultCountry ?? 'US').toUpperCase();
  const defaultCountry = getCountries().find(c => c === countryCode);
  if (!defaultCountry) {
    throw new ConfigError(`Unsupported defaultCountry in ${configPath}: ${file.defaultCountry}`);
  }

  return {
    storePath: env.ETHCONTACTS_STORE ?? file.storePath ?? DEFAULT_STORE_PATH,
    preferencesNamespace: file.preferencesNamespace ?? DEFAULT_PREFS_NAMESPACE,
    defaultCountry,
  };
}

async function readConfigFile(configPath: string): Promise<z.infer<typeof configFileSchema>> {
  let raw: string;
  try {
    raw = await fs.readFile(configPath, 'utf-8');
  } catch (err) {
    if (errnoCode(err) === 'ENOENT') {
      logger.debug('No config file at', configPath, '- using defaults');
      return {};
    }
    throw err;
  }

  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch {
    throw new ConfigError(`Config file is not valid JSON: ${configPath}`);
  }
  const parsed = configFileSchema.safeParse(json);
  if (!parsed.success) {
    throw new ConfigError(`Invalid config in ${configPath}: ${parsed.error.message}`);
  }
  return parsed.data;
}
