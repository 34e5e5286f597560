import { Logger } from '@nestjs/common';
import * as fs from 'fs';
import { configValidationSchema } from './config.schema';
import { AppConfig } from './config.types';
import { resolveConfigPath } from '../cli/paths';
import { PortkeyModuleOptions } from '../portkey/portkey.types';

const logger = new Logger('Config');

/** Replace `${NAME}` and `${NAME:default}` in every string leaf. */
export function expandEnvVars(value: unknown): unknown {
  if (typeof value === 'string') {
    return value.replace(/\$\{(\w+)(?::([^}]*))?\}/g, (_match, name: string, defaultVal?: string) => {
      return process.env[name] ?? defaultVal ?? '';
    });
  }
  if (Array.isArray(value)) {
    return value.map(expandEnvVars);
  }
  if (value && typeof value === 'object') {
    const result: Record<string, unknown> = {};
    for (const [key, entry] of Object.entries(value)) {
      result[key] = expandEnvVars(entry);
    }
    return result;
  }
  return value;
}

export function loadConfig(configPath: string = resolveConfigPath()): AppConfig {
  if (!fs.existsSync(configPath)) {
    throw new Error(`Config file not found: ${configPath}`);
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(fs.readFileSync(configPath, 'utf-8'));
  } catch {
    throw new Error(`Config file is not valid JSON: ${configPath}`);
  }

  const result = configValidationSchema.validate(expandEnvVars(parsed), {
    allowUnknown: true,
    abortEarly: false,
  });
  if (result.error) {
    throw new Error(`Config validation error: ${result.error.message}`);
  }
  logger.debug(`Loaded ${configPath}`);
  return result.value;
}

export function toPortkeyModuleOptions(config: AppConfig): PortkeyModuleOptions {
  return {
    credentials: {
      apiKey: config.portkey.api_key,
      virtualKey: config.portkey.virtual_key,
    },
    options: {
      timeout: config.portkey.timeout,
      maxRetries: config.portkey.max_retries,
    },
  };
}
