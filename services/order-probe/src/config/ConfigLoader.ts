/**
 * Configuration Loader
 *
 * Reads the probe's JSON config file once at startup and returns a frozen value that
 * is passed to each component's constructor. Nothing reads configuration globally.
 */

import { existsSync, readFileSync } from 'fs';
import * as path from 'path';
import { ZodError } from 'zod';
import { ConfigError } from '../utils/errors';
import {
  type Credentials,
  CredentialsSchema,
  type ProbeConfig,
  ProbeConfigSchema,
} from './ConfigSchema';

export const DEFAULT_CONFIG_PATH = path.join('config', 'order-probe.json');
export const CONFIG_PATH_ENV = 'ORDER_PROBE_CONFIG';
export const CLIENT_ID_ENV = 'DERIBIT_CLIENT_ID';
export const CLIENT_SECRET_ENV = 'DERIBIT_CLIENT_SECRET';

function firstIssue(error: ZodError): ConfigError {
  const issue = error.issues[0];
  const field = issue && issue.path.length > 0 ? issue.path.join('.') : undefined;
  return new ConfigError(issue ? issue.message : error.message, field);
}

export function resolveConfigPath(env: NodeJS.ProcessEnv = process.env): string {
  return env[CONFIG_PATH_ENV] || DEFAULT_CONFIG_PATH;
}

export function parseProbeConfig(raw: unknown): ProbeConfig {
  const parsed = ProbeConfigSchema.safeParse(raw);
  if (!parsed.success) {
    throw firstIssue(parsed.error);
  }
  return Object.freeze(parsed.data);
}

export function loadProbeConfig(configPath: string): ProbeConfig {
  if (!existsSync(configPath)) {
    throw new ConfigError(`config file not found at '${configPath}'`);
  }

  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(configPath, 'utf-8'));
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ConfigError(`failed to parse config file at '${configPath}': ${reason}`);
  }

  return parseProbeConfig(raw);
}

export function loadCredentials(env: NodeJS.ProcessEnv = process.env): Credentials {
  const parsed = CredentialsSchema.safeParse({
    clientId: env[CLIENT_ID_ENV]?.trim(),
    clientSecret: env[CLIENT_SECRET_ENV]?.trim(),
  });
  if (!parsed.success) {
    const field = parsed.error.issues[0]?.path[0] === 'clientSecret' ? CLIENT_SECRET_ENV : CLIENT_ID_ENV;
    throw new ConfigError('exchange credentials must be set and non-empty', field);
  }
  return Object.freeze(parsed.data);
}
