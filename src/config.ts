/**
 * Configuration loaded from the environment. The CLI entry point loads .env
 * into it before any command runs.
 */

import os from 'os';
import path from 'path';
import { ConfigurationError } from './errors';
import { sanitizeSecret } from './utils/validators';

export interface DigikeyConfig {
  clientId: string;
  clientSecret: string;
  storagePath: string;
  sandbox: boolean;
}

export interface MouserConfig {
  partApiKey: string;
}

export interface InvenTreeConfig {
  serverUrl: string;
  token: string;
}

export interface AppConfig {
  inventree?: InvenTreeConfig;
  digikey?: DigikeyConfig;
  mouser?: MouserConfig;
  requestTimeoutMs: number;
}

/**
 * A config whose InvenTree section is known to be present
 */
export type ValidatedConfig = AppConfig & { inventree: InvenTreeConfig };

export const DEFAULT_DIGIKEY_STORAGE_PATH = path.join(os.homedir(), '.partsync', '.digikey');

function readEnv(env: NodeJS.ProcessEnv, name: string): string | undefined {
  const value = env[name]?.trim();
  return value ? value : undefined;
}

function expandHome(p: string): string {
  return p.startsWith('~') ? path.join(os.homedir(), p.slice(1)) : p;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const config: AppConfig = {
    requestTimeoutMs: parseInt(env.REQUEST_TIMEOUT_MS || '30000', 10),
  };

  const serverUrl = readEnv(env, 'INVENTREE_SERVER_URL');
  const token = readEnv(env, 'INVENTREE_TOKEN');
  if (serverUrl && token) {
    config.inventree = { serverUrl, token };
  }

  const clientId = readEnv(env, 'DIGIKEY_CLIENT_ID');
  const clientSecret = readEnv(env, 'DIGIKEY_CLIENT_SECRET');
  if (clientId && clientSecret) {
    config.digikey = {
      clientId,
      clientSecret,
      storagePath: expandHome(readEnv(env, 'DIGIKEY_STORAGE_PATH') || DEFAULT_DIGIKEY_STORAGE_PATH),
      sandbox: (env.DIGIKEY_CLIENT_SANDBOX || 'false').toLowerCase() === 'true',
    };
  }

  const partApiKey = readEnv(env, 'MOUSER_PART_API_KEY');
  if (partApiKey) {
    config.mouser = { partApiKey };
  }

  return config;
}

export function validateConfig(config: AppConfig): asserts config is ValidatedConfig {
  if (!config.inventree) {
    throw new ConfigurationError(
      'InvenTree configuration is required (INVENTREE_SERVER_URL and INVENTREE_TOKEN)'
    );
  }

  if (!config.digikey && !config.mouser) {
    throw new ConfigurationError('At least one supplier API must be configured (DigiKey or Mouser)');
  }
}

/**
 * Lines printed by the `config` command, secrets masked
 */
export function describeConfig(config: AppConfig): string[] {
  const lines: string[] = [];

  if (config.inventree) {
    lines.push('✅ InvenTree:');
    lines.push(`   Server: ${config.inventree.serverUrl}`);
    lines.push(`   Token: ${'*'.repeat(10)}`);
  } else {
    lines.push('❌ InvenTree: Not configured');
    lines.push('   Set: INVENTREE_SERVER_URL, INVENTREE_TOKEN');
  }

  lines.push('');
  if (config.digikey) {
    lines.push('✅ DigiKey:');
    lines.push(`   Client ID: ${sanitizeSecret(config.digikey.clientId)}`);
    lines.push(`   Storage: ${config.digikey.storagePath}`);
    lines.push(`   Sandbox: ${config.digikey.sandbox}`);
  } else {
    lines.push('❌ DigiKey: Not configured');
    lines.push('   Set: DIGIKEY_CLIENT_ID, DIGIKEY_CLIENT_SECRET');
  }

  lines.push('');
  if (config.mouser) {
    lines.push('✅ Mouser:');
    lines.push(`   API Key: ${sanitizeSecret(config.mouser.partApiKey)}`);
  } else {
    lines.push('❌ Mouser: Not configured');
    lines.push('   Set: MOUSER_PART_API_KEY');
  }

  return lines;
}

export const CONFIGURATION_HINTS: readonly string[] = [
  'Please set the required environment variables:',
  '  - INVENTREE_SERVER_URL: Your InvenTree server URL',
  '  - INVENTREE_TOKEN: Your InvenTree API token',
  '',
  'For suppliers, set at least one:',
  '  DigiKey:',
  '    - DIGIKEY_CLIENT_ID',
  '    - DIGIKEY_CLIENT_SECRET',
  '  Mouser:',
  '    - MOUSER_PART_API_KEY',
];
