// rubify/config - Settings read from the environment

import { isTokenLayout, TOKEN_LAYOUTS, type TokenLayout } from './protocol.js';

export interface RubifyConfig {
  /** kuromoji dictionary directory; the bundled one when unset */
  dictPath?: string;
  layout: TokenLayout;
  /** CSV user dictionary applied when a request brings none */
  userDictPath?: string;
  debug: boolean;
  port: number;
}

const DEFAULT_PORT = 3000;

function invalid(name: string, value: string, reason: string): Error {
  return new Error(`Invalid configuration (${name}=${value}): ${reason}`);
}

function parseFlag(name: string, value: string | undefined): boolean {
  if (value === undefined || value === '') return false;
  const normalized = value.toLowerCase();
  if (['1', 'true', 'yes', 'on'].includes(normalized)) return true;
  if (['0', 'false', 'no', 'off'].includes(normalized)) return false;
  throw invalid(name, value, 'expected a boolean');
}

function parsePort(value: string | undefined): number {
  if (value === undefined || value === '') return DEFAULT_PORT;
  const port = Number(value);
  if (!Number.isInteger(port) || port < 0 || port > 65535) {
    throw invalid('PORT', value, 'expected an integer between 0 and 65535');
  }
  return port;
}

export function getConfigFromEnv(env: NodeJS.ProcessEnv = process.env): RubifyConfig {
  const layout = env.RUBIFY_LAYOUT || 'details';
  if (!isTokenLayout(layout)) {
    throw invalid('RUBIFY_LAYOUT', layout, `expected one of ${TOKEN_LAYOUTS.join(', ')}`);
  }

  const config: RubifyConfig = {
    layout,
    debug: parseFlag('RUBIFY_DEBUG', env.RUBIFY_DEBUG),
    port: parsePort(env.PORT)
  };

  if (env.RUBIFY_DICT_PATH) {
    config.dictPath = env.RUBIFY_DICT_PATH;
  }
  if (env.RUBIFY_USER_DICT) {
    config.userDictPath = env.RUBIFY_USER_DICT;
  }

  return config;
}
