import dotenv from 'dotenv';

// Load .env from the working directory of the consuming process
dotenv.config();

export interface Config {
  nodeEnv: string;
  logLevel: string;
  apiUrl: string;
  username: string;
  password: string;
  verifySsl: boolean;
  caBundlePath: string | null;
  timeoutMs: number;
}

export const DEFAULT_API_URL = 'https://svc.aebroadcast.com.br/';

/**
 * Reads the client configuration from environment variables.
 * Exposed as a function so credentials can be re-read after the process env changes.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const nodeEnv = env.NODE_ENV || 'development';
  const timeoutMs = parseInt(env.DATAFEED_TIMEOUT_MS || '0', 10);

  return {
    nodeEnv,
    logLevel: env.LOG_LEVEL || (nodeEnv === 'production' ? 'info' : nodeEnv === 'test' ? 'silent' : 'debug'),
    apiUrl: env.DATAFEED_API_URL || DEFAULT_API_URL,
    username: env.DATAFEED_USERNAME || '',
    password: env.DATAFEED_PASSWORD || '',
    verifySsl: env.DATAFEED_VERIFY_SSL !== 'false', // enabled by default
    caBundlePath: env.DATAFEED_CA_BUNDLE || null,
    timeoutMs: Number.isNaN(timeoutMs) ? 0 : timeoutMs, // 0 = no timeout
  };
}

export const config: Config = loadConfig();
