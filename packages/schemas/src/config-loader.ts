import { readFile } from 'node:fs/promises';
import { ConfigurationError } from '@embedlens/shared/src/utils/errors.js';
import { validateEmbedLensConfig } from './validators.js';
import type { EmbedLensConfig } from './config.schema.js';

type Env = Readonly<Record<string, string | undefined>>;

async function readJsonFile(filePath: string): Promise<unknown> {
  try {
    const content = await readFile(filePath, 'utf-8');
    return JSON.parse(content) as unknown;
  } catch (error) {
    if (error instanceof SyntaxError) {
      throw new ConfigurationError(`Invalid JSON in ${filePath}: ${error.message}`);
    }
    if (isErrnoException(error) && error.code === 'ENOENT') {
      throw new ConfigurationError(`Configuration file not found: ${filePath}`);
    }
    const message = error instanceof Error ? error.message : String(error);
    throw new ConfigurationError(`Failed to read configuration file ${filePath}: ${message}`);
  }
}

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function section(raw: Record<string, unknown>, key: string): Record<string, unknown> {
  const value = raw[key];
  return isRecord(value) ? { ...value } : {};
}

function parsePort(value: string): number | string {
  const port = Number(value);
  // Leave unparseable values as strings so validation reports them.
  return Number.isInteger(port) ? port : value;
}

export function applyEnvOverrides(raw: unknown, env: Env): unknown {
  if (!isRecord(raw)) {
    return raw;
  }

  const ollama = section(raw, 'ollama');
  const embedding = section(raw, 'embedding');
  const server = section(raw, 'server');

  if (env['EMBEDLENS_OLLAMA_URL']) {
    ollama['baseUrl'] = env['EMBEDLENS_OLLAMA_URL'];
  }
  if (env['EMBEDLENS_EMBEDDING_MODEL']) {
    embedding['defaultModel'] = env['EMBEDLENS_EMBEDDING_MODEL'];
  }
  if (env['PORT']) {
    server['port'] = parsePort(env['PORT']);
  }

  return { ...raw, ollama, embedding, server };
}

/**
 * Loads the configuration from an optional JSON file, then applies
 * `EMBEDLENS_OLLAMA_URL`, `EMBEDLENS_EMBEDDING_MODEL` and `PORT` on top.
 * Without a file every setting starts from its schema default.
 */
export async function loadConfig(
  configPath?: string,
  env: Env = process.env,
): Promise<EmbedLensConfig> {
  const raw = configPath ? await readJsonFile(configPath) : {};
  return validateEmbedLensConfig(applyEnvOverrides(raw, env));
}
