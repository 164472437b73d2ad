/**
 * Server configuration read from the environment (and .env through dotenv)
 */

export interface ServerConfig {
  port: number;
  host: string;
  nodeEnv: string;
  hideLogs: boolean;
  // Node budget shared by every hosted tree
  treeNodeLimit: number;
  // Throw on tree violations instead of returning status codes
  strictTrees: boolean;
  corsOrigins: string[];
  // Reasons any value fell back to its default
  warnings: string[];
}

export const DEFAULT_PORT = 3001;
export const DEFAULT_TREE_NODE_LIMIT = 1_000_000;

type Env = Record<string, string | undefined>;

function readInteger(env: Env, name: string, fallback: number, min: number, warnings: string[]): number {
  const raw = env[name];
  if (raw === undefined || raw.trim() === '') return fallback;

  const value = Number(raw);
  if (!Number.isInteger(value) || value < min) {
    warnings.push(`${name}=${raw} is not an integer >= ${min}, using ${fallback}`);
    return fallback;
  }
  return value;
}

function readFlag(env: Env, name: string): boolean {
  const raw = env[name]?.trim().toLowerCase();
  return raw === 'true' || raw === '1';
}

export function loadConfig(env: Env = process.env): ServerConfig {
  const warnings: string[] = [];
  const origins = (env['CORS_ORIGINS'] || 'http://localhost:5173')
    .split(',')
    .map(origin => origin.trim())
    .filter(origin => origin.length > 0);

  return {
    port: readInteger(env, 'PORT', DEFAULT_PORT, 0, warnings),
    host: env['HOST'] || '0.0.0.0',
    nodeEnv: env['NODE_ENV'] || 'development',
    hideLogs: Boolean(env['HIDE_LOGS']),
    treeNodeLimit: readInteger(env, 'TREE_NODE_LIMIT', DEFAULT_TREE_NODE_LIMIT, 0, warnings),
    strictTrees: readFlag(env, 'TREE_STRICT_MODE'),
    corsOrigins: origins,
    warnings
  };
}
