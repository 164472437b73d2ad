import { describe, it, expect } from 'vitest';
import { loadConfig, DEFAULT_PORT, DEFAULT_TREE_NODE_LIMIT } from '../config.js';

describe('loadConfig', () => {
  it('should fall back to defaults for an empty environment', () => {
    expect(loadConfig({})).toEqual({
      port: DEFAULT_PORT,
      host: '0.0.0.0',
      nodeEnv: 'development',
      hideLogs: false,
      treeNodeLimit: DEFAULT_TREE_NODE_LIMIT,
      strictTrees: false,
      corsOrigins: ['http://localhost:5173'],
      warnings: []
    });
  });

  it('should read every setting', () => {
    const config = loadConfig({
      PORT: '8080',
      HOST: '127.0.0.1',
      NODE_ENV: 'production',
      HIDE_LOGS: 'true',
      TREE_NODE_LIMIT: '500',
      TREE_STRICT_MODE: '1',
      CORS_ORIGINS: 'https://a.test, https://b.test,'
    });

    expect(config).toEqual({
      port: 8080,
      host: '127.0.0.1',
      nodeEnv: 'production',
      hideLogs: true,
      treeNodeLimit: 500,
      strictTrees: true,
      corsOrigins: ['https://a.test', 'https://b.test'],
      warnings: []
    });
  });

  it('should warn and fall back on malformed numbers', () => {
    const config = loadConfig({ PORT: 'http', TREE_NODE_LIMIT: '-5' });

    expect(config.port).toBe(DEFAULT_PORT);
    expect(config.treeNodeLimit).toBe(DEFAULT_TREE_NODE_LIMIT);
    expect(config.warnings).toEqual([
      'PORT=http is not an integer >= 0, using 3001',
      'TREE_NODE_LIMIT=-5 is not an integer >= 0, using 1000000'
    ]);
  });

  it('should only enable strict mode for true or 1', () => {
    expect(loadConfig({ TREE_STRICT_MODE: 'TRUE' }).strictTrees).toBe(true);
    expect(loadConfig({ TREE_STRICT_MODE: 'yes' }).strictTrees).toBe(false);
  });
});
