import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, writeFileSync } from 'node:fs';
import { homedir, tmpdir } from 'node:os';
import { join } from 'node:path';

import { expandHome, loadConfig, parseConfig } from '../../src/core/config.js';
import { isLogLevel, toErrorMessage } from '../../src/core/logger.js';

const ENV_KEYS = [
  'TIDEWATCH_CONFIG_PATH',
  'TIDEWATCH_TRADING_MODE',
  'TIDEWATCH_STATE_PATH',
  'SOLANA_RPC_URL',
  'TIDEWATCH_LOG_LEVEL',
];

function writeYaml(content: string): string {
  const dir = mkdtempSync(join(tmpdir(), 'tidewatch-config-'));
  const path = join(dir, 'config.yaml');
  writeFileSync(path, content, 'utf-8');
  return path;
}

describe('parseConfig', () => {
  it('fills every section with defaults', () => {
    const config = parseConfig({});
    expect(config.trading.mode).toBe('dry_run');
    expect(config.runner).toMatchObject({
      cycleIntervalSeconds: 300,
      errorBackoffSeconds: 600,
      idleBackoffSeconds: 450,
      maxConsecutiveErrors: 3,
      stopTimeoutMs: 15_000,
    });
    expect(config.solana.submission).toEqual({
      maxRetries: 3,
      baseDelayMs: 2000,
      directRpcFallback: true,
    });
    expect(config.agent.objectives.length).toBeGreaterThan(0);
  });

  it('rejects an unknown trading mode', () => {
    expect(() => parseConfig({ trading: { mode: 'yolo' } })).toThrow();
  });
});

describe('loadConfig', () => {
  beforeEach(() => {
    for (const key of ENV_KEYS) vi.stubEnv(key, '');
  });

  afterEach(() => {
    vi.unstubAllEnvs();
  });

  it('reads YAML and expands home paths', () => {
    const path = writeYaml(
      ['trading:', '  mode: live', 'state:', '  path: ~/tw/state.json', 'runner:', '  cycleIntervalSeconds: 60'].join('\n')
    );

    const config = loadConfig(path);

    expect(config.trading.mode).toBe('live');
    expect(config.runner.cycleIntervalSeconds).toBe(60);
    expect(config.state.path).toBe(join(homedir(), 'tw', 'state.json'));
  });

  it('lets the environment override the file', () => {
    const path = writeYaml('trading:\n  mode: live\n');
    vi.stubEnv('TIDEWATCH_CONFIG_PATH', path);
    vi.stubEnv('TIDEWATCH_TRADING_MODE', 'dry_run');
    vi.stubEnv('TIDEWATCH_STATE_PATH', '/tmp/tidewatch-state.json');
    vi.stubEnv('SOLANA_RPC_URL', 'http://rpc.test');
    vi.stubEnv('TIDEWATCH_LOG_LEVEL', 'debug');

    const config = loadConfig();

    expect(config.trading.mode).toBe('dry_run');
    expect(config.state.path).toBe('/tmp/tidewatch-state.json');
    expect(config.solana.rpcUrl).toBe('http://rpc.test');
    expect(config.logging.level).toBe('debug');
  });

  it('ignores an unrecognized log level override', () => {
    const path = writeYaml('logging:\n  level: warn\n');
    vi.stubEnv('TIDEWATCH_LOG_LEVEL', 'verbose');
    expect(loadConfig(path).logging.level).toBe('warn');
  });

  it('treats an empty file as all defaults', () => {
    expect(loadConfig(writeYaml('')).trading.mode).toBe('dry_run');
  });
});

describe('helpers', () => {
  it('expands only a leading ~/', () => {
    expect(expandHome('~/a/b')).toBe(join(homedir(), 'a', 'b'));
    expect(expandHome('/abs/~/x')).toBe('/abs/~/x');
  });

  it('recognizes log levels', () => {
    expect(isLogLevel('warn')).toBe(true);
    expect(isLogLevel('toString')).toBe(false);
  });

  it('turns any thrown value into a message', () => {
    expect(toErrorMessage(new Error('boom'))).toBe('boom');
    expect(toErrorMessage('plain')).toBe('plain');
    expect(toErrorMessage({ code: 7 })).toBe('{"code":7}');
    expect(toErrorMessage(undefined)).toBe('undefined');
  });
});
