import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import path from 'node:path';

import {
  defaultRuntimeConfig,
  loadRuntimeConfig,
  parseRuntimeConfig,
  resolveTarget,
  substituteEnv,
} from '../runtime-config.js';
import { ErrorCode } from '../../errors/codes.js';
import { ConfigError } from '../../types/errors.js';

const minimal = {
  targets: {
    legacy: { base_url: 'http://legacy.test' },
    rewrite: { base_url: 'http://rewrite.test', headers: { authorization: 'Bearer ${API_TOKEN}' } },
  },
  target_a: 'legacy',
  target_b: 'rewrite',
};

const env = { API_TOKEN: 'test-token' };

describe('substituteEnv', () => {
  it('replaces references inside nested strings', () => {
    expect(substituteEnv({ a: ['x-${API_TOKEN}-y', 3] }, env)).toEqual({ a: ['x-test-token-y', 3] });
  });

  it('names the unset variable and where it was used', () => {
    expect(() => substituteEnv({ a: { b: '${MISSING}' } }, {})).toThrow(
      'Environment variable MISSING is not set (referenced at $.a.b)'
    );
  });
});

describe('parseRuntimeConfig', () => {
  it('applies defaults', () => {
    const config = parseRuntimeConfig(minimal, undefined, env);
    expect(config.sourceOfTruth).toBe('a');
    expect(config.defaultTimeoutMs).toBe(30000);
    expect(config.operationTimeoutsMs).toEqual({});
    expect(config.redactFields).toEqual([]);
    expect(config.evaluator).toEqual({ workerTimeoutMs: 5000, callTimeoutMs: 10000, maxRestarts: 3 });
    expect(config.requestsPerSecond).toBeUndefined();
    expect(config.targets.get('rewrite')).toEqual({
      name: 'rewrite',
      baseUrl: 'http://rewrite.test',
      headers: { authorization: 'Bearer test-token' },
    });
  });

  it('converts seconds and resolves the rules file beside the configuration', () => {
    const config = parseRuntimeConfig(
      {
        ...minimal,
        comparison_rules: 'rules.yaml',
        source_of_truth: 'b',
        rate_limit: { requests_per_second: 5 },
        secrets: { redact_fields: ['$.token'] },
        timeouts: { default: 2.5, operations: { createItem: 10 } },
        evaluator: { call_timeout_ms: 200 },
      },
      '/etc/diffprobe/config.yaml',
      env
    );
    expect(config.file).toBe(path.resolve('/etc/diffprobe/config.yaml'));
    expect(config.comparisonRules).toBe(path.resolve('/etc/diffprobe', 'rules.yaml'));
    expect(config.sourceOfTruth).toBe('b');
    expect(config.requestsPerSecond).toBe(5);
    expect(config.redactFields).toEqual(['$.token']);
    expect(config.defaultTimeoutMs).toBe(2500);
    expect(config.operationTimeoutsMs).toEqual({ createItem: 10000 });
    expect(config.evaluator.callTimeoutMs).toBe(200);
  });

  it('rejects documents the schema does not allow', () => {
    expect(() => parseRuntimeConfig({})).toThrow("Invalid configuration: / must have required property 'targets'");
    expect(() => parseRuntimeConfig({ targets: { x: { base_url: 'ftp://x' } } })).toThrow(ConfigError);
  });

  it('rejects target_a naming an unknown target', () => {
    expect(() => parseRuntimeConfig({ ...minimal, target_a: 'staging' }, undefined, env)).toThrow(
      "target_a names unknown target 'staging' (known: legacy, rewrite)"
    );
  });
});

describe('loadRuntimeConfig', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(path.join(tmpdir(), 'diffprobe-config-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('reads YAML from disk', async () => {
    const file = path.join(dir, 'diffprobe.yaml');
    await writeFile(
      file,
      ['targets:', '  legacy:', '    base_url: http://legacy.test', 'target_a: legacy', 'comparison_rules: ./rules.yaml', ''].join('\n')
    );
    const config = await loadRuntimeConfig(file, {});
    expect(config.targetA).toBe('legacy');
    expect(config.comparisonRules).toBe(path.join(dir, 'rules.yaml'));
  });

  it('reports unreadable and malformed files as configuration errors', async () => {
    await expect(loadRuntimeConfig(path.join(dir, 'missing.yaml'))).rejects.toMatchObject({
      errorCode: ErrorCode.CONFIGURATION_ERROR,
    });
    const bad = path.join(dir, 'bad.yaml');
    await writeFile(bad, 'targets: [unclosed');
    await expect(loadRuntimeConfig(bad)).rejects.toThrow(/^Configuration is not valid YAML: /);
  });
});

describe('resolveTarget', () => {
  const config = parseRuntimeConfig(minimal, undefined, env);

  it('prefers the explicit argument, then the configured role', () => {
    expect(resolveTarget(config, undefined, 'a').baseUrl).toBe('http://legacy.test');
    expect(resolveTarget(config, 'rewrite', 'a').baseUrl).toBe('http://rewrite.test');
  });

  it('accepts a bare URL under the role name', () => {
    expect(resolveTarget(config, 'https://other.test/api', 'b')).toEqual({
      name: 'b',
      baseUrl: 'https://other.test/api',
      headers: {},
    });
  });

  it('fails on a missing or unknown target', () => {
    expect(() => resolveTarget(defaultRuntimeConfig(), undefined, 'b')).toThrow(
      'No target B given; pass --target-b or set target_b in the configuration'
    );
    expect(() => resolveTarget(config, 'staging', 'a')).toThrow(
      "Unknown target 'staging'; expected a configured target name or an http(s) URL"
    );
  });
});
