/**
 * Tests for project config loading and env overrides.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdirSync, rmSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import {
  getProjectConfigPath,
  getSampleDecisionsPath,
  loadProjectConfig,
} from '../infra/config/project/projectConfig.js';
import { applyProjectConfigEnvOverrides } from '../infra/config/env/config-env-overrides.js';

describe('loadProjectConfig', () => {
  let projectDir: string;

  beforeEach(() => {
    projectDir = join(tmpdir(), `decision-log-test-config-${Date.now()}-${Math.random().toString(36).slice(2)}`);
    mkdirSync(projectDir, { recursive: true });
  });

  afterEach(() => {
    rmSync(projectDir, { recursive: true, force: true });
  });

  function writeConfig(content: string): void {
    mkdirSync(join(projectDir, '.decision-log'), { recursive: true });
    writeFileSync(getProjectConfigPath(projectDir), content, 'utf-8');
  }

  it('should fall back to the bundled sample and info level', () => {
    expect(loadProjectConfig(projectDir, {})).toEqual({
      source: getSampleDecisionsPath(),
      logLevel: 'info',
    });
  });

  it('should place the sample log under data/', () => {
    expect(getSampleDecisionsPath().endsWith(join('data', 'sample-decisions.json'))).toBe(true);
  });

  it('should resolve a relative source against the project directory', () => {
    writeConfig('source: logs/decisions.yaml\nlog_level: debug\n');

    expect(loadProjectConfig(projectDir, {})).toEqual({
      source: join(projectDir, 'logs', 'decisions.yaml'),
      logLevel: 'debug',
    });
  });

  it('should keep an absolute source as is', () => {
    const absolute = join(projectDir, 'elsewhere', 'log.json');
    writeConfig(`source: ${absolute}\n`);

    expect(loadProjectConfig(projectDir, {}).source).toBe(absolute);
  });

  it('should treat an empty config file as defaults', () => {
    writeConfig('');

    expect(loadProjectConfig(projectDir, {}).logLevel).toBe('info');
  });

  it('should let environment variables override the file', () => {
    writeConfig('source: from-file.json\nlog_level: debug\n');

    const config = loadProjectConfig(projectDir, {
      DECISION_LOG_SOURCE: 'from-env.jsonl',
      DECISION_LOG_LEVEL: 'warn',
    });

    expect(config).toEqual({ source: join(projectDir, 'from-env.jsonl'), logLevel: 'warn' });
  });

  it('should reject an unknown log level', () => {
    expect(() => loadProjectConfig(projectDir, { DECISION_LOG_LEVEL: 'loud' }))
      .toThrow(/^Invalid project config \(.*config\.yaml\): log_level: /);
  });

  it('should reject a config that is not a mapping', () => {
    writeConfig('- a\n- b\n');

    expect(() => loadProjectConfig(projectDir, {}))
      .toThrow(`Invalid ${getProjectConfigPath(projectDir)}: expected a mapping at the top level`);
  });

  it('should reject malformed YAML', () => {
    writeConfig('source: [unclosed\n');

    expect(() => loadProjectConfig(projectDir, {})).toThrow(/^Failed to parse /);
  });
});

describe('applyProjectConfigEnvOverrides', () => {
  it('should ignore unset and blank variables', () => {
    const raw: Record<string, unknown> = { source: 'keep.json' };

    applyProjectConfigEnvOverrides(raw, { DECISION_LOG_SOURCE: '   ', DECISION_LOG_LEVEL: undefined });

    expect(raw).toEqual({ source: 'keep.json' });
  });

  it('should trim override values', () => {
    const raw: Record<string, unknown> = {};

    applyProjectConfigEnvOverrides(raw, { DECISION_LOG_LEVEL: ' error ' });

    expect(raw).toEqual({ log_level: 'error' });
  });
});
