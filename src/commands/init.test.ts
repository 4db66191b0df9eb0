import { existsSync, mkdtempSync, readFileSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { parse } from 'dotenv';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { SuiteParser } from '../parser/suite-parser.ts';
import { validateSuite } from '../parser/suite-validator.ts';
import { ConfigLoader } from '../utils/config-loader.ts';
import { SilentLogger } from '../utils/logger.ts';
import { initProject } from './init.ts';

describe('initProject', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'promptcheck-init-'));
  });

  afterEach(() => {
    ConfigLoader.clear();
    rmSync(dir, { recursive: true, force: true });
  });

  it('writes the starter files', () => {
    const result = initProject(dir, new SilentLogger());

    expect(result).toEqual({ created: ['tests.yaml', join('.promptcheck', 'config.yaml'), '.env.example'], skipped: [] });
    expect(existsSync(join(dir, '.promptcheck', 'config.yaml'))).toBe(true);
    expect(readFileSync(join(dir, '.env.example'), 'utf8')).toContain('OPENAI_API_KEY=');
  });

  it('writes an env example that dotenv reads as empty provider keys', () => {
    initProject(dir, new SilentLogger());

    const variables = parse(readFileSync(join(dir, '.env.example'), 'utf8'));
    expect(variables).toEqual({ OPENAI_API_KEY: '', ANTHROPIC_API_KEY: '' });
  });

  it('writes a suite and config that load and validate cleanly', () => {
    initProject(dir, new SilentLogger());

    const config = ConfigLoader.load(dir);
    expect(config.model_mappings).toEqual({ 'claude-*': 'anthropic' });

    const suite = SuiteParser.loadSuite(join(dir, 'tests.yaml'));
    expect(suite.tests.map((test) => test.id)).toEqual(['hello-world']);
    expect(validateSuite(suite, { knownProviders: Object.keys(config.providers) })).toEqual([]);
  });

  it('never overwrites existing files', () => {
    writeFileSync(join(dir, 'tests.yaml'), 'tests: []\n');

    const result = initProject(dir, new SilentLogger());

    expect(result.skipped).toEqual(['tests.yaml']);
    expect(result.created).toHaveLength(2);
    expect(readFileSync(join(dir, 'tests.yaml'), 'utf8')).toBe('tests: []\n');
  });
});
