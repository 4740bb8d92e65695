import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { loadConfig, loadStaticPrompts, parseConfig } from './config.js';

const MINIMAL = `
access:
  adminIds: ["1"]
providers:
  default: openai
  openai:
    model: gpt-test
`;

const ENV = {
  SWITCHBOARD_FRONTEND_TOKEN: 'test-token',
  OPENAI_API_KEY: 'test-openai-key',
};

describe('config', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'switchboard-'));
    writeFileSync(join(dir, 'default-prompt.yaml'), 'chat_default: |\n  Be helpful.\n');
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  function writeConfig(yaml: string) {
    writeFileSync(join(dir, 'config.yaml'), yaml);
  }

  it('loads a minimal config with defaults', () => {
    writeConfig(MINIMAL);
    const config = loadConfig(dir, ENV);

    expect(config.server).toEqual({ port: 3000, host: '0.0.0.0' });
    expect(config.databasePath).toBe(join(dir, 'switchboard.db'));
    expect(config.access).toEqual({ adminIds: ['1'], defaultLevel: 'standard', frontendToken: 'test-token' });
    expect(config.prompts).toEqual({
      maxLength: 4000,
      historyLimit: 25,
      persistForceMode: true,
      defaultPrompt: 'Be helpful.',
      fixpyPrompt: null,
    });
    expect(config.providers.initial).toBe('openai');
    expect(config.providers.entries).toEqual([
      { type: 'openai', apiKey: 'test-openai-key', timeout: undefined, baseUrl: undefined, model: 'gpt-test' },
    ]);
    expect([...config.providers.params]).toEqual([['openai', { model: 'gpt-test' }]]);
  });

  it('merges admin ids from the environment', () => {
    writeConfig(MINIMAL);
    const config = loadConfig(dir, { ...ENV, SWITCHBOARD_ADMIN_IDS: ' 2, 1 ,,3' });
    expect(config.access.adminIds).toEqual(['1', '2', '3']);
  });

  it('rejects unquoted admin ids instead of rounding them', () => {
    writeConfig(MINIMAL.replace('["1"]', '\n    - 100000000000000001'));
    expect(() => loadConfig(dir, ENV))
      .toThrow('access.adminIds.0: admin ids must be quoted strings, e.g. "100000000000000001"');
  });

  it('keeps quoted large admin ids exact', () => {
    writeConfig(MINIMAL.replace('["1"]', '\n    - "100000000000000001"'));
    expect(loadConfig(dir, ENV).access.adminIds).toEqual(['100000000000000001']);
  });

  it('loads the code-fixing prompt next to the default', () => {
    writeConfig(MINIMAL);
    writeFileSync(join(dir, 'default-prompt.yaml'), 'chat_default: Be helpful.\nfixpy: |\n  Fix the code.\n');
    expect(loadConfig(dir, ENV).prompts.fixpyPrompt).toBe('Fix the code.');
  });

  it('requires the front-end token', () => {
    writeConfig(MINIMAL);
    expect(() => loadConfig(dir, { OPENAI_API_KEY: 'k' })).toThrow('SWITCHBOARD_FRONTEND_TOKEN must be set');
  });

  it('requires API keys for configured cloud providers', () => {
    writeConfig(MINIMAL);
    expect(() => loadConfig(dir, { SWITCHBOARD_FRONTEND_TOKEN: 't' }))
      .toThrow('OPENAI_API_KEY is required when provider "openai" is configured');
  });

  it('does not need a key for ollama', () => {
    writeConfig(`
providers:
  default: ollama
  ollama:
    model: qwen
`);
    const config = loadConfig(dir, { SWITCHBOARD_FRONTEND_TOKEN: 't' });
    expect(config.providers.entries).toEqual([{ type: 'ollama', model: 'qwen' }]);
  });

  it('fails when the config file is missing', () => {
    expect(() => loadConfig(dir, ENV)).toThrow(/Config not found/);
  });

  it('fails when the default prompt is missing', () => {
    writeConfig(MINIMAL + 'prompts:\n  defaultPath: nope.txt\n');
    expect(() => loadConfig(dir, ENV)).toThrow(/Default system prompt not found/);
  });

  it('reads plain-text default prompts', () => {
    writeFileSync(join(dir, 'prompt.txt'), '\n  Plain prompt.  \n');
    expect(loadStaticPrompts(join(dir, 'prompt.txt'))).toEqual({ chatDefault: 'Plain prompt.', fixpy: null });
  });

  it('rejects YAML prompts without chat_default', () => {
    writeFileSync(join(dir, 'bad.yml'), 'other: x\n');
    expect(() => loadStaticPrompts(join(dir, 'bad.yml'))).toThrow('must define a "chat_default" string');
  });

  it('rejects empty default prompts', () => {
    writeFileSync(join(dir, 'empty.txt'), '   \n');
    expect(() => loadStaticPrompts(join(dir, 'empty.txt'))).toThrow(/is empty/);
  });
});

describe('parseConfig', () => {
  it('rejects a default provider that is not configured', () => {
    expect(() => parseConfig({ providers: { default: 'gemini', openai: { model: 'x' } } }))
      .toThrow('providers.default: providers.default must name a configured provider');
  });

  it('applies per-provider temperature ranges', () => {
    expect(() => parseConfig({ providers: { default: 'anthropic', anthropic: { model: 'c', temperature: 1.5 } } }))
      .toThrow(/providers\.anthropic\.temperature/);
    expect(parseConfig({ providers: { default: 'openai', openai: { model: 'o', temperature: 1.5 } } })
      .providers.openai?.temperature).toBe(1.5);
  });

  it('rejects unknown provider names as default', () => {
    expect(() => parseConfig({ providers: { default: 'foo' } })).toThrow(/providers\.default/);
  });
});
