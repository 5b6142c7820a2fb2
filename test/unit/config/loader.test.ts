import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, writeFileSync, rmSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { ConfigError, loadConfig } from '../../../src/config/loader.js';

describe('loadConfig', () => {
  let tempDir: string;

  beforeEach(() => {
    tempDir = mkdtempSync(join(tmpdir(), 'twinpane-config-'));
    vi.spyOn(process, 'cwd').mockReturnValue(tempDir);
  });

  afterEach(() => {
    vi.restoreAllMocks();
    rmSync(tempDir, { recursive: true, force: true });
  });

  it('should fill in defaults', async () => {
    const config = await loadConfig();
    expect(config).toEqual({
      lookahead: 3,
      binaryProbeBytes: 8192,
      closeGuard: 'two-step',
      preserveTimestamps: true,
      showHidden: true,
      output: 'text',
      logLevel: 'info',
    });
  });

  it('should override defaults with CLI options', async () => {
    const config = await loadConfig({
      lookahead: '5',
      binaryProbeBytes: '1024',
      closeGuard: 'prompt',
      output: 'json',
      exclude: ['*.log'],
      showHidden: false,
      preserveTimestamps: false,
      verbose: true,
    });
    expect(config.lookahead).toBe(5);
    expect(config.binaryProbeBytes).toBe(1024);
    expect(config.closeGuard).toBe('prompt');
    expect(config.output).toBe('json');
    expect(config.exclude).toEqual(['*.log']);
    expect(config.showHidden).toBe(false);
    expect(config.preserveTimestamps).toBe(false);
    expect(config.logLevel).toBe('debug');
  });

  it('should reject an unknown close guard', async () => {
    await expect(loadConfig({ closeGuard: 'ask' })).rejects.toThrow();
  });

  it('should reject a non-numeric lookahead', async () => {
    await expect(loadConfig({ lookahead: 'many' })).rejects.toThrow();
  });

  it('should reject a zero lookahead', async () => {
    await expect(loadConfig({ lookahead: '0' })).rejects.toThrow();
  });
});

describe('config file loading', () => {
  let tempDir: string;

  beforeEach(() => {
    tempDir = mkdtempSync(join(tmpdir(), 'twinpane-config-'));
    vi.spyOn(process, 'cwd').mockReturnValue(tempDir);
  });

  afterEach(() => {
    vi.restoreAllMocks();
    rmSync(tempDir, { recursive: true, force: true });
  });

  it('should load JSON config file', async () => {
    const tempFilePath = join(tempDir, '.twinpanerc.json');
    writeFileSync(tempFilePath, JSON.stringify({ lookahead: 4, closeGuard: 'prompt' }), 'utf-8');

    const config = await loadConfig({ config: tempFilePath });

    expect(config.lookahead).toBe(4);
    expect(config.closeGuard).toBe('prompt');
  });

  it('should load YAML config file', async () => {
    const tempFilePath = join(tempDir, '.twinpanerc.yml');
    writeFileSync(tempFilePath, 'showHidden: false\nexclude:\n  - node_modules\n  - "*.tmp"\n', 'utf-8');

    const config = await loadConfig({ config: tempFilePath });

    expect(config.showHidden).toBe(false);
    expect(config.exclude).toEqual(['node_modules', '*.tmp']);
  });

  it('should discover a config file in the working directory', async () => {
    writeFileSync(join(tempDir, '.twinpanerc.yaml'), 'output: json\n', 'utf-8');

    const config = await loadConfig();

    expect(config.output).toBe('json');
  });

  it('should let CLI options win over the file', async () => {
    const tempFilePath = join(tempDir, '.twinpanerc.json');
    writeFileSync(tempFilePath, JSON.stringify({ lookahead: 4 }), 'utf-8');

    const config = await loadConfig({ config: tempFilePath, lookahead: '2' });

    expect(config.lookahead).toBe(2);
  });

  it('should treat an empty YAML file as no settings', async () => {
    const tempFilePath = join(tempDir, '.twinpanerc.yml');
    writeFileSync(tempFilePath, '', 'utf-8');

    const config = await loadConfig({ config: tempFilePath });

    expect(config.lookahead).toBe(3);
  });

  it('should throw on malformed JSON', async () => {
    const tempFilePath = join(tempDir, '.twinpanerc.json');
    writeFileSync(tempFilePath, '{ broken json', 'utf-8');

    await expect(loadConfig({ config: tempFilePath })).rejects.toThrow('Failed to parse config file');
  });

  it('should throw when the file is not an object', async () => {
    const tempFilePath = join(tempDir, '.twinpanerc.yml');
    writeFileSync(tempFilePath, '- just\n- a list\n', 'utf-8');

    await expect(loadConfig({ config: tempFilePath })).rejects.toThrow(ConfigError);
  });
});
