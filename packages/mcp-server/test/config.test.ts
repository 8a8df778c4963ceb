/**
 * Configuration loading from environment variables
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdir, writeFile } from 'fs/promises';
import path from 'path';
import { DEFAULT_CONTEXT_TAG, findVaultRoot, loadConfig } from '../src/config.js';
import { VaultNotConfiguredError } from '../src/core/shared/errors.js';
import { cleanupTempVault, createTempVault } from './helpers/testUtils.js';

describe('loadConfig', () => {
  it('should apply defaults', () => {
    const config = loadConfig({ MDVAULT_PATH: '/vault' }, '/work');
    expect(config).toEqual({
      vaultPath: path.resolve('/vault'),
      allowNewTags: false,
      contextTag: DEFAULT_CONTEXT_TAG,
      injectContext: true,
    });
  });

  it('should prefer MDVAULT_PATH and resolve relative paths', () => {
    expect(loadConfig({ MDVAULT_PATH: 'notes', VAULT_PATH: '/other' }, '/work').vaultPath).toBe(path.resolve('/work', 'notes'));
    expect(loadConfig({ VAULT_PATH: '/other' }, '/work').vaultPath).toBe(path.resolve('/other'));
  });

  it('should parse boolean flags', () => {
    const config = loadConfig(
      { MDVAULT_PATH: '/vault', MDVAULT_ALLOW_NEW_TAGS: ' TRUE ', MDVAULT_INJECT_CONTEXT: '0', MDVAULT_CONTEXT_TAG: 'ai' },
      '/work'
    );
    expect(config.allowNewTags).toBe(true);
    expect(config.injectContext).toBe(false);
    expect(config.contextTag).toBe('ai');
  });

  it('should reject an invalid flag', () => {
    expect(() => loadConfig({ MDVAULT_PATH: '/vault', MDVAULT_ALLOW_NEW_TAGS: 'maybe' }, '/work')).toThrow(
      VaultNotConfiguredError
    );
    expect(() => loadConfig({ MDVAULT_PATH: '/vault', MDVAULT_ALLOW_NEW_TAGS: 'maybe' }, '/work')).toThrow(
      /^Invalid configuration: MDVAULT_ALLOW_NEW_TAGS: /
    );
  });
});

describe('findVaultRoot', () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await createTempVault();
  });

  afterEach(async () => {
    await cleanupTempVault(tempDir);
  });

  it('should walk up to the .obsidian marker', async () => {
    await mkdir(path.join(tempDir, '.obsidian'));
    await mkdir(path.join(tempDir, 'a', 'b'), { recursive: true });

    expect(findVaultRoot(path.join(tempDir, 'a', 'b'))).toBe(tempDir);
    expect(loadConfig({}, path.join(tempDir, 'a')).vaultPath).toBe(tempDir);
  });

  it('should ignore a marker that is a file', async () => {
    await writeFile(path.join(tempDir, '.obsidian'), '');
    await mkdir(path.join(tempDir, 'a'));

    expect(findVaultRoot(path.join(tempDir, 'a'))).toBe(path.join(tempDir, 'a'));
  });
});
