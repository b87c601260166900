import { describe, it, expect, afterEach } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import {
  ACTION_NAMES,
  forScope,
  loadDefaultScopes,
  loadStrategyTable,
  parseStrategyTable,
} from '../../src/core/strategy-table.js';
import { ProvisioningError } from '../../src/utils/errors.js';
import { testStrategyTable } from '../helpers/fixtures.js';

describe('strategy table', () => {
  let tempDir: string | null = null;

  afterEach(() => {
    if (tempDir) {
      rmSync(tempDir, { recursive: true, force: true });
      tempDir = null;
    }
  });

  function writeTemp(content: string): string {
    tempDir = mkdtempSync(join(tmpdir(), 'strategies-'));
    const file = join(tempDir, 'strategies.json');
    writeFileSync(file, content);
    return file;
  }

  it('should load the shipped table with every action', () => {
    const table = loadStrategyTable();

    expect(Object.keys(table.actions).sort()).toEqual([...ACTION_NAMES].sort());
    expect(table.actions['mfa.code'][0]).toMatchObject({ name: 'per-digit', mode: 'per-digit' });
  });

  it('should reject a table with a missing action', () => {
    const { actions } = testStrategyTable();
    const { 'wizard.copyButton': _dropped, ...rest } = actions;

    expect(() => parseStrategyTable({ version: 1, actions: rest })).toThrow(/wizard\.copyButton/);
  });

  it('should require the scope placeholder in acceptance selectors', () => {
    const table = testStrategyTable();
    const broken = {
      ...table,
      actions: { ...table.actions, 'wizard.scopeAccepted': [{ name: 'chip', selector: '.chip' }] },
    };

    try {
      parseStrategyTable(broken, 'inline-test');
      expect.unreachable('parseStrategyTable should throw');
    } catch (error) {
      expect(error).toBeInstanceOf(ProvisioningError);
      if (error instanceof ProvisioningError) {
        expect(error.reason).toBe('config_invalid');
        expect(error.retryable).toBe(false);
        expect(error.message).toContain('inline-test');
        expect(error.message).toContain('{scope}');
      }
    }
  });

  it('should report a missing file as a configuration error', () => {
    expect(() => loadStrategyTable('/nonexistent/strategies.json')).toThrow(
      'Strategy table not found: /nonexistent/strategies.json'
    );
  });

  it('should report malformed JSON as a configuration error', () => {
    const file = writeTemp('{ "version": 1, ');

    expect(() => loadStrategyTable(file)).toThrow(`Strategy table is not valid JSON: ${file}`);
  });

  it('should load an override file', () => {
    const file = writeTemp(JSON.stringify(testStrategyTable()));

    expect(loadStrategyTable(file).actions['login.submit']).toEqual([{ name: 'submit', selector: '#login' }]);
  });
});

describe('forScope', () => {
  it('should substitute every placeholder', () => {
    const [strategy] = forScope([{ name: 'chip', selector: '.tag:has-text("{scope}"), [title="{scope}"]' }], 'View Contacts');

    expect(strategy.selector).toBe('.tag:has-text("View Contacts"), [title="View Contacts"]');
  });

  it('should escape quotes and backslashes', () => {
    const [strategy] = forScope([{ name: 'chip', selector: '.tag:has-text("{scope}")' }], 'Say "hi" \\ now');

    expect(strategy.selector).toBe('.tag:has-text("Say \\"hi\\" \\\\ now")');
  });
});

describe('loadDefaultScopes', () => {
  it('should return the shipped scope list', () => {
    const scopes = loadDefaultScopes();

    expect(scopes).toHaveLength(15);
    expect(scopes[0]).toBe('View Contacts');
    expect(new Set(scopes).size).toBe(15);
  });
});
