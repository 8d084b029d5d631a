import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';

import { StaticNameService } from '@execmon/logevt';
import { StringWriter } from '@execmon/logfmt';
import { load } from 'js-yaml';
import { type MockInstance, afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

import { configCommands } from './config.js';

describe('config commands', () => {
  let tmpDir: string;
  let stdout: StringWriter;
  let consoleSpy: MockInstance<Parameters<typeof console.log>, void>;
  const logger = { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };

  function commands() {
    return configCommands({
      stdout,
      logger,
      nameService: new StaticNameService(),
      now: () => ({ sec: 1700000000, nsec: 5 }),
    });
  }

  function writeConfig(name: string, content: string): string {
    const file = path.join(tmpDir, name);
    fs.writeFileSync(file, content);
    return file;
  }

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'execmon-config-'));
    stdout = new StringWriter();
    consoleSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
  });

  afterEach(() => {
    consoleSpy.mockRestore();
    vi.clearAllMocks();
    fs.rmSync(tmpDir, { recursive: true, force: true });
    process.exitCode = undefined;
  });

  describe('lint', () => {
    it('accepts a valid file', async () => {
      const file = writeConfig('ok.yaml', 'events: [image_exec]\nhashes: sha256\n');

      await commands().lint(file);

      expect(consoleSpy).toHaveBeenCalledWith('Configuration is valid');
      expect(consoleSpy).toHaveBeenCalledTimes(1);
      expect(process.exitCode).toBeUndefined();
    });

    it('lists warnings', async () => {
      const file = writeConfig('warn.yaml', 'colour: true\n');

      await commands().lint(file);

      expect(consoleSpy.mock.calls).toEqual([
        ['Configuration is valid'],
        ['\nWarnings:'],
        ['   - unknown configuration key: colour'],
      ]);
    });

    it('lists errors and fails', async () => {
      const file = writeConfig('bad.yaml', 'omit_sid: maybe\nlimit_nofile: 0\n');

      await commands().lint(file);

      expect(consoleSpy.mock.calls).toEqual([
        ['Configuration validation failed:'],
        ['   - omit_sid must be a boolean'],
        ['   - limit_nofile must be a positive integer'],
      ]);
      expect(process.exitCode).toBe(1);
    });

    it('reports unreadable files', async () => {
      await commands().lint(path.join(tmpDir, 'missing.yaml'));

      expect(consoleSpy).toHaveBeenCalledTimes(1);
      expect(String(consoleSpy.mock.calls[0]?.[0])).toMatch(/^Failed to read configuration file: ENOENT/);
      expect(process.exitCode).toBe(1);
    });
  });

  describe('show', () => {
    it('writes the startup record as YAML', async () => {
      const file = writeConfig('show.yaml', 'id: lab-01\nhashes: [md5, sha1]\nancestors: 3\n');

      await commands().show(file, { format: 'yaml' });

      const out = stdout.toString();
      expect(out.startsWith('---\nversion: 1\n')).toBe(true);
      expect(load(out)).toMatchObject({
        version: 1,
        eventcode: 0,
        op: 'config',
        build: { version: '0.1.0' },
        config: { path: file, id: 'lab-01', hashes: 'md5,sha1', ancestors: 3 },
      });
      expect(process.exitCode).toBeUndefined();
    });

    it('writes one JSON line when asked', async () => {
      const file = writeConfig('show.yaml', '{}\n');

      await commands().show(file, { oneline: true });

      const out = stdout.toString();
      expect(out.endsWith('}\n')).toBe(true);
      expect(out.split('\n')).toHaveLength(2);
      expect(JSON.parse(out)).toMatchObject({
        time: '2023-11-14T22:13:20.000000005Z',
        op: 'config',
        config: { ancestors: 'unlimited', events: 'ops,stats,image_exec,process_access,launchd_add' },
      });
    });

    it('rejects unknown formats', async () => {
      const file = writeConfig('show.yaml', '{}\n');

      await commands().show(file, { format: 'xml' });

      expect(logger.error).toHaveBeenCalledWith(
        'Failed to show configuration: unsupported record format: xml (supported: json, yaml)',
      );
      expect(stdout.toString()).toBe('');
      expect(process.exitCode).toBe(1);
    });

    it('passes configuration warnings to the logger', async () => {
      const file = writeConfig('show.yaml', 'path: /elsewhere.yaml\n');

      await commands().show(file);

      expect(logger.warn).toHaveBeenCalledWith('path is ignored; it is set from the location of the configuration file');
      expect(JSON.parse(stdout.toString())).toMatchObject({ config: { path: file } });
    });
  });
});
