import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';

import { EventCode } from '@execmon/logevt';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

import { ConfigLoadError } from './errors.js';
import { loadLogConfigFromFile, loadLogConfigFromString } from './loader.js';

describe('loadLogConfigFromString', () => {
  it('merges the document over the defaults', () => {
    const config = loadLogConfigFromString(
      ['events: [image_exec, socket_connect]', 'hashes: md5,sha256', 'omit_groups: true', 'ancestors: unlimited'].join(
        '\n',
      ),
    );

    expect(config.events).toEqual([EventCode.ImageExec, EventCode.SocketConnect]);
    expect(config.hashes).toEqual(['md5', 'sha256']);
    expect(config.omit_groups).toBe(true);
    expect(config.ancestors).toBe(Number.POSITIVE_INFINITY);
    expect(config.stats_interval).toBe(3600);
    expect(config.path).toBe('/etc/execmon/execmon.yaml');
  });

  it('returns the defaults for an empty document', () => {
    const config = loadLogConfigFromString('');
    expect(config.hashes).toEqual(['sha256']);
    expect(config.kextlevel).toBe('open');
  });

  it('returns a frozen snapshot', () => {
    const config = loadLogConfigFromString('suppress_image_exec_by_ident: [com.example.a]');
    expect(Object.isFrozen(config)).toBe(true);
    expect(Object.isFrozen(config.suppress_image_exec_by_ident)).toBe(true);
  });

  it('reports warnings through the callback', () => {
    const onWarning = vi.fn();
    loadLogConfigFromString('colour: true', { onWarning });
    expect(onWarning).toHaveBeenCalledWith('unknown configuration key: colour');
  });

  it('throws ConfigLoadError with the lint errors', () => {
    let caught: unknown;
    try {
      loadLogConfigFromString('omit_sid: maybe\nenvlevel: partial', { onWarning: () => {} });
    } catch (err) {
      caught = err;
    }

    expect(caught).toBeInstanceOf(ConfigLoadError);
    if (caught instanceof ConfigLoadError) {
      expect(caught.errors).toEqual(['omit_sid must be a boolean', 'envlevel must be one of: none, dyld, full']);
      expect(caught.message).toBe('omit_sid must be a boolean; envlevel must be one of: none, dyld, full');
    }
  });

  it('throws ConfigLoadError for malformed YAML', () => {
    expect(() => loadLogConfigFromString('events: [ops')).toThrow(ConfigLoadError);
    expect(() => loadLogConfigFromString('events: [ops')).toThrow(/^invalid YAML: /);
  });
});

describe('loadLogConfigFromFile', () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'execmon-config-'));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('records the file location as path', () => {
    const file = path.join(dir, 'execmon.yaml');
    fs.writeFileSync(file, 'id: host-a\nlogoneline: true\n');

    const config = loadLogConfigFromFile(file);

    expect(config.path).toBe(file);
    expect(config.id).toBe('host-a');
    expect(config.logoneline).toBe(true);
  });

  it('wraps read failures', () => {
    expect(() => loadLogConfigFromFile(path.join(dir, 'missing.yaml'))).toThrow(/^cannot read configuration /);
  });
});
