import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';

import { StaticNameService } from '@execmon/logevt';
import { StringWriter } from '@execmon/logfmt';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

import { createCli } from '../index.js';
import type { CliIo } from '../io.js';
import { renderCommands } from './render.js';

const time = { sec: 1700000000, nsec: 5 };

const exec = {
  code: 'image_exec',
  time,
  pid: 4242,
  path: '/bin/ls',
  hashes: { sha256: 'ab'.repeat(32) },
  codesign: { result: 'good', origin: 'system', ident: 'com.example.ls' },
  argv: ['ls'],
  subject: { pid: 4242, auid: 501, euid: 501, egid: 20, ruid: 501, rgid: 20, sid: 100 },
  prev: { pid: 1, path: '/sbin/launchd', time: { sec: 1600000000 } },
};

const expectedExecRecord = {
  version: 1,
  time: '2023-11-14T22:13:20.000000005Z',
  eventcode: 2,
  argv: ['ls'],
  image: {
    path: '/bin/ls',
    sha256: 'ab'.repeat(32),
    signature: 'good',
    origin: 'system',
    ident: 'com.example.ls',
  },
  subject: {
    pid: 4242,
    auid: 501,
    auname: 'alice',
    euid: 501,
    euname: 'alice',
    egid: 20,
    egname: 'staff',
    ruid: 501,
    runame: 'alice',
    rgid: 20,
    rgname: 'staff',
    sid: 100,
    image: { exec_time: '2020-09-13T12:26:40.000000000Z', exec_pid: 1, path: '/sbin/launchd' },
    ancestors: [],
  },
};

describe('render command', () => {
  let tmpDir: string;
  let io: CliIo;
  let stdout: StringWriter;
  const logger = { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };

  function writeFile(name: string, content: string): string {
    const file = path.join(tmpDir, name);
    fs.writeFileSync(file, content);
    return file;
  }

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'execmon-render-'));
    stdout = new StringWriter();
    io = {
      stdout,
      logger,
      nameService: new StaticNameService({ users: { 501: 'alice' }, groups: { 20: 'staff' } }),
    };
  });

  afterEach(() => {
    vi.clearAllMocks();
    fs.rmSync(tmpDir, { recursive: true, force: true });
    process.exitCode = undefined;
  });

  it('renders enabled events one per line', async () => {
    const config = writeFile('execmon.yaml', 'events: [image_exec]\nlogoneline: true\n');
    const events = writeFile('events.json', JSON.stringify([{ code: 'ops', time, subtype: 'start' }, exec]));

    await renderCommands(io).render(events, { config });

    const lines = stdout.toString().split('\n');
    expect(lines).toHaveLength(2);
    expect(lines[1]).toBe('');
    expect(JSON.parse(lines[0] ?? '')).toEqual(expectedExecRecord);
    expect(logger.debug).toHaveBeenCalledWith('skipping ops event: not enabled in configuration');
    expect(process.exitCode).toBeUndefined();
  });

  it('uses the default configuration without a file', async () => {
    const events = writeFile('events.json', JSON.stringify(exec));

    await renderCommands(io).render(events);

    const out = stdout.toString();
    expect(out).toBe(`${JSON.stringify(expectedExecRecord, null, 2)}\n`);
  });

  it('lets flags override the configuration', async () => {
    const config = writeFile('execmon.yaml', 'logfmt: yaml\nlogoneline: true\nhashes: none\n');
    const events = writeFile('events.json', JSON.stringify(exec));

    await renderCommands(io).render(events, { config, format: 'json', oneline: false });

    const record = JSON.parse(stdout.toString());
    expect(record.image).toEqual({ path: '/bin/ls', signature: 'good', origin: 'system', ident: 'com.example.ls' });
    expect(stdout.toString().split('\n').length).toBeGreaterThan(2);
  });

  it('reports descriptor errors by path', async () => {
    const events = writeFile('events.json', JSON.stringify([{ code: 'image_exec', time: { sec: 1 }, pid: 'x' }]));

    await renderCommands(io).render(events);

    expect(logger.error).toHaveBeenCalledWith('Failed to render events: $[0].pid: expected an integer');
    expect(stdout.toString()).toBe('');
    expect(process.exitCode).toBe(1);
  });

  it('reports invalid configuration', async () => {
    const config = writeFile('execmon.yaml', 'kextlevel: all\n');
    const events = writeFile('events.json', '[]');

    await renderCommands(io).render(events, { config });

    expect(logger.error).toHaveBeenCalledWith(
      'Failed to render events: kextlevel must be one of: none, open, hash, csig',
    );
    expect(process.exitCode).toBe(1);
  });

  it('is reachable through the command line', async () => {
    const config = writeFile('execmon.yaml', 'events: [image_exec]\n');
    const events = writeFile('events.json', JSON.stringify(exec));

    await createCli(io).parseAsync(['render', events, '-c', config, '-f', 'yaml'], { from: 'user' });

    expect(stdout.toString()).toMatch(/^---\nversion: 1\n/);
    expect(stdout.toString()).toContain("\n  sha256: abab");
  });
});
