// Descriptor builders shared by the test suites.

import { type LogConfig, defaultLogConfig } from './config.js';
import { type LogEngine, createLogEngine } from './engine.js';
import { StaticNameService } from './identity.js';
import { silentLogger } from './logger.js';
import { CollectingSink, type JsonValue } from './tree-sink.js';
import {
  type CodeSignature,
  EventCode,
  type FileStat,
  type ImageExec,
  type ImageHashes,
  type LogEvent,
  NO_DEV,
  type ProcessDescriptor,
  type StatsSnapshot,
  type Timespec,
} from './types.js';

export const T0: Timespec = { sec: 1700000000, nsec: 5 };
export const T0_TEXT = '2023-11-14T22:13:20.000000005Z';

export const MD5 = new Uint8Array(16).fill(0x11);
export const SHA1 = new Uint8Array(20).fill(0x22);
export const SHA256 = new Uint8Array(32).fill(0x33);
export const ALL_HASHES: ImageHashes = { md5: MD5, sha1: SHA1, sha256: SHA256 };

export const testNames = new StaticNameService({
  users: { 0: 'root', 501: 'alice' },
  groups: { 0: 'wheel', 20: 'staff' },
});

export function testConfig(overrides: Partial<LogConfig> = {}): LogConfig {
  return {
    ...defaultLogConfig(),
    hashes: ['md5', 'sha1', 'sha256'],
    ancestors: 2,
    ...overrides,
  };
}

export function testEngine(overrides: Partial<LogConfig> = {}): LogEngine {
  return createLogEngine({
    config: testConfig(overrides),
    nameService: testNames,
    logger: silentLogger,
    build: { version: '1.2.3', date: '2024-01-01', info: 'test' },
    system: { name: 'TestOS', version: '1.0', build: '1A1' },
  });
}

export function proc(overrides: Partial<ProcessDescriptor> = {}): ProcessDescriptor {
  return {
    pid: 4242,
    auid: 501,
    euid: 501,
    egid: 20,
    ruid: 501,
    rgid: 20,
    sid: 100,
    dev: NO_DEV,
    ...overrides,
  };
}

export const FULL_STAT: FileStat = {
  mode: 0o100755,
  uid: 0,
  gid: 0,
  size: 1024,
  mtime: { sec: 1600000000, nsec: 0 },
  ctime: { sec: 1600000001, nsec: 0 },
  btime: { sec: 1600000002, nsec: 0 },
};

export const PLATFORM_SIGNATURE: CodeSignature = {
  result: 'good',
  origin: 'system',
  ident: 'com.example.tool',
};

export function image(overrides: Partial<ImageExec> = {}): ImageExec {
  return {
    code: EventCode.ImageExec,
    time: T0,
    pid: 4242,
    path: '/bin/ls',
    reconstructed: false,
    subject: proc(),
    ...overrides,
  };
}

/** Builds a `prev` chain: `pids[0]` is the nearest ancestor. */
export function chain(pids: number[]): ImageExec | undefined {
  let prev: ImageExec | undefined;
  for (let i = pids.length - 1; i >= 0; i--) {
    prev = image({ pid: pids[i], path: `/bin/p${pids[i]}`, prev });
  }
  return prev;
}

const CACHE = { used: 1, size: 2, puts: 3, gets: 4, hits: 5, misses: 6, invalids: 7 };

export function statsSnapshot(overrides: Partial<StatsSnapshot> = {}): StatsSnapshot {
  return {
    code: EventCode.Stats,
    time: T0,
    evtloop: { aupclobbers: 0, aueunknowns: 0, failedsyscalls: 0, workarounds: [], missingtoken: 0, ooms: 0 },
    procmon: {
      procs: 12,
      images: 30,
      liveacq: 1,
      missBypid: 0,
      missForksubj: 0,
      missExecsubj: 0,
      missExecinterp: 0,
      missChdirsubj: 0,
      missGetcwd: 0,
      ooms: 0,
    },
    hackmon: { recvd: 0, procd: 0, ooms: 0 },
    filemon: { recvd: 0, procd: 0, lpmiss: 0, ooms: 0 },
    sockmon: { recvd: 0, procd: 0, ooms: 0 },
    kextCdevq: { qsize: 0, visitors: 0, timeouts: 0, errors: 0, defers: 0, denies: 0 },
    prepQueue: { qsize: 0, lookups: 0, misses: 0, drops: 0, skips: 0 },
    aupiCdevq: { qlen: 0, qlimit: 0, inserts: 0, reads: 0, drops: 0 },
    workQueue: { qsize: 0 },
    logQueue: { qsize: 0, counts: [0, 0, 0, 0, 0, 0, 0, 0], errors: 0 },
    hashCache: CACHE,
    csigCache: CACHE,
    ldplCache: CACHE,
    ...overrides,
  };
}

export function render(engine: LogEngine, event: LogEvent): JsonValue {
  const sink = new CollectingSink();
  engine.write(sink, event);
  const [record] = sink.records;
  if (record === undefined) {
    throw new Error('no record written');
  }
  return record;
}

/** Walks `path` through nested dicts and lists. */
export function at(value: JsonValue | undefined, ...path: Array<string | number>): JsonValue | undefined {
  let current = value;
  for (const key of path) {
    if (current === null || current === undefined || typeof current !== 'object') {
      return undefined;
    }
    if (Array.isArray(current)) {
      current = typeof key === 'number' ? current[key] : undefined;
    } else {
      current = typeof key === 'string' ? current[key] : undefined;
    }
  }
  return current;
}

export function keysAt(value: JsonValue | undefined, ...path: Array<string | number>): string[] {
  const target = at(value, ...path);
  if (target === null || target === undefined || typeof target !== 'object' || Array.isArray(target)) {
    return [];
  }
  return Object.keys(target);
}
