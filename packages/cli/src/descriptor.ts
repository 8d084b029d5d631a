import {
  type CacheCounters,
  type CodeSignature,
  EventCode,
  type FileAttributes,
  type FileStat,
  HASH_SIZES,
  type ImageExec,
  type ImageHashes,
  type LogEvent,
  NO_DEV,
  type ProcessDescriptor,
  type ScriptImage,
  type SignatureOrigin,
  type SignatureResult,
  type StatsSnapshot,
  type Timespec,
  type WorkaroundCounter,
  parseEventCode,
} from '@execmon/logevt';

export class DescriptorDecodeError extends Error {
  /** JSON path of the offending value, e.g. `$[0].subject.pid`. */
  readonly path: string;

  constructor(path: string, message: string) {
    super(`${path}: ${message}`);
    this.name = 'DescriptorDecodeError';
    this.path = path;
  }
}

const SIGNATURE_RESULTS: readonly SignatureResult[] = ['unsigned', 'good', 'untrusted', 'bad', 'error'];
const SIGNATURE_ORIGINS: readonly SignatureOrigin[] = ['system', 'appstore', 'devid', 'generic', 'trusted'];

/** Typed field access on one JSON object, reporting failures by path. */
class Fields {
  private constructor(
    private readonly obj: Record<string, unknown>,
    readonly path: string,
  ) {}

  static of(value: unknown, path: string): Fields {
    if (typeof value !== 'object' || value === null || Array.isArray(value)) {
      throw new DescriptorDecodeError(path, 'expected an object');
    }
    return new Fields(Object.fromEntries(Object.entries(value)), path);
  }

  has(key: string): boolean {
    return this.obj[key] !== undefined;
  }

  at(key: string): string {
    return `${this.path}.${key}`;
  }

  fail(key: string, message: string): never {
    throw new DescriptorDecodeError(this.at(key), message);
  }

  raw(key: string): unknown {
    return this.obj[key];
  }

  child(key: string): Fields {
    return Fields.of(this.obj[key], this.at(key));
  }

  optChild(key: string): Fields | undefined {
    return this.has(key) ? this.child(key) : undefined;
  }

  string(key: string): string {
    const value = this.obj[key];
    if (typeof value !== 'string') this.fail(key, 'expected a string');
    return value;
  }

  optString(key: string): string | undefined {
    return this.has(key) ? this.string(key) : undefined;
  }

  int(key: string): number {
    const value = this.obj[key];
    if (typeof value !== 'number' || !Number.isInteger(value)) this.fail(key, 'expected an integer');
    return value;
  }

  optInt(key: string): number | undefined {
    return this.has(key) ? this.int(key) : undefined;
  }

  intOr(key: string, fallback: number): number {
    return this.optInt(key) ?? fallback;
  }

  bool(key: string, fallback: boolean): boolean {
    if (!this.has(key)) return fallback;
    const value = this.obj[key];
    if (typeof value !== 'boolean') this.fail(key, 'expected a boolean');
    return value;
  }

  strings(key: string): string[] | undefined {
    if (!this.has(key)) return undefined;
    const value = this.obj[key];
    if (!Array.isArray(value)) this.fail(key, 'expected a list of strings');
    return value.map((item, i) => {
      if (typeof item !== 'string') {
        throw new DescriptorDecodeError(`${this.at(key)}[${i}]`, 'expected a string');
      }
      return item;
    });
  }

  timespec(key: string): Timespec {
    const t = this.child(key);
    const nsec = t.intOr('nsec', 0);
    if (nsec < 0 || nsec > 999_999_999) t.fail('nsec', 'out of range');
    return { sec: t.int('sec'), nsec };
  }

  optTimespec(key: string): Timespec | undefined {
    return this.has(key) ? this.timespec(key) : undefined;
  }

  hex(key: string, size?: number): Uint8Array {
    const text = this.string(key);
    if (!/^(?:[0-9a-fA-F]{2})*$/.test(text)) this.fail(key, 'expected a hex string');
    const bytes = new Uint8Array(text.length / 2);
    for (let i = 0; i < bytes.length; i++) {
      bytes[i] = Number.parseInt(text.slice(i * 2, i * 2 + 2), 16);
    }
    if (size !== undefined && bytes.length !== size) this.fail(key, `expected ${size} bytes`);
    return bytes;
  }

  oneOf<T extends string>(key: string, allowed: readonly T[]): T {
    const value = this.obj[key];
    for (const candidate of allowed) {
      if (value === candidate) return candidate;
    }
    return this.fail(key, `expected one of: ${allowed.join(', ')}`);
  }
}

/** Accepts one descriptor object or an array of them. */
export function decodeDescriptors(value: unknown): LogEvent[] {
  if (Array.isArray(value)) {
    return value.map((item, i) => decodeDescriptor(item, `$[${i}]`));
  }
  return [decodeDescriptor(value, '$')];
}

export function decodeDescriptor(value: unknown, path = '$'): LogEvent {
  const f = Fields.of(value, path);
  const rawCode = f.raw('code');
  const code = typeof rawCode === 'string' || typeof rawCode === 'number' ? parseEventCode(rawCode) : null;
  if (code === null) {
    return f.fail('code', `unknown event code: ${String(rawCode)}`);
  }
  const time = f.timespec('time');

  switch (code) {
    case EventCode.Ops:
      return { code, time, subtype: f.string('subtype') };
    case EventCode.Stats:
      return decodeStats(f, time);
    case EventCode.ImageExec:
      return decodeImage(f);
    case EventCode.ProcessAccess:
      return {
        code,
        time,
        method: f.string('method'),
        object: f.has('object') ? decodeProcess(f.child('object')) : undefined,
        objectPid: f.optInt('objectPid'),
        objectImage: f.has('objectImage') ? decodeImage(f.child('objectImage')) : undefined,
        subject: decodeProcess(f.child('subject')),
        subjectImage: f.has('subjectImage') ? decodeImage(f.child('subjectImage')) : undefined,
      };
    case EventCode.LaunchdAdd:
      return {
        code,
        time,
        plistPath: f.string('plistPath'),
        programPath: f.optString('programPath'),
        programRpath: f.optString('programRpath'),
        programArgv: f.strings('programArgv'),
        noSubject: f.bool('noSubject', false),
        subject: decodeProcess(f.child('subject')),
        subjectImage: f.has('subjectImage') ? decodeImage(f.child('subjectImage')) : undefined,
      };
    case EventCode.SocketListen:
      return { code, time, ...decodeSocket(f) };
    case EventCode.SocketAccept:
      return { code, time, ...decodeSocket(f), ...decodePeer(f) };
    case EventCode.SocketConnect:
      return { code, time, ...decodeSocket(f), ...decodePeer(f) };
    default: {
      const exhaustive: never = code;
      return exhaustive;
    }
  }
}

function decodeSocket(f: Fields) {
  return {
    protocol: f.intOr('protocol', 0),
    sockAddr: f.optString('sockAddr'),
    sockPort: f.intOr('sockPort', 0),
    subject: decodeProcess(f.child('subject')),
    subjectImage: f.has('subjectImage') ? decodeImage(f.child('subjectImage')) : undefined,
  };
}

function decodePeer(f: Fields) {
  return { peerAddr: f.optString('peerAddr'), peerPort: f.intOr('peerPort', 0) };
}

function decodeProcess(f: Fields): ProcessDescriptor {
  return {
    pid: f.int('pid'),
    auid: f.int('auid'),
    euid: f.int('euid'),
    egid: f.int('egid'),
    ruid: f.int('ruid'),
    rgid: f.int('rgid'),
    sid: f.intOr('sid', 0),
    dev: f.intOr('dev', NO_DEV),
    addr: f.optString('addr'),
  };
}

/** Image descriptors nest through `prev`; the code field is optional there. */
function decodeImage(f: Fields): ImageExec {
  const prev = f.optChild('prev');
  return {
    code: EventCode.ImageExec,
    time: f.has('time') ? f.timespec('time') : { sec: 0, nsec: 0 },
    pid: f.int('pid'),
    path: f.string('path'),
    stat: f.has('stat') ? decodeStat(f.child('stat')) : undefined,
    hashes: f.has('hashes') ? decodeHashes(f.child('hashes')) : undefined,
    codesign: f.has('codesign') ? decodeSignature(f.child('codesign')) : undefined,
    script: f.has('script') ? decodeScript(f.child('script')) : undefined,
    argv: f.strings('argv'),
    envv: f.strings('envv'),
    cwd: f.optString('cwd'),
    forkTime: f.optTimespec('forkTime'),
    prev: prev ? decodeImage(prev) : undefined,
    reconstructed: f.bool('reconstructed', false),
    subject: f.has('subject') ? decodeProcess(f.child('subject')) : emptyProcess(f.int('pid')),
  };
}

function emptyProcess(pid: number): ProcessDescriptor {
  return { pid, auid: -1, euid: -1, egid: -1, ruid: -1, rgid: -1, sid: 0, dev: NO_DEV };
}

function decodeScript(f: Fields): ScriptImage {
  if (f.has('codesign')) {
    f.fail('codesign', 'scripts carry no code signature');
  }
  return {
    path: f.string('path'),
    stat: f.has('stat') ? decodeStat(f.child('stat')) : undefined,
    hashes: f.has('hashes') ? decodeHashes(f.child('hashes')) : undefined,
  };
}

function decodeStat(f: Fields): FileAttributes | FileStat {
  const attrs = { mode: f.int('mode'), uid: f.int('uid'), gid: f.int('gid') };
  if (!f.has('size')) {
    return attrs;
  }
  return {
    ...attrs,
    size: f.int('size'),
    mtime: f.timespec('mtime'),
    ctime: f.timespec('ctime'),
    btime: f.timespec('btime'),
  };
}

function decodeHashes(f: Fields): ImageHashes {
  return {
    md5: f.has('md5') ? f.hex('md5', HASH_SIZES.md5) : undefined,
    sha1: f.has('sha1') ? f.hex('sha1', HASH_SIZES.sha1) : undefined,
    sha256: f.has('sha256') ? f.hex('sha256', HASH_SIZES.sha256) : undefined,
  };
}

function decodeSignature(f: Fields): CodeSignature {
  return {
    result: f.oneOf('result', SIGNATURE_RESULTS),
    origin: f.has('origin') ? f.oneOf('origin', SIGNATURE_ORIGINS) : undefined,
    cdhash: f.has('cdhash') ? f.hex('cdhash') : undefined,
    ident: f.optString('ident'),
    teamid: f.optString('teamid'),
    certcn: f.optString('certcn'),
  };
}

function count(f: Fields | undefined, key: string): number {
  return f ? f.intOr(key, 0) : 0;
}

function cache(f: Fields | undefined): CacheCounters {
  return {
    used: count(f, 'used'),
    size: count(f, 'size'),
    puts: count(f, 'puts'),
    gets: count(f, 'gets'),
    hits: count(f, 'hits'),
    misses: count(f, 'misses'),
    invalids: count(f, 'invalids'),
  };
}

/** Missing counters read as zero. */
function decodeStats(f: Fields, time: Timespec): StatsSnapshot {
  const ev = f.optChild('evtloop');
  const workarounds: WorkaroundCounter[] = [];
  const rawWorkarounds = ev?.raw('workarounds');
  if (ev && rawWorkarounds !== undefined) {
    if (!Array.isArray(rawWorkarounds)) {
      throw new DescriptorDecodeError(ev.at('workarounds'), 'expected a list');
    }
    rawWorkarounds.forEach((item: unknown, i) => {
      const w = Fields.of(item, `${ev.at('workarounds')}[${i}]`);
      workarounds.push({ id: w.string('id'), hits: w.intOr('hits', 0), fatal: w.optInt('fatal') });
    });
  }

  const lq = f.optChild('logQueue');
  const counts: number[] = [];
  const rawCounts = lq?.raw('counts');
  if (lq && rawCounts !== undefined) {
    if (!Array.isArray(rawCounts)) {
      throw new DescriptorDecodeError(lq.at('counts'), 'expected a list of integers');
    }
    rawCounts.forEach((item: unknown, i) => {
      if (typeof item !== 'number' || !Number.isInteger(item)) {
        throw new DescriptorDecodeError(`${lq.at('counts')}[${i}]`, 'expected an integer');
      }
      counts.push(item);
    });
  }

  const pm = f.optChild('procmon');
  const hm = f.optChild('hackmon');
  const fm = f.optChild('filemon');
  const sm = f.optChild('sockmon');
  const kq = f.optChild('kextCdevq');
  const pq = f.optChild('prepQueue');
  const aq = f.optChild('aupiCdevq');

  return {
    code: EventCode.Stats,
    time,
    evtloop: {
      aupclobbers: count(ev, 'aupclobbers'),
      aueunknowns: count(ev, 'aueunknowns'),
      failedsyscalls: count(ev, 'failedsyscalls'),
      workarounds,
      missingtoken: count(ev, 'missingtoken'),
      ooms: count(ev, 'ooms'),
    },
    procmon: {
      procs: count(pm, 'procs'),
      images: count(pm, 'images'),
      liveacq: count(pm, 'liveacq'),
      missBypid: count(pm, 'missBypid'),
      missForksubj: count(pm, 'missForksubj'),
      missExecsubj: count(pm, 'missExecsubj'),
      missExecinterp: count(pm, 'missExecinterp'),
      missChdirsubj: count(pm, 'missChdirsubj'),
      missGetcwd: count(pm, 'missGetcwd'),
      ooms: count(pm, 'ooms'),
    },
    hackmon: { recvd: count(hm, 'recvd'), procd: count(hm, 'procd'), ooms: count(hm, 'ooms') },
    filemon: {
      recvd: count(fm, 'recvd'),
      procd: count(fm, 'procd'),
      lpmiss: count(fm, 'lpmiss'),
      ooms: count(fm, 'ooms'),
    },
    sockmon: { recvd: count(sm, 'recvd'), procd: count(sm, 'procd'), ooms: count(sm, 'ooms') },
    kextCdevq: {
      qsize: count(kq, 'qsize'),
      visitors: count(kq, 'visitors'),
      timeouts: count(kq, 'timeouts'),
      errors: count(kq, 'errors'),
      defers: count(kq, 'defers'),
      denies: count(kq, 'denies'),
    },
    prepQueue: {
      qsize: count(pq, 'qsize'),
      lookups: count(pq, 'lookups'),
      misses: count(pq, 'misses'),
      drops: count(pq, 'drops'),
      skips: count(pq, 'skips'),
    },
    aupiCdevq: {
      qlen: count(aq, 'qlen'),
      qlimit: count(aq, 'qlimit'),
      inserts: count(aq, 'inserts'),
      reads: count(aq, 'reads'),
      drops: count(aq, 'drops'),
    },
    workQueue: { qsize: count(f.optChild('workQueue'), 'qsize') },
    logQueue: { qsize: count(lq, 'qsize'), counts, errors: count(lq, 'errors') },
    hashCache: cache(f.optChild('hashCache')),
    csigCache: cache(f.optChild('csigCache')),
    ldplCache: cache(f.optChild('ldplCache')),
  };
}
