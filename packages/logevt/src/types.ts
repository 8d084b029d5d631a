/**
 * Descriptors of observed system activity, as handed to the engine by the
 * capture side. Everything here is read-only input: the engine never creates,
 * mutates or frees a descriptor.
 */

export interface Timespec {
  sec: number;
  nsec: number;
}

export enum EventCode {
  Ops = 0,
  Stats = 1,
  ImageExec = 2,
  ProcessAccess = 3,
  LaunchdAdd = 4,
  SocketListen = 5,
  SocketAccept = 6,
  SocketConnect = 7,
}

export const EVENT_CODE_COUNT = 8;

const EVENT_CODE_NAMES: Record<EventCode, string> = {
  [EventCode.Ops]: 'ops',
  [EventCode.Stats]: 'stats',
  [EventCode.ImageExec]: 'image_exec',
  [EventCode.ProcessAccess]: 'process_access',
  [EventCode.LaunchdAdd]: 'launchd_add',
  [EventCode.SocketListen]: 'socket_listen',
  [EventCode.SocketAccept]: 'socket_accept',
  [EventCode.SocketConnect]: 'socket_connect',
};

export function eventCodeName(code: EventCode): string {
  return EVENT_CODE_NAMES[code];
}

export function parseEventCode(value: string | number): EventCode | null {
  for (const code of allEventCodes()) {
    if (value === code || value === EVENT_CODE_NAMES[code]) {
      return code;
    }
  }
  return null;
}

export function allEventCodes(): EventCode[] {
  return [
    EventCode.Ops,
    EventCode.Stats,
    EventCode.ImageExec,
    EventCode.ProcessAccess,
    EventCode.LaunchdAdd,
    EventCode.SocketListen,
    EventCode.SocketAccept,
    EventCode.SocketConnect,
  ];
}

export interface EventHeader<C extends EventCode = EventCode> {
  readonly code: C;
  readonly time: Timespec;
}

// uid_t/gid_t -1 as seen from either a signed or an unsigned source.
export const NO_ID = 0xffffffff;
export const NO_DEV = -1;

export function isNoId(id: number): boolean {
  return id === -1 || id === NO_ID;
}

export function isNoDev(dev: number): boolean {
  return dev === NO_DEV || dev === 0xffffffff;
}

export interface FileAttributes {
  readonly mode: number;
  readonly uid: number;
  readonly gid: number;
}

export interface FileStat extends FileAttributes {
  readonly size: number;
  readonly mtime: Timespec;
  readonly ctime: Timespec;
  readonly btime: Timespec;
}

export function isFullStat(stat: FileAttributes | FileStat): stat is FileStat {
  return 'size' in stat;
}

export type HashAlgorithm = 'md5' | 'sha1' | 'sha256';

export const HASH_ALGORITHMS: readonly HashAlgorithm[] = ['md5', 'sha1', 'sha256'];

export const HASH_SIZES: Record<HashAlgorithm, number> = {
  md5: 16,
  sha1: 20,
  sha256: 32,
};

export interface ImageHashes {
  readonly md5?: Uint8Array;
  readonly sha1?: Uint8Array;
  readonly sha256?: Uint8Array;
}

export type SignatureResult = 'unsigned' | 'good' | 'untrusted' | 'bad' | 'error';

export type SignatureOrigin = 'system' | 'appstore' | 'devid' | 'generic' | 'trusted';

export interface CodeSignature {
  readonly result: SignatureResult;
  readonly origin?: SignatureOrigin;
  readonly cdhash?: Uint8Array;
  readonly ident?: string;
  readonly teamid?: string;
  readonly certcn?: string;
}

/** Interpreter script executed through a `#!` line. Scripts are never signed. */
export interface ScriptImage {
  readonly path: string;
  readonly stat?: FileAttributes | FileStat;
  readonly hashes?: ImageHashes;
}

export interface ProcessDescriptor {
  readonly pid: number;
  readonly auid: number;
  readonly euid: number;
  readonly egid: number;
  readonly ruid: number;
  readonly rgid: number;
  readonly sid: number;
  readonly dev: number;
  readonly addr?: string;
}

export interface ImageExec extends EventHeader<EventCode.ImageExec> {
  readonly pid: number;
  readonly path: string;
  readonly stat?: FileAttributes | FileStat;
  readonly hashes?: ImageHashes;
  readonly codesign?: CodeSignature;
  readonly script?: ScriptImage;
  readonly argv?: readonly string[];
  readonly envv?: readonly string[];
  readonly cwd?: string;
  readonly forkTime?: Timespec;
  /** Image executed previously in the same lineage; walked for ancestry. */
  readonly prev?: ImageExec;
  /** Built from a bare pid rather than observed exec. */
  readonly reconstructed: boolean;
  /** Process that performed the exec. */
  readonly subject: ProcessDescriptor;
}

export interface ProcessAccess extends EventHeader<EventCode.ProcessAccess> {
  readonly method: string;
  readonly object?: ProcessDescriptor;
  /** Set when only the pid of the accessed process is known. */
  readonly objectPid?: number;
  readonly objectImage?: ImageExec;
  readonly subject: ProcessDescriptor;
  readonly subjectImage?: ImageExec;
}

export interface LaunchdAdd extends EventHeader<EventCode.LaunchdAdd> {
  readonly plistPath: string;
  readonly programPath?: string;
  readonly programRpath?: string;
  readonly programArgv?: readonly string[];
  readonly noSubject: boolean;
  readonly subject: ProcessDescriptor;
  readonly subjectImage?: ImageExec;
}

interface SocketEventBase<C extends EventCode> extends EventHeader<C> {
  /** IANA protocol number, 0 when unknown. */
  readonly protocol: number;
  readonly sockAddr?: string;
  readonly sockPort: number;
  readonly subject: ProcessDescriptor;
  readonly subjectImage?: ImageExec;
}

export type SocketListen = SocketEventBase<EventCode.SocketListen>;

export interface SocketAccept extends SocketEventBase<EventCode.SocketAccept> {
  readonly peerAddr?: string;
  readonly peerPort: number;
}

export interface SocketConnect extends SocketEventBase<EventCode.SocketConnect> {
  readonly peerAddr?: string;
  readonly peerPort: number;
}

export interface OpsEvent extends EventHeader<EventCode.Ops> {
  readonly subtype: string;
}

export interface CacheCounters {
  readonly used: number;
  readonly size: number;
  readonly puts: number;
  readonly gets: number;
  readonly hits: number;
  readonly misses: number;
  readonly invalids: number;
}

export interface WorkaroundCounter {
  readonly id: string;
  readonly hits: number;
  /** Only workarounds that can fail fatally carry this counter. */
  readonly fatal?: number;
}

export interface StatsSnapshot extends EventHeader<EventCode.Stats> {
  readonly evtloop: {
    readonly aupclobbers: number;
    readonly aueunknowns: number;
    readonly failedsyscalls: number;
    /** Counters of platform bug workarounds, emitted in order. */
    readonly workarounds: readonly WorkaroundCounter[];
    readonly missingtoken: number;
    readonly ooms: number;
  };
  readonly procmon: {
    readonly procs: number;
    readonly images: number;
    readonly liveacq: number;
    readonly missBypid: number;
    readonly missForksubj: number;
    readonly missExecsubj: number;
    readonly missExecinterp: number;
    readonly missChdirsubj: number;
    readonly missGetcwd: number;
    readonly ooms: number;
  };
  readonly hackmon: { readonly recvd: number; readonly procd: number; readonly ooms: number };
  readonly filemon: {
    readonly recvd: number;
    readonly procd: number;
    readonly lpmiss: number;
    readonly ooms: number;
  };
  readonly sockmon: { readonly recvd: number; readonly procd: number; readonly ooms: number };
  readonly kextCdevq: {
    readonly qsize: number;
    readonly visitors: number;
    readonly timeouts: number;
    readonly errors: number;
    readonly defers: number;
    readonly denies: number;
  };
  readonly prepQueue: {
    readonly qsize: number;
    readonly lookups: number;
    readonly misses: number;
    readonly drops: number;
    readonly skips: number;
  };
  readonly aupiCdevq: {
    readonly qlen: number;
    readonly qlimit: number;
    readonly inserts: number;
    readonly reads: number;
    readonly drops: number;
  };
  readonly workQueue: { readonly qsize: number };
  readonly logQueue: {
    readonly qsize: number;
    /** Records queued per event code, indexed by {@link EventCode}. */
    readonly counts: readonly number[];
    readonly errors: number;
  };
  readonly hashCache: CacheCounters;
  readonly csigCache: CacheCounters;
  readonly ldplCache: CacheCounters;
}

export type LogEvent =
  | OpsEvent
  | StatsSnapshot
  | ImageExec
  | ProcessAccess
  | LaunchdAdd
  | SocketListen
  | SocketAccept
  | SocketConnect;
