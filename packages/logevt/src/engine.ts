import os from 'node:os';

import { type LogConfig, freezeLogConfig } from './config.js';
import type { SerializerContext } from './context.js';
import { InvariantViolationError, RecordWriteError } from './errors.js';
import {
  type BuildInfo,
  type Provenance,
  type SystemInfo,
  writeImageExec,
  writeLaunchdAdd,
  writeOps,
  writeProcessAccess,
  writeSocketAccept,
  writeSocketConnect,
  writeSocketListen,
  writeStats,
} from './events.js';
import { IdentityResolver, type NameService, PasswdNameService } from './identity.js';
import { type Logger, createConsoleLogger } from './logger.js';
import { redactionPolicyFromConfig } from './redaction.js';
import type { RecordSink } from './sink.js';
import {
  EventCode,
  type ImageExec,
  type LaunchdAdd,
  type LogEvent,
  type OpsEvent,
  type ProcessAccess,
  type SocketAccept,
  type SocketConnect,
  type SocketListen,
  type StatsSnapshot,
} from './types.js';

export const ENGINE_VERSION = '0.1.0';

export interface LogEngineOptions {
  config: LogConfig;
  /** Defaults to the local passwd/group databases. */
  nameService?: NameService;
  build?: Partial<BuildInfo>;
  system?: SystemInfo;
  logger?: Logger;
}

/**
 * Turns event descriptors into records. Each call writes exactly one record
 * to the given sink or throws; nothing is retained between calls.
 */
export interface LogEngine {
  readonly config: Readonly<LogConfig>;
  /** Whether the configuration asks for events of this kind. */
  isEnabled(code: EventCode): boolean;
  write(sink: RecordSink, event: LogEvent): void;
  ops(sink: RecordSink, event: OpsEvent): void;
  stats(sink: RecordSink, snapshot: StatsSnapshot): void;
  imageExec(sink: RecordSink, event: ImageExec): void;
  processAccess(sink: RecordSink, event: ProcessAccess): void;
  launchdAdd(sink: RecordSink, event: LaunchdAdd): void;
  socketListen(sink: RecordSink, event: SocketListen): void;
  socketAccept(sink: RecordSink, event: SocketAccept): void;
  socketConnect(sink: RecordSink, event: SocketConnect): void;
}

export function detectSystemInfo(): SystemInfo {
  return {
    name: os.type(),
    version: os.release(),
    build: os.version(),
  };
}

/**
 * Injects the configuration snapshot and collaborators. Must run before any
 * record is written; the snapshot is frozen and never swapped afterwards.
 */
export function createLogEngine(options: LogEngineOptions): LogEngine {
  const config = freezeLogConfig(options.config);
  const logger = options.logger ?? createConsoleLogger('warn');
  const names = options.nameService ?? new PasswdNameService({ logger });

  const redaction = redactionPolicyFromConfig(config);
  const ctx: SerializerContext = Object.freeze({
    config,
    redaction,
    identity: new IdentityResolver(redaction.resolveIdentities, names),
  });
  const provenance: Provenance = Object.freeze({
    build: {
      version: options.build?.version ?? ENGINE_VERSION,
      date: options.build?.date ?? '',
      info: options.build?.info ?? '',
    },
    system: options.system ?? detectSystemInfo(),
  });

  const enabled = new Set<EventCode>(config.events);

  return {
    config,
    isEnabled(code) {
      return enabled.has(code);
    },
    write(sink, event) {
      guarded(event.code, () => dispatch(ctx, provenance, sink, event));
    },
    ops(sink, event) {
      guarded(event.code, () => writeOps(ctx, provenance, sink, event));
    },
    stats(sink, snapshot) {
      guarded(snapshot.code, () => writeStats(sink, snapshot));
    },
    imageExec(sink, event) {
      guarded(event.code, () => writeImageExec(ctx, sink, event));
    },
    processAccess(sink, event) {
      guarded(event.code, () => writeProcessAccess(ctx, sink, event));
    },
    launchdAdd(sink, event) {
      guarded(event.code, () => writeLaunchdAdd(ctx, sink, event));
    },
    socketListen(sink, event) {
      guarded(event.code, () => writeSocketListen(ctx, sink, event));
    },
    socketAccept(sink, event) {
      guarded(event.code, () => writeSocketAccept(ctx, sink, event));
    },
    socketConnect(sink, event) {
      guarded(event.code, () => writeSocketConnect(ctx, sink, event));
    },
  };
}

function dispatch(ctx: SerializerContext, provenance: Provenance, sink: RecordSink, event: LogEvent): void {
  switch (event.code) {
    case EventCode.Ops:
      return writeOps(ctx, provenance, sink, event);
    case EventCode.Stats:
      return writeStats(sink, event);
    case EventCode.ImageExec:
      return writeImageExec(ctx, sink, event);
    case EventCode.ProcessAccess:
      return writeProcessAccess(ctx, sink, event);
    case EventCode.LaunchdAdd:
      return writeLaunchdAdd(ctx, sink, event);
    case EventCode.SocketListen:
      return writeSocketListen(ctx, sink, event);
    case EventCode.SocketAccept:
      return writeSocketAccept(ctx, sink, event);
    case EventCode.SocketConnect:
      return writeSocketConnect(ctx, sink, event);
    default: {
      const exhaustive: never = event;
      return exhaustive;
    }
  }
}

function guarded(code: EventCode, write: () => void): void {
  try {
    write();
  } catch (err) {
    if (err instanceof InvariantViolationError) {
      throw err;
    }
    throw new RecordWriteError(code, { cause: err });
  }
}
