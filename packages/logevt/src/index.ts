/**
 * @execmon/logevt
 *
 * Serializes security event descriptors into versioned records through a
 * pluggable sink.
 */

export type {
  CacheCounters,
  CodeSignature,
  EventHeader,
  FileAttributes,
  FileStat,
  HashAlgorithm,
  ImageExec,
  ImageHashes,
  LaunchdAdd,
  LogEvent,
  OpsEvent,
  ProcessAccess,
  ProcessDescriptor,
  ScriptImage,
  SignatureOrigin,
  SignatureResult,
  SocketAccept,
  SocketConnect,
  SocketListen,
  StatsSnapshot,
  Timespec,
  WorkaroundCounter,
} from './types.js';
export {
  EVENT_CODE_COUNT,
  EventCode,
  HASH_ALGORITHMS,
  HASH_SIZES,
  NO_DEV,
  NO_ID,
  allEventCodes,
  eventCodeName,
  isFullStat,
  isNoDev,
  isNoId,
  parseEventCode,
} from './types.js';

export type { EnvLevel, KextLevel, LogConfig, SuppressionListKey } from './config.js';
export { SUPPRESSION_LIST_KEYS, defaultLogConfig, freezeLogConfig } from './config.js';

export { InvariantViolationError, RecordWriteError, SinkProtocolError, invariant } from './errors.js';

export type { Logger, LogLevel } from './logger.js';
export { createConsoleLogger, silentLogger } from './logger.js';

export type { RecordSink, SinkCall, SinkOp } from './sink.js';
export { SinkProtocol } from './sink-protocol.js';
export { RecordingSink } from './recording-sink.js';
export type { JsonObject, JsonValue, ValueRenderer } from './tree-sink.js';
export { CollectingSink, TreeSink, defaultValueRenderer, formatTimespec, formatTtyDev, toHex } from './tree-sink.js';

export type { NameService, PasswdNameServiceOptions, ResolvedIdentity } from './identity.js';
export { IdentityResolver, PasswdNameService, StaticNameService, parseIdDatabase } from './identity.js';

export type { RedactionPolicy } from './redaction.js';
export { isPositivelyValidated, isTrustedPlatform, redactionPolicyFromConfig, shouldEmitHashes } from './redaction.js';

export { RECORD_SCHEMA_VERSION, beginRecord, endRecord } from './envelope.js';
export type { SerializerContext } from './context.js';
export type { SubjectImage } from './image.js';
export { writeImageAsAncestor, writeImageAsSubject } from './image.js';
export { writeAncestors, writeProcess } from './process.js';

export type { BuildInfo, Provenance, SystemInfo } from './events.js';
export {
  protocolName,
  writeImageExec,
  writeLaunchdAdd,
  writeOps,
  writeProcessAccess,
  writeSocketAccept,
  writeSocketConnect,
  writeSocketListen,
  writeStats,
} from './events.js';

export type { LogEngine, LogEngineOptions } from './engine.js';
export { ENGINE_VERSION, createLogEngine, detectSystemInfo } from './engine.js';
