import type { SerializerContext } from './context.js';
import { beginRecord, endRecord } from './envelope.js';
import { assertUnsignedScript, writeImageAsSubject } from './image.js';
import { writeProcess } from './process.js';
import type { RecordSink } from './sink.js';
import {
  type CacheCounters,
  type ImageExec,
  type LaunchdAdd,
  type OpsEvent,
  type ProcessAccess,
  type SocketAccept,
  type SocketConnect,
  type SocketListen,
  type StatsSnapshot,
  eventCodeName,
} from './types.js';

export interface BuildInfo {
  version: string;
  date: string;
  info: string;
}

export interface SystemInfo {
  name: string;
  version: string;
  build: string;
}

/** Identity of this build and host, reported in the startup record. */
export interface Provenance {
  readonly build: BuildInfo;
  readonly system: SystemInfo;
}

const PROTOCOL_NAMES: Record<number, string> = {
  1: 'icmp',
  6: 'tcp',
  17: 'udp',
  58: 'icmp6',
  132: 'sctp',
};

export function protocolName(protocol: number): string {
  return PROTOCOL_NAMES[protocol] ?? String(protocol);
}

function field(sink: RecordSink, key: string): RecordSink {
  sink.dictItem(key);
  return sink;
}

function writeStringList(sink: RecordSink, values: readonly string[], label: string): void {
  sink.listBegin();
  for (const value of values) {
    sink.listItem(label);
    sink.valueString(value);
  }
  sink.listEnd();
}

function writeCounters(sink: RecordSink, counters: ReadonlyArray<readonly [string, number]>): void {
  sink.dictBegin();
  for (const [key, value] of counters) {
    field(sink, key).valueUint(value);
  }
  sink.dictEnd();
}

function cacheCounters(c: CacheCounters): Array<readonly [string, number]> {
  return [
    ['buckets', c.used],
    ['bucketmax', c.size],
    ['put', c.puts],
    ['get', c.gets],
    ['hit', c.hits],
    ['miss', c.misses],
    ['inv', c.invalids],
  ];
}

export function writeOps(ctx: SerializerContext, provenance: Provenance, sink: RecordSink, event: OpsEvent): void {
  const { config } = ctx;

  beginRecord(sink, event);
  field(sink, 'op').valueString(event.subtype);

  field(sink, 'build').dictBegin();
  field(sink, 'version').valueString(provenance.build.version);
  field(sink, 'date').valueString(provenance.build.date);
  field(sink, 'info').valueString(provenance.build.info);
  sink.dictEnd();

  field(sink, 'config').dictBegin();
  field(sink, 'path').valueString(config.path);
  field(sink, 'id');
  if (config.id !== null) {
    sink.valueString(config.id);
  } else {
    sink.valueNull();
  }
  field(sink, 'launchd_mode').valueBool(config.launchd_mode);
  field(sink, 'debug').valueBool(config.debug);
  field(sink, 'events').valueString(config.events.map(eventCodeName).join(','));
  field(sink, 'stats_interval').valueUint(config.stats_interval);
  field(sink, 'kextlevel').valueString(config.kextlevel);
  field(sink, 'hashes').valueString(config.hashes.join(','));
  field(sink, 'codesign').valueBool(config.codesign);
  field(sink, 'envlevel').valueString(config.envlevel);
  field(sink, 'resolve_users_groups').valueBool(config.resolve_users_groups);
  field(sink, 'omit_mode').valueBool(config.omit_mode);
  field(sink, 'omit_size').valueBool(config.omit_size);
  field(sink, 'omit_mtime').valueBool(config.omit_mtime);
  field(sink, 'omit_ctime').valueBool(config.omit_ctime);
  field(sink, 'omit_btime').valueBool(config.omit_btime);
  field(sink, 'omit_sid').valueBool(config.omit_sid);
  field(sink, 'omit_groups').valueBool(config.omit_groups);
  field(sink, 'omit_apple_hashes').valueBool(config.omit_apple_hashes);
  field(sink, 'ancestors');
  if (Number.isFinite(config.ancestors)) {
    sink.valueUint(config.ancestors);
  } else {
    sink.valueString('unlimited');
  }
  field(sink, 'logdst').valueString(config.logdst);
  field(sink, 'logfmt').valueString(config.logfmt);
  field(sink, 'logoneline');
  if (config.logoneline === null) {
    sink.valueNull();
  } else {
    sink.valueBool(config.logoneline);
  }
  field(sink, 'logfile');
  if (config.logfile !== null) {
    sink.valueString(config.logfile);
  } else {
    sink.valueNull();
  }
  field(sink, 'limit_nofile').valueUint(config.limit_nofile);
  field(sink, 'suppress_image_exec_at_start').valueBool(config.suppress_image_exec_at_start);
  // Suppression lists are reported by size only.
  field(sink, 'suppress_image_exec_by_ident').valueUint(config.suppress_image_exec_by_ident.length);
  field(sink, 'suppress_image_exec_by_path').valueUint(config.suppress_image_exec_by_path.length);
  field(sink, 'suppress_image_exec_by_ancestor_ident').valueUint(
    config.suppress_image_exec_by_ancestor_ident.length,
  );
  field(sink, 'suppress_image_exec_by_ancestor_path').valueUint(
    config.suppress_image_exec_by_ancestor_path.length,
  );
  field(sink, 'suppress_process_access_by_subject_ident').valueUint(
    config.suppress_process_access_by_subject_ident.length,
  );
  field(sink, 'suppress_process_access_by_subject_path').valueUint(
    config.suppress_process_access_by_subject_path.length,
  );
  field(sink, 'suppress_socket_op_localhost').valueBool(config.suppress_socket_op_localhost);
  field(sink, 'suppress_socket_op_by_subject_ident').valueUint(config.suppress_socket_op_by_subject_ident.length);
  field(sink, 'suppress_socket_op_by_subject_path').valueUint(config.suppress_socket_op_by_subject_path.length);
  sink.dictEnd();

  field(sink, 'system').dictBegin();
  field(sink, 'name').valueString(provenance.system.name);
  field(sink, 'version').valueString(provenance.system.version);
  field(sink, 'build').valueString(provenance.system.build);
  sink.dictEnd();

  endRecord(sink);
}

export function writeStats(sink: RecordSink, st: StatsSnapshot): void {
  beginRecord(sink, st);

  const workarounds: Array<readonly [string, number]> = [];
  for (const w of st.evtloop.workarounds) {
    workarounds.push([w.id, w.hits]);
    if (w.fatal !== undefined) {
      workarounds.push([`${w.id}_fatal`, w.fatal]);
    }
  }
  field(sink, 'evtloop');
  writeCounters(sink, [
    ['aupclobber', st.evtloop.aupclobbers],
    ['aueunknown', st.evtloop.aueunknowns],
    ['failedsyscall', st.evtloop.failedsyscalls],
    ...workarounds,
    ['missingtoken', st.evtloop.missingtoken],
    ['oom', st.evtloop.ooms],
  ]);

  const pm = st.procmon;
  field(sink, 'procmon').dictBegin();
  field(sink, 'actprocs').valueUint(pm.procs);
  field(sink, 'actexecimages').valueUint(pm.images);
  field(sink, 'liveacq').valueUint(pm.liveacq);
  field(sink, 'miss');
  writeCounters(sink, [
    ['bypid', pm.missBypid],
    ['forksubj', pm.missForksubj],
    ['execsubj', pm.missExecsubj],
    ['execinterp', pm.missExecinterp],
    ['chdirsubj', pm.missChdirsubj],
    ['getcwd', pm.missGetcwd],
  ]);
  field(sink, 'oom').valueUint(pm.ooms);
  sink.dictEnd();

  field(sink, 'hackmon');
  writeCounters(sink, [
    ['recvd', st.hackmon.recvd],
    ['procd', st.hackmon.procd],
    ['oom', st.hackmon.ooms],
  ]);
  field(sink, 'filemon');
  writeCounters(sink, [
    ['recvd', st.filemon.recvd],
    ['procd', st.filemon.procd],
    ['lpmiss', st.filemon.lpmiss],
    ['oom', st.filemon.ooms],
  ]);
  field(sink, 'sockmon');
  writeCounters(sink, [
    ['recvd', st.sockmon.recvd],
    ['procd', st.sockmon.procd],
    ['oom', st.sockmon.ooms],
  ]);
  field(sink, 'kext_cdevq');
  writeCounters(sink, [
    ['buckets', st.kextCdevq.qsize],
    ['visitors', st.kextCdevq.visitors],
    ['timeout', st.kextCdevq.timeouts],
    ['error', st.kextCdevq.errors],
    ['defer', st.kextCdevq.defers],
    ['deny', st.kextCdevq.denies],
  ]);
  field(sink, 'prep_queue');
  writeCounters(sink, [
    ['buckets', st.prepQueue.qsize],
    ['lookup', st.prepQueue.lookups],
    ['miss', st.prepQueue.misses],
    ['drop', st.prepQueue.drops],
    ['bktskip', st.prepQueue.skips],
  ]);
  field(sink, 'aupi_cdevq');
  writeCounters(sink, [
    ['buckets', st.aupiCdevq.qlen],
    ['bucketmax', st.aupiCdevq.qlimit],
    ['insert', st.aupiCdevq.inserts],
    ['read', st.aupiCdevq.reads],
    ['drop', st.aupiCdevq.drops],
  ]);
  field(sink, 'work_queue');
  writeCounters(sink, [['buckets', st.workQueue.qsize]]);

  field(sink, 'log_queue').dictBegin();
  field(sink, 'buckets').valueUint(st.logQueue.qsize);
  field(sink, 'events').listBegin();
  for (const count of st.logQueue.counts) {
    sink.listItem('event');
    sink.valueUint(count);
  }
  sink.listEnd();
  field(sink, 'errors').valueUint(st.logQueue.errors);
  sink.dictEnd();

  field(sink, 'hash_cache');
  writeCounters(sink, cacheCounters(st.hashCache));
  field(sink, 'csig_cache');
  writeCounters(sink, cacheCounters(st.csigCache));
  field(sink, 'ldpl_cache');
  writeCounters(sink, cacheCounters(st.ldplCache));

  endRecord(sink);
}

export function writeImageExec(ctx: SerializerContext, sink: RecordSink, ie: ImageExec): void {
  beginRecord(sink, ie);

  if (ie.reconstructed) {
    field(sink, 'reconstructed').valueBool(true);
  }
  if (ie.argv) {
    field(sink, 'argv');
    writeStringList(sink, ie.argv, 'arg');
  }
  if (ie.envv) {
    field(sink, 'env');
    writeStringList(sink, ie.envv, 'var');
  }
  if (ie.cwd !== undefined) {
    field(sink, 'cwd').valueString(ie.cwd);
  }

  field(sink, 'image');
  writeImageAsSubject(ctx, sink, ie);

  if (ie.script) {
    assertUnsignedScript(ie.script);
    field(sink, 'script');
    writeImageAsSubject(ctx, sink, ie.script);
  }

  // The subject runs the image that preceded this exec.
  field(sink, 'subject');
  writeProcess(ctx, sink, ie.reconstructed ? undefined : ie.subject, 0, ie.prev);

  endRecord(sink);
}

export function writeProcessAccess(ctx: SerializerContext, sink: RecordSink, pa: ProcessAccess): void {
  beginRecord(sink, pa);

  field(sink, 'method').valueString(pa.method);
  field(sink, 'object');
  writeProcess(ctx, sink, pa.object, pa.objectPid ?? 0, pa.objectImage);
  field(sink, 'subject');
  writeProcess(ctx, sink, pa.subject, 0, pa.subjectImage);

  endRecord(sink);
}

export function writeLaunchdAdd(ctx: SerializerContext, sink: RecordSink, ev: LaunchdAdd): void {
  beginRecord(sink, ev);

  field(sink, 'plist').dictBegin();
  field(sink, 'path').valueString(ev.plistPath);
  sink.dictEnd();

  field(sink, 'program').dictBegin();
  if (ev.programRpath !== undefined) {
    field(sink, 'rpath').valueString(ev.programRpath);
  }
  if (ev.programPath !== undefined) {
    field(sink, 'path').valueString(ev.programPath);
  }
  if (ev.programArgv) {
    field(sink, 'argv');
    writeStringList(sink, ev.programArgv, 'arg');
  }
  sink.dictEnd();

  if (!ev.noSubject) {
    field(sink, 'subject');
    writeProcess(ctx, sink, ev.subject, 0, ev.subjectImage);
  }

  endRecord(sink);
}

function writeSocketCommon(sink: RecordSink, so: SocketListen | SocketAccept | SocketConnect): void {
  if (so.protocol) {
    field(sink, 'proto').valueString(protocolName(so.protocol));
  }
  if (so.sockAddr) {
    field(sink, 'sockaddr').valueString(so.sockAddr);
    field(sink, 'sockport').valueUint(so.sockPort);
  }
}

function writePeer(sink: RecordSink, so: SocketAccept | SocketConnect): void {
  if (so.peerAddr) {
    field(sink, 'peeraddr').valueString(so.peerAddr);
    field(sink, 'peerport').valueUint(so.peerPort);
  }
}

export function writeSocketListen(ctx: SerializerContext, sink: RecordSink, so: SocketListen): void {
  beginRecord(sink, so);
  writeSocketCommon(sink, so);
  field(sink, 'subject');
  writeProcess(ctx, sink, so.subject, 0, so.subjectImage);
  endRecord(sink);
}

export function writeSocketAccept(ctx: SerializerContext, sink: RecordSink, so: SocketAccept): void {
  beginRecord(sink, so);
  writeSocketCommon(sink, so);
  writePeer(sink, so);
  field(sink, 'subject');
  writeProcess(ctx, sink, so.subject, 0, so.subjectImage);
  endRecord(sink);
}

export function writeSocketConnect(ctx: SerializerContext, sink: RecordSink, so: SocketConnect): void {
  beginRecord(sink, so);
  writeSocketCommon(sink, so);
  writePeer(sink, so);
  field(sink, 'subject');
  writeProcess(ctx, sink, so.subject, 0, so.subjectImage);
  endRecord(sink);
}
