import type { SerializerContext } from './context.js';
import { writeImageAsAncestor } from './image.js';
import type { RecordSink } from './sink.js';
import { type ImageExec, type ProcessDescriptor, isNoDev } from './types.js';

/**
 * Writes one process as a dict.
 *
 * When `objectPid` is positive only that pid is known and `process` is
 * ignored even if set. `image` is the image the process is running; its
 * `prev` chain supplies the ancestors.
 */
export function writeProcess(
  ctx: SerializerContext,
  sink: RecordSink,
  process: ProcessDescriptor | undefined,
  objectPid: number,
  image: ImageExec | undefined,
): void {
  const { redaction, identity } = ctx;

  sink.dictBegin();
  if (image?.reconstructed) {
    sink.dictItem('reconstructed');
    sink.valueBool(true);
  }
  if (objectPid > 0) {
    sink.dictItem('pid');
    sink.valueInt(objectPid);
  } else if (process) {
    sink.dictItem('pid');
    sink.valueInt(process.pid);
    identity.writeUser(sink, process.auid, 'auid', 'auname');
    identity.writeUser(sink, process.euid, 'euid', 'euname');
    if (!redaction.groups) {
      identity.writeGroup(sink, process.egid, 'egid', 'egname');
    }
    identity.writeUser(sink, process.ruid, 'ruid', 'runame');
    if (!redaction.groups) {
      identity.writeGroup(sink, process.rgid, 'rgid', 'rgname');
    }
    if (!redaction.sid) {
      sink.dictItem('sid');
      sink.valueUint(process.sid);
    }
    if (!isNoDev(process.dev)) {
      sink.dictItem('dev');
      sink.valueTtyDev(process.dev);
    }
    if (process.addr) {
      sink.dictItem('addr');
      sink.valueString(process.addr);
    }
  }
  if (image) {
    if (image.forkTime && image.forkTime.sec > 0) {
      sink.dictItem('fork_time');
      sink.valueTimespec(image.forkTime);
    }
    sink.dictItem('image');
    writeImageAsAncestor(ctx, sink, image);
    if (ctx.config.ancestors > 0) {
      sink.dictItem('ancestors');
      writeAncestors(ctx, sink, image.prev);
    }
  }
  sink.dictEnd();
}

/**
 * Walks the `prev` chain from `first`, nearest ancestor first. The walk ends
 * at the configured depth even if the chain does not terminate.
 */
export function writeAncestors(ctx: SerializerContext, sink: RecordSink, first: ImageExec | undefined): void {
  const max = ctx.config.ancestors;
  let depth = 0;

  sink.listBegin();
  for (let node = first; node && node.pid > 0; node = node.prev) {
    if (depth >= max) {
      break;
    }
    sink.listItem('ancestor');
    writeImageAsAncestor(ctx, sink, node);
    depth++;
  }
  sink.listEnd();
}
