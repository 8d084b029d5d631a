import type { SerializerContext } from './context.js';
import { invariant } from './errors.js';
import { isPositivelyValidated, shouldEmitHashes } from './redaction.js';
import type { RecordSink } from './sink.js';
import { type CodeSignature, type ImageExec, type ImageHashes, type ScriptImage, isFullStat } from './types.js';

/** Either a full image or a script; only the former may carry a signature. */
export type SubjectImage = ScriptImage & { readonly codesign?: CodeSignature };

export function assertUnsignedScript(script: ScriptImage): void {
  invariant(
    !('codesign' in script) || script.codesign === undefined,
    'unsigned-script',
    `script ${script.path} carries a code signature`,
  );
}

function writeHashes(ctx: SerializerContext, sink: RecordSink, hashes: ImageHashes): void {
  for (const alg of ctx.redaction.hashes) {
    const digest = hashes[alg];
    if (digest) {
      sink.dictItem(alg);
      sink.valueBufHex(digest);
    }
  }
}

/**
 * Object-image rendering, used when the image itself is what the record is
 * about: stat metadata, hashes and the complete signature block.
 */
export function writeImageAsSubject(
  ctx: SerializerContext,
  sink: RecordSink,
  image: SubjectImage,
): void {
  const { redaction, identity } = ctx;
  const codesign = image.codesign;

  sink.dictBegin();
  sink.dictItem('path');
  sink.valueString(image.path);

  const stat = image.stat;
  if (stat) {
    if (!redaction.mode) {
      sink.dictItem('mode');
      sink.valueUintOct(stat.mode);
    }
    identity.writeUser(sink, stat.uid, 'uid', 'uname');
    if (!redaction.groups) {
      identity.writeGroup(sink, stat.gid, 'gid', 'gname');
    }
    if (isFullStat(stat)) {
      if (!redaction.size) {
        sink.dictItem('size');
        sink.valueUint(stat.size);
      }
      if (!redaction.mtime) {
        sink.dictItem('mtime');
        sink.valueTimespec(stat.mtime);
      }
      if (!redaction.ctime) {
        sink.dictItem('ctime');
        sink.valueTimespec(stat.ctime);
      }
      if (!redaction.btime) {
        sink.dictItem('btime');
        sink.valueTimespec(stat.btime);
      }
    }
  }

  if (image.hashes && shouldEmitHashes(redaction, codesign)) {
    writeHashes(ctx, sink, image.hashes);
  }

  if (codesign) {
    sink.dictItem('signature');
    sink.valueString(codesign.result);
    if (codesign.origin) {
      sink.dictItem('origin');
      sink.valueString(codesign.origin);
    }
    if (codesign.cdhash) {
      sink.dictItem('cdhash');
      sink.valueBufHex(codesign.cdhash);
    }
    if (codesign.ident !== undefined) {
      sink.dictItem('ident');
      sink.valueString(codesign.ident);
    }
    if (codesign.teamid !== undefined) {
      sink.dictItem('teamid');
      sink.valueString(codesign.teamid);
    }
    if (codesign.certcn !== undefined) {
      sink.dictItem('certcn');
      sink.valueString(codesign.certcn);
    }
  }
  sink.dictEnd();
}

/**
 * Process-context rendering, used for the image attached to a process and
 * for every ancestor. Only a positively validated signature contributes, and
 * only its ident and team id.
 */
export function writeImageAsAncestor(ctx: SerializerContext, sink: RecordSink, image: ImageExec): void {
  sink.dictBegin();
  // A reconstructed image has no trustworthy exec time.
  if (!image.reconstructed) {
    sink.dictItem('exec_time');
    sink.valueTimespec(image.time);
  }
  sink.dictItem('exec_pid');
  sink.valueInt(image.pid);
  sink.dictItem('path');
  sink.valueString(image.path);

  if (image.hashes && shouldEmitHashes(ctx.redaction, image.codesign)) {
    writeHashes(ctx, sink, image.hashes);
  }

  if (isPositivelyValidated(image.codesign)) {
    if (image.codesign.ident !== undefined) {
      sink.dictItem('ident');
      sink.valueString(image.codesign.ident);
    }
    if (image.codesign.teamid !== undefined) {
      sink.dictItem('teamid');
      sink.valueString(image.codesign.teamid);
    }
  }

  const script = image.script;
  if (script) {
    assertUnsignedScript(script);
    sink.dictItem('script');
    sink.dictBegin();
    sink.dictItem('path');
    sink.valueString(script.path);
    if (script.hashes) {
      writeHashes(ctx, sink, script.hashes);
    }
    sink.dictEnd();
  }
  sink.dictEnd();
}
