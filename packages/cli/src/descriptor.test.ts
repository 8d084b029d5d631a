import { EventCode, NO_DEV } from '@execmon/logevt';
import { describe, expect, it } from 'vitest';

import { DescriptorDecodeError, decodeDescriptor, decodeDescriptors } from './descriptor.js';

const subject = { pid: 4242, auid: 501, euid: 501, egid: 20, ruid: 501, rgid: 20, sid: 100 };
const time = { sec: 1700000000, nsec: 5 };

function decodeFailure(value: unknown): DescriptorDecodeError | undefined {
  try {
    decodeDescriptor(value);
  } catch (err) {
    if (err instanceof DescriptorDecodeError) return err;
    throw err;
  }
  return undefined;
}

describe('decodeDescriptor', () => {
  it('decodes an image exec with its lineage', () => {
    const event = decodeDescriptor({
      code: 'image_exec',
      time,
      pid: 4242,
      path: '/bin/ls',
      hashes: { md5: '00ff'.repeat(8) },
      codesign: { result: 'good', origin: 'system', ident: 'com.example.ls', cdhash: 'abcd' },
      argv: ['ls', '-l'],
      subject,
      prev: { pid: 1, path: '/sbin/launchd', reconstructed: true },
    });

    expect(event.code).toBe(EventCode.ImageExec);
    if (event.code !== EventCode.ImageExec) return;
    expect(event.time).toEqual(time);
    expect(event.hashes?.md5).toEqual(Uint8Array.from([0, 255, 0, 255, 0, 255, 0, 255, 0, 255, 0, 255, 0, 255, 0, 255]));
    expect(event.codesign?.cdhash).toEqual(Uint8Array.from([0xab, 0xcd]));
    expect(event.argv).toEqual(['ls', '-l']);
    expect(event.reconstructed).toBe(false);
    expect(event.subject).toEqual({ ...subject, dev: NO_DEV, addr: undefined });
    expect(event.prev?.pid).toBe(1);
    expect(event.prev?.reconstructed).toBe(true);
    expect(event.prev?.time).toEqual({ sec: 0, nsec: 0 });
  });

  it('accepts numeric codes', () => {
    const event = decodeDescriptor({ code: 0, time, subtype: 'start' });
    expect(event).toEqual({ code: EventCode.Ops, time, subtype: 'start' });
  });

  it('fills socket defaults', () => {
    const event = decodeDescriptor({ code: 'socket_connect', time, subject });
    expect(event).toMatchObject({ code: EventCode.SocketConnect, protocol: 0, sockPort: 0, peerPort: 0 });
  });

  it('reads missing stats counters as zero', () => {
    const event = decodeDescriptor({
      code: 'stats',
      time,
      evtloop: { ooms: 2, workarounds: [{ id: 'radar1', hits: 4 }, { id: 'radar2', hits: 1, fatal: 2 }] },
      logQueue: { counts: [1, 2] },
    });

    expect(event.code).toBe(EventCode.Stats);
    if (event.code !== EventCode.Stats) return;
    expect(event.evtloop).toEqual({
      aupclobbers: 0,
      aueunknowns: 0,
      failedsyscalls: 0,
      workarounds: [
        { id: 'radar1', hits: 4 },
        { id: 'radar2', hits: 1, fatal: 2 },
      ],
      missingtoken: 0,
      ooms: 2,
    });
    expect(event.logQueue).toEqual({ qsize: 0, counts: [1, 2], errors: 0 });
    expect(event.hashCache.hits).toBe(0);
  });

  it('rejects stats lists that are not lists', () => {
    expect(decodeFailure({ code: 'stats', time, evtloop: { workarounds: 'radar1' } })?.message).toBe(
      '$.evtloop.workarounds: expected a list',
    );
    expect(decodeFailure({ code: 'stats', time, logQueue: { counts: 3 } })?.message).toBe(
      '$.logQueue.counts: expected a list of integers',
    );
  });

  it('reports the path of a bad field', () => {
    const err = decodeFailure({ code: 'process_access', time, method: 'ptrace', subject: { ...subject, euid: 'x' } });
    expect(err?.path).toBe('$.subject.euid');
    expect(err?.message).toBe('$.subject.euid: expected an integer');
  });

  it('rejects unknown codes', () => {
    expect(decodeFailure({ code: 'file_open', time })?.message).toBe('$.code: unknown event code: file_open');
  });

  it('rejects digests of the wrong size', () => {
    const err = decodeFailure({ code: 'image_exec', time, pid: 1, path: '/x', hashes: { sha1: 'abcd' }, subject });
    expect(err?.message).toBe('$.hashes.sha1: expected 20 bytes');
  });

  it('rejects signed scripts', () => {
    const err = decodeFailure({
      code: 'image_exec',
      time,
      pid: 1,
      path: '/bin/sh',
      script: { path: '/tmp/run.sh', codesign: { result: 'good' } },
      subject,
    });
    expect(err?.path).toBe('$.script.codesign');
  });
});

describe('decodeDescriptors', () => {
  it('accepts a single object or an array', () => {
    expect(decodeDescriptors({ code: 'ops', time, subtype: 'start' })).toHaveLength(1);
    expect(
      decodeDescriptors([
        { code: 'ops', time, subtype: 'start' },
        { code: 'ops', time, subtype: 'stop' },
      ]),
    ).toHaveLength(2);
  });

  it('prefixes paths with the array index', () => {
    expect(() => decodeDescriptors([{ code: 'ops', time, subtype: 'start' }, { code: 'ops' }])).toThrow(
      '$[1].time: expected an object',
    );
  });
});
