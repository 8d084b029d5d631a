import fs from 'node:fs';

import { LRUCache } from 'lru-cache';

import type { Logger } from './logger.js';
import type { RecordSink } from './sink.js';
import { isNoId } from './types.js';

/** Best-effort numeric id to name lookup. */
export interface NameService {
  userName(uid: number): string | undefined;
  groupName(gid: number): string | undefined;
}

export interface ResolvedIdentity {
  /** `-1` for the "no such id" sentinel. */
  id: number;
  name?: string;
}

export class StaticNameService implements NameService {
  private readonly users: Map<number, string>;
  private readonly groups: Map<number, string>;

  constructor(entries: { users?: Record<number, string>; groups?: Record<number, string> } = {}) {
    this.users = toIdMap(entries.users ?? {});
    this.groups = toIdMap(entries.groups ?? {});
  }

  userName(uid: number): string | undefined {
    return this.users.get(uid);
  }

  groupName(gid: number): string | undefined {
    return this.groups.get(gid);
  }
}

function toIdMap(entries: Record<number, string>): Map<number, string> {
  const out = new Map<number, string>();
  for (const [id, name] of Object.entries(entries)) {
    out.set(Number(id), name);
  }
  return out;
}

export interface PasswdNameServiceOptions {
  passwdPath?: string;
  groupPath?: string;
  /** How long a parsed database stays cached before it is read again. */
  ttlMs?: number;
  logger?: Logger;
}

/**
 * Reads the local passwd and group databases. Parsed tables are cached for
 * `ttlMs` so that account changes show up without a restart.
 */
export class PasswdNameService implements NameService {
  private readonly passwdPath: string;
  private readonly groupPath: string;
  private readonly logger?: Logger;
  private readonly tables: LRUCache<string, Map<number, string>>;
  private readonly warned = new Set<string>();

  constructor(options: PasswdNameServiceOptions = {}) {
    this.passwdPath = options.passwdPath ?? '/etc/passwd';
    this.groupPath = options.groupPath ?? '/etc/group';
    this.logger = options.logger;
    this.tables = new LRUCache<string, Map<number, string>>({
      max: 2,
      ttl: Math.max(1, Math.trunc(options.ttlMs ?? 60_000)),
      allowStale: false,
    });
  }

  userName(uid: number): string | undefined {
    return this.table(this.passwdPath).get(uid);
  }

  groupName(gid: number): string | undefined {
    return this.table(this.groupPath).get(gid);
  }

  private table(filePath: string): Map<number, string> {
    const cached = this.tables.get(filePath);
    if (cached) {
      return cached;
    }
    const parsed = this.read(filePath);
    this.tables.set(filePath, parsed);
    return parsed;
  }

  private read(filePath: string): Map<number, string> {
    let content: string;
    try {
      content = fs.readFileSync(filePath, 'utf8');
    } catch (err) {
      if (!this.warned.has(filePath)) {
        this.warned.add(filePath);
        const message = err instanceof Error ? err.message : String(err);
        this.logger?.warn(`name service database unavailable: ${filePath}: ${message}`);
      }
      return new Map();
    }
    return parseIdDatabase(content);
  }
}

/**
 * Parses `name:password:id:...` lines as found in passwd(5) and group(5).
 * The first entry for an id wins.
 */
export function parseIdDatabase(content: string): Map<number, string> {
  const out = new Map<number, string>();
  for (const line of content.split('\n')) {
    const trimmed = line.trim();
    if (!trimmed || trimmed.startsWith('#')) continue;
    const fields = trimmed.split(':');
    if (fields.length < 3) continue;
    const name = fields[0];
    const id = Number(fields[2]);
    if (!name || !Number.isInteger(id) || fields[2] === '') continue;
    if (!out.has(id)) {
      out.set(id, name);
    }
  }
  return out;
}

/**
 * Resolves ids while a record is written rather than when the event is
 * captured, so a slow name service never stalls capture.
 */
export class IdentityResolver {
  constructor(
    private readonly enabled: boolean,
    private readonly names: NameService,
  ) {}

  resolveUser(uid: number): ResolvedIdentity {
    return this.resolve(uid, (id) => this.names.userName(id));
  }

  resolveGroup(gid: number): ResolvedIdentity {
    return this.resolve(gid, (id) => this.names.groupName(id));
  }

  writeUser(sink: RecordSink, uid: number, idKey: string, nameKey: string): void {
    write(sink, this.resolveUser(uid), idKey, nameKey);
  }

  writeGroup(sink: RecordSink, gid: number, idKey: string, nameKey: string): void {
    write(sink, this.resolveGroup(gid), idKey, nameKey);
  }

  private resolve(id: number, lookup: (id: number) => string | undefined): ResolvedIdentity {
    if (isNoId(id)) {
      return { id: -1 };
    }
    if (!this.enabled) {
      return { id };
    }
    const name = lookup(id);
    return name === undefined ? { id } : { id, name };
  }
}

function write(sink: RecordSink, identity: ResolvedIdentity, idKey: string, nameKey: string): void {
  sink.dictItem(idKey);
  if (identity.id === -1) {
    sink.valueInt(-1);
    return;
  }
  sink.valueUint(identity.id);
  if (identity.name !== undefined) {
    sink.dictItem(nameKey);
    sink.valueString(identity.name);
  }
}
