import {
  type EnvLevel,
  type EventCode,
  HASH_ALGORITHMS,
  type HashAlgorithm,
  type KextLevel,
  type LogConfig,
  SUPPRESSION_LIST_KEYS,
  parseEventCode,
} from '@execmon/logevt';

export type ConfigLintResult = {
  valid: boolean;
  errors: string[];
  warnings: string[];
};

export type ConfigParseResult = {
  lint: ConfigLintResult;
  /** Only the keys present in the document. */
  values: Partial<LogConfig>;
};

const BOOLEAN_KEYS = [
  'launchd_mode',
  'debug',
  'codesign',
  'resolve_users_groups',
  'omit_mode',
  'omit_size',
  'omit_mtime',
  'omit_ctime',
  'omit_btime',
  'omit_sid',
  'omit_groups',
  'omit_apple_hashes',
  'suppress_image_exec_at_start',
  'suppress_socket_op_localhost',
] as const;

const NULLABLE_STRING_KEYS = ['id', 'logfile'] as const;

const STRING_KEYS = ['logdst', 'logfmt'] as const;

const KEXT_LEVELS: readonly KextLevel[] = ['none', 'open', 'hash', 'csig'];
const ENV_LEVELS: readonly EnvLevel[] = ['none', 'dyld', 'full'];

const KNOWN_KEYS = new Set<string>([
  ...BOOLEAN_KEYS,
  ...NULLABLE_STRING_KEYS,
  ...STRING_KEYS,
  ...SUPPRESSION_LIST_KEYS,
  'events',
  'stats_interval',
  'kextlevel',
  'hashes',
  'envlevel',
  'ancestors',
  'logoneline',
  'limit_nofile',
]);

export function validateLogConfig(raw: unknown): ConfigLintResult {
  return parseLogConfig(raw).lint;
}

/**
 * Lints a parsed YAML document and extracts the values of the keys it sets.
 * `values` is only meaningful when `lint.valid` is true.
 */
export function parseLogConfig(raw: unknown): ConfigParseResult {
  const errors: string[] = [];
  const warnings: string[] = [];
  const values: Partial<LogConfig> = {};

  if (!isPlainObject(raw)) {
    return { lint: { valid: false, errors: ['configuration must be a mapping'], warnings }, values };
  }

  for (const key of Object.keys(raw)) {
    if (key === 'path') {
      warnings.push('path is ignored; it is set from the location of the configuration file');
    } else if (!KNOWN_KEYS.has(key)) {
      warnings.push(`unknown configuration key: ${key}`);
    }
  }

  for (const key of BOOLEAN_KEYS) {
    const value = raw[key];
    if (value === undefined) continue;
    if (typeof value !== 'boolean') {
      errors.push(`${key} must be a boolean`);
      continue;
    }
    values[key] = value;
  }

  for (const key of NULLABLE_STRING_KEYS) {
    const value = raw[key];
    if (value === undefined) continue;
    if (value === null || typeof value === 'string') {
      values[key] = value;
    } else {
      errors.push(`${key} must be a string or null`);
    }
  }

  for (const key of STRING_KEYS) {
    const value = raw[key];
    if (value === undefined) continue;
    if (typeof value !== 'string' || value.trim() === '') {
      errors.push(`${key} must be a non-empty string`);
      continue;
    }
    values[key] = value;
  }

  for (const key of SUPPRESSION_LIST_KEYS) {
    const value = raw[key];
    if (value === undefined) continue;
    const list = stringList(value);
    if (list === null) {
      errors.push(`${key} must be a list of strings`);
      continue;
    }
    values[key] = list;
  }

  const { events, hashes, kextlevel, envlevel, stats_interval, limit_nofile, ancestors, logoneline } = raw;

  if (events !== undefined) {
    const codes = parseEvents(events, errors);
    if (codes) values.events = codes;
  }

  if (hashes !== undefined) {
    const algs = parseHashes(hashes, errors);
    if (algs) values.hashes = algs;
  }

  if (kextlevel !== undefined) {
    const level = oneOf(kextlevel, KEXT_LEVELS);
    if (level === null) {
      errors.push(`kextlevel must be one of: ${KEXT_LEVELS.join(', ')}`);
    } else {
      values.kextlevel = level;
    }
  }

  if (envlevel !== undefined) {
    const level = oneOf(envlevel, ENV_LEVELS);
    if (level === null) {
      errors.push(`envlevel must be one of: ${ENV_LEVELS.join(', ')}`);
    } else {
      values.envlevel = level;
    }
  }

  if (stats_interval !== undefined) {
    if (isNonNegativeInteger(stats_interval)) {
      values.stats_interval = stats_interval;
    } else {
      errors.push('stats_interval must be a non-negative integer');
    }
  }

  if (limit_nofile !== undefined) {
    if (isNonNegativeInteger(limit_nofile) && limit_nofile > 0) {
      values.limit_nofile = limit_nofile;
    } else {
      errors.push('limit_nofile must be a positive integer');
    }
  }

  if (ancestors !== undefined) {
    if (ancestors === 'unlimited') {
      values.ancestors = Number.POSITIVE_INFINITY;
    } else if (isNonNegativeInteger(ancestors)) {
      values.ancestors = ancestors;
    } else {
      errors.push(`ancestors must be a non-negative integer or 'unlimited'`);
    }
  }

  if (logoneline !== undefined) {
    if (logoneline === null || typeof logoneline === 'boolean') {
      values.logoneline = logoneline;
    } else {
      errors.push('logoneline must be a boolean or null');
    }
  }

  return { lint: { valid: errors.length === 0, errors, warnings }, values };
}

function parseEvents(value: unknown, errors: string[]): EventCode[] | null {
  const items = listOrCommaString(value);
  if (items === null) {
    errors.push('events must be a list or a comma-separated string');
    return null;
  }
  const out: EventCode[] = [];
  for (const item of items) {
    const code = typeof item === 'string' || typeof item === 'number' ? parseEventCode(item) : null;
    if (code === null) {
      errors.push(`events: unknown event: ${String(item)}`);
      continue;
    }
    if (!out.includes(code)) out.push(code);
  }
  return out;
}

function parseHashes(value: unknown, errors: string[]): HashAlgorithm[] | null {
  const items = listOrCommaString(value);
  if (items === null) {
    errors.push('hashes must be a list or a comma-separated string');
    return null;
  }
  const out: HashAlgorithm[] = [];
  for (const item of items) {
    if (item === 'none') continue;
    const alg = oneOf(item, HASH_ALGORITHMS);
    if (alg === null) {
      errors.push(`hashes: unknown hash algorithm: ${String(item)}`);
      continue;
    }
    if (!out.includes(alg)) out.push(alg);
  }
  return out;
}

function listOrCommaString(value: unknown): unknown[] | null {
  if (Array.isArray(value)) {
    return value;
  }
  if (typeof value === 'string') {
    return value
      .split(',')
      .map((s) => s.trim())
      .filter((s) => s !== '');
  }
  return null;
}

function stringList(value: unknown): string[] | null {
  if (!Array.isArray(value)) return null;
  const out: string[] = [];
  for (const item of value) {
    if (typeof item !== 'string') return null;
    out.push(item);
  }
  return out;
}

function oneOf<T extends string>(value: unknown, allowed: readonly T[]): T | null {
  for (const candidate of allowed) {
    if (value === candidate) return candidate;
  }
  return null;
}

function isNonNegativeInteger(value: unknown): value is number {
  return typeof value === 'number' && Number.isInteger(value) && value >= 0;
}

export function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
