import { EventCode, type HashAlgorithm } from './types.js';

export type KextLevel = 'none' | 'open' | 'hash' | 'csig';

export type EnvLevel = 'none' | 'dyld' | 'full';

/**
 * Process-wide configuration snapshot. Field names double as the YAML keys and
 * as the keys of the `config` block in the startup record.
 */
export interface LogConfig {
  path: string;
  id: string | null;
  launchd_mode: boolean;
  debug: boolean;
  events: EventCode[];
  stats_interval: number;
  kextlevel: KextLevel;
  hashes: HashAlgorithm[];
  codesign: boolean;
  envlevel: EnvLevel;
  resolve_users_groups: boolean;
  omit_mode: boolean;
  omit_size: boolean;
  omit_mtime: boolean;
  omit_ctime: boolean;
  omit_btime: boolean;
  omit_sid: boolean;
  omit_groups: boolean;
  omit_apple_hashes: boolean;
  /** Maximum ancestors per process; `Infinity` means unlimited. */
  ancestors: number;
  logdst: string;
  logfmt: string;
  logoneline: boolean | null;
  logfile: string | null;
  limit_nofile: number;
  suppress_image_exec_at_start: boolean;
  suppress_image_exec_by_ident: string[];
  suppress_image_exec_by_path: string[];
  suppress_image_exec_by_ancestor_ident: string[];
  suppress_image_exec_by_ancestor_path: string[];
  suppress_process_access_by_subject_ident: string[];
  suppress_process_access_by_subject_path: string[];
  suppress_socket_op_localhost: boolean;
  suppress_socket_op_by_subject_ident: string[];
  suppress_socket_op_by_subject_path: string[];
}

export const SUPPRESSION_LIST_KEYS = [
  'suppress_image_exec_by_ident',
  'suppress_image_exec_by_path',
  'suppress_image_exec_by_ancestor_ident',
  'suppress_image_exec_by_ancestor_path',
  'suppress_process_access_by_subject_ident',
  'suppress_process_access_by_subject_path',
  'suppress_socket_op_by_subject_ident',
  'suppress_socket_op_by_subject_path',
] as const;

export type SuppressionListKey = (typeof SUPPRESSION_LIST_KEYS)[number];

export function defaultLogConfig(): LogConfig {
  return {
    path: '/etc/execmon/execmon.yaml',
    id: null,
    launchd_mode: false,
    debug: false,
    events: [
      EventCode.Ops,
      EventCode.Stats,
      EventCode.ImageExec,
      EventCode.ProcessAccess,
      EventCode.LaunchdAdd,
    ],
    stats_interval: 3600,
    kextlevel: 'open',
    hashes: ['sha256'],
    codesign: true,
    envlevel: 'dyld',
    resolve_users_groups: true,
    omit_mode: false,
    omit_size: false,
    omit_mtime: false,
    omit_ctime: false,
    omit_btime: false,
    omit_sid: false,
    omit_groups: false,
    omit_apple_hashes: false,
    ancestors: Number.POSITIVE_INFINITY,
    logdst: 'file',
    logfmt: 'json',
    logoneline: null,
    logfile: null,
    limit_nofile: 8192,
    suppress_image_exec_at_start: false,
    suppress_image_exec_by_ident: [],
    suppress_image_exec_by_path: [],
    suppress_image_exec_by_ancestor_ident: [],
    suppress_image_exec_by_ancestor_path: [],
    suppress_process_access_by_subject_ident: [],
    suppress_process_access_by_subject_path: [],
    suppress_socket_op_localhost: true,
    suppress_socket_op_by_subject_ident: [],
    suppress_socket_op_by_subject_path: [],
  };
}

/** Deep-freezes a copy of `config`; the engine only ever sees frozen snapshots. */
export function freezeLogConfig(config: LogConfig): Readonly<LogConfig> {
  const copy: LogConfig = {
    ...config,
    events: [...config.events],
    hashes: [...config.hashes],
  };
  for (const key of SUPPRESSION_LIST_KEYS) {
    copy[key] = [...config[key]];
    Object.freeze(copy[key]);
  }
  Object.freeze(copy.events);
  Object.freeze(copy.hashes);
  return Object.freeze(copy);
}
