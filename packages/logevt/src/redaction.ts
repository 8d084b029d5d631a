import type { LogConfig } from './config.js';
import type { CodeSignature, HashAlgorithm } from './types.js';

/**
 * Switches that suppress optional output fields. A switch only ever removes
 * data that is present; it never turns observed data into a null.
 */
export interface RedactionPolicy {
  readonly mode: boolean;
  readonly size: boolean;
  readonly mtime: boolean;
  readonly ctime: boolean;
  readonly btime: boolean;
  readonly sid: boolean;
  readonly groups: boolean;
  readonly platformHashes: boolean;
  readonly resolveIdentities: boolean;
  /** Hash algorithms emitted, in output order. */
  readonly hashes: readonly HashAlgorithm[];
}

const HASH_ORDER: readonly HashAlgorithm[] = ['md5', 'sha1', 'sha256'];

export function redactionPolicyFromConfig(config: Readonly<LogConfig>): RedactionPolicy {
  return Object.freeze({
    mode: config.omit_mode,
    size: config.omit_size,
    mtime: config.omit_mtime,
    ctime: config.omit_ctime,
    btime: config.omit_btime,
    sid: config.omit_sid,
    groups: config.omit_groups,
    platformHashes: config.omit_apple_hashes,
    resolveIdentities: config.resolve_users_groups,
    hashes: HASH_ORDER.filter((alg) => config.hashes.includes(alg)),
  });
}

export function isPositivelyValidated(codesign: CodeSignature | undefined): codesign is CodeSignature {
  return codesign?.result === 'good';
}

export function isTrustedPlatform(codesign: CodeSignature | undefined): boolean {
  return isPositivelyValidated(codesign) && codesign.origin === 'system';
}

/**
 * Hashes are withheld only for binaries that carry a trusted-platform
 * signature while the platform-hash switch is set.
 */
export function shouldEmitHashes(policy: RedactionPolicy, codesign: CodeSignature | undefined): boolean {
  return !policy.platformHashes || !isTrustedPlatform(codesign);
}
