import { describe, expect, it } from 'vitest';

import { testConfig } from './fixtures.js';
import { isTrustedPlatform, redactionPolicyFromConfig, shouldEmitHashes } from './redaction.js';

describe('redactionPolicyFromConfig', () => {
  it('maps each switch', () => {
    const policy = redactionPolicyFromConfig(
      testConfig({ omit_mode: true, omit_sid: true, omit_apple_hashes: true, resolve_users_groups: false }),
    );

    expect(policy.mode).toBe(true);
    expect(policy.size).toBe(false);
    expect(policy.sid).toBe(true);
    expect(policy.platformHashes).toBe(true);
    expect(policy.resolveIdentities).toBe(false);
  });

  it('orders hash algorithms by digest size', () => {
    const policy = redactionPolicyFromConfig(testConfig({ hashes: ['sha256', 'md5'] }));
    expect(policy.hashes).toEqual(['md5', 'sha256']);
  });
});

describe('platform hash rule', () => {
  const on = redactionPolicyFromConfig(testConfig({ omit_apple_hashes: true }));
  const off = redactionPolicyFromConfig(testConfig({ omit_apple_hashes: false }));

  it('recognises trusted platform signatures', () => {
    expect(isTrustedPlatform({ result: 'good', origin: 'system' })).toBe(true);
    expect(isTrustedPlatform({ result: 'good', origin: 'appstore' })).toBe(false);
    expect(isTrustedPlatform({ result: 'bad', origin: 'system' })).toBe(false);
    expect(isTrustedPlatform(undefined)).toBe(false);
  });

  it('withholds hashes only when both the switch and the signature agree', () => {
    expect(shouldEmitHashes(on, { result: 'good', origin: 'system' })).toBe(false);
    expect(shouldEmitHashes(on, { result: 'untrusted', origin: 'system' })).toBe(true);
    expect(shouldEmitHashes(on, undefined)).toBe(true);
    expect(shouldEmitHashes(off, { result: 'good', origin: 'system' })).toBe(true);
  });
});
