import { describe, it, expect } from 'vitest';
import { DMESG_ERROR_RULES, UNKNOWN_DMESG_RULE } from '../../src/domain/rules/dmesg-rules.js';
import { createErrorRule } from '../../src/domain/rules/error-rule.js';
import { isErrorRule } from '../../src/domain/rules/types.js';

function ruleFor(message: string) {
  const rule = DMESG_ERROR_RULES.find((r) => r.message === message);
  if (rule === undefined) throw new Error(`no rule "${message}"`);
  return rule;
}

describe('DMESG_ERROR_RULES', () => {
  const samples: Array<[string, string]> = [
    ['Out of memory error', 'Out of memory: Killed process 4242 (stress)'],
    ['QCM fence timeout', 'amdgpu: qcm fence wait loop timeout expired'],
    ['Failed to disallow cf state', 'amdgpu 0000:03:00.0: amdgpu: Failed to disallow cf state'],
    ['Fatal error during GPU init', 'amdgpu 0000:03:00.0: amdgpu: Fatal error during GPU init'],
    ['amdgpu Page Fault', 'amdgpu 0000:03:00.0: amdgpu: [gfxhub] retry page fault (src_id:0)'],
    ['RAS Uncorrectable Error', 'amdgpu: 2 uncorrectable hardware errors detected in umc block'],
    ['Kernel panic', 'Kernel panic - not syncing: Fatal exception'],
    ['Kernel BUG', 'BUG: unable to handle kernel NULL pointer dereference at 0000000000000008'],
    ['Block device I/O error', 'blk_update_request: I/O error, dev sdb, sector 2048'],
    ['PCIe AER error', 'pcieport 0000:00:01.1: AER: Corrected error received: 0000:01:00.0'],
  ];

  it.each(samples)('should match a sample line for "%s"', (message, line) => {
    expect(ruleFor(message).pattern.test(line)).toBe(true);
  });

  it('should hold only frozen compiled rules', () => {
    expect(Object.isFrozen(DMESG_ERROR_RULES)).toBe(true);
    expect(DMESG_ERROR_RULES.every((r) => isErrorRule(r) && Object.isFrozen(r))).toBe(true);
  });

  it('should classify uncorrectable RAS errors as critical', () => {
    expect(ruleFor('RAS Uncorrectable Error').severity).toBe('CRITICAL');
    expect(ruleFor('RAS Correctable Error').severity).toBe('WARNING');
  });
});

describe('UNKNOWN_DMESG_RULE', () => {
  it('should capture the message of error-level lines', () => {
    const match = UNKNOWN_DMESG_RULE.pattern.exec(
      'kern  :crit  : 2024-10-07T10:17:15,145363-04:00 thermal zone tripped  ',
    );
    expect(match?.[1]).toBe('thermal zone tripped');
  });

  it('should capture messages on lines without a timestamp', () => {
    expect(UNKNOWN_DMESG_RULE.pattern.exec('kern  :err   : disk on fire')?.[1]).toBe('disk on fire');
  });

  it('should not match a timestamp-only line', () => {
    const content = 'kern  :err   : 2024-10-07T10:17:15,145363-04:00  \nkern  :info  : link up';
    expect(UNKNOWN_DMESG_RULE.pattern.test(content)).toBe(false);
  });

  it('should ignore informational lines', () => {
    expect(UNKNOWN_DMESG_RULE.pattern.test('kern  :info  : 2024-10-07T10:17:15,145363-04:00 link up')).toBe(
      false,
    );
  });
});

describe('createErrorRule', () => {
  it('should default category and severity', () => {
    const rule = createErrorRule(/x/, 'X');
    expect(rule).toEqual({ pattern: /x/, message: 'X', category: 'UNKNOWN', severity: 'ERROR' });
  });
});
