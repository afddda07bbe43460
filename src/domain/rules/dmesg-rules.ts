import type { ErrorRule } from './types.js';
import { createErrorRule } from './error-rule.js';

/**
 * Base rule set for kernel ring buffer (dmesg) output.
 *
 * Order matters: events are created in rule order, and when two rules
 * produce the same match key the earlier rule's classification wins.
 */
export const DMESG_ERROR_RULES: readonly ErrorRule[] = Object.freeze([
  createErrorRule(/(?:oom_kill_process.*)|(?:Out of memory.*)/, 'Out of memory error', {
    category: 'OS',
  }),
  createErrorRule(/qcm fence wait loop timeout expired/, 'QCM fence timeout', {
    category: 'SW_DRIVER',
  }),
  createErrorRule(/amdgpu: Failed to disallow cf state/, 'Failed to disallow cf state', {
    category: 'SW_DRIVER',
  }),
  createErrorRule(/: Fatal error during GPU init/, 'Fatal error during GPU init', {
    category: 'SW_DRIVER',
  }),
  createErrorRule(/amdgpu: \[\w+\] (?:no-)?retry page fault/, 'amdgpu Page Fault', {
    category: 'SW_DRIVER',
  }),
  // An ACA burst is one header line followed by register dump lines.
  createErrorRule(
    /Accelerator Check Architecture events logged(?:\n[^\n]*(?:aca entry|ACA)\[[^\]\n]*\]\.\w+=0x[0-9a-fA-F]+)*/,
    'ACA Error',
    { category: 'RAS' },
  ),
  createErrorRule(
    /(\d+) correctable hardware errors detected in total in (\w+) block/,
    'RAS Correctable Error',
    { category: 'RAS', severity: 'WARNING' },
  ),
  createErrorRule(
    /(\d+) uncorrectable hardware errors detected in (?:total in )?(\w+) block/,
    'RAS Uncorrectable Error',
    { category: 'RAS', severity: 'CRITICAL' },
  ),
  createErrorRule(/Kernel panic - not syncing: (.*)/, 'Kernel panic', {
    category: 'OS',
    severity: 'CRITICAL',
  }),
  createErrorRule(
    /BUG: unable to handle (?:kernel )?(NULL pointer dereference|paging request)/,
    'Kernel BUG',
    { category: 'OS', severity: 'CRITICAL' },
  ),
  createErrorRule(/(?:blk_update_request: )?I\/O error, dev (\w+), sector/, 'Block device I/O error', {
    category: 'STORAGE',
  }),
  createErrorRule(/AER: (Corrected|Uncorrected \(\w+\)) error (?:message )?received(?: from|:) (\S+)/, 'PCIe AER error', {
    category: 'IO',
  }),
  createErrorRule(
    /LNetError:.*ko2iblnd: No matching interfaces/,
    'LNet: ko2iblnd has no matching interfaces',
    { category: 'IO', severity: 'WARNING' },
  ),
  createErrorRule(/LNetError:.*Error -\d+ starting up LNI \w+/, 'LNet: Error starting up LNI', {
    category: 'IO',
    severity: 'WARNING',
  }),
  createErrorRule(/LustreError:.*network initialisation failed/, 'Lustre: network initialisation failed', {
    category: 'IO',
    severity: 'WARNING',
  }),
]);

/**
 * Catch-all for err/crit/alert/emerg lines no base or custom rule covered.
 * Captures the message after the level and optional timestamp. A match
 * never leaves its line, and a line carrying only a timestamp has no
 * message to report.
 */
export const UNKNOWN_DMESG_RULE: ErrorRule = createErrorRule(
  /^kern[ \t]*:[ \t]*(?:err|crit|alert|emerg)[ \t]*:(?:[ \t]*\d{4}-\d+-\d+T[\d:.,]+(?:Z|[+-]\d+:\d+)?(?=[ \t]|$))?(?![ \t]*\d{4}-\d+-\d+T)[ \t]*(\S(?:.*\S)?)[ \t]*$/m,
  'Unknown dmesg error',
  { category: 'OS', severity: 'WARNING' },
);
