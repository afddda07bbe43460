import { vi } from 'vitest';
import type { AnalysisLogger } from '../src/application/analysis-logger.js';

/** ISO timestamp in the dmesg format on 2024-10-07, e.g. ts('10:00:30'). */
export function ts(hms: string, offset: string = '-04:00'): string {
  return `2024-10-07T${hms},000000${offset}`;
}

/** One line of `dmesg --time-format iso` output. */
export function dmesgLine(timestamp: string, message: string, level: string = 'err'): string {
  return `kern  :${level.padEnd(6)}: ${timestamp} ${message}`;
}

/** Logger whose methods are spies. */
export function fakeLogger(): AnalysisLogger {
  return {
    error: vi.fn(),
    warn: vi.fn(),
    info: vi.fn(),
    debug: vi.fn(),
  } as unknown as AnalysisLogger;
}
