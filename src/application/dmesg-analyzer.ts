import { z } from 'zod';
import { EVENT_CATEGORIES, ValidationError } from '../domain/index.js';
import type { MatchEvent } from '../domain/index.js';
import { DMESG_ERROR_RULES, UNKNOWN_DMESG_RULE } from '../domain/rules/index.js';
import type { ErrorRule } from '../domain/rules/index.js';
import { analyzeContent, scanMatches } from './regex-analysis-engine.js';
import type { AnalyzeOptions } from './regex-analysis-engine.js';
import { composeRules } from './rule-set-composer.js';
import { rawRuleSchema } from './rule-schema.js';
import { deriveStatus } from './task-result.js';
import type { ExecutionStatus, TaskResult } from './task-result.js';
import { extractTimestamp, parseTimestamp } from './timestamp-extractor.js';
import { defaultAnalysisLogger } from './analysis-logger.js';
import type { AnalysisLogger } from './analysis-logger.js';

const TASK_NAME = 'DmesgAnalyzer';
const SOURCE = 'dmesg';

const isoTimestamp = z
  .string()
  .refine((v) => parseTimestamp(v) !== null, { message: 'Must be an ISO-8601 timestamp' });

/**
 * Zod schema for dmesg analyzer arguments.
 *
 * Output is valid input again, so stored defaults can be re-parsed with
 * per-request overrides spread on top.
 */
export const dmesgAnalyzerArgsSchema = z.object({
  analysis_range_start: isoTimestamp.optional(),
  analysis_range_end: isoTimestamp.optional(),
  check_unknown_dmesg_errors: z.boolean().optional().default(true),
  exclude_category: z.array(z.enum(EVENT_CATEGORIES)).optional().default([]),
  custom_error_patterns: z.array(rawRuleSchema).optional().default([]),
  group: z.boolean().optional().default(true),
  num_timestamps: z.number().int().min(1).optional().default(3),
  interval_to_collapse_event: z.number().int().min(0).optional().default(60),
});

export type DmesgAnalyzerArgs = z.infer<typeof dmesgAnalyzerArgsSchema>;
export type DmesgAnalyzerArgsInput = z.input<typeof dmesgAnalyzerArgsSchema>;

export const DEFAULT_DMESG_ARGS: DmesgAnalyzerArgs = dmesgAnalyzerArgsSchema.parse({});

/** Index of the line containing `offset`, given ascending line start offsets. */
function lineIndexAt(lineStarts: readonly number[], offset: number): number {
  let lo = 0;
  let hi = lineStarts.length - 1;
  while (lo < hi) {
    const mid = (lo + hi + 1) >> 1;
    const start = lineStarts[mid] ?? 0;
    if (start <= offset) lo = mid;
    else hi = mid - 1;
  }
  return lo;
}

/**
 * Lines of `content` that no match of any rule touches, joined by newlines.
 * A multi-line match covers every line it spans.
 */
export function uncoveredLines(content: string, rules: readonly ErrorRule[]): string {
  const lines = content.split('\n');
  const lineStarts: number[] = [];
  let offset = 0;
  for (const line of lines) {
    lineStarts.push(offset);
    offset += line.length + 1;
  }

  const covered = new Set<number>();
  for (const rule of rules) {
    for (const match of scanMatches(content, rule.pattern)) {
      const start = match.index ?? 0;
      const end = start + Math.max((match[0] ?? '').length - 1, 0);
      const last = lineIndexAt(lineStarts, end);
      for (let i = lineIndexAt(lineStarts, start); i <= last; i++) {
        covered.add(i);
      }
    }
  }

  return lines.filter((_line, i) => !covered.has(i)).join('\n');
}

/**
 * Keeps the lines of `content` inside [start, end).
 *
 * Collection begins at the first line whose timestamp is at or after
 * `start` and stops at the first later line whose timestamp is at or after
 * `end`. Lines without a timestamp follow whatever state is current.
 * Blank lines are dropped; every kept line ends with a newline.
 */
export function filterDmesg(content: string, start: number | null, end: number | null): string {
  let foundStart = start === null;
  let filtered = '';

  for (const line of content.split('\n')) {
    if (line === '') continue;

    const raw = extractTimestamp(line, 0);
    const at = raw === null ? null : parseTimestamp(raw);

    if (at !== null) {
      if (!foundStart && start !== null && at >= start) {
        foundStart = true;
      } else if (end !== null && at >= end) {
        break;
      }
    }

    if (foundStart) {
      filtered += `${line}\n`;
    }
  }

  return filtered;
}

function statusMessage(status: ExecutionStatus): string {
  switch (status) {
    case 'ERROR':   return 'Dmesg errors detected';
    case 'WARNING': return 'Dmesg warnings detected';
    default:        return 'No dmesg errors found';
  }
}

/**
 * Dmesg analyzer — checks kernel ring buffer output for known errors.
 *
 * Order:
 * 1. Narrow the content to the analysis range, when one is given.
 * 2. Compose custom rules in front of the base rule set.
 * 3. Run the regex analysis engine over the content.
 * 4. Optionally report err/crit/alert/emerg lines no rule covered.
 * 5. Drop excluded categories and derive the overall status.
 *
 * Invalid custom rules abort the run with EXECUTION_FAILURE; nothing is
 * analyzed with a partial rule set.
 */
export class DmesgAnalyzer {
  private readonly baseRules: readonly ErrorRule[];
  private readonly log: AnalysisLogger;

  constructor(log: AnalysisLogger = defaultAnalysisLogger, baseRules: readonly ErrorRule[] = DMESG_ERROR_RULES) {
    this.log = log;
    this.baseRules = baseRules;
  }

  analyze(content: string, args: DmesgAnalyzerArgs = DEFAULT_DMESG_ARGS): TaskResult {
    const start = args.analysis_range_start === undefined ? null : parseTimestamp(args.analysis_range_start);
    const end = args.analysis_range_end === undefined ? null : parseTimestamp(args.analysis_range_end);

    let scoped = content;
    if (start !== null || end !== null) {
      this.log.info(
        { start: args.analysis_range_start, end: args.analysis_range_end },
        'Filtering dmesg log by analysis range',
      );
      scoped = filterDmesg(content, start, end);
    }

    let rules: ErrorRule[];
    try {
      rules = composeRules(args.custom_error_patterns, this.baseRules);
    } catch (err: unknown) {
      if (err instanceof ValidationError) {
        this.log.error({ issues: err.issues }, 'Invalid custom error pattern');
        const detail = err.issues.map((i) => `${i.path}: ${i.message}`).join('; ');
        return {
          task: TASK_NAME,
          status: 'EXECUTION_FAILURE',
          message: `Invalid custom error pattern: ${detail}`,
          events: [],
        };
      }
      throw err;
    }

    const options: AnalyzeOptions = {
      group: args.group,
      numTimestamps: args.num_timestamps,
      collapseIntervalSeconds: args.interval_to_collapse_event,
      log: this.log,
    };

    const events: MatchEvent[] = analyzeContent(scoped, SOURCE, rules, options);

    if (args.check_unknown_dmesg_errors) {
      const residual = uncoveredLines(scoped, rules);
      events.push(...analyzeContent(residual, SOURCE, [UNKNOWN_DMESG_RULE], options));
    }

    const excluded = new Set<string>(args.exclude_category);
    const kept = events.filter((e) => !excluded.has(e.category));

    const status = deriveStatus(kept);
    return {
      task: TASK_NAME,
      status,
      message: statusMessage(status),
      events: kept,
    };
  }
}
