import { existsSync, readFileSync } from 'node:fs';
import { resolve } from 'node:path';
import { z } from 'zod';
import { ValidationError } from '../../domain/index.js';
import { composeRules, dmesgAnalyzerArgsSchema, toValidationIssues } from '../../application/index.js';
import type { DmesgAnalyzerArgs } from '../../application/index.js';

/**
 * Process configuration: environment for the server, JSON file for
 * analyzer defaults.
 */
export interface AppConfig {
  server: { host: string; port: number };
  logLevel: string;
  dmesg: DmesgAnalyzerArgs;
}

/** Shape of config/analyzer.json. Every section is optional. */
const analyzerFileSchema = z.object({
  dmesg: dmesgAnalyzerArgsSchema.optional(),
});

const portSchema = z.coerce.number().int().min(0).max(65535);

export const DEFAULT_CONFIG_PATH = 'config/analyzer.json';

/**
 * Reads analyzer defaults from a JSON file.
 *
 * A missing file yields built-in defaults. A file that exists but does not
 * parse, does not match the schema, or carries a custom error pattern that
 * does not compile is a ValidationError: the process should not start with
 * a rule set nobody asked for.
 */
export function loadAnalyzerFile(configPath: string): { dmesg: DmesgAnalyzerArgs } {
  if (!existsSync(configPath)) {
    return { dmesg: dmesgAnalyzerArgsSchema.parse({}) };
  }

  let json: unknown;
  try {
    json = JSON.parse(readFileSync(configPath, 'utf-8'));
  } catch (err: unknown) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new ValidationError(`Cannot read analyzer config ${configPath}`, [{ path: '', message: reason }]);
  }

  const parsed = analyzerFileSchema.safeParse(json);
  if (!parsed.success) {
    throw new ValidationError(`Invalid analyzer config ${configPath}`, toValidationIssues(parsed.error));
  }

  const dmesg = parsed.data.dmesg ?? dmesgAnalyzerArgsSchema.parse({});
  try {
    composeRules(dmesg.custom_error_patterns, []);
  } catch (err: unknown) {
    if (err instanceof ValidationError) {
      throw new ValidationError(
        `Invalid analyzer config ${configPath}`,
        err.issues.map((issue) => ({ ...issue, path: `dmesg.custom_error_patterns.${issue.path}` })),
      );
    }
    throw err;
  }

  return { dmesg };
}

/**
 * Loads the full process configuration.
 *
 * Environment:
 * - PORT (default 3000), HOST (default 0.0.0.0), LOG_LEVEL (default info)
 * - ANALYZER_CONFIG: path of the analyzer JSON, relative to the working directory
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const configPath = resolve(process.cwd(), env['ANALYZER_CONFIG'] ?? DEFAULT_CONFIG_PATH);

  const port = portSchema.safeParse(env['PORT'] ?? '3000');
  if (!port.success) {
    throw new ValidationError('Invalid PORT', toValidationIssues(port.error));
  }

  return {
    server: { host: env['HOST'] ?? '0.0.0.0', port: port.data },
    logLevel: env['LOG_LEVEL'] ?? 'info',
    dmesg: loadAnalyzerFile(configPath).dmesg,
  };
}
