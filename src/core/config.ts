import * as fs from 'node:fs';
import * as path from 'node:path';
import { z } from 'zod';

export const CONFIG_FILENAME = '.rbsig.json';

const ruleToggle = z.object({ enabled: z.boolean().default(true) }).strict();

const signatureRule = ruleToggle
  .extend({
    lineLengthLimit: z.number().int().positive().nullable().default(null),
  })
  .strict();

export const ConfigSchema = z
  .object({
    rules: z
      .object({
        'methods-should-have-signatures': signatureRule.default({}),
        'empty-line-after-sig': ruleToggle.default({}),
      })
      .strict()
      .default({}),
  })
  .strict();

export type RbsigConfig = z.infer<typeof ConfigSchema>;

export class ConfigError extends Error {
  constructor(message: string, readonly issues: readonly string[] = []) {
    super(issues.length > 0 ? `${message}\n${issues.map((i) => `  - ${i}`).join('\n')}` : message);
    this.name = 'ConfigError';
  }
}

export function defaultConfig(): RbsigConfig {
  return ConfigSchema.parse({});
}

export function parseConfig(raw: unknown, source = CONFIG_FILENAME): RbsigConfig {
  const result = ConfigSchema.safeParse(raw);
  if (result.success) return result.data;
  const issues = result.error.issues.map((issue) => {
    const where = issue.path.length > 0 ? issue.path.join('.') : '<root>';
    return `${where}: ${issue.message}`;
  });
  throw new ConfigError(`Invalid configuration in ${source}`, issues);
}

/**
 * Load `explicitPath`, or `.rbsig.json` from `cwd` when present. A missing
 * default file yields the defaults; a missing explicit file is an error.
 */
export function loadConfig(explicitPath?: string, cwd: string = process.cwd()): RbsigConfig {
  const file = explicitPath ? path.resolve(cwd, explicitPath) : path.join(cwd, CONFIG_FILENAME);
  if (!fs.existsSync(file)) {
    if (explicitPath) throw new ConfigError(`Config file not found: ${explicitPath}`);
    return defaultConfig();
  }
  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(file, 'utf8'));
  } catch (e) {
    throw new ConfigError(`Cannot read ${file}: ${e instanceof Error ? e.message : String(e)}`);
  }
  return parseConfig(raw, file);
}
