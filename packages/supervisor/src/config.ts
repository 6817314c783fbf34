import fs from 'node:fs/promises';

import { z } from 'zod';

import { COMMAND_PLACEHOLDER } from './commandLine.js';
import { SUMMARY_TIMESTAMP_TOKEN } from './summarySink.js';
import { MAX_TIMER_DELAY_MS } from './supervisedProcess.js';

const MAX_TIMER_DELAY_SEC = Math.floor(MAX_TIMER_DELAY_MS / 1000);

const timerSeconds = z
  .number()
  .finite({ message: 'must be a finite number of seconds' })
  .max(MAX_TIMER_DELAY_SEC, { message: `must be at most ${MAX_TIMER_DELAY_SEC} seconds` });

export class ConfigError extends Error {
  override name = 'ConfigError';
}

export const supervisorConfigSchema = z.object({
  /** Outer command pattern; `%s` receives the record's command template. */
  invocation: z
    .string()
    .trim()
    .min(1)
    .refine((v) => v.includes(COMMAND_PLACEHOLDER), { message: `must contain ${COMMAND_PLACEHOLDER}` })
    .default('gst-launch-1.0 %s'),
  debugEnvVar: z.string().trim().min(1).default('GST_DEBUG'),
  timeoutSec: timerSeconds.positive().default(120),
  killGraceSec: timerSeconds.nonnegative().default(10),
  summaryDir: z.string().trim().min(1).default('.'),
  summaryFilePattern: z
    .string()
    .trim()
    .min(1)
    .refine((v) => v.includes(SUMMARY_TIMESTAMP_TOKEN), { message: `must contain ${SUMMARY_TIMESTAMP_TOKEN}` })
    .default('summary-{timestamp}.log'),
});

export type SupervisorConfig = z.output<typeof supervisorConfigSchema>;
export type SupervisorConfigInput = z.input<typeof supervisorConfigSchema>;

function envString(env: NodeJS.ProcessEnv, key: string): string | undefined {
  const value = env[key];
  return value !== undefined && value.trim() ? value : undefined;
}

function envNumber(env: NodeJS.ProcessEnv, key: string): number | undefined {
  const value = envString(env, key);
  return value === undefined ? undefined : Number(value);
}

const DOTENV_LINE = /^\s*(?:export\s+)?(PIPESOAK_[A-Z0-9_]+)\s*=(.*)$/;

function dotenvValue(raw: string): string {
  const value = raw.trim();
  const quoted = /^(["'])(.*)\1$/.exec(value);
  if (quoted) return quoted[2] ?? '';
  const comment = value.indexOf(' #');
  return (comment >= 0 ? value.slice(0, comment) : value).trim();
}

/** Reads `PIPESOAK_*` assignments from `.env` content; other keys are ignored. */
export function parseDotenv(content: string): Record<string, string> {
  const entries: Record<string, string> = {};
  for (const line of content.split(/\r?\n/)) {
    const match = DOTENV_LINE.exec(line);
    if (!match?.[1]) continue;
    entries[match[1]] = dotenvValue(match[2] ?? '');
  }
  return entries;
}

function isNodeError(value: unknown): value is NodeJS.ErrnoException {
  return value instanceof Error && 'code' in value;
}

/** A missing file yields no entries. */
export async function readDotenvFile(filePath: string): Promise<Record<string, string>> {
  try {
    return parseDotenv(await fs.readFile(filePath, 'utf-8'));
  } catch (err) {
    if (isNodeError(err) && err.code === 'ENOENT') return {};
    throw new ConfigError(`Cannot read ${filePath}: ${err instanceof Error ? err.message : String(err)}`, { cause: err });
  }
}

/**
 * Precedence per field: `overrides`, then `env`, then `dotenv`, then the
 * schema default.
 */
export function resolveSupervisorConfig(options?: {
  env?: NodeJS.ProcessEnv;
  dotenv?: Readonly<Record<string, string>>;
  overrides?: SupervisorConfigInput;
}): SupervisorConfig {
  const dotenv = options?.dotenv ?? {};
  const processEnv = options?.env ?? process.env;
  const env: NodeJS.ProcessEnv = { ...dotenv };
  for (const [key, value] of Object.entries(processEnv)) {
    if (value !== undefined && value.trim()) env[key] = value;
  }
  const overrides = options?.overrides ?? {};
  const parsed = supervisorConfigSchema.safeParse({
    invocation: overrides.invocation ?? envString(env, 'PIPESOAK_INVOCATION'),
    debugEnvVar: overrides.debugEnvVar ?? envString(env, 'PIPESOAK_DEBUG_ENV'),
    timeoutSec: overrides.timeoutSec ?? envNumber(env, 'PIPESOAK_TIMEOUT_SEC'),
    killGraceSec: overrides.killGraceSec ?? envNumber(env, 'PIPESOAK_KILL_GRACE_SEC'),
    summaryDir: overrides.summaryDir ?? envString(env, 'PIPESOAK_SUMMARY_DIR'),
    summaryFilePattern: overrides.summaryFilePattern ?? envString(env, 'PIPESOAK_SUMMARY_PATTERN'),
  });
  if (!parsed.success) {
    const details = parsed.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
    throw new ConfigError(`Invalid configuration: ${details.join('; ')}`);
  }
  return parsed.data;
}
