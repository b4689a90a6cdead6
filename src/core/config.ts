import { join } from 'node:path';
import { z } from 'zod';

import { ConfigError } from '../utils/errors.js';
import { fileExists, readJsonFile } from '../utils/fs.js';

export const DEFAULT_MODEL = 'claude-sonnet-4-20250514';
export const DEFAULT_GIT_USER_NAME = 'Issue Agent';
export const DEFAULT_GIT_USER_EMAIL = 'issue-agent@users.noreply.github.com';

const API_KEY_REQUIRED = 'ANTHROPIC_API_KEY environment variable is required';

const optionalValue = z
  .string()
  .optional()
  .transform((value) => (value ? value : undefined));

const envSchema = z.object({
  ANTHROPIC_API_KEY: z.string({ required_error: API_KEY_REQUIRED }).min(1, API_KEY_REQUIRED),
  GITHUB_TOKEN: optionalValue,
  GIT_USER_NAME: optionalValue,
  GIT_USER_EMAIL: optionalValue,
  ANTHROPIC_MODEL: optionalValue,
});

export interface EnvConfig {
  anthropicApiKey: string;
  githubToken?: string;
  gitUserName: string;
  gitUserEmail: string;
  model: string;
}

/**
 * Read credentials and identity from the environment. Empty strings count as
 * unset, matching how CI runners export absent secrets.
 */
export function loadEnvConfig(env: NodeJS.ProcessEnv = process.env): EnvConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(parsed.error.issues[0]?.message ?? 'Invalid environment');
  }

  const vars = parsed.data;
  return {
    anthropicApiKey: vars.ANTHROPIC_API_KEY,
    githubToken: vars.GITHUB_TOKEN,
    gitUserName: vars.GIT_USER_NAME ?? DEFAULT_GIT_USER_NAME,
    gitUserEmail: vars.GIT_USER_EMAIL ?? DEFAULT_GIT_USER_EMAIL,
    model: vars.ANTHROPIC_MODEL ?? DEFAULT_MODEL,
  };
}

const qualityGatesSchema = z.object({
  lintFix: z.string().min(1).default('swiftlint lint --fix'),
  lint: z.string().min(1).default('swiftlint lint'),
  build: z.string().min(1).default('swift build'),
  test: z.string().min(1).default('swift test'),
});

export type QualityGateCommands = z.infer<typeof qualityGatesSchema>;

const workspaceConfigSchema = z.object({
  qualityGates: qualityGatesSchema.default({}),
  maxTokens: z.number().int().positive().default(8192),
  maxRetainedTurns: z.number().int().min(2).optional(),
});

export type WorkspaceConfig = z.infer<typeof workspaceConfigSchema>;

export const WORKSPACE_CONFIG_FILENAME = 'issuesmith.config.json';

/**
 * Per-repository settings, read from `issuesmith.config.json` at the
 * workspace root. Absent file → defaults.
 */
export async function loadWorkspaceConfig(workspace: string): Promise<WorkspaceConfig> {
  const configPath = join(workspace, WORKSPACE_CONFIG_FILENAME);
  if (!(await fileExists(configPath))) {
    return workspaceConfigSchema.parse({});
  }

  let raw: unknown;
  try {
    raw = await readJsonFile(configPath);
  } catch (error) {
    const msg = error instanceof Error ? error.message : String(error);
    throw new ConfigError(msg);
  }

  const parsed = workspaceConfigSchema.safeParse(raw);
  if (!parsed.success) {
    const detail = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new ConfigError(`Invalid ${WORKSPACE_CONFIG_FILENAME}: ${detail}`);
  }
  return parsed.data;
}

/** Gate commands in the order they must run. */
export function orderedQualityGates(gates: QualityGateCommands): string[] {
  return [gates.lintFix, gates.lint, gates.build, gates.test];
}
