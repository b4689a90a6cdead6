import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { tmpdir } from 'node:os';

import {
  DEFAULT_GIT_USER_EMAIL,
  DEFAULT_GIT_USER_NAME,
  DEFAULT_MODEL,
  loadEnvConfig,
  loadWorkspaceConfig,
  orderedQualityGates,
  WORKSPACE_CONFIG_FILENAME,
} from '../../src/core/config.js';
import { ConfigError } from '../../src/utils/errors.js';

describe('loadEnvConfig', () => {
  it('should apply defaults for optional variables', () => {
    expect(loadEnvConfig({ ANTHROPIC_API_KEY: 'test-key' })).toEqual({
      anthropicApiKey: 'test-key',
      githubToken: undefined,
      gitUserName: DEFAULT_GIT_USER_NAME,
      gitUserEmail: DEFAULT_GIT_USER_EMAIL,
      model: DEFAULT_MODEL,
    });
  });

  it('should read every supported variable', () => {
    expect(
      loadEnvConfig({
        ANTHROPIC_API_KEY: 'test-key',
        GITHUB_TOKEN: 'test-token',
        GIT_USER_NAME: 'Bot',
        GIT_USER_EMAIL: 'bot@example.com',
        ANTHROPIC_MODEL: 'test-model',
        UNRELATED: 'ignored',
      }),
    ).toEqual({
      anthropicApiKey: 'test-key',
      githubToken: 'test-token',
      gitUserName: 'Bot',
      gitUserEmail: 'bot@example.com',
      model: 'test-model',
    });
  });

  it('should require the API key', () => {
    expect(() => loadEnvConfig({})).toThrow(ConfigError);
    expect(() => loadEnvConfig({})).toThrow('ANTHROPIC_API_KEY environment variable is required');
  });

  it('should treat an empty API key as missing', () => {
    expect(() => loadEnvConfig({ ANTHROPIC_API_KEY: '' })).toThrow(
      'ANTHROPIC_API_KEY environment variable is required',
    );
  });

  it('should treat empty optional variables as unset', () => {
    const config = loadEnvConfig({ ANTHROPIC_API_KEY: 'test-key', GITHUB_TOKEN: '', GIT_USER_NAME: '' });
    expect(config.githubToken).toBeUndefined();
    expect(config.gitUserName).toBe(DEFAULT_GIT_USER_NAME);
  });
});

describe('loadWorkspaceConfig', () => {
  let workspace: string;

  beforeEach(async () => {
    workspace = await mkdtemp(join(tmpdir(), 'issuesmith-config-'));
  });

  afterEach(async () => {
    await rm(workspace, { recursive: true, force: true });
  });

  it('should return defaults when no config file exists', async () => {
    await expect(loadWorkspaceConfig(workspace)).resolves.toEqual({
      qualityGates: {
        lintFix: 'swiftlint lint --fix',
        lint: 'swiftlint lint',
        build: 'swift build',
        test: 'swift test',
      },
      maxTokens: 8192,
    });
  });

  it('should merge partial quality gate overrides with defaults', async () => {
    await writeFile(
      join(workspace, WORKSPACE_CONFIG_FILENAME),
      JSON.stringify({ qualityGates: { build: 'npm run build', test: 'npm test' }, maxRetainedTurns: 10 }),
    );

    const config = await loadWorkspaceConfig(workspace);
    expect(config.qualityGates).toEqual({
      lintFix: 'swiftlint lint --fix',
      lint: 'swiftlint lint',
      build: 'npm run build',
      test: 'npm test',
    });
    expect(config.maxRetainedTurns).toBe(10);
  });

  it('should reject invalid values', async () => {
    await writeFile(join(workspace, WORKSPACE_CONFIG_FILENAME), JSON.stringify({ maxTokens: -1 }));
    await expect(loadWorkspaceConfig(workspace)).rejects.toThrow(/Invalid issuesmith\.config\.json: maxTokens/);
  });

  it('should reject malformed JSON', async () => {
    await writeFile(join(workspace, WORKSPACE_CONFIG_FILENAME), '{');
    await expect(loadWorkspaceConfig(workspace)).rejects.toBeInstanceOf(ConfigError);
  });
});

describe('orderedQualityGates', () => {
  it('should order lint-fix, lint, build, test', () => {
    expect(orderedQualityGates({ test: 't', build: 'b', lint: 'l', lintFix: 'f' })).toEqual(['f', 'l', 'b', 't']);
  });
});
