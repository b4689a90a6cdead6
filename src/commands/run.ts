import { resolve } from 'node:path';

import { AnthropicAssistant } from '../core/anthropic-client.js';
import type { AssistantClient } from '../core/assistant-client.js';
import { loadEnvConfig, loadWorkspaceConfig } from '../core/config.js';
import type { EnvConfig, WorkspaceConfig } from '../core/config.js';
import { AssistantConversation, ConversationSession } from '../core/conversation.js';
import { FileCredentialStore } from '../core/credentials.js';
import type { CredentialStore } from '../core/credentials.js';
import { ShellExecutor } from '../core/executor.js';
import type { CommandRunner } from '../core/executor.js';
import { issueSubject, loadAnalysisRecord, parseIssueRecord, readInputObject } from '../core/inputs.js';
import type { AnalysisRecord } from '../core/inputs.js';
import { abortedReport, epochSeconds, writeReport } from '../core/report.js';
import type { ExecutionReport } from '../core/report.js';
import { WorkflowRunner } from '../core/workflow.js';
import { buildSystemPrompt, loadSystemPromptTemplate } from '../prompts/system.js';
import type { PromptContext } from '../prompts/context.js';
import { logger } from '../ui/logger.js';
import { ConfigError, InputError } from '../utils/errors.js';
import { directoryExists, fileExists } from '../utils/fs.js';

export interface RunOptions {
  issueData: string;
  analysisData: string;
  workspace: string;
  output: string;
}

/** Seams for swapping the external collaborators, used by tests. */
export interface RunDependencies {
  env?: NodeJS.ProcessEnv;
  createRunner?: (workspace: string) => CommandRunner;
  createAssistant?: (env: EnvConfig, config: WorkspaceConfig) => AssistantClient;
  createCredentialStore?: (workspace: string) => CredentialStore;
  clock?: () => number;
}

async function checkPreconditions(options: RunOptions): Promise<string | null> {
  if (!(await fileExists(options.issueData))) {
    return `Issue data file not found: ${options.issueData}`;
  }
  if (!(await fileExists(options.analysisData))) {
    return `Analysis data file not found: ${options.analysisData}`;
  }
  if (!(await directoryExists(options.workspace))) {
    return `Workspace directory not found: ${options.workspace}`;
  }
  return null;
}

function printSummary(report: ExecutionReport): void {
  logger.header(`Execution completed: ${report.success ? 'SUCCESS' : 'FAILED'}`);
  logger.info(`Steps completed: ${report.steps.length}`);
  logger.info(`Duration: ${(report.duration_seconds ?? 0).toFixed(2)} seconds`);

  if (report.success) {
    logger.success(`PR URL: ${report.pr_url ?? 'Not available'}`);
  } else {
    logger.error(`Error: ${report.error ?? 'Unknown error'}`);
  }
}

async function prepareWorkflow(
  options: RunOptions,
  issueData: Record<string, unknown>,
  analysis: AnalysisRecord,
  env: EnvConfig,
  deps: RunDependencies,
): Promise<WorkflowRunner> {
  const issue = parseIssueRecord(options.issueData, issueData);
  const workspace = resolve(options.workspace);
  const config = await loadWorkspaceConfig(workspace);
  const template = await loadSystemPromptTemplate(workspace);

  const context: PromptContext = {
    issue,
    analysis,
    workspace,
    qualityGates: config.qualityGates,
  };

  const assistant = deps.createAssistant
    ? deps.createAssistant(env, config)
    : new AnthropicAssistant({ apiKey: env.anthropicApiKey, model: env.model, maxTokens: config.maxTokens });
  logger.debug(`Using model ${assistant.model}`);

  const conversation = new AssistantConversation(
    assistant,
    new ConversationSession({ maxRetainedTurns: config.maxRetainedTurns }),
    () => buildSystemPrompt(template, context),
  );

  return new WorkflowRunner(
    context,
    {
      runner: deps.createRunner ? deps.createRunner(workspace) : new ShellExecutor(workspace),
      conversation,
      credentials: deps.createCredentialStore
        ? deps.createCredentialStore(workspace)
        : new FileCredentialStore(workspace),
      clock: deps.clock,
    },
    {
      githubToken: env.githubToken,
      gitUserName: env.gitUserName,
      gitUserEmail: env.gitUserEmail,
      qualityGates: config.qualityGates,
    },
  );
}

/**
 * Validate inputs, run the workflow and write the execution report.
 * Resolves to the process exit code. Missing files, unreadable JSON and a
 * missing API key return 1 before anything is written; every later failure,
 * including an unusable issue record or workspace config, still writes a
 * report.
 */
export async function runCommand(options: RunOptions, deps: RunDependencies = {}): Promise<number> {
  const problem = await checkPreconditions(options);
  if (problem) {
    logger.error(problem);
    return 1;
  }

  const issueData = await readInputObject(options.issueData);
  const analysis = await loadAnalysisRecord(options.analysisData);

  let env: EnvConfig;
  try {
    env = loadEnvConfig(deps.env ?? process.env);
  } catch (error) {
    if (error instanceof ConfigError) {
      logger.error(error.message);
      return 1;
    }
    throw error;
  }

  let report: ExecutionReport;
  try {
    const workflow = await prepareWorkflow(options, issueData, analysis, env, deps);
    report = await workflow.run();
  } catch (error) {
    if (!(error instanceof InputError || error instanceof ConfigError)) {
      throw error;
    }
    logger.error(`Workflow not started: ${error.message}`);
    report = abortedReport(issueSubject(issueData), error.message, (deps.clock ?? epochSeconds)());
  }

  await writeReport(options.output, report);
  logger.dim(`Report written to ${options.output}`);
  printSummary(report);

  return report.success ? 0 : 1;
}
