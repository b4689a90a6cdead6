import { logger } from '../ui/logger.js';
import { withSpinner } from '../ui/spinner.js';
import { CommandFailure, MissingCredentialError, QualityGateError } from '../utils/errors.js';
import { buildInitialAnalysisMessage, buildStatusMessage } from '../prompts/messages.js';
import {
  buildCommitMessage,
  buildCommitSummary,
  buildPullRequestBody,
  buildPullRequestTitle,
} from '../prompts/pull-request.js';
import type { PromptContext } from '../prompts/context.js';
import { interpretReply } from './assistant-actions.js';
import { orderedQualityGates } from './config.js';
import type { QualityGateCommands } from './config.js';
import type { AssistantConversation } from './conversation.js';
import type { CredentialStore } from './credentials.js';
import type { CommandRunner } from './executor.js';
import { GitClient } from './git.js';
import { createPullRequest } from './github.js';
import { epochSeconds, finishReport, recordStep, startReport } from './report.js';
import type { ExecutionReport } from './report.js';

export const MAX_IMPLEMENTATION_ITERATIONS = 20;

export interface WorkflowSettings {
  githubToken?: string;
  gitUserName: string;
  gitUserEmail: string;
  qualityGates: QualityGateCommands;
}

export interface WorkflowServices {
  runner: CommandRunner;
  conversation: AssistantConversation;
  credentials: CredentialStore;
  /** Seconds since the epoch. */
  clock?: () => number;
}

/**
 * Drives one issue from branch creation to an open pull request.
 *
 * Stages run strictly in order and each one is a terminal failure point: the
 * first error stops the run and is recorded on the report. Nothing is rolled
 * back, so a failed run can leave a local branch or commit behind.
 */
export class WorkflowRunner {
  private readonly context: PromptContext;
  private readonly settings: WorkflowSettings;
  private readonly runner: CommandRunner;
  private readonly conversation: AssistantConversation;
  private readonly credentials: CredentialStore;
  private readonly clock: () => number;
  private readonly git: GitClient;

  constructor(context: PromptContext, services: WorkflowServices, settings: WorkflowSettings) {
    this.context = context;
    this.settings = settings;
    this.runner = services.runner;
    this.conversation = services.conversation;
    this.credentials = services.credentials;
    this.clock = services.clock ?? epochSeconds;
    this.git = new GitClient(services.runner);
  }

  async run(): Promise<ExecutionReport> {
    const { issue } = this.context;
    const report = startReport(issue, this.clock());

    try {
      logger.header(`Issue #${issue.issue_number}: ${issue.title || 'Unknown'}`);
      logger.info('Starting development workflow...');
      recordStep(report, 'workflow_started');

      await this.configureGit();
      recordStep(report, 'git_configured');

      await this.createBranch();
      recordStep(report, 'branch_created');

      await this.requestPlan();
      recordStep(report, 'initial_analysis');

      const turns = await this.implement();
      logger.dim(`Implementation loop finished after ${turns} iteration(s)`);
      recordStep(report, 'implementation_completed');

      await this.runQualityGates();
      recordStep(report, 'quality_gates_passed');

      await this.commitChanges(buildCommitSummary(issue));
      recordStep(report, 'changes_committed');

      logger.info(`Pushing branch: ${issue.branch_name}`);
      await this.git.push(issue.branch_name);
      recordStep(report, 'branch_pushed');

      report.pr_url = await this.openPullRequest();
      recordStep(report, 'pr_created');

      report.success = true;
      logger.success('Development workflow completed successfully!');
    } catch (error) {
      const msg = (error instanceof Error ? error.message : String(error)) || 'Unknown error';
      logger.error(`Workflow failed: ${msg}`);
      report.error = msg;
    } finally {
      finishReport(report, this.clock());
    }

    return report;
  }

  private async configureGit(): Promise<void> {
    logger.info('Setting up Git authentication...');

    const token = this.settings.githubToken;
    if (!token) {
      throw new MissingCredentialError('GITHUB_TOKEN');
    }

    await this.git.configureIdentity(this.settings.gitUserName, this.settings.gitUserEmail);
    await this.credentials.store(token);
    await this.git.useCredentialFile(this.credentials.location);

    logger.success('Git authentication configured');
  }

  private async createBranch(): Promise<void> {
    const branch = this.context.issue.branch_name;
    logger.info(`Creating branch: ${branch}`);

    await this.git.checkoutBase();
    await this.git.createBranch(branch);

    logger.success(`Switched to branch: ${branch}`);
  }

  private async requestPlan(): Promise<void> {
    const plan = await this.ask(
      buildInitialAnalysisMessage(this.context.issue, this.context.analysis),
    );
    logger.dim(plan);
    logger.success('Initial analysis completed');
  }

  /**
   * Converse until the assistant reports completion or the iteration ceiling
   * is hit. Returns the number of turns taken.
   */
  private async implement(): Promise<number> {
    const hints = [...orderedQualityGates(this.settings.qualityGates), 'git '];

    for (let iteration = 1; iteration <= MAX_IMPLEMENTATION_ITERATIONS; iteration++) {
      logger.info(`Implementation iteration ${iteration}/${MAX_IMPLEMENTATION_ITERATIONS}`);

      const status = await this.git.status();
      const reply = await this.ask(buildStatusMessage(iteration, status));
      const action = interpretReply(reply, hints);

      switch (action.kind) {
        case 'complete':
          logger.success('Implementation marked as complete by the assistant');
          return iteration;
        case 'suggested-commands':
          logger.warn(
            `Assistant suggested commands - manual execution needed (${action.hints.join(', ').trim()})`,
          );
          break;
        case 'continue':
          logger.debug(reply);
          break;
      }
    }

    logger.warn(`Stopped after ${MAX_IMPLEMENTATION_ITERATIONS} iterations without a completion signal`);
    return MAX_IMPLEMENTATION_ITERATIONS;
  }

  private async runQualityGates(): Promise<void> {
    logger.info('Running quality gates...');

    for (const gate of orderedQualityGates(this.settings.qualityGates)) {
      try {
        await this.runner.run(gate);
      } catch (error) {
        if (error instanceof CommandFailure) {
          logger.error(`✗ ${gate}`);
          throw new QualityGateError(gate);
        }
        throw error;
      }
      logger.success(gate);
    }

    logger.success('All quality gates passed!');
  }

  private async commitChanges(summary: string): Promise<void> {
    logger.info('Committing changes...');

    if (!(await this.git.hasPendingChanges())) {
      logger.info('No changes to commit');
      return;
    }

    await this.git.stageAll();
    await this.git.commit(buildCommitMessage(summary, this.context.issue));
    logger.success(`Committed: ${summary}`);
  }

  private async openPullRequest(): Promise<string> {
    const { issue } = this.context;
    logger.info('Creating pull request...');

    const url = await createPullRequest(this.runner, {
      owner: issue.owner,
      repo: issue.repo,
      title: buildPullRequestTitle(issue),
      body: buildPullRequestBody(this.context),
    });

    logger.success(`Pull request created: ${url}`);
    return url;
  }

  private ask(message: string): Promise<string> {
    return withSpinner(
      'Waiting for the assistant...',
      () => this.conversation.send(message),
      (reply) => `Assistant replied (${reply.length} chars)`,
    );
  }
}
