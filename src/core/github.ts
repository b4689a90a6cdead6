import type { CommandRunner } from './executor.js';
import { quoteShellArg } from '../utils/shell.js';

export const PR_URL_NOT_FOUND = 'PR URL not found';

export interface PullRequestDraft {
  owner: string;
  repo: string;
  title: string;
  body: string;
}

/**
 * `gh pr create` prints progress lines before the URL; the URL is the last
 * non-empty line of stdout.
 */
export function extractPullRequestUrl(stdout: string): string {
  const lines = stdout
    .split('\n')
    .map((line) => line.trim())
    .filter(Boolean);
  return lines.at(-1) ?? PR_URL_NOT_FOUND;
}

export async function createPullRequest(runner: CommandRunner, draft: PullRequestDraft): Promise<string> {
  const command = [
    'gh pr create',
    `--repo ${quoteShellArg(`${draft.owner}/${draft.repo}`)}`,
    `--title ${quoteShellArg(draft.title)}`,
    `--body ${quoteShellArg(draft.body)}`,
  ].join(' ');

  const { stdout } = await runner.run(command);
  return extractPullRequestUrl(stdout);
}
