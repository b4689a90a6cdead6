import { createPullRequest, extractPullRequestUrl, PR_URL_NOT_FOUND } from '../../src/core/github.js';
import { CommandFailure } from '../../src/utils/errors.js';
import { FakeRunner } from './helpers/fakes.js';

describe('extractPullRequestUrl', () => {
  it('should take the last non-empty line', () => {
    const stdout = 'Creating pull request for feature/issue-42 into main in acme/widgets\n\nhttps://github.com/acme/widgets/pull/7\n\n';
    expect(extractPullRequestUrl(stdout)).toBe('https://github.com/acme/widgets/pull/7');
  });

  it('should fall back to a placeholder for blank output', () => {
    expect(extractPullRequestUrl('')).toBe(PR_URL_NOT_FOUND);
    expect(extractPullRequestUrl('  \n\t\n')).toBe(PR_URL_NOT_FOUND);
  });
});

describe('createPullRequest', () => {
  it('should run gh pr create with quoted title and body', async () => {
    const runner = new FakeRunner().respond('gh pr create', {
      stdout: 'https://github.com/acme/widgets/pull/7\n',
    });

    const url = await createPullRequest(runner, {
      owner: 'acme',
      repo: 'widgets',
      title: 'Resolve #42: Add parser',
      body: "## Summary\nIt's done",
    });

    expect(url).toBe('https://github.com/acme/widgets/pull/7');
    expect(runner.commands).toEqual([
      "gh pr create --repo acme/widgets --title 'Resolve #42: Add parser' --body '## Summary\nIt'\\''s done'",
    ]);
  });

  it('should propagate a failed gh invocation', async () => {
    const runner = new FakeRunner().respond('gh pr create', { exitCode: 1, stderr: 'no commits between main and feature' });

    await expect(
      createPullRequest(runner, { owner: 'acme', repo: 'widgets', title: 't', body: 'b' }),
    ).rejects.toBeInstanceOf(CommandFailure);
  });
});
