import { orderedQualityGates } from '../core/config.js';
import { summarizeAnalysis } from '../core/inputs.js';
import type { IssueRecord } from '../core/inputs.js';
import { AUTOMATION_MARKER } from './context.js';
import type { PromptContext } from './context.js';

export function buildCommitSummary(issue: IssueRecord): string {
  return `feat: implement ${issue.title || `issue #${issue.issue_number}`}`;
}

export function buildCommitMessage(summary: string, issue: IssueRecord): string {
  return `${summary}\n\nRefs #${issue.issue_number}\n\n${AUTOMATION_MARKER}`;
}

export function buildPullRequestTitle(issue: IssueRecord): string {
  return issue.pr_title || `Resolve #${issue.issue_number}: ${issue.title || 'Issue'}`;
}

export function buildPullRequestBody(context: PromptContext): string {
  const { issue, analysis, qualityGates } = context;
  const summary = summarizeAnalysis(analysis);
  const testPlan = orderedQualityGates(qualityGates)
    .map((gate) => `- [x] \`${gate}\` passes`)
    .join('\n');

  return `## Summary
Resolves #${issue.issue_number}

This PR addresses the issue: ${issue.title || 'Unknown issue'}

## Changes
Implementation based on the issue analysis:
- Complexity: ${summary.complexity}
- Risk Level: ${summary.risk}

## Test Plan
${testPlan}

${AUTOMATION_MARKER}`;
}
