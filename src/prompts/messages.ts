import { COMPLETION_MARKER } from '../core/assistant-actions.js';
import { summarizeAnalysis } from '../core/inputs.js';
import type { AnalysisRecord, IssueRecord } from '../core/inputs.js';

export const STATUS_SNIPPET_LENGTH = 500;

/**
 * First turn: seed the issue and analysis, ask for a plan.
 */
export function buildInitialAnalysisMessage(issue: IssueRecord, analysis: AnalysisRecord): string {
  const summary = summarizeAnalysis(analysis);

  return `I need to implement the following GitHub issue:

**Issue #${issue.issue_number}**: ${issue.title || 'Unknown'}

**Description**:
${issue.body || 'No description'}

**Analysis Summary**:
- Complexity: ${summary.complexity}
- Estimated Time: ${summary.estimatedMinutes} minutes
- Affected Modules: ${summary.affectedModules.join(', ')}

Please analyze the codebase and provide a step-by-step implementation plan. Start by exploring the relevant files and understanding the current structure.`;
}

export function buildStatusMessage(iteration: number, gitStatus: string): string {
  const treeState = gitStatus.trim() ? 'has changes' : 'clean';
  const snippet = gitStatus ? gitStatus.slice(0, STATUS_SNIPPET_LENGTH) : 'No changes';

  return `Current status (iteration ${iteration}):
- Working directory: ${treeState}
- Git status: ${snippet}

Please continue with the implementation. If you need to run commands, state them clearly.
If the implementation is complete, respond with "${COMPLETION_MARKER}".`;
}
