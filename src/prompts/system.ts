import { join } from 'node:path';

import { orderedQualityGates } from '../core/config.js';
import { summarizeAnalysis } from '../core/inputs.js';
import { readFileIfExists } from '../utils/fs.js';
import { renderTemplate } from '../utils/template.js';
import type { PromptContext } from './context.js';

/** Workspace-relative file that replaces the default system prompt template. */
export const SYSTEM_PROMPT_OVERRIDE = join('.issuesmith', 'system-prompt.md');

export const DEFAULT_SYSTEM_TEMPLATE = `You are a software development assistant working on the {{owner}}/{{repo}} repository. You are running non-interactively inside an isolated workspace.

## Project Context
- Repository: {{owner}}/{{repo}}
- Issue #{{issueNumber}}: {{title}}
- Working Branch: {{branchName}}
- Workspace: {{workspace}}

## Your Capabilities
You can ask for shell commands to be run in the workspace. Available tools:
- The project's build, lint and test toolchain
- Git for version control (configured with token auth)
- GitHub CLI for API operations
- File system access within the workspace

## Development Guidelines
1. Follow the project conventions in CLAUDE.md or CONTRIBUTING.md when present
2. Run the quality gates, in this order:
{{#each qualityGates}}   {{@number}}. \`{{this}}\`
{{/each}}3. Use conventional commit format
4. Create meaningful, focused commits
5. Never expose sensitive information

## Analysis Context
Complexity: {{complexity}}
Risk Level: {{risk}}
Estimated Time: {{estimatedMinutes}} minutes
Affected Modules: {{affectedModules}}

## Current Task
{{body}}

Respond with specific actions you'll take. When you need to execute commands, clearly state them. Always explain your reasoning for code changes.`;

/**
 * Resolve the template once per run; a repository can ship its own at
 * `.issuesmith/system-prompt.md` using the same placeholders.
 */
export async function loadSystemPromptTemplate(workspace: string): Promise<string> {
  return (await readFileIfExists(join(workspace, SYSTEM_PROMPT_OVERRIDE))) ?? DEFAULT_SYSTEM_TEMPLATE;
}

export function buildSystemPrompt(template: string, context: PromptContext): string {
  const { issue, analysis, workspace, qualityGates } = context;
  const summary = summarizeAnalysis(analysis);

  return renderTemplate(template, {
    owner: issue.owner,
    repo: issue.repo,
    issueNumber: issue.issue_number,
    title: issue.title || 'Unknown',
    branchName: issue.branch_name,
    workspace,
    qualityGates: orderedQualityGates(qualityGates),
    complexity: summary.complexity,
    risk: summary.risk,
    estimatedMinutes: summary.estimatedMinutes,
    affectedModules: summary.affectedModules,
    body: issue.body || 'No description available',
  });
}
