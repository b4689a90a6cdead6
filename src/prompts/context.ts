import type { QualityGateCommands } from '../core/config.js';
import type { AnalysisRecord, IssueRecord } from '../core/inputs.js';

export interface PromptContext {
  issue: IssueRecord;
  analysis: AnalysisRecord;
  workspace: string;
  qualityGates: QualityGateCommands;
}

export const AUTOMATION_MARKER = '🤖 Generated with issuesmith automation';
