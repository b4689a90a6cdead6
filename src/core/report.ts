import { z } from 'zod';

import { readJsonFile, writeJsonFile } from '../utils/fs.js';

export const WORKFLOW_STEPS = [
  'workflow_started',
  'git_configured',
  'branch_created',
  'initial_analysis',
  'implementation_completed',
  'quality_gates_passed',
  'changes_committed',
  'branch_pushed',
  'pr_created',
] as const;

export type WorkflowStep = (typeof WORKFLOW_STEPS)[number];

export const executionReportSchema = z.object({
  // Null only when the issue record could not supply them.
  issue_number: z.number().int().nullable(),
  branch_name: z.string().nullable(),
  start_time: z.number(),
  end_time: z.number().nullable(),
  duration_seconds: z.number().nullable(),
  steps: z.array(z.enum(WORKFLOW_STEPS)),
  success: z.boolean(),
  error: z.string().nullable(),
  pr_url: z.string().nullable(),
});

/** Times are seconds since the epoch. */
export type ExecutionReport = z.infer<typeof executionReportSchema>;

export type ReportSubject = Pick<ExecutionReport, 'issue_number' | 'branch_name'>;

export function epochSeconds(): number {
  return Date.now() / 1000;
}

export function startReport(subject: ReportSubject, now: number): ExecutionReport {
  return {
    issue_number: subject.issue_number,
    branch_name: subject.branch_name,
    start_time: now,
    end_time: null,
    duration_seconds: null,
    steps: [],
    success: false,
    error: null,
    pr_url: null,
  };
}

export function recordStep(report: ExecutionReport, step: WorkflowStep): void {
  report.steps.push(step);
}

export function finishReport(report: ExecutionReport, now: number): void {
  report.end_time = now;
  report.duration_seconds = now - report.start_time;
}

/** A report for a run that failed before the workflow could start. */
export function abortedReport(subject: ReportSubject, error: string, now: number): ExecutionReport {
  const report = startReport(subject, now);
  report.error = error;
  finishReport(report, now);
  return report;
}

export async function writeReport(path: string, report: ExecutionReport): Promise<void> {
  await writeJsonFile(path, report);
}

export async function readReport(path: string): Promise<ExecutionReport> {
  return executionReportSchema.parse(await readJsonFile(path));
}
