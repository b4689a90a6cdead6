import { z } from 'zod';

import { InputError } from '../utils/errors.js';
import { readJsonFile } from '../utils/fs.js';

/** Empty or null text is treated the same as an absent field. */
const optionalText = z
  .string()
  .nullish()
  .catch(undefined)
  .transform((value) => value || undefined);

export const issueRecordSchema = z.object({
  issue_number: z.number().int().positive(),
  branch_name: z.string().min(1),
  owner: z.string().min(1),
  repo: z.string().min(1),
  title: optionalText,
  body: optionalText,
  pr_title: optionalText,
});

export type IssueRecord = Readonly<z.infer<typeof issueRecordSchema>>;

/** The identifiers a report can carry even when the issue record is unusable. */
const issueSubjectSchema = z.object({
  issue_number: z.number().int().nullable().catch(null),
  branch_name: z.string().nullable().catch(null),
});

export type IssueSubject = z.infer<typeof issueSubjectSchema>;

// Every analysis field is advisory: values of the wrong type are dropped and
// rendered as placeholders instead of failing the run.
const advisoryText = z.string().nullish().catch(undefined);

function advisorySection<T extends z.ZodRawShape>(shape: T) {
  return z.object(shape).passthrough().nullish().catch(undefined);
}

export const analysisRecordSchema = z
  .object({
    complexity_assessment: advisorySection({ level: advisoryText }),
    risk_assessment: advisorySection({ overall_risk: advisoryText }),
    implementation_roadmap: advisorySection({
      total_estimated_time_minutes: z.number().nonnegative().nullish().catch(undefined),
    }),
    codebase_impact: advisorySection({
      affected_modules: z.array(z.string()).nullish().catch(undefined),
    }),
  })
  .passthrough();

export type AnalysisRecord = Readonly<z.infer<typeof analysisRecordSchema>>;

export interface AnalysisSummary {
  complexity: string;
  risk: string;
  estimatedMinutes: string;
  affectedModules: string[];
}

const UNKNOWN = 'unknown';

export function summarizeAnalysis(analysis: AnalysisRecord): AnalysisSummary {
  return {
    complexity: analysis.complexity_assessment?.level || UNKNOWN,
    risk: analysis.risk_assessment?.overall_risk || UNKNOWN,
    estimatedMinutes: String(analysis.implementation_roadmap?.total_estimated_time_minutes ?? UNKNOWN),
    affectedModules: analysis.codebase_impact?.affected_modules ?? [],
  };
}

function describeIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}

const inputObjectSchema = z.record(z.unknown());

/**
 * Read an input file that must hold a JSON object. Unparseable JSON and
 * non-object documents raise `InputError`; field-level checks come later.
 */
export async function readInputObject(path: string): Promise<Record<string, unknown>> {
  let raw: unknown;
  try {
    raw = await readJsonFile(path);
  } catch (error) {
    const msg = error instanceof Error ? error.message : String(error);
    throw new InputError(path, msg);
  }

  const parsed = inputObjectSchema.safeParse(raw);
  if (!parsed.success) {
    throw new InputError(path, 'expected a JSON object');
  }
  return parsed.data;
}

export function parseIssueRecord(path: string, data: Record<string, unknown>): IssueRecord {
  const parsed = issueRecordSchema.safeParse(data);
  if (!parsed.success) {
    throw new InputError(path, describeIssues(parsed.error));
  }
  return parsed.data;
}

export function issueSubject(data: Record<string, unknown>): IssueSubject {
  return issueSubjectSchema.parse(data);
}

export async function loadAnalysisRecord(path: string): Promise<AnalysisRecord> {
  return analysisRecordSchema.parse(await readInputObject(path));
}
