/**
 * Session report assembly.
 *
 * Built for every terminal status, so a failed or timed-out session still
 * says which examples converged and which did not.
 */

import type { z } from 'zod';
import type { UsageAccumulator } from '../lib/llm-provider.js';
import {
  COMPETENCY_AREAS,
  DRAFT_KEY,
  POSITION_KEY,
  QUALITY_KEY,
  type CompetencyArea,
  type ExampleSlot,
  type WorkflowStage,
} from './runtime/agent-protocol.js';
import type { ContextReader } from './runtime/context-store.js';
import type { RevisionCycleManager } from './runtime/revision-manager.js';
import { ANALYSIS_KEY, READINESS_KEY, SKILLS_KEY } from './collaborators.js';
import {
  PositionAnalysisSchema,
  QualityReportSchema,
  ReadinessAssessmentSchema,
  StarExampleSchema,
  TransferableSkillsSchema,
} from './schemas/collaborator-schemas.js';
import {
  PositionRequirementsSchema,
  type CoverageCell,
  type CoverageRow,
  type ExampleReport,
  type SessionReport,
  type UnresolvedGap,
} from './types.js';

export interface ReportParams {
  sessionId: string;
  status: SessionReport['status'];
  stage: WorkflowStage;
  turnsUsed: number;
  elapsedMs: number;
  failure: SessionReport['failure'];
  examples: readonly ExampleSlot[];
  store: ContextReader;
  revisions: RevisionCycleManager;
  usage: UsageAccumulator;
  /** The applicant's own example, reported beside the example it seeded */
  applicantText?: string | null;
}

export function buildReport(params: ReportParams): SessionReport {
  const { store } = params;
  const examples = params.examples.map((slot) => describeExample(slot, params));

  return {
    session_id: params.sessionId,
    status: params.status,
    final_stage: params.stage,
    turns_used: params.turnsUsed,
    elapsed_ms: params.elapsedMs,
    failure: params.failure,
    examples,
    coverage_matrix: coverageMatrix(store, examples),
    unresolved_gaps: unresolvedGaps(examples, params.revisions),
    readiness: parsed(ReadinessAssessmentSchema, store.get(READINESS_KEY)),
    transferable_skills: parsed(TransferableSkillsSchema, store.get(SKILLS_KEY)),
    quality: parsed(QualityReportSchema, store.get(QUALITY_KEY)),
    usage: { ...params.usage },
  };
}

function parsed<S extends z.ZodType>(schema: S, value: unknown): z.output<S> | null {
  if (value === undefined) return null;
  const result = schema.safeParse(value);
  return result.success ? result.data : null;
}

// ─── Examples ────────────────────────────────────────────────────────

function describeExample(slot: ExampleSlot, params: ReportParams): ExampleReport {
  const progress = params.revisions.progress(slot.example_id);
  // A converged example is final even when the session ended before the checkpoint froze it
  const status = progress ? (progress.status === 'converged' ? 'finalized' : progress.status) : 'planned';

  return {
    example_id: slot.example_id,
    key_accountability: slot.key_accountability,
    area: slot.area,
    status,
    text: parsed(StarExampleSchema, params.store.get(DRAFT_KEY, slot.example_id)),
    scores: progress?.scores ?? {},
    initial_scores: progress?.initial_scores ?? {},
    applicant_text: progress?.seeded ? params.applicantText ?? null : null,
    competencies_covered: progress?.covered ?? [],
    competency_gaps: progress?.gaps ?? [...slot.required_competencies],
    revision_count: progress?.revision_count ?? 0,
  };
}

function unresolvedGaps(examples: ExampleReport[], revisions: RevisionCycleManager): UnresolvedGap[] {
  return examples
    .filter((example) => example.status !== 'finalized')
    .map((example) => ({
      example_id: example.example_id,
      key_accountability: example.key_accountability,
      status: example.status,
      reason: revisions.progress(example.example_id)?.reason
        ?? (example.status === 'planned' ? 'not-drafted' : 'not-converged'),
    }));
}

// ─── Coverage matrix ─────────────────────────────────────────────────

/**
 * One row per Key Accountability: `verified` when a finalized example answers
 * it, `claimed` when a drafted one does, `none` otherwise.
 */
function coverageMatrix(store: ContextReader, examples: ExampleReport[]): CoverageRow[] {
  const rows: CoverageRow[] = [];
  const seen = new Set<string>();
  const rowKey = (ka: string, area: CompetencyArea) => `${area}:${ka.trim().toLowerCase()}`;

  const addRow = (ka: string, area: CompetencyArea) => {
    const key = rowKey(ka, area);
    if (seen.has(key)) return;
    seen.add(key);
    const matching = examples.filter((e) => e.area === area && rowKey(e.key_accountability, area) === key);
    let coverage: CoverageCell = 'none';
    if (matching.some((e) => e.status === 'finalized')) coverage = 'verified';
    else if (matching.some((e) => e.text !== null || e.applicant_text !== null)) coverage = 'claimed';
    rows.push({ key_accountability: ka, area, coverage, example_ids: matching.map((e) => e.example_id) });
  };

  const accountabilities = keyAccountabilities(store);
  for (const area of COMPETENCY_AREAS) {
    for (const ka of accountabilities[area]) addRow(ka, area);
  }
  for (const example of examples) addRow(example.key_accountability, example.area);
  return rows;
}

function keyAccountabilities(store: ContextReader): Record<CompetencyArea, string[]> {
  const analysis = PositionAnalysisSchema.safeParse(store.get(ANALYSIS_KEY));
  if (analysis.success) return analysis.data.key_accountabilities;
  const position = PositionRequirementsSchema.safeParse(store.get(POSITION_KEY));
  if (position.success) return position.data.key_accountabilities;
  return { vision: [], results: [], accountability: [] };
}
