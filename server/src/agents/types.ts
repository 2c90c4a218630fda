/**
 * Shared type definitions for a promotion-example session.
 *
 * Intake payloads are validated with zod at the edge (HTTP body or direct
 * controller call); everything downstream works from the inferred types.
 */

import { z } from 'zod';
import { ConfigOverridesSchema } from '../lib/config.js';
import type { UsageAccumulator } from '../lib/llm-provider.js';
import type { CompetencyArea, ScoringCriterion, WorkflowStage } from './runtime/agent-protocol.js';
import type { ExampleStatus, StatusReason } from './runtime/revision-manager.js';
import type {
  QualityReport,
  ReadinessAssessment,
  StarExample,
  TransferableSkills,
} from './schemas/collaborator-schemas.js';

// ─── Intake ──────────────────────────────────────────────────────────

export const ExperienceItemSchema = z.object({
  id: z.string().min(1),
  title: z.string().min(1),
  year: z.string().optional(),
  rank: z.string().optional(),
  location: z.string().optional(),
  summary: z.string().min(1),
});

export const UserProfileSchema = z.object({
  name: z.string().min(1),
  current_rank: z.string().min(1),
  current_position: z.string().min(1),
  location: z.string().min(1),
  years_experience: z.number().int().nonnegative(),
  target_position: z.string().min(1),
  target_location: z.string().optional(),
  experience: z.array(ExperienceItemSchema).optional().default([]),
  /** The applicant's own example; scored as-is before any rewrite. Blank counts as absent */
  job_example: z.string().trim().optional(),
});

export const PositionRequirementsSchema = z.object({
  title: z.string().min(1),
  rank_level: z.string().min(1),
  location: z.string().optional(),
  key_accountabilities: z.object({
    vision: z.array(z.string()).optional().default([]),
    results: z.array(z.string()).optional().default([]),
    accountability: z.array(z.string()).optional().default([]),
  }),
  location_factors: z.record(z.string(), z.string()).optional().default({}),
  /** LC4Q items the advertisement lists; omitted areas use the full framework */
  lc4q_competencies: z.object({
    vision: z.array(z.string()).optional(),
    results: z.array(z.string()).optional(),
    accountability: z.array(z.string()).optional(),
  }).optional(),
  operational_priorities: z.array(z.string()).optional().default([]),
  position_description: z.string().optional(),
});

export const SessionInputSchema = z.object({
  session_id: z.string().min(1).max(128).optional(),
  profile: UserProfileSchema,
  position: PositionRequirementsSchema,
  /** Changes the applicant wants made to the examples */
  user_feedback: z.string().trim().max(4_000).optional(),
  config: ConfigOverridesSchema.optional(),
});

export type UserProfile = z.infer<typeof UserProfileSchema>;
export type PositionRequirements = z.infer<typeof PositionRequirementsSchema>;
export type SessionInput = z.input<typeof SessionInputSchema>;
export type ParsedSessionInput = z.output<typeof SessionInputSchema>;

// ─── Session lifecycle ───────────────────────────────────────────────

export type SessionStatus = 'running' | 'completed' | 'failed' | 'timed_out';

export interface SessionState {
  session_id: string;
  status: SessionStatus;
  stage: WorkflowStage;
  turns_used: number;
  started_at: string;
  cancel_requested: boolean;
}

export type SessionEvent =
  | { type: 'stage_transition'; session_id: string; from: WorkflowStage; to: WorkflowStage }
  | {
      type: 'turn_complete';
      session_id: string;
      seq: number;
      stage: WorkflowStage;
      capability: string;
      example_id: string | null;
      status: 'succeeded' | 'failed';
      satisfied: boolean;
    }
  | {
      type: 'backtrack';
      session_id: string;
      from: WorkflowStage;
      to: WorkflowStage;
      example_id: string;
      reason: StatusReason;
    }
  | {
      type: 'example_status';
      session_id: string;
      example_id: string;
      from: ExampleStatus | null;
      to: ExampleStatus;
      reason: StatusReason | null;
    }
  | { type: 'session_complete'; session_id: string; status: Exclude<SessionStatus, 'running'> };

export type SessionEmitter = (event: SessionEvent) => void;

// ─── Report ──────────────────────────────────────────────────────────

export type CoverageCell = 'verified' | 'claimed' | 'none';

export interface ExampleReport {
  example_id: string;
  key_accountability: string;
  area: CompetencyArea;
  /** `planned` when the session ended before the example was drafted */
  status: ExampleStatus | 'planned';
  text: StarExample | null;
  /** Latest scores */
  scores: Partial<Record<ScoringCriterion, number>>;
  /** Scores of the first draft, before any rewrite */
  initial_scores: Partial<Record<ScoringCriterion, number>>;
  /** Set when the first draft was the applicant's own job example */
  applicant_text: string | null;
  competencies_covered: string[];
  competency_gaps: string[];
  revision_count: number;
}

export interface UnresolvedGap {
  example_id: string;
  key_accountability: string;
  status: ExampleStatus | 'planned';
  reason: string;
}

export interface CoverageRow {
  key_accountability: string;
  area: CompetencyArea;
  coverage: CoverageCell;
  example_ids: string[];
}

export interface SessionReport {
  session_id: string;
  status: Exclude<SessionStatus, 'running'>;
  final_stage: WorkflowStage;
  turns_used: number;
  elapsed_ms: number;
  failure: { code: string; message: string; details?: Record<string, unknown> } | null;
  examples: ExampleReport[];
  coverage_matrix: CoverageRow[];
  unresolved_gaps: UnresolvedGap[];
  readiness: ReadinessAssessment | null;
  transferable_skills: TransferableSkills | null;
  quality: QualityReport | null;
  usage: UsageAccumulator;
}
