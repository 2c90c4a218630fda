/**
 * Agent Protocol: Standard types for the collaborator workflow.
 *
 * Collaborators are plain descriptor records dispatched by capability tag:
 * no class hierarchy, no per-agent code paths in the engine. The Router,
 * Turn Executor and Revision Cycle Manager only ever see these shapes.
 */

import type { z } from 'zod';
import type { ModelTier } from '../../lib/llm.js';

// ─── Workflow stages ─────────────────────────────────────────────────

/** Fixed forward ordering. Only the Revision Cycle Manager may move backwards. */
export const WORKFLOW_STAGES = [
  'intake',
  'readiness',
  'position-analysis',
  'example-selection',
  'star-writing',
  'scoring',
  'competency-check',
  'revision',
  'skills-articulation',
  'quality-assurance',
  'finalized',
] as const;

export type WorkflowStage = (typeof WORKFLOW_STAGES)[number];

export function stageIndex(stage: WorkflowStage): number {
  return WORKFLOW_STAGES.indexOf(stage);
}

export function nextStage(stage: WorkflowStage): WorkflowStage {
  const idx = stageIndex(stage);
  return WORKFLOW_STAGES[Math.min(idx + 1, WORKFLOW_STAGES.length - 1)];
}

// ─── Capabilities ────────────────────────────────────────────────────

export const COMPETENCY_AREAS = ['vision', 'results', 'accountability'] as const;
export type CompetencyArea = (typeof COMPETENCY_AREAS)[number];

export const SCORING_CRITERIA = ['context', 'complexity', 'initiative'] as const;
export type ScoringCriterion = (typeof SCORING_CRITERIA)[number];

export type ScoringCapability = `scoring-${ScoringCriterion}`;
export type CompetencyCapability = `competency-${CompetencyArea}`;

export type Capability =
  | 'orchestrator'
  | 'readiness'
  | 'position-analysis'
  | 'example-selection'
  | 'star-writing'
  | ScoringCapability
  | CompetencyCapability
  | 'transferable-skills'
  | 'quality-assurance';

export function competencyCapabilityFor(area: CompetencyArea): CompetencyCapability {
  return `competency-${area}`;
}

export function scoringCapabilityFor(criterion: ScoringCriterion): ScoringCapability {
  return `scoring-${criterion}`;
}

// ─── Context keys ────────────────────────────────────────────────────

/** Namespaced store key, e.g. `readiness.assessment` or `score.context` */
export type ContextKey = string;

/** Owner name used for keys the session itself seeds at intake */
export const SESSION_OWNER = 'session';

export const PROFILE_KEY = 'input.profile';
export const POSITION_KEY = 'input.position';
/** Applicant's feedback on the examples, applied by every rewrite */
export const FEEDBACK_KEY = 'input.feedback';

/** `experience_ref` a planned example uses when it answers with the applicant's own job example */
export const APPLICANT_EXPERIENCE_REF = 'job_example';

/** The current draft of an example; every score and competency check is judged against it */
export const DRAFT_KEY = 'star.example';
export const DRAFT_CAPABILITY = 'star-writing' satisfies Capability;

export const SCORE_KEYS: Readonly<Record<ScoringCriterion, ContextKey>> = {
  context: 'score.context',
  complexity: 'score.complexity',
  initiative: 'score.initiative',
};

export const COMPETENCY_KEYS: Readonly<Record<CompetencyArea, ContextKey>> = {
  vision: 'competency.vision',
  results: 'competency.results',
  accountability: 'competency.accountability',
};

export const SELECTION_KEY = 'selection.plan';
export const QUALITY_KEY = 'quality.report';
export const QUALITY_CAPABILITY = 'quality-assurance' satisfies Capability;

// ─── Collaborator descriptor ─────────────────────────────────────────

export interface CollaboratorIdentity {
  /** Unique collaborator name (e.g. 'star-writer', 'context-scorer') */
  name: string;
  /** Product domain */
  domain: string;
}

export interface CollaboratorDescriptor {
  identity: CollaboratorIdentity;
  capability: Capability;
  /** Workflow stage this collaborator serves */
  stage: WorkflowStage;
  /** `example` collaborators run once per example; `session` once per session */
  scope: 'session' | 'example';
  description: string;
  system_prompt: string;
  /** Keys this collaborator may read; nothing else reaches its prompt */
  input_keys: readonly ContextKey[];
  /** Keys this collaborator owns; each must be a property of `output_schema` */
  output_keys: readonly ContextKey[];
  output_schema: z.ZodObject;
  model_tier: ModelTier;
  /** Opaque rubric text handed to the backend with every turn */
  rubric?: string;
  /**
   * Whether validated outputs satisfy the stage. Defaults to "every declared
   * output key is present". The QA collaborator uses it to require approval.
   */
  is_satisfied?: (outputs: Readonly<Record<ContextKey, unknown>>) => boolean;
  /** Example-scoped collaborators only: restrict to matching examples (e.g. one LC4Q area) */
  applies_to?: (example: ExampleSlot) => boolean;
}

// ─── Examples ────────────────────────────────────────────────────────

/** One planned example, as laid out by the example-selection collaborator */
export interface ExampleSlot {
  example_id: string;
  key_accountability: string;
  area: CompetencyArea;
  /** LC4Q items the example must cover for its area */
  required_competencies: readonly string[];
  experience_ref?: string;
  rationale?: string;
}

// ─── Snapshots and turn records ──────────────────────────────────────

export interface ContextEntry {
  value: unknown;
  /** Store version of the commit that wrote this entry */
  version: number;
  writer: string;
}

export interface ContextSnapshot {
  readonly version: number;
  readonly taken_at: string;
  readonly entries: Readonly<Record<string, Readonly<ContextEntry>>>;
}

export type TurnStatus = 'succeeded' | 'failed';

export interface TurnRecord {
  readonly seq: number;
  readonly session_id: string;
  readonly stage: WorkflowStage;
  readonly capability: Capability;
  readonly collaborator: string;
  readonly example_id: string | null;
  readonly input_snapshot: ContextSnapshot;
  /** Declared outputs written to the store (null on failure) */
  readonly output: Readonly<Record<ContextKey, unknown>> | null;
  /** Keys the backend returned that the collaborator does not own */
  readonly dropped_keys: readonly string[];
  readonly status: TurnStatus;
  /** Did the outputs satisfy the stage (see CollaboratorDescriptor.is_satisfied) */
  readonly satisfied: boolean;
  readonly error: { code: string; message: string } | null;
  /** Backend calls made during this turn, including retries and re-prompts */
  readonly attempts: number;
  readonly started_at: string;
  readonly finished_at: string;
}

// ─── Generation backend (external) ───────────────────────────────────

export interface GenerationRequest {
  session_id: string;
  collaborator: CollaboratorIdentity;
  capability: Capability;
  system_prompt: string;
  model_tier: ModelTier;
  /** Scoped view: declared inputs, target example, fixed configuration */
  view: TurnView;
  /** Validation feedback from the previous attempt, for a corrective re-prompt */
  correction?: string;
  signal: AbortSignal;
}

export interface TurnView {
  inputs: Record<ContextKey, unknown>;
  /** Declared inputs that are not in the store yet */
  missing_inputs: ContextKey[];
  target_example: ExampleSlot | null;
  config: {
    adequacy_threshold: number;
    rubric: string;
    competency_framework: Readonly<Record<CompetencyArea, readonly string[]>>;
  };
}

/**
 * Any text-generation provider. Implementations reject with BackendUnavailable,
 * BackendTimeout or MalformedResponse from ./errors.js.
 */
export interface GenerationBackend {
  generate(request: GenerationRequest, outputSchema: Record<string, unknown>): Promise<unknown>;
}
