/**
 * Built-in collaborator catalogue.
 *
 * Thirteen descriptors, one per capability. Each declares exactly which keys
 * it reads and writes; the registry derives store ownership from them.
 */

import { z } from 'zod';
import {
  COMPETENCY_AREAS,
  COMPETENCY_KEYS,
  DRAFT_KEY,
  FEEDBACK_KEY,
  POSITION_KEY,
  PROFILE_KEY,
  QUALITY_KEY,
  SCORE_KEYS,
  SCORING_CRITERIA,
  SELECTION_KEY,
  competencyCapabilityFor,
  scoringCapabilityFor,
  type CollaboratorDescriptor,
  type ContextKey,
  type ExampleSlot,
  type ScoringCriterion,
} from './runtime/agent-protocol.js';
import { CollaboratorRegistry } from './runtime/agent-registry.js';
import type { ContextReader } from './runtime/context-store.js';
import type { CompetencyFramework } from './knowledge/lc4q.js';
import { SCORING_RUBRICS } from './knowledge/rubrics.js';
import {
  COMPETENCY_PROMPTS,
  COMPLEXITY_SCORING_PROMPT,
  CONTEXT_SCORING_PROMPT,
  EXAMPLE_SELECTION_PROMPT,
  INITIATIVE_SCORING_PROMPT,
  ORCHESTRATOR_PROMPT,
  POSITION_ANALYSIS_PROMPT,
  QUALITY_ASSURANCE_PROMPT,
  READINESS_PROMPT,
  STAR_WRITING_PROMPT,
  TRANSFERABLE_SKILLS_PROMPT,
} from './prompts.js';
import {
  CompetencyCheckSchema,
  OrchestratorBriefSchema,
  PositionAnalysisSchema,
  QualityReportSchema,
  ReadinessAssessmentSchema,
  ScoreSchema,
  SelectionPlanSchema,
  StarExampleSchema,
  TransferableSkillsSchema,
} from './schemas/collaborator-schemas.js';

const DOMAIN = 'promotion-application';

export const BRIEF_KEY = 'orchestrator.brief';
export const READINESS_KEY = 'readiness.assessment';
export const ANALYSIS_KEY = 'position.analysis';
export const SKILLS_KEY = 'skills.transferable';

const ALL_SCORE_KEYS: ContextKey[] = SCORING_CRITERIA.map((c) => SCORE_KEYS[c]);
const ALL_COMPETENCY_KEYS: ContextKey[] = COMPETENCY_AREAS.map((a) => COMPETENCY_KEYS[a]);

// ─── Session-scoped collaborators ────────────────────────────────────

const orchestrator: CollaboratorDescriptor = {
  identity: { name: 'orchestrator', domain: DOMAIN },
  capability: 'orchestrator',
  stage: 'intake',
  scope: 'session',
  description: 'Frames the session: summary, priorities and risks for every later specialist',
  system_prompt: ORCHESTRATOR_PROMPT,
  input_keys: [PROFILE_KEY, POSITION_KEY],
  output_keys: [BRIEF_KEY],
  output_schema: z.object({ [BRIEF_KEY]: OrchestratorBriefSchema }),
  model_tier: 'light',
};

const readiness: CollaboratorDescriptor = {
  identity: { name: 'readiness-assessor', domain: DOMAIN },
  capability: 'readiness',
  stage: 'readiness',
  scope: 'session',
  description: 'Evaluates promotion readiness against six indicators',
  system_prompt: READINESS_PROMPT,
  input_keys: [PROFILE_KEY, POSITION_KEY, BRIEF_KEY],
  output_keys: [READINESS_KEY],
  output_schema: z.object({ [READINESS_KEY]: ReadinessAssessmentSchema }),
  model_tier: 'mid',
};

const positionAnalyst: CollaboratorDescriptor = {
  identity: { name: 'position-analyst', domain: DOMAIN },
  capability: 'position-analysis',
  stage: 'position-analysis',
  scope: 'session',
  description: 'Extracts Key Accountabilities, location factors and priorities from the position',
  system_prompt: POSITION_ANALYSIS_PROMPT,
  input_keys: [POSITION_KEY, BRIEF_KEY],
  output_keys: [ANALYSIS_KEY],
  output_schema: z.object({ [ANALYSIS_KEY]: PositionAnalysisSchema }),
  model_tier: 'mid',
};

const exampleSelector: CollaboratorDescriptor = {
  identity: { name: 'example-selector', domain: DOMAIN },
  capability: 'example-selection',
  stage: 'example-selection',
  scope: 'session',
  description: 'Plans one example per Key Accountability from the applicant\'s experience',
  system_prompt: EXAMPLE_SELECTION_PROMPT,
  input_keys: [PROFILE_KEY, ANALYSIS_KEY, READINESS_KEY],
  output_keys: [SELECTION_KEY],
  output_schema: z.object({ [SELECTION_KEY]: SelectionPlanSchema }),
  model_tier: 'mid',
};

const transferableSkills: CollaboratorDescriptor = {
  identity: { name: 'transferable-skills', domain: DOMAIN },
  capability: 'transferable-skills',
  stage: 'skills-articulation',
  scope: 'session',
  description: 'Articulates skills that carry over to the target position',
  system_prompt: TRANSFERABLE_SKILLS_PROMPT,
  input_keys: [PROFILE_KEY, ANALYSIS_KEY, DRAFT_KEY],
  output_keys: [SKILLS_KEY],
  output_schema: z.object({ [SKILLS_KEY]: TransferableSkillsSchema }),
  model_tier: 'mid',
};

const qualityAssurance: CollaboratorDescriptor = {
  identity: { name: 'quality-reviewer', domain: DOMAIN },
  capability: 'quality-assurance',
  stage: 'quality-assurance',
  scope: 'session',
  description: 'Final review of the complete example set; only an approved report finalises a session',
  system_prompt: QUALITY_ASSURANCE_PROMPT,
  input_keys: [
    PROFILE_KEY,
    POSITION_KEY,
    ANALYSIS_KEY,
    SELECTION_KEY,
    DRAFT_KEY,
    ...ALL_SCORE_KEYS,
    ...ALL_COMPETENCY_KEYS,
    SKILLS_KEY,
    FEEDBACK_KEY,
  ],
  output_keys: [QUALITY_KEY],
  output_schema: z.object({ [QUALITY_KEY]: QualityReportSchema }),
  model_tier: 'mid',
  is_satisfied: (outputs) => {
    const report = QualityReportSchema.safeParse(outputs[QUALITY_KEY]);
    return report.success && report.data.approved;
  },
};

// ─── Example-scoped collaborators ────────────────────────────────────

const starWriter: CollaboratorDescriptor = {
  identity: { name: 'star-writer', domain: DOMAIN },
  capability: 'star-writing',
  stage: 'star-writing',
  scope: 'example',
  description: 'Drafts and revises one example in STAR form',
  system_prompt: STAR_WRITING_PROMPT,
  input_keys: [
    PROFILE_KEY,
    ANALYSIS_KEY,
    SELECTION_KEY,
    DRAFT_KEY,
    ...ALL_SCORE_KEYS,
    ...ALL_COMPETENCY_KEYS,
    QUALITY_KEY,
    FEEDBACK_KEY,
  ],
  output_keys: [DRAFT_KEY],
  output_schema: z.object({ [DRAFT_KEY]: StarExampleSchema }),
  model_tier: 'primary',
};

const SCORING_PROMPTS: Readonly<Record<ScoringCriterion, string>> = {
  context: CONTEXT_SCORING_PROMPT,
  complexity: COMPLEXITY_SCORING_PROMPT,
  initiative: INITIATIVE_SCORING_PROMPT,
};

function scorer(criterion: ScoringCriterion): CollaboratorDescriptor {
  const key = SCORE_KEYS[criterion];
  return {
    identity: { name: `${criterion}-scorer`, domain: DOMAIN },
    capability: scoringCapabilityFor(criterion),
    stage: 'scoring',
    scope: 'example',
    description: `Scores one example for ${criterion} on the 1-7 scale`,
    system_prompt: SCORING_PROMPTS[criterion],
    // Complexity is judged relative to the applicant's current rank
    input_keys: criterion === 'complexity'
      ? [DRAFT_KEY, ANALYSIS_KEY, POSITION_KEY, PROFILE_KEY]
      : [DRAFT_KEY, ANALYSIS_KEY, POSITION_KEY],
    output_keys: [key],
    output_schema: z.object({ [key]: ScoreSchema }),
    model_tier: 'mid',
    rubric: SCORING_RUBRICS[criterion],
  };
}

const competencyChecks: CollaboratorDescriptor[] = COMPETENCY_AREAS.map((area) => {
  const key = COMPETENCY_KEYS[area];
  return {
    identity: { name: `${area}-competency`, domain: DOMAIN },
    capability: competencyCapabilityFor(area),
    stage: 'competency-check',
    scope: 'example',
    description: `Verifies the LC4Q ${area} items an example must demonstrate`,
    system_prompt: COMPETENCY_PROMPTS[area],
    input_keys: [DRAFT_KEY, ANALYSIS_KEY],
    output_keys: [key],
    output_schema: z.object({ [key]: CompetencyCheckSchema }),
    model_tier: 'mid',
    applies_to: (example: ExampleSlot) => example.area === area,
  };
});

/** Every built-in descriptor, in stage order. */
export function defaultCollaborators(): CollaboratorDescriptor[] {
  return [
    orchestrator,
    readiness,
    positionAnalyst,
    exampleSelector,
    starWriter,
    ...SCORING_CRITERIA.map(scorer),
    ...competencyChecks,
    transferableSkills,
    qualityAssurance,
  ];
}

export function createRegistry(descriptors: readonly CollaboratorDescriptor[]): CollaboratorRegistry {
  // The applicant's own job example is seeded as the first draft of its slot
  const registry = new CollaboratorRegistry([PROFILE_KEY, POSITION_KEY, FEEDBACK_KEY], [DRAFT_KEY]);
  for (const descriptor of descriptors) registry.register(descriptor);
  return registry;
}

export function createDefaultRegistry(): CollaboratorRegistry {
  return createRegistry(defaultCollaborators());
}

/**
 * Example slots from the current selection plan, in plan order, with the
 * competency items each must cover. Empty until the plan exists.
 */
export function planExamples(store: ContextReader, framework: CompetencyFramework): ExampleSlot[] {
  const plan = SelectionPlanSchema.safeParse(store.get(SELECTION_KEY));
  if (!plan.success) return [];
  return plan.data.examples.map((planned) => ({
    example_id: planned.example_id,
    key_accountability: planned.key_accountability,
    area: planned.area,
    required_competencies: framework[planned.area],
    ...(planned.experience_ref ? { experience_ref: planned.experience_ref } : {}),
    ...(planned.rationale ? { rationale: planned.rationale } : {}),
  }));
}
