/**
 * Zod schemas for collaborator output validation.
 *
 * Each collaborator's output schema is an object whose properties are its
 * declared context keys (see ../collaborators.ts); the value schemas live here.
 * Lists default to empty and objects use .passthrough() so that harmless extra
 * fields from the model survive, while the fields the engine reads (scores,
 * coverage, approval) stay strict.
 */

import { z } from 'zod';
import { COMPETENCY_AREAS } from '../runtime/agent-protocol.js';

const stringList = () => z.array(z.string()).optional().default([]);

// ─── orchestrator ─────────────────────────────────────────────────────

export const OrchestratorBriefSchema = z.object({
  summary: z.string().min(1),
  priorities: stringList(),
  risks: stringList(),
}).passthrough();

export type OrchestratorBrief = z.infer<typeof OrchestratorBriefSchema>;

// ─── readiness ────────────────────────────────────────────────────────

export const ReadinessAssessmentSchema = z.object({
  readiness_score: z.number().int().min(0).max(10),
  strengths: stringList(),
  development_areas: stringList(),
  recommendation: z.enum(['proceed', 'develop', 'wait']),
  feedback: z.string().optional().default(''),
}).passthrough();

export type ReadinessAssessment = z.infer<typeof ReadinessAssessmentSchema>;

// ─── position-analysis ────────────────────────────────────────────────

export const PositionAnalysisSchema = z.object({
  position_title: z.string().min(1),
  rank_level: z.string().optional().default(''),
  key_accountabilities: z.object({
    vision: stringList(),
    results: stringList(),
    accountability: stringList(),
  }),
  location_factors: z.record(z.string(), z.string()).optional().default({}),
  required_competencies: z.record(z.string(), z.array(z.string())).optional().default({}),
  operational_priorities: stringList(),
}).passthrough();

export type PositionAnalysis = z.infer<typeof PositionAnalysisSchema>;

// ─── example-selection ────────────────────────────────────────────────

export const PlannedExampleSchema = z.object({
  example_id: z.string().min(1),
  key_accountability: z.string().min(1),
  area: z.enum(COMPETENCY_AREAS),
  experience_ref: z.string().optional(),
  rationale: z.string().optional(),
});

export const SelectionPlanSchema = z.object({
  examples: z.array(PlannedExampleSchema).min(1),
  coverage_analysis: z.record(z.string(), z.string()).optional().default({}),
  gaps_identified: stringList(),
  improvement_suggestions: stringList(),
}).passthrough().refine(
  (plan) => new Set(plan.examples.map((e) => e.example_id)).size === plan.examples.length,
  { message: 'example_id values must be unique', path: ['examples'] },
);

export type SelectionPlan = z.infer<typeof SelectionPlanSchema>;

// ─── star-writing ─────────────────────────────────────────────────────

export const StarExampleSchema = z.object({
  year_rank_location: z.string().min(1),
  situation: z.string().min(1),
  task: z.string().min(1),
  action: z.string().min(1),
  result: z.string().min(1),
  word_count: z.number().int().nonnegative(),
  competencies_demonstrated: stringList(),
}).passthrough();

export type StarExample = z.infer<typeof StarExampleSchema>;

// ─── scoring-* ────────────────────────────────────────────────────────
// One shape for all three criteria; the criterion is carried by the key.

export const ScoreSchema = z.object({
  score: z.number().int().min(1).max(7),
  strengths: stringList(),
  weaknesses: stringList(),
  improvement_suggestions: stringList(),
  specific_feedback: z.string().optional().default(''),
}).passthrough();

export type Score = z.infer<typeof ScoreSchema>;

// ─── competency-* ─────────────────────────────────────────────────────

export const CompetencyCheckSchema = z.object({
  area: z.enum(COMPETENCY_AREAS),
  competencies_covered: z.record(z.string(), z.boolean()),
  gaps: stringList(),
  behavioral_evidence: z.record(z.string(), z.array(z.string())).optional().default({}),
  suggestions: stringList(),
}).passthrough();

export type CompetencyCheck = z.infer<typeof CompetencyCheckSchema>;

// ─── transferable-skills ──────────────────────────────────────────────

export const TransferableSkillsSchema = z.object({
  transferable_skills: stringList(),
  skill_statements: stringList(),
  relevance_mapping: z.record(z.string(), z.string()).optional().default({}),
  credibility_score: z.number().int().min(0).max(10),
}).passthrough();

export type TransferableSkills = z.infer<typeof TransferableSkillsSchema>;

// ─── quality-assurance ────────────────────────────────────────────────

export const QualityFindingSchema = z.object({
  example_id: z.string().min(1),
  criterion: z.enum(['content', 'competency', 'context', 'complexity', 'initiative']),
  note: z.string().optional(),
});

export const QualityReportSchema = z.object({
  grammar_check: z.boolean(),
  professional_tone: z.boolean(),
  word_count_compliance: z.boolean(),
  format_requirements: z.boolean(),
  all_criteria_addressed: z.boolean(),
  missing_sections: stringList(),
  overall_quality: z.number().int().min(1).max(10),
  approved: z.boolean(),
  flagged: z.array(QualityFindingSchema).optional().default([]),
}).passthrough();

export type QualityReport = z.infer<typeof QualityReportSchema>;
export type QualityFinding = z.infer<typeof QualityFindingSchema>;
