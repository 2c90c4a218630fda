/**
 * Revision Cycle Manager: per-example convergence and stagnation tracking.
 *
 *   drafted → scored → converged | needs-revision
 *   needs-revision → (rewrite) revised → scored → …
 *   converged → finalized (frozen at the revision checkpoint)
 *   any unresolved state → stalled (stagnation or revision budget)
 *
 * The manager reads the store and the turn history but never writes either.
 * It answers one question for the Router: is there an example that needs to
 * go backwards, and where to?
 */

import { z } from 'zod';
import type { OrchestrationConfig } from '../../lib/config.js';
import {
  COMPETENCY_KEYS,
  DRAFT_CAPABILITY,
  DRAFT_KEY,
  QUALITY_CAPABILITY,
  QUALITY_KEY,
  SCORE_KEYS,
  SCORING_CRITERIA,
  scoringCapabilityFor,
  type ExampleSlot,
  type ScoringCapability,
  type ScoringCriterion,
  type TurnRecord,
} from './agent-protocol.js';
import type { ContextReader } from './context-store.js';

// ─── Types ───────────────────────────────────────────────────────────

export type ExampleStatus =
  | 'drafted'
  | 'scored'
  | 'needs-revision'
  | 'revised'
  | 'converged'
  | 'finalized'
  | 'stalled';

export type StatusReason =
  | 'below-threshold'
  | 'competency-gap'
  | 'quality-finding'
  | 'quality-recheck'
  | 'stagnation'
  | 'revision-budget';

export interface ExampleProgress {
  example_id: string;
  status: ExampleStatus;
  reason: StatusReason | null;
  revision_count: number;
  stagnant_passes: number;
  scores: Partial<Record<ScoringCriterion, number>>;
  /** Scores of the first draft, before any rewrite */
  initial_scores: Partial<Record<ScoringCriterion, number>>;
  /** The first draft was the applicant's own text rather than a written one */
  seeded: boolean;
  /** Required competency items the latest check confirmed */
  covered: string[];
  /** Required competency items not yet confirmed (all of them before the first check) */
  gaps: string[];
}

export interface StatusChange {
  example_id: string;
  from: ExampleStatus | null;
  to: ExampleStatus;
  reason: StatusReason | null;
}

/** A narrow re-score request raised by a quality finding */
export interface Recheck {
  capability: ScoringCapability;
  exampleId: string;
  /** Satisfied once the score entry's version is greater than this */
  afterVersion: number;
}

export interface BackwardTarget {
  stage: 'star-writing' | 'scoring';
  capability: typeof DRAFT_CAPABILITY | ScoringCapability;
  exampleId: string;
  reason: StatusReason;
}

/** The read-only face the Router consults */
export interface RevisionAdvisor {
  statusOf(exampleId: string): ExampleStatus | undefined;
  backwardTarget(examples: readonly ExampleSlot[], store: ContextReader): BackwardTarget | null;
}

export type RevisionPolicy = Pick<
  OrchestrationConfig,
  'adequacy_threshold' | 'max_stagnant_passes' | 'max_revisions_per_example'
>;

const FROZEN: ReadonlySet<ExampleStatus> = new Set(['finalized', 'stalled']);

export function isFrozen(status: ExampleStatus | undefined): boolean {
  return status !== undefined && FROZEN.has(status);
}

// ─── Readings ────────────────────────────────────────────────────────
// Values were validated by the collaborators' own schemas on the way in;
// these read only the fields revision control depends on.

const ScoreReading = z.object({ score: z.number() });
const CompetencyReading = z.object({ competencies_covered: z.record(z.string(), z.boolean()) });
const QualityReading = z.object({
  approved: z.boolean(),
  flagged: z
    .array(
      z.object({
        example_id: z.string(),
        criterion: z.enum(['content', 'competency', 'context', 'complexity', 'initiative']),
      }),
    )
    .default([]),
});

interface PassSummary {
  scores: Record<ScoringCriterion, number>;
  coveredCount: number | null;
  gapCount: number | null;
}

interface Ledger {
  slot: ExampleSlot;
  status: ExampleStatus;
  reason: StatusReason | null;
  revisionCount: number;
  stagnantPasses: number;
  scores: Partial<Record<ScoringCriterion, number>>;
  initialScores: Record<ScoringCriterion, number> | null;
  seeded: boolean;
  covered: string[];
  gaps: string[];
  lastPass: PassSummary | null;
  /** Highest store version that fed the last evaluation */
  lastEvaluated: number;
}

function normalise(item: string): string {
  return item.trim().toLowerCase();
}

// ─── Manager ─────────────────────────────────────────────────────────

export class RevisionCycleManager implements RevisionAdvisor {
  private readonly ledgers = new Map<string, Ledger>();
  private rechecks: Recheck[] = [];

  constructor(private readonly policy: RevisionPolicy) {}

  statusOf(exampleId: string): ExampleStatus | undefined {
    return this.ledgers.get(exampleId)?.status;
  }

  progress(exampleId: string): ExampleProgress | undefined {
    const ledger = this.ledgers.get(exampleId);
    return ledger ? toProgress(ledger) : undefined;
  }

  /** Re-checks whose score has not been rewritten yet */
  outstandingRechecks(store: ContextReader): Recheck[] {
    return this.rechecks.filter((r) => !isRecheckSatisfied(r, store));
  }

  /**
   * Fold one turn into the ledger. Failed turns change nothing.
   */
  observe(record: TurnRecord, store: ContextReader, examples: readonly ExampleSlot[]): StatusChange[] {
    if (record.status !== 'succeeded') return [];
    const changes: StatusChange[] = [];

    if (record.capability === QUALITY_CAPABILITY) {
      this.applyQualityFindings(store, changes);
    } else if (record.example_id) {
      const slot = examples.find((e) => e.example_id === record.example_id);
      if (slot) {
        if (record.capability === DRAFT_CAPABILITY) {
          this.onDraft(slot, changes);
        } else {
          this.evaluate(slot, store, changes);
        }
      }
    }

    this.rechecks = this.outstandingRechecks(store);
    return changes;
  }

  /**
   * Track a draft the session wrote itself (the applicant's own example) as
   * the example's first draft. No-op when the example already has one.
   */
  seedDraft(slot: ExampleSlot): StatusChange[] {
    if (this.ledgers.has(slot.example_id)) return [];
    const changes: StatusChange[] = [];
    this.onDraft(slot, changes, true);
    return changes;
  }

  /** Revision checkpoint: converged examples become final. */
  freeze(): StatusChange[] {
    const changes: StatusChange[] = [];
    for (const ledger of this.ledgers.values()) {
      if (ledger.status === 'converged') this.setStatus(ledger, 'finalized', null, changes);
    }
    return changes;
  }

  /**
   * First example (in selection order) needing a rewrite, else the first
   * outstanding narrow re-check, else null.
   */
  backwardTarget(examples: readonly ExampleSlot[], store: ContextReader): BackwardTarget | null {
    for (const slot of examples) {
      const ledger = this.ledgers.get(slot.example_id);
      if (ledger?.status === 'needs-revision') {
        return {
          stage: 'star-writing',
          capability: DRAFT_CAPABILITY,
          exampleId: slot.example_id,
          reason: ledger.reason ?? 'below-threshold',
        };
      }
    }
    const outstanding = this.outstandingRechecks(store);
    for (const slot of examples) {
      const recheck = outstanding.find((r) => r.exampleId === slot.example_id);
      if (recheck && !isFrozen(this.statusOf(slot.example_id))) {
        return { stage: 'scoring', capability: recheck.capability, exampleId: slot.example_id, reason: 'quality-recheck' };
      }
    }
    return null;
  }

  // ─── Transitions ───────────────────────────────────────────────────

  private onDraft(slot: ExampleSlot, changes: StatusChange[], seeded = false): void {
    const ledger = this.ledgers.get(slot.example_id);
    if (!ledger) {
      const created: Ledger = {
        slot,
        status: 'drafted',
        reason: null,
        revisionCount: 0,
        stagnantPasses: 0,
        scores: {},
        initialScores: null,
        seeded,
        covered: [],
        gaps: [...slot.required_competencies],
        lastPass: null,
        lastEvaluated: 0,
      };
      this.ledgers.set(slot.example_id, created);
      changes.push({ example_id: slot.example_id, from: null, to: 'drafted', reason: null });
      return;
    }
    ledger.revisionCount += 1;
    this.setStatus(ledger, 'revised', ledger.reason, changes);
  }

  /**
   * An evaluation point is reached once all three scores postdate the current
   * draft: immediately when any is below threshold, otherwise once the
   * competency check postdates it too.
   */
  private evaluate(slot: ExampleSlot, store: ContextReader, changes: StatusChange[]): void {
    const ledger = this.ledgers.get(slot.example_id);
    const draft = store.entry(DRAFT_KEY, slot.example_id);
    if (!ledger || !draft || isFrozen(ledger.status)) return;

    const scores: Partial<Record<ScoringCriterion, number>> = {};
    let newest = 0;
    for (const criterion of SCORING_CRITERIA) {
      const entry = store.entry(SCORE_KEYS[criterion], slot.example_id);
      if (!entry || entry.version < draft.version) return;
      const reading = ScoreReading.safeParse(entry.value);
      if (!reading.success) return;
      scores[criterion] = reading.data.score;
      newest = Math.max(newest, entry.version);
    }
    const complete = completeScores(scores);
    if (!complete) return;
    ledger.scores = complete;
    ledger.initialScores ??= complete;

    const { adequacy_threshold: threshold } = this.policy;
    const below = SCORING_CRITERIA.filter((c) => complete[c] < threshold);

    const competency = store.entry(COMPETENCY_KEYS[slot.area], slot.example_id);
    const competencyFresh = competency !== undefined && competency.version > draft.version;
    if (competency) {
      const reading = CompetencyReading.safeParse(competency.value);
      if (reading.success) {
        const confirmed = new Set(
          Object.entries(reading.data.competencies_covered)
            .filter(([, covered]) => covered)
            .map(([item]) => normalise(item)),
        );
        ledger.covered = slot.required_competencies.filter((item) => confirmed.has(normalise(item)));
        ledger.gaps = slot.required_competencies.filter((item) => !confirmed.has(normalise(item)));
      }
    }

    if (below.length === 0 && !competencyFresh) {
      if (ledger.status !== 'scored') this.setStatus(ledger, 'scored', null, changes);
      return;
    }

    if (competencyFresh && competency) newest = Math.max(newest, competency.version);
    if (newest <= ledger.lastEvaluated) return;
    ledger.lastEvaluated = newest;

    const pass: PassSummary = {
      scores: complete,
      coveredCount: competency ? ledger.covered.length : null,
      gapCount: competency ? ledger.gaps.length : null,
    };
    const previous = ledger.lastPass;
    ledger.lastPass = pass;

    if (below.length === 0 && competencyFresh && ledger.gaps.length === 0) {
      ledger.stagnantPasses = 0;
      this.setStatus(ledger, 'converged', null, changes);
      return;
    }

    ledger.stagnantPasses = previous && !madeProgress(previous, pass, threshold) ? ledger.stagnantPasses + 1 : 0;

    if (ledger.stagnantPasses >= this.policy.max_stagnant_passes) {
      this.setStatus(ledger, 'stalled', 'stagnation', changes);
    } else if (ledger.revisionCount >= this.policy.max_revisions_per_example) {
      this.setStatus(ledger, 'stalled', 'revision-budget', changes);
    } else {
      this.setStatus(ledger, 'needs-revision', below.length > 0 ? 'below-threshold' : 'competency-gap', changes);
    }
  }

  /**
   * A rejected quality report may flag examples. Content and competency
   * findings send the example back for a rewrite; a criterion finding asks for
   * that one score again. Stalled examples and exhausted budgets are skipped.
   */
  private applyQualityFindings(store: ContextReader, changes: StatusChange[]): void {
    const reading = QualityReading.safeParse(store.get(QUALITY_KEY));
    if (!reading.success || reading.data.approved) return;

    for (const finding of reading.data.flagged) {
      const ledger = this.ledgers.get(finding.example_id);
      if (!ledger || ledger.status === 'stalled' || ledger.status === 'needs-revision') continue;
      if (ledger.revisionCount >= this.policy.max_revisions_per_example) continue;

      if (finding.criterion === 'content' || finding.criterion === 'competency') {
        this.setStatus(ledger, 'needs-revision', 'quality-finding', changes);
        continue;
      }

      const capability = scoringCapabilityFor(finding.criterion);
      const alreadyQueued = this.rechecks.some(
        (r) => r.exampleId === finding.example_id && r.capability === capability,
      );
      if (alreadyQueued) continue;
      const current = store.entry(SCORE_KEYS[finding.criterion], finding.example_id);
      this.rechecks.push({ capability, exampleId: finding.example_id, afterVersion: current?.version ?? 0 });
      ledger.revisionCount += 1;
      this.setStatus(ledger, 'revised', 'quality-recheck', changes);
    }
  }

  private setStatus(
    ledger: Ledger,
    to: ExampleStatus,
    reason: StatusReason | null,
    changes: StatusChange[],
  ): void {
    const from = ledger.status;
    ledger.status = to;
    ledger.reason = reason;
    if (from !== to) changes.push({ example_id: ledger.slot.example_id, from, to, reason });
  }
}

// ─── Helpers ─────────────────────────────────────────────────────────

function completeScores(
  scores: Partial<Record<ScoringCriterion, number>>,
): Record<ScoringCriterion, number> | null {
  const { context, complexity, initiative } = scores;
  if (context === undefined || complexity === undefined || initiative === undefined) return null;
  return { context, complexity, initiative };
}

/**
 * Progress means a previously below-threshold score strictly improved, or
 * coverage grew while gaps remained.
 */
function madeProgress(previous: PassSummary, current: PassSummary, threshold: number): boolean {
  const scoreImproved = SCORING_CRITERIA.some(
    (c) => previous.scores[c] < threshold && current.scores[c] > previous.scores[c],
  );
  if (scoreImproved) return true;
  return (
    previous.gapCount !== null
    && previous.gapCount > 0
    && previous.coveredCount !== null
    && current.coveredCount !== null
    && current.coveredCount > previous.coveredCount
  );
}

function isRecheckSatisfied(recheck: Recheck, store: ContextReader): boolean {
  const criterion = SCORING_CRITERIA.find((c) => scoringCapabilityFor(c) === recheck.capability);
  if (!criterion) return true;
  const entry = store.entry(SCORE_KEYS[criterion], recheck.exampleId);
  return entry !== undefined && entry.version > recheck.afterVersion;
}

function toProgress(ledger: Ledger): ExampleProgress {
  return {
    example_id: ledger.slot.example_id,
    status: ledger.status,
    reason: ledger.reason,
    revision_count: ledger.revisionCount,
    stagnant_passes: ledger.stagnantPasses,
    scores: { ...ledger.scores },
    initial_scores: { ...ledger.initialScores },
    seeded: ledger.seeded,
    covered: [...ledger.covered],
    gaps: [...ledger.gaps],
  };
}
