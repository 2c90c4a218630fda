/**
 * Router: deterministic next-step selection.
 *
 * decide() is a pure function of the current stage, the store, the turn
 * history, outstanding re-checks and the revision advisor. Given the same
 * inputs it always returns the same decision, which is what makes a session
 * replayable from its Turn Records.
 */

import {
  DRAFT_CAPABILITY,
  DRAFT_KEY,
  QUALITY_CAPABILITY,
  nextStage,
  type Capability,
  type CollaboratorDescriptor,
  type ContextKey,
  type ExampleSlot,
  type TurnRecord,
  type WorkflowStage,
} from './agent-protocol.js';
import type { CollaboratorRegistry } from './agent-registry.js';
import type { ContextReader } from './context-store.js';
import { isFrozen, type BackwardTarget, type Recheck, type RevisionAdvisor } from './revision-manager.js';

// ─── Decisions ───────────────────────────────────────────────────────

export type RouterDecision =
  | { kind: 'turn'; stage: WorkflowStage; capability: Capability; exampleId: string | null }
  | { kind: 'advance'; from: WorkflowStage; to: WorkflowStage }
  | { kind: 'backtrack'; from: WorkflowStage; target: BackwardTarget }
  | {
      kind: 'blocked';
      stage: WorkflowStage;
      capability: Capability;
      exampleId: string | null;
      missingKeys: ContextKey[];
      attempts: number;
      lastError: string | null;
    }
  | { kind: 'terminal' };

export interface RouterInput {
  stage: WorkflowStage;
  store: ContextReader;
  history: readonly TurnRecord[];
  rechecks: readonly Recheck[];
  advisor: RevisionAdvisor;
  registry: CollaboratorRegistry;
  /** Planned examples in selection order (empty before example-selection) */
  examples: readonly ExampleSlot[];
  policy: { max_stage_attempts: number };
}

/** Stages that consult the revision advisor once their own work is done */
const REVISION_GATES: ReadonlySet<WorkflowStage> = new Set(['scoring', 'competency-check']);

interface WorkItem {
  descriptor: CollaboratorDescriptor;
  example: ExampleSlot | null;
}

// ─── Decision ────────────────────────────────────────────────────────

export function decide(input: RouterInput): RouterDecision {
  const { stage } = input;
  if (stage === 'finalized') return { kind: 'terminal' };

  // A rejected quality report goes back for revision before QA runs again
  if (stage === 'quality-assurance' && lastQualityRejected(input.history)) {
    const target = input.advisor.backwardTarget(input.examples, input.store);
    if (target) return { kind: 'backtrack', from: stage, target };
  }

  const pending = findPending(input);
  if (pending) {
    const blocked = checkAttempts(pending, input);
    if (blocked) return blocked;
    return {
      kind: 'turn',
      stage,
      capability: pending.descriptor.capability,
      exampleId: pending.example?.example_id ?? null,
    };
  }

  if (REVISION_GATES.has(stage)) {
    const target = input.advisor.backwardTarget(input.examples, input.store);
    if (target) return { kind: 'backtrack', from: stage, target };
  }

  return { kind: 'advance', from: stage, to: nextStage(stage) };
}

// ─── Pending work ────────────────────────────────────────────────────

function findPending(input: RouterInput): WorkItem | null {
  const descriptors = input.registry.forStage(input.stage);

  for (const descriptor of descriptors.filter((d) => d.scope === 'session')) {
    if (isSessionItemPending(descriptor, input)) return { descriptor, example: null };
  }

  const perExample = descriptors.filter((d) => d.scope === 'example');
  if (perExample.length === 0) return null;

  for (const example of input.examples) {
    const status = input.advisor.statusOf(example.example_id);
    if (isFrozen(status)) continue;
    for (const descriptor of perExample) {
      if (descriptor.applies_to && !descriptor.applies_to(example)) continue;
      if (isExampleItemPending(descriptor, example, input)) return { descriptor, example };
    }
  }
  return null;
}

function isSessionItemPending(descriptor: CollaboratorDescriptor, input: RouterInput): boolean {
  if (descriptor.output_keys.some((key) => !input.store.has(key))) return true;
  const last = lastRecordFor(input.history, descriptor.capability, null);
  return last !== undefined && !(last.status === 'succeeded' && last.satisfied);
}

/**
 * Drafting is pending for examples never drafted and for those the revision
 * manager sent back. Anything else is pending when absent, older than the
 * current draft, or named by an outstanding re-check.
 */
function isExampleItemPending(
  descriptor: CollaboratorDescriptor,
  example: ExampleSlot,
  input: RouterInput,
): boolean {
  const { store } = input;
  const id = example.example_id;
  const status = input.advisor.statusOf(id);

  if (descriptor.capability === DRAFT_CAPABILITY) {
    return !store.has(DRAFT_KEY, id) || status === 'needs-revision';
  }

  const draft = store.entry(DRAFT_KEY, id);
  if (!draft || status === 'needs-revision') return false;

  for (const key of descriptor.output_keys) {
    const entry = store.entry(key, id);
    if (!entry || entry.version < draft.version) return true;
  }

  return input.rechecks.some((r) => {
    if (r.exampleId !== id || r.capability !== descriptor.capability) return false;
    return descriptor.output_keys.some((key) => (store.entry(key, id)?.version ?? 0) <= r.afterVersion);
  });
}

// ─── Attempt accounting ──────────────────────────────────────────────

/**
 * Count the item's consecutive unsatisfying attempts. A successful turn by
 * any other item in between means the inputs moved on, so counting restarts.
 */
function checkAttempts(item: WorkItem, input: RouterInput): RouterDecision | null {
  const exampleId = item.example?.example_id ?? null;
  const capability = item.descriptor.capability;
  let attempts = 0;
  let lastError: string | null = null;

  for (let i = input.history.length - 1; i >= 0; i--) {
    const record = input.history[i];
    const sameItem = record.capability === capability && record.example_id === exampleId;
    if (!sameItem) {
      if (record.status === 'succeeded') break;
      continue;
    }
    if (record.status === 'succeeded' && record.satisfied) break;
    attempts += 1;
    if (lastError === null && record.error) lastError = `${record.error.code}: ${record.error.message}`;
  }

  if (attempts < input.policy.max_stage_attempts) return null;

  const missingKeys = item.descriptor.output_keys.filter((key) => !input.store.has(key, exampleId));
  return {
    kind: 'blocked',
    stage: input.stage,
    capability,
    exampleId,
    missingKeys,
    attempts,
    lastError,
  };
}

function lastRecordFor(
  history: readonly TurnRecord[],
  capability: Capability,
  exampleId: string | null,
): TurnRecord | undefined {
  for (let i = history.length - 1; i >= 0; i--) {
    const record = history[i];
    if (record.capability === capability && record.example_id === exampleId) return record;
  }
  return undefined;
}

function lastQualityRejected(history: readonly TurnRecord[]): boolean {
  const last = lastRecordFor(history, QUALITY_CAPABILITY, null);
  return last !== undefined && last.status === 'succeeded' && !last.satisfied;
}
