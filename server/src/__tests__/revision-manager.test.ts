import { describe, expect, it } from 'vitest';
import { createDefaultRegistry } from '../agents/collaborators.js';
import { DEFAULT_CONFIG } from '../lib/config.js';
import type {
  Capability,
  ExampleSlot,
  ScoringCriterion,
  TurnRecord,
} from '../agents/runtime/agent-protocol.js';
import { SharedContextStore } from '../agents/runtime/context-store.js';
import { RevisionCycleManager, type RevisionPolicy, type StatusChange } from '../agents/runtime/revision-manager.js';

const EXAMPLE: ExampleSlot = {
  example_id: 'ex-1',
  key_accountability: 'Lead district strategy',
  area: 'vision',
  required_competencies: ['Leads strategically', 'Makes insightful decisions'],
};

function turn(capability: Capability, exampleId: string | null): TurnRecord {
  return {
    seq: 0,
    session_id: 's',
    stage: 'scoring',
    capability,
    collaborator: capability,
    example_id: exampleId,
    input_snapshot: { version: 0, taken_at: '', entries: {} },
    output: {},
    dropped_keys: [],
    status: 'succeeded',
    satisfied: true,
    error: null,
    attempts: 1,
    started_at: '',
    finished_at: '',
  };
}

function harness(policy: Partial<RevisionPolicy> = {}, slot: ExampleSlot = EXAMPLE) {
  const registry = createDefaultRegistry();
  const store = new SharedContextStore((key) => registry.ownersOf(key));
  const manager = new RevisionCycleManager({ ...DEFAULT_CONFIG, ...policy });
  const id = slot.example_id;

  const observe = (capability: Capability, exampleId: string | null = id) =>
    manager.observe(turn(capability, exampleId), store, [slot]);

  const rescore = (criterion: ScoringCriterion, score: number): StatusChange[] => {
    store.put(`${criterion}-scorer`, `score.${criterion}`, { score }, id);
    return observe(`scoring-${criterion}`);
  };

  return {
    store,
    manager,
    rescore,
    draft(): StatusChange[] {
      store.put('star-writer', 'star.example', { situation: 'draft' }, id);
      return observe('star-writing');
    },
    score(context: number, complexity: number, initiative: number): StatusChange[] {
      return [
        ...rescore('context', context),
        ...rescore('complexity', complexity),
        ...rescore('initiative', initiative),
      ];
    },
    check(covered: Record<string, boolean>): StatusChange[] {
      store.put('vision-competency', 'competency.vision', { area: 'vision', competencies_covered: covered }, id);
      return observe('competency-vision');
    },
    review(flagged: Array<{ example_id: string; criterion: string }>): StatusChange[] {
      store.put('quality-reviewer', 'quality.report', { approved: false, flagged });
      return observe('quality-assurance', null);
    },
  };
}

const ALL_COVERED = { 'Leads strategically': true, 'Makes insightful decisions': true };

describe('RevisionCycleManager', () => {
  it('tracks a first draft', () => {
    const h = harness();
    expect(h.draft()).toEqual([{ example_id: 'ex-1', from: null, to: 'drafted', reason: null }]);
    expect(h.manager.progress('ex-1')?.gaps).toEqual(['Leads strategically', 'Makes insightful decisions']);
  });

  it('waits for all three scores, then marks an adequate example scored', () => {
    const h = harness();
    h.draft();
    h.rescore('context', 5);
    expect(h.manager.statusOf('ex-1')).toBe('drafted');

    h.rescore('complexity', 5);
    expect(h.rescore('initiative', 6)).toEqual([{ example_id: 'ex-1', from: 'drafted', to: 'scored', reason: null }]);
    expect(h.manager.progress('ex-1')?.scores).toEqual({ context: 5, complexity: 5, initiative: 6 });
  });

  it('sends a below-threshold example back to star-writing', () => {
    const h = harness();
    h.draft();
    const changes = h.score(3, 5, 6);

    expect(changes).toEqual([{ example_id: 'ex-1', from: 'drafted', to: 'needs-revision', reason: 'below-threshold' }]);
    expect(h.manager.backwardTarget([EXAMPLE], h.store)).toEqual({
      stage: 'star-writing',
      capability: 'star-writing',
      exampleId: 'ex-1',
      reason: 'below-threshold',
    });
  });

  it('converges once scores pass and every competency is confirmed, and freezes at the checkpoint', () => {
    const h = harness();
    h.draft();
    h.score(3, 5, 6);
    expect(h.draft()).toEqual([{ example_id: 'ex-1', from: 'needs-revision', to: 'revised', reason: 'below-threshold' }]);
    h.score(4, 5, 6);
    expect(h.manager.statusOf('ex-1')).toBe('scored');

    expect(h.check(ALL_COVERED)).toEqual([{ example_id: 'ex-1', from: 'scored', to: 'converged', reason: null }]);
    expect(h.manager.backwardTarget([EXAMPLE], h.store)).toBeNull();

    expect(h.manager.freeze()).toEqual([{ example_id: 'ex-1', from: 'converged', to: 'finalized', reason: null }]);
    expect(h.manager.progress('ex-1')).toMatchObject({
      status: 'finalized',
      revision_count: 1,
      scores: { context: 4, complexity: 5, initiative: 6 },
      covered: ['Leads strategically', 'Makes insightful decisions'],
      gaps: [],
    });
  });

  it('matches competency items regardless of case and surrounding space', () => {
    const h = harness();
    h.draft();
    h.score(5, 5, 5);
    const changes = h.check({ ' leads strategically ': true, 'Makes insightful decisions': false });

    expect(changes).toEqual([{ example_id: 'ex-1', from: 'scored', to: 'needs-revision', reason: 'competency-gap' }]);
    expect(h.manager.progress('ex-1')).toMatchObject({
      covered: ['Leads strategically'],
      gaps: ['Makes insightful decisions'],
    });
  });

  it('stalls an example whose scores never improve', () => {
    const h = harness({ max_stagnant_passes: 3 });
    h.draft();
    h.score(3, 5, 6);
    for (let i = 0; i < 2; i++) {
      h.draft();
      h.score(3, 5, 6);
      expect(h.manager.statusOf('ex-1')).toBe('needs-revision');
    }
    h.draft();
    const changes = h.score(3, 5, 6);

    expect(changes).toEqual([{ example_id: 'ex-1', from: 'revised', to: 'stalled', reason: 'stagnation' }]);
    expect(h.manager.progress('ex-1')).toMatchObject({ revision_count: 3, stagnant_passes: 3 });
    expect(h.manager.backwardTarget([EXAMPLE], h.store)).toBeNull();
  });

  it('resets the stagnation count when a low score improves', () => {
    const h = harness({ max_stagnant_passes: 2 });
    h.draft();
    h.score(2, 5, 6);
    h.draft();
    h.score(2, 5, 6);
    expect(h.manager.progress('ex-1')?.stagnant_passes).toBe(1);

    h.draft();
    h.score(3, 5, 6);
    expect(h.manager.progress('ex-1')).toMatchObject({ status: 'needs-revision', stagnant_passes: 0 });
  });

  it('resets the stagnation count when competency coverage grows', () => {
    const wide: ExampleSlot = {
      ...EXAMPLE,
      required_competencies: ['Leads strategically', 'Makes insightful decisions', 'Plans ahead', 'Builds consensus'],
    };
    const h = harness({ max_stagnant_passes: 3, max_revisions_per_example: 5 }, wide);
    const twoOfFour = { 'Leads strategically': true, 'Makes insightful decisions': true };
    h.draft();
    h.score(5, 5, 5);
    h.check(twoOfFour);
    h.draft();
    h.score(5, 5, 5);
    h.check(twoOfFour);
    expect(h.manager.progress('ex-1')?.stagnant_passes).toBe(1);

    h.draft();
    h.score(5, 5, 5);
    h.check({ ...twoOfFour, 'Plans ahead': true });
    expect(h.manager.progress('ex-1')).toMatchObject({
      status: 'needs-revision',
      reason: 'competency-gap',
      stagnant_passes: 0,
      gaps: ['Builds consensus'],
    });
  });

  it('scores a seeded applicant draft and keeps its scores as the initial ones', () => {
    const h = harness();
    h.store.put('session', 'star.example', { source: 'applicant', text: 'I fixed the rota.', word_count: 4 }, 'ex-1');

    expect(h.manager.seedDraft(EXAMPLE)).toEqual([{ example_id: 'ex-1', from: null, to: 'drafted', reason: null }]);
    expect(h.manager.seedDraft(EXAMPLE)).toEqual([]);

    h.score(2, 5, 6);
    expect(h.manager.statusOf('ex-1')).toBe('needs-revision');
    h.draft();
    h.score(5, 5, 6);
    expect(h.manager.progress('ex-1')).toMatchObject({
      seeded: true,
      revision_count: 1,
      initial_scores: { context: 2, complexity: 5, initiative: 6 },
      scores: { context: 5, complexity: 5, initiative: 6 },
    });
  });

  it('stalls an example that runs out of revision budget', () => {
    const h = harness({ max_revisions_per_example: 1 });
    h.draft();
    h.score(2, 5, 6);
    h.draft();
    const changes = h.score(3, 5, 6);

    expect(changes).toEqual([{ example_id: 'ex-1', from: 'revised', to: 'stalled', reason: 'revision-budget' }]);
  });

  it('reopens an example flagged for content by a rejected quality review', () => {
    const h = harness();
    h.draft();
    h.score(5, 5, 5);
    h.check(ALL_COVERED);
    h.manager.freeze();

    const changes = h.review([{ example_id: 'ex-1', criterion: 'content' }]);

    expect(changes).toEqual([{ example_id: 'ex-1', from: 'finalized', to: 'needs-revision', reason: 'quality-finding' }]);
    expect(h.manager.backwardTarget([EXAMPLE], h.store)?.stage).toBe('star-writing');
  });

  it('turns a criterion finding into a narrow re-check of that score', () => {
    const h = harness();
    h.draft();
    h.score(5, 5, 5);
    h.check(ALL_COVERED);
    const before = h.store.entry('score.complexity', 'ex-1')?.version ?? 0;

    h.review([{ example_id: 'ex-1', criterion: 'complexity' }]);

    expect(h.manager.outstandingRechecks(h.store)).toEqual([
      { capability: 'scoring-complexity', exampleId: 'ex-1', afterVersion: before },
    ]);
    expect(h.manager.backwardTarget([EXAMPLE], h.store)).toEqual({
      stage: 'scoring',
      capability: 'scoring-complexity',
      exampleId: 'ex-1',
      reason: 'quality-recheck',
    });
    expect(h.manager.progress('ex-1')).toMatchObject({ status: 'revised', revision_count: 1 });

    expect(h.rescore('complexity', 6)).toEqual([{ example_id: 'ex-1', from: 'revised', to: 'converged', reason: null }]);
    expect(h.manager.outstandingRechecks(h.store)).toEqual([]);
  });

  it('ignores quality findings for stalled examples', () => {
    const h = harness({ max_revisions_per_example: 1 });
    h.draft();
    h.score(2, 5, 6);
    h.draft();
    h.score(3, 5, 6);

    expect(h.review([{ example_id: 'ex-1', criterion: 'content' }])).toEqual([]);
    expect(h.manager.statusOf('ex-1')).toBe('stalled');
  });

  it('ignores failed turns', () => {
    const h = harness();
    const failed: TurnRecord = { ...turn('star-writing', 'ex-1'), status: 'failed', satisfied: false };
    expect(h.manager.observe(failed, h.store, [EXAMPLE])).toEqual([]);
    expect(h.manager.statusOf('ex-1')).toBeUndefined();
  });
});
