import { describe, expect, it } from 'vitest';
import { createDefaultRegistry } from '../agents/collaborators.js';
import type { Capability, ExampleSlot, TurnRecord, WorkflowStage } from '../agents/runtime/agent-protocol.js';
import { SharedContextStore } from '../agents/runtime/context-store.js';
import type {
  BackwardTarget,
  ExampleStatus,
  Recheck,
  RevisionAdvisor,
} from '../agents/runtime/revision-manager.js';
import { decide, type RouterDecision } from '../agents/runtime/router.js';

const registry = createDefaultRegistry();

const EXAMPLES: ExampleSlot[] = [
  { example_id: 'ex-1', key_accountability: 'Lead strategy', area: 'vision', required_competencies: ['Leads strategically'] },
  { example_id: 'ex-2', key_accountability: 'Deliver results', area: 'results', required_competencies: ['Inspires others'] },
];

function stubAdvisor(
  statuses: Record<string, ExampleStatus> = {},
  target: BackwardTarget | null = null,
): RevisionAdvisor {
  return {
    statusOf: (id) => statuses[id],
    backwardTarget: () => target,
  };
}

function record(
  seq: number,
  capability: Capability,
  overrides: Partial<Omit<TurnRecord, 'seq' | 'capability'>> = {},
): TurnRecord {
  return {
    seq,
    session_id: 's',
    stage: 'intake',
    capability,
    collaborator: capability,
    example_id: null,
    input_snapshot: { version: 0, taken_at: '', entries: {} },
    output: null,
    dropped_keys: [],
    status: 'failed',
    satisfied: false,
    error: { code: 'TurnTimeout', message: 'Turn exceeded 5ms' },
    attempts: 2,
    started_at: '',
    finished_at: '',
    ...overrides,
  };
}

function route(
  stage: WorkflowStage,
  store: SharedContextStore,
  options: {
    history?: TurnRecord[];
    advisor?: RevisionAdvisor;
    examples?: ExampleSlot[];
    rechecks?: Recheck[];
  } = {},
): RouterDecision {
  return decide({
    stage,
    store,
    history: options.history ?? [],
    rechecks: options.rechecks ?? [],
    advisor: options.advisor ?? stubAdvisor(),
    registry,
    examples: options.examples ?? EXAMPLES,
    policy: { max_stage_attempts: 3 },
  });
}

function seededStore() {
  const store = new SharedContextStore((key) => registry.ownersOf(key));
  store.commit('session', [
    { key: 'input.profile', value: { name: 'A' } },
    { key: 'input.position', value: { title: 'Inspector' } },
  ]);
  return store;
}

function draft(store: SharedContextStore, exampleId: string) {
  store.put('star-writer', 'star.example', { situation: exampleId }, exampleId);
}

function scoreAll(store: SharedContextStore, exampleId: string) {
  store.put('context-scorer', 'score.context', { score: 5 }, exampleId);
  store.put('complexity-scorer', 'score.complexity', { score: 5 }, exampleId);
  store.put('initiative-scorer', 'score.initiative', { score: 5 }, exampleId);
}

describe('decide', () => {
  it('is terminal once finalized', () => {
    expect(route('finalized', seededStore())).toEqual({ kind: 'terminal' });
  });

  it('runs a session collaborator whose output is missing, then advances', () => {
    const store = seededStore();
    expect(route('intake', store)).toEqual({ kind: 'turn', stage: 'intake', capability: 'orchestrator', exampleId: null });

    store.put('orchestrator', 'orchestrator.brief', { summary: 'x' });
    expect(route('intake', store)).toEqual({ kind: 'advance', from: 'intake', to: 'readiness' });
  });

  it('re-runs a session collaborator whose last output was unsatisfying', () => {
    const store = seededStore();
    store.put('quality-reviewer', 'quality.report', { approved: false });
    const history = [record(1, 'quality-assurance', { status: 'succeeded', satisfied: false, error: null })];

    expect(route('quality-assurance', store, { history })).toMatchObject({
      kind: 'turn',
      capability: 'quality-assurance',
    });
  });

  it('drafts examples in plan order, then advances', () => {
    const store = seededStore();
    expect(route('star-writing', store)).toMatchObject({ kind: 'turn', capability: 'star-writing', exampleId: 'ex-1' });

    draft(store, 'ex-1');
    expect(route('star-writing', store)).toMatchObject({ kind: 'turn', exampleId: 'ex-2' });

    draft(store, 'ex-2');
    expect(route('star-writing', store)).toEqual({ kind: 'advance', from: 'star-writing', to: 'scoring' });
  });

  it('rescores an example whose scores predate its current draft', () => {
    const store = seededStore();
    draft(store, 'ex-1');
    draft(store, 'ex-2');
    scoreAll(store, 'ex-1');
    scoreAll(store, 'ex-2');
    expect(route('scoring', store)).toEqual({ kind: 'advance', from: 'scoring', to: 'competency-check' });

    draft(store, 'ex-1');
    expect(route('scoring', store)).toEqual({
      kind: 'turn',
      stage: 'scoring',
      capability: 'scoring-context',
      exampleId: 'ex-1',
    });
  });

  it('routes each example to the competency check for its own area', () => {
    const store = seededStore();
    draft(store, 'ex-2');

    expect(route('competency-check', store, { examples: [EXAMPLES[1]] })).toMatchObject({
      kind: 'turn',
      capability: 'competency-results',
      exampleId: 'ex-2',
    });
  });

  it('skips frozen examples and those waiting for a rewrite', () => {
    const store = seededStore();
    draft(store, 'ex-1');
    draft(store, 'ex-2');
    const advisor = stubAdvisor({ 'ex-1': 'stalled', 'ex-2': 'needs-revision' });

    expect(route('scoring', store, { advisor })).toEqual({ kind: 'advance', from: 'scoring', to: 'competency-check' });
  });

  it('asks for a narrow re-check of one score', () => {
    const store = seededStore();
    draft(store, 'ex-1');
    scoreAll(store, 'ex-1');
    const version = store.entry('score.complexity', 'ex-1')?.version ?? 0;
    const rechecks: Recheck[] = [{ capability: 'scoring-complexity', exampleId: 'ex-1', afterVersion: version }];

    expect(route('scoring', store, { rechecks, examples: [EXAMPLES[0]] })).toMatchObject({
      kind: 'turn',
      capability: 'scoring-complexity',
      exampleId: 'ex-1',
    });
  });

  it('backtracks from a revision gate when the advisor names a target', () => {
    const store = seededStore();
    const target: BackwardTarget = {
      stage: 'star-writing',
      capability: 'star-writing',
      exampleId: 'ex-2',
      reason: 'below-threshold',
    };

    const advisor = stubAdvisor({ 'ex-1': 'stalled', 'ex-2': 'needs-revision' }, target);

    expect(route('competency-check', store, { advisor })).toEqual({
      kind: 'backtrack',
      from: 'competency-check',
      target,
    });
  });

  it('backtracks before re-running a rejected quality review', () => {
    const store = seededStore();
    store.put('quality-reviewer', 'quality.report', { approved: false });
    const history = [record(1, 'quality-assurance', { status: 'succeeded', satisfied: false, error: null })];
    const target: BackwardTarget = { stage: 'scoring', capability: 'scoring-context', exampleId: 'ex-1', reason: 'quality-recheck' };

    expect(route('quality-assurance', store, { history, advisor: stubAdvisor({}, target) })).toEqual({
      kind: 'backtrack',
      from: 'quality-assurance',
      target,
    });
  });

  it('blocks after the configured number of consecutive failed attempts', () => {
    const store = seededStore();
    const history = [
      record(1, 'readiness', { status: 'succeeded', satisfied: true, error: null }),
      record(2, 'position-analysis'),
      record(3, 'position-analysis'),
      record(4, 'position-analysis'),
    ];

    expect(route('position-analysis', store, { history })).toEqual({
      kind: 'blocked',
      stage: 'position-analysis',
      capability: 'position-analysis',
      exampleId: null,
      missingKeys: ['position.analysis'],
      attempts: 3,
      lastError: 'TurnTimeout: Turn exceeded 5ms',
    });
  });

  it('restarts the attempt count after another item succeeds', () => {
    const store = seededStore();
    const history = [
      record(1, 'position-analysis'),
      record(2, 'position-analysis'),
      record(3, 'readiness', { status: 'succeeded', satisfied: true, error: null }),
      record(4, 'position-analysis'),
    ];

    expect(route('position-analysis', store, { history })).toMatchObject({ kind: 'turn', capability: 'position-analysis' });
  });

  it('returns the same decision for the same inputs', () => {
    const store = seededStore();
    draft(store, 'ex-1');
    const first = route('star-writing', store);
    const second = route('star-writing', store);
    expect(second).toEqual(first);
  });
});
