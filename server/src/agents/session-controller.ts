/**
 * Session Controller
 *
 * Owns one session end to end: seeds the store from the intake payloads,
 * then loops Router → Turn Executor → Revision Cycle Manager until the
 * Router reports a terminal stage, a stage blocks, a budget runs out or the
 * caller cancels. Every exit path produces a report.
 *
 * Makes no LLM calls of its own.
 */

import { randomUUID } from 'node:crypto';
import { loadConfig, resolveConfig, type OrchestrationConfig } from '../lib/config.js';
import {
  startUsageTracking,
  stopUsageTracking,
  withUsageContext,
  type UsageAccumulator,
} from '../lib/llm-provider.js';
import { createSessionLogger, type Logger } from '../lib/logger.js';
import { withSessionLock } from '../lib/session-lock.js';
import { formatIssues, validateBody } from '../lib/validate.js';
import { createDefaultRegistry, planExamples } from './collaborators.js';
import { frameworkFor, type CompetencyFramework } from './knowledge/lc4q.js';
import { buildReport } from './report.js';
import {
  APPLICANT_EXPERIENCE_REF,
  DRAFT_KEY,
  FEEDBACK_KEY,
  POSITION_KEY,
  PROFILE_KEY,
  SESSION_OWNER,
  type ExampleSlot,
  type GenerationBackend,
} from './runtime/agent-protocol.js';
import type { CollaboratorRegistry } from './runtime/agent-registry.js';
import { SharedContextStore, type ContextWrite } from './runtime/context-store.js';
import {
  OrchestrationError,
  SessionCancelled,
  StageBlocked,
  describeError,
} from './runtime/errors.js';
import { RevisionCycleManager, type StatusChange } from './runtime/revision-manager.js';
import { decide } from './runtime/router.js';
import { TurnExecutor } from './runtime/turn-executor.js';
import {
  SessionInputSchema,
  type ParsedSessionInput,
  type SessionEmitter,
  type SessionInput,
  type SessionReport,
  type SessionState,
} from './types.js';

// ─── Public API ──────────────────────────────────────────────────────

export interface SessionControllerOptions {
  backend: GenerationBackend;
  /** Defaults to the thirteen built-in collaborators */
  registry?: CollaboratorRegistry;
  /** Base configuration; per-session overrides from the input are applied on top */
  config?: OrchestrationConfig;
  emit?: SessionEmitter;
  /** Clock used for budgets and timestamps */
  now?: () => number;
}

interface RunContext {
  sessionId: string;
  input: ParsedSessionInput;
  config: OrchestrationConfig;
  usage: UsageAccumulator;
  log: Logger;
}

type Outcome = Pick<SessionReport, 'status' | 'failure'>;

interface LoopDeps {
  store: SharedContextStore;
  revisions: RevisionCycleManager;
  executor: TurnExecutor;
  framework: CompetencyFramework;
  config: OrchestrationConfig;
  log: Logger;
  elapsed: () => number;
  /** The applicant's own example, seeded as a first draft once examples are planned */
  applicantText: string | null;
}

export class SessionController {
  private readonly registry: CollaboratorRegistry;
  private readonly baseConfig: OrchestrationConfig;
  private readonly now: () => number;
  private state: SessionState | null = null;
  private cancelRequested = false;
  private cancellation = new AbortController();

  constructor(private readonly options: SessionControllerOptions) {
    this.registry = options.registry ?? createDefaultRegistry();
    this.baseConfig = options.config ?? loadConfig();
    this.now = options.now ?? Date.now;
  }

  /**
   * Run a session to a terminal status. Rejects only for invalid input or a
   * concurrent run on the same session id (SessionBusy); every other failure
   * is reported in the returned SessionReport.
   */
  async start(rawInput: SessionInput): Promise<SessionReport> {
    const validation = validateBody(SessionInputSchema, rawInput);
    if (!validation.success) {
      throw new Error(`Invalid session input:\n${formatIssues(validation.issues)}`);
    }
    const input = validation.data;
    const sessionId = input.session_id ?? randomUUID();

    return withSessionLock(sessionId, async () => {
      const usage = startUsageTracking(sessionId);
      try {
        return await withUsageContext(sessionId, () =>
          this.run({
            sessionId,
            input,
            config: resolveConfig(this.baseConfig, input.config),
            usage,
            log: createSessionLogger(sessionId),
          }),
        );
      } finally {
        stopUsageTracking(sessionId);
      }
    });
  }

  /** Cooperative: takes effect before the next turn, never interrupts one in flight. */
  cancel(): void {
    this.cancelRequested = true;
    // Stops retries of the turn in flight; the turn itself still runs to its end
    this.cancellation.abort();
    if (this.state) this.state.cancel_requested = true;
  }

  status(): SessionState | null {
    return this.state ? { ...this.state } : null;
  }

  // ─── Main loop ─────────────────────────────────────────────────────

  private async run(ctx: RunContext): Promise<SessionReport> {
    const { sessionId, config, log } = ctx;
    const startedAt = this.now();
    const elapsed = () => this.now() - startedAt;
    this.cancelRequested = false;
    this.cancellation = new AbortController();

    this.state = {
      session_id: sessionId,
      status: 'running',
      stage: 'intake',
      turns_used: 0,
      started_at: new Date(startedAt).toISOString(),
      cancel_requested: this.cancelRequested,
    };
    const state = this.state;

    const framework: CompetencyFramework = frameworkFor(ctx.input.position.lc4q_competencies);
    const store = new SharedContextStore((key) => this.registry.ownersOf(key));
    const intake: ContextWrite[] = [
      { key: PROFILE_KEY, value: ctx.input.profile },
      { key: POSITION_KEY, value: ctx.input.position },
    ];
    if (ctx.input.user_feedback) intake.push({ key: FEEDBACK_KEY, value: ctx.input.user_feedback });
    store.commit(SESSION_OWNER, intake);
    const applicantText = ctx.input.profile.job_example || null;

    const revisions = new RevisionCycleManager(config);
    const executor = new TurnExecutor({
      sessionId,
      store,
      backend: this.options.backend,
      config,
      competencyFramework: framework,
      remainingMs: () => config.session_timeout_ms - elapsed(),
      signal: this.cancellation.signal,
      now: this.now,
      log,
    });

    log.info({ collaborators: this.registry.size, config }, 'Session started');

    let outcome: Outcome;
    try {
      outcome = await this.drive(state, {
        store, revisions, executor, framework, config, log, elapsed, applicantText,
      });
    } catch (err) {
      // OwnershipViolation, CapabilityNotFound and anything unexpected end the session
      log.error({ err }, 'Session aborted');
      outcome = { status: 'failed', failure: failureOf(err) };
    }

    state.status = outcome.status;
    const stage = state.stage;
    const report = buildReport({
      sessionId,
      status: outcome.status,
      stage,
      turnsUsed: executor.history.length,
      elapsedMs: elapsed(),
      failure: outcome.failure,
      examples: planExamples(store, framework),
      store,
      revisions,
      usage: ctx.usage,
      applicantText,
    });

    log.info(
      {
        status: report.status,
        stage,
        turns: report.turns_used,
        elapsedMs: report.elapsed_ms,
        unresolved: report.unresolved_gaps.length,
      },
      'Session finished',
    );
    this.options.emit?.({ type: 'session_complete', session_id: sessionId, status: report.status });
    return report;
  }

  private async drive(state: SessionState, deps: LoopDeps): Promise<Outcome> {
    const { store, revisions, executor, framework, config, log } = deps;
    const sessionId = state.session_id;
    let applicantSeeded = deps.applicantText === null;

    for (;;) {
      const exhausted = this.checkBudgets(sessionId, executor.history.length, deps.elapsed(), config);
      if (exhausted) return exhausted;

      const stage = state.stage;
      const examples = planExamples(store, framework);
      if (!applicantSeeded && deps.applicantText !== null && examples.length > 0) {
        applicantSeeded = true;
        this.seedApplicantDraft(sessionId, deps, examples, deps.applicantText);
      }
      const decision = decide({
        stage,
        store,
        history: executor.history,
        rechecks: revisions.outstandingRechecks(store),
        advisor: revisions,
        registry: this.registry,
        examples,
        policy: config,
      });

      switch (decision.kind) {
        case 'terminal':
          return { status: 'completed', failure: null };

        case 'advance':
          if (stage === 'revision') this.emitStatusChanges(sessionId, revisions.freeze());
          log.info({ from: decision.from, to: decision.to }, 'Stage advanced');
          this.options.emit?.({ type: 'stage_transition', session_id: sessionId, from: decision.from, to: decision.to });
          state.stage = decision.to;
          break;

        case 'backtrack': {
          const { target } = decision;
          log.info(
            { from: decision.from, to: target.stage, exampleId: target.exampleId, reason: target.reason },
            'Backtracking',
          );
          this.options.emit?.({
            type: 'backtrack',
            session_id: sessionId,
            from: decision.from,
            to: target.stage,
            example_id: target.exampleId,
            reason: target.reason,
          });
          state.stage = target.stage;
          break;
        }

        case 'blocked': {
          const blocked = new StageBlocked({
            stage: decision.stage,
            capability: decision.capability,
            missingKeys: decision.missingKeys,
            attempts: decision.attempts,
            exampleId: decision.exampleId,
            lastError: decision.lastError ?? undefined,
          });
          log.error({ details: blocked.details }, blocked.message);
          return { status: 'failed', failure: failureOf(blocked) };
        }

        case 'turn': {
          const descriptor = this.registry.resolve(decision.capability);
          const example = examples.find((e) => e.example_id === decision.exampleId) ?? null;
          const record = await executor.execute({ stage, descriptor, example });
          state.turns_used = executor.history.length;
          this.options.emit?.({
            type: 'turn_complete',
            session_id: sessionId,
            seq: record.seq,
            stage: record.stage,
            capability: record.capability,
            example_id: record.example_id,
            status: record.status,
            satisfied: record.satisfied,
          });
          this.emitStatusChanges(sessionId, revisions.observe(record, store, planExamples(store, framework)));
          break;
        }
      }
    }
  }

  /**
   * Write the applicant's example as the first draft of the slot planned for
   * it (else the first slot), so it is scored before any rewrite.
   */
  private seedApplicantDraft(
    sessionId: string,
    deps: LoopDeps,
    examples: readonly ExampleSlot[],
    text: string,
  ): void {
    const slot = examples.find((e) => e.experience_ref === APPLICANT_EXPERIENCE_REF) ?? examples[0];
    if (!slot || deps.store.entry(DRAFT_KEY, slot.example_id)) return;
    deps.store.put(
      SESSION_OWNER,
      DRAFT_KEY,
      { source: 'applicant', text, word_count: text.split(/\s+/).length },
      slot.example_id,
    );
    deps.log.info({ exampleId: slot.example_id }, 'Seeded applicant example as first draft');
    this.emitStatusChanges(sessionId, deps.revisions.seedDraft(slot));
  }

  private checkBudgets(
    sessionId: string,
    turnsUsed: number,
    elapsedMs: number,
    config: OrchestrationConfig,
  ): Outcome | null {
    if (this.cancelRequested) {
      return { status: 'failed', failure: failureOf(new SessionCancelled(sessionId)) };
    }
    if (turnsUsed >= config.max_turns) {
      return {
        status: 'timed_out',
        failure: { code: 'TurnBudgetExhausted', message: `Used all ${config.max_turns} turns` },
      };
    }
    if (elapsedMs >= config.session_timeout_ms) {
      return {
        status: 'timed_out',
        failure: { code: 'SessionTimeout', message: `Session exceeded ${config.session_timeout_ms}ms` },
      };
    }
    return null;
  }

  private emitStatusChanges(sessionId: string, changes: StatusChange[]): void {
    for (const change of changes) {
      this.options.emit?.({
        type: 'example_status',
        session_id: sessionId,
        example_id: change.example_id,
        from: change.from,
        to: change.to,
        reason: change.reason,
      });
    }
  }
}

function failureOf(err: unknown): NonNullable<SessionReport['failure']> {
  const { code, message } = describeError(err);
  return err instanceof OrchestrationError ? { code, message, details: err.details } : { code, message };
}
