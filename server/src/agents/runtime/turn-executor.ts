/**
 * Turn Executor: runs exactly one collaborator turn.
 *
 *   1. Snapshot the store and build the collaborator's scoped view
 *   2. Call the generation backend under a per-turn timeout
 *   3. Retry transient failures once, re-prompt once on invalid output
 *   4. Commit declared outputs atomically and append a Turn Record
 *
 * A failed turn never touches the store. Every turn, successful or not,
 * leaves exactly one record in the history.
 */

import { z } from 'zod';
import type { OrchestrationConfig } from '../../lib/config.js';
import { createCombinedAbortSignal } from '../../lib/llm-provider.js';
import logger, { type Logger } from '../../lib/logger.js';
import { withRetry } from '../../lib/retry.js';
import { formatIssues, validateBody } from '../../lib/validate.js';
import type {
  CollaboratorDescriptor,
  ContextKey,
  ContextSnapshot,
  ExampleSlot,
  GenerationBackend,
  GenerationRequest,
  TurnRecord,
  TurnView,
  WorkflowStage,
} from './agent-protocol.js';
import type { ContextWrite, SharedContextStore } from './context-store.js';
import {
  InvalidOutput,
  MalformedResponse,
  OwnershipViolation,
  TurnTimeout,
  describeError,
} from './errors.js';

// ─── Constants ───────────────────────────────────────────────────────

/** One original call plus one retry for transient failures */
const TRANSIENT_ATTEMPTS = 2;
/** One original response plus one corrective re-prompt */
const VALIDATION_PASSES = 2;

// ─── Public API ──────────────────────────────────────────────────────

export interface TurnExecutorOptions {
  sessionId: string;
  store: SharedContextStore;
  backend: GenerationBackend;
  config: OrchestrationConfig;
  competencyFramework: TurnView['config']['competency_framework'];
  /** Milliseconds left in the session budget; caps the per-turn timeout */
  remainingMs: () => number;
  /** Aborted when the session is cancelled; stops further retries */
  signal?: AbortSignal;
  now?: () => number;
  log?: Logger;
}

export interface TurnRequest {
  stage: WorkflowStage;
  descriptor: CollaboratorDescriptor;
  /** Target example for example-scoped collaborators */
  example: ExampleSlot | null;
}

export class TurnExecutor {
  private readonly records: TurnRecord[] = [];
  private readonly now: () => number;
  private readonly log: Logger;

  constructor(private readonly options: TurnExecutorOptions) {
    this.now = options.now ?? Date.now;
    this.log = options.log ?? logger.child({ sessionId: options.sessionId });
  }

  /** Append-only history, oldest first */
  get history(): readonly TurnRecord[] {
    return this.records;
  }

  /**
   * Run one turn and return its record. Turn-level failures are recorded and
   * returned; only OwnershipViolation propagates (after being recorded).
   */
  async execute(request: TurnRequest): Promise<TurnRecord> {
    const { descriptor, example } = request;
    const name = descriptor.identity.name;
    const startedAt = new Date(this.now()).toISOString();
    const snapshot = this.options.store.snapshot();
    const view = this.buildView(descriptor, example);
    const log = this.log.child({
      collaborator: name,
      capability: descriptor.capability,
      exampleId: example?.example_id ?? null,
    });

    let attempts = 0;
    const countAttempt = () => {
      attempts += 1;
    };

    try {
      const { outputs, dropped } = await this.generateValidated(request, view, countAttempt, log);
      const writes: ContextWrite[] = descriptor.output_keys
        .filter((key) => outputs[key] !== undefined)
        .map((key) => ({
          key,
          value: outputs[key],
          exampleId: descriptor.scope === 'example' ? example?.example_id : null,
        }));
      this.options.store.commit(name, writes);

      const written: Record<ContextKey, unknown> = {};
      for (const write of writes) written[write.key] = write.value;
      const satisfied = descriptor.is_satisfied
        ? descriptor.is_satisfied(written)
        : descriptor.output_keys.every((key) => written[key] !== undefined);

      if (dropped.length > 0) {
        log.debug({ dropped }, 'Dropped undeclared output keys');
      }
      log.info({ attempts, satisfied, version: this.options.store.version }, 'Turn succeeded');

      return this.append({
        request,
        snapshot,
        startedAt,
        output: written,
        dropped,
        satisfied,
        error: null,
        attempts,
      });
    } catch (err) {
      const error = describeError(err);
      log.warn({ attempts, code: error.code, error: error.message }, 'Turn failed');
      const record = this.append({
        request,
        snapshot,
        startedAt,
        output: null,
        dropped: [],
        satisfied: false,
        error,
        attempts,
      });
      if (err instanceof OwnershipViolation) throw err;
      return record;
    }
  }

  // ─── View construction ─────────────────────────────────────────────

  /**
   * Only declared inputs reach the backend. In an example turn a scoped key
   * resolves to the target example's value; in a session turn it resolves to
   * a map of example id to value.
   */
  private buildView(descriptor: CollaboratorDescriptor, example: ExampleSlot | null): TurnView {
    const { store, config, competencyFramework } = this.options;
    const inputs: Record<ContextKey, unknown> = {};
    const missing: ContextKey[] = [];

    for (const key of descriptor.input_keys) {
      if (example && store.has(key, example.example_id)) {
        inputs[key] = store.get(key, example.example_id);
      } else if (store.has(key)) {
        inputs[key] = store.get(key);
      } else if (!example && store.scopedEntries(key).length > 0) {
        const byExample: Record<string, unknown> = {};
        for (const [exampleId, entry] of store.scopedEntries(key)) byExample[exampleId] = entry.value;
        inputs[key] = byExample;
      } else {
        missing.push(key);
      }
    }

    return {
      inputs,
      missing_inputs: missing,
      target_example: example,
      config: {
        adequacy_threshold: config.adequacy_threshold,
        rubric: descriptor.rubric ?? '',
        competency_framework: competencyFramework,
      },
    };
  }

  // ─── Backend calls ─────────────────────────────────────────────────

  private async generateValidated(
    request: TurnRequest,
    view: TurnView,
    countAttempt: () => void,
    log: Logger,
  ): Promise<{ outputs: Record<ContextKey, unknown>; dropped: string[] }> {
    const { descriptor } = request;
    const name = descriptor.identity.name;
    const outputSchema = z.toJSONSchema(descriptor.output_schema);
    let correction: string | undefined;

    for (let pass = 1; pass <= VALIDATION_PASSES; pass++) {
      let raw: unknown;
      try {
        raw = await this.generateWithRetry(request, view, outputSchema, correction, countAttempt, log);
      } catch (err) {
        if (!(err instanceof MalformedResponse)) throw err;
        if (pass === VALIDATION_PASSES) throw new InvalidOutput(name, err.message);
        correction = `The previous reply could not be parsed as JSON (${err.message}). Reply with a single JSON object.`;
        log.info({ pass }, 'Malformed response; re-prompting');
        continue;
      }

      const result = validateBody(descriptor.output_schema, raw);
      if (result.success) {
        const dropped = isRecord(raw)
          ? Object.keys(raw).filter((key) => !descriptor.output_keys.includes(key))
          : [];
        return { outputs: result.data, dropped };
      }

      const issues = formatIssues(result.issues);
      if (pass === VALIDATION_PASSES) throw new InvalidOutput(name, issues);
      correction = `The previous reply did not match the required schema:\n${issues}`;
      log.info({ pass, issues }, 'Schema mismatch; re-prompting');
    }

    throw new InvalidOutput(name, 'no valid response');
  }

  private async generateWithRetry(
    request: TurnRequest,
    view: TurnView,
    outputSchema: Record<string, unknown>,
    correction: string | undefined,
    countAttempt: () => void,
    log: Logger,
  ): Promise<unknown> {
    // No retry (or backoff) once the session is cancelled or out of time
    const { signal, cleanup } = createCombinedAbortSignal(
      this.options.signal,
      Math.max(1, this.options.remainingMs()),
    );
    try {
      return await withRetry(
        () => {
          countAttempt();
          return this.callWithTimeout(request, view, outputSchema, correction);
        },
        {
          maxAttempts: TRANSIENT_ATTEMPTS,
          baseDelay: this.options.config.retry_base_delay_ms,
          signal,
          onRetry: (attempt, err) => {
            log.warn({ attempt, error: err.message }, 'Transient backend failure; retrying');
          },
        },
      );
    } finally {
      cleanup();
    }
  }

  private async callWithTimeout(
    request: TurnRequest,
    view: TurnView,
    outputSchema: Record<string, unknown>,
    correction: string | undefined,
  ): Promise<unknown> {
    const { descriptor } = request;
    const timeoutMs = Math.max(1, Math.min(this.options.config.turn_timeout_ms, this.options.remainingMs()));
    const { signal, cleanup } = createCombinedAbortSignal(undefined, timeoutMs);

    // The race guarantees the turn ends even when a backend ignores its signal
    const timedOut = new Promise<never>((_, reject) => {
      signal.addEventListener('abort', () => reject(new TurnTimeout(descriptor.identity.name, timeoutMs)), {
        once: true,
      });
    });

    const generation: GenerationRequest = {
      session_id: this.options.sessionId,
      collaborator: descriptor.identity,
      capability: descriptor.capability,
      system_prompt: descriptor.system_prompt,
      model_tier: descriptor.model_tier,
      view,
      signal,
      ...(correction ? { correction } : {}),
    };

    try {
      return await Promise.race([this.options.backend.generate(generation, outputSchema), timedOut]);
    } finally {
      cleanup();
    }
  }

  // ─── Records ───────────────────────────────────────────────────────

  private append(params: {
    request: TurnRequest;
    snapshot: ContextSnapshot;
    startedAt: string;
    output: Record<ContextKey, unknown> | null;
    dropped: string[];
    satisfied: boolean;
    error: { code: string; message: string } | null;
    attempts: number;
  }): TurnRecord {
    const { request } = params;
    const record: TurnRecord = {
      seq: this.records.length + 1,
      session_id: this.options.sessionId,
      stage: request.stage,
      capability: request.descriptor.capability,
      collaborator: request.descriptor.identity.name,
      example_id: request.example?.example_id ?? null,
      input_snapshot: params.snapshot,
      output: params.output ? Object.freeze(structuredClone(params.output)) : null,
      dropped_keys: Object.freeze([...params.dropped]),
      status: params.error ? 'failed' : 'succeeded',
      satisfied: params.satisfied,
      error: params.error,
      attempts: params.attempts,
      started_at: params.startedAt,
      finished_at: new Date(this.now()).toISOString(),
    };
    this.records.push(Object.freeze(record));
    return record;
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
