/**
 * Orchestration error taxonomy.
 *
 * Every error carries a stable `code` (surfaced in Turn Records and reports)
 * and a `transient` flag read by the retry helper. Transient errors are retried
 * locally; everything else either fails the turn or the whole session.
 */

export type OrchestrationErrorCode =
  | 'OwnershipViolation'
  | 'DuplicateCapability'
  | 'InvalidDescriptor'
  | 'CapabilityNotFound'
  | 'TurnTimeout'
  | 'BackendTimeout'
  | 'BackendUnavailable'
  | 'MalformedResponse'
  | 'InvalidOutput'
  | 'StageBlocked'
  | 'SessionBusy'
  | 'SessionCancelled';

export class OrchestrationError extends Error {
  readonly code: OrchestrationErrorCode;
  readonly transient: boolean;
  readonly details: Record<string, unknown>;

  constructor(
    code: OrchestrationErrorCode,
    message: string,
    options?: { transient?: boolean; details?: Record<string, unknown>; cause?: unknown },
  ) {
    super(message, options?.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = code;
    this.code = code;
    this.transient = options?.transient ?? false;
    this.details = options?.details ?? {};
  }
}

// ─── Configuration errors (fatal before any session starts) ──────────

export class DuplicateCapability extends OrchestrationError {
  constructor(capability: string, existing: string, incoming: string) {
    super(
      'DuplicateCapability',
      `Capability "${capability}" is already claimed by "${existing}"; cannot register "${incoming}"`,
      { details: { capability, existing, incoming } },
    );
  }
}

export class InvalidDescriptor extends OrchestrationError {
  constructor(collaborator: string, reason: string) {
    super('InvalidDescriptor', `Collaborator "${collaborator}" is misconfigured: ${reason}`, {
      details: { collaborator },
    });
  }
}

export class CapabilityNotFound extends OrchestrationError {
  constructor(capability: string) {
    super('CapabilityNotFound', `No collaborator registered for capability "${capability}"`, {
      details: { capability },
    });
  }
}

// ─── Store errors ────────────────────────────────────────────────────

export class OwnershipViolation extends OrchestrationError {
  constructor(writer: string, key: string, owners: readonly string[]) {
    super(
      'OwnershipViolation',
      `"${writer}" may not write "${key}" (owners: ${owners.length > 0 ? owners.join(', ') : 'none'})`,
      { details: { writer, key, owners: [...owners] } },
    );
  }
}

// ─── Turn errors ─────────────────────────────────────────────────────

export class TurnTimeout extends OrchestrationError {
  constructor(collaborator: string, timeoutMs: number) {
    super('TurnTimeout', `Turn for "${collaborator}" exceeded ${timeoutMs}ms`, {
      transient: true,
      details: { collaborator, timeout_ms: timeoutMs },
    });
  }
}

export class BackendTimeout extends OrchestrationError {
  constructor(message = 'Generation backend timed out', cause?: unknown) {
    super('BackendTimeout', message, { transient: true, cause });
  }
}

/** Transient unless the provider rejected the request itself (bad key, bad request) */
export class BackendUnavailable extends OrchestrationError {
  constructor(message = 'Generation backend unavailable', cause?: unknown, transient = true) {
    super('BackendUnavailable', message, { transient, cause });
  }
}

export class MalformedResponse extends OrchestrationError {
  readonly raw: string;

  constructor(message: string, raw = '') {
    super('MalformedResponse', message, { details: { raw_snippet: raw.slice(0, 300) } });
    this.raw = raw;
  }
}

export class InvalidOutput extends OrchestrationError {
  constructor(collaborator: string, issues: string) {
    super('InvalidOutput', `Output from "${collaborator}" failed schema validation:\n${issues}`, {
      details: { collaborator, issues },
    });
  }
}

// ─── Session errors ──────────────────────────────────────────────────

export class StageBlocked extends OrchestrationError {
  readonly stage: string;
  readonly capability: string;
  readonly missingKeys: readonly string[];

  constructor(params: {
    stage: string;
    capability: string;
    missingKeys: readonly string[];
    attempts: number;
    exampleId?: string | null;
    lastError?: string;
  }) {
    const target = params.exampleId ? ` (example ${params.exampleId})` : '';
    super(
      'StageBlocked',
      `Stage "${params.stage}" is blocked: "${params.capability}"${target} did not produce `
        + `${params.missingKeys.join(', ') || 'satisfying output'} after ${params.attempts} attempts`,
      {
        details: {
          stage: params.stage,
          capability: params.capability,
          missing_keys: [...params.missingKeys],
          attempts: params.attempts,
          example_id: params.exampleId ?? null,
          last_error: params.lastError ?? null,
        },
      },
    );
    this.stage = params.stage;
    this.capability = params.capability;
    this.missingKeys = params.missingKeys;
  }
}

export class SessionBusy extends OrchestrationError {
  constructor(sessionId: string) {
    super('SessionBusy', `Session ${sessionId} already has a run in flight`, {
      details: { session_id: sessionId },
    });
  }
}

export class SessionCancelled extends OrchestrationError {
  constructor(sessionId: string) {
    super('SessionCancelled', `Session ${sessionId} was cancelled`, {
      details: { session_id: sessionId },
    });
  }
}

export function isOrchestrationError(err: unknown): err is OrchestrationError {
  return err instanceof OrchestrationError;
}

/** Normalise anything thrown into `{ code, message }` for Turn Records and reports. */
export function describeError(err: unknown): { code: string; message: string } {
  if (err instanceof OrchestrationError) return { code: err.code, message: err.message };
  if (err instanceof Error) return { code: err.name || 'Error', message: err.message };
  return { code: 'Error', message: String(err) };
}
