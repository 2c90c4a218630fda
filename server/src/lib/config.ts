import { z } from 'zod';

/**
 * Orchestration budgets and thresholds. Every value is supplied from the
 * environment (or per session); nothing in the engine hardcodes them.
 */
export interface OrchestrationConfig {
  /** Minimum acceptable score on each 1–7 criterion */
  adequacy_threshold: number;
  /** Maximum collaborator turns per session */
  max_turns: number;
  /** Consecutive non-improving revision passes before an example stalls */
  max_stagnant_passes: number;
  /** Revision passes allowed per example before it stalls */
  max_revisions_per_example: number;
  /** Consecutive unsatisfied attempts on one work item before StageBlocked */
  max_stage_attempts: number;
  /** Per-turn backend timeout (ms) */
  turn_timeout_ms: number;
  /** Wall-clock budget for the whole session (ms) */
  session_timeout_ms: number;
  /** Base backoff between transient retries (ms) */
  retry_base_delay_ms: number;
}

const intFromEnv = (fallback: number, min: number) =>
  z.coerce.number().int().min(min).optional().default(fallback);

const EnvConfigSchema = z.object({
  ADEQUACY_THRESHOLD: z.coerce.number().int().min(1).max(7).optional().default(4),
  MAX_TURNS: intFromEnv(100, 1),
  MAX_STAGNANT_PASSES: intFromEnv(3, 1),
  MAX_REVISIONS_PER_EXAMPLE: intFromEnv(6, 1),
  MAX_STAGE_ATTEMPTS: intFromEnv(3, 1),
  TURN_TIMEOUT_MS: intFromEnv(120_000, 1),
  SESSION_TIMEOUT_MS: intFromEnv(3_600_000, 1),
  RETRY_BASE_DELAY_MS: intFromEnv(1_000, 0),
});

export const DEFAULT_CONFIG: Readonly<OrchestrationConfig> = Object.freeze({
  adequacy_threshold: 4,
  max_turns: 100,
  max_stagnant_passes: 3,
  max_revisions_per_example: 6,
  max_stage_attempts: 3,
  turn_timeout_ms: 120_000,
  session_timeout_ms: 3_600_000,
  retry_base_delay_ms: 1_000,
});

const CONFIG_KEYS = [
  'adequacy_threshold',
  'max_turns',
  'max_stagnant_passes',
  'max_revisions_per_example',
  'max_stage_attempts',
  'turn_timeout_ms',
  'session_timeout_ms',
  'retry_base_delay_ms',
] as const satisfies ReadonlyArray<keyof OrchestrationConfig>;

/** Per-session overrides accepted over HTTP and by the controller. */
export const ConfigOverridesSchema = z.object({
  adequacy_threshold: z.number().int().min(1).max(7).optional(),
  max_turns: z.number().int().min(1).optional(),
  max_stagnant_passes: z.number().int().min(1).optional(),
  max_revisions_per_example: z.number().int().min(1).optional(),
  max_stage_attempts: z.number().int().min(1).optional(),
  turn_timeout_ms: z.number().int().min(1).optional(),
  session_timeout_ms: z.number().int().min(1).optional(),
  retry_base_delay_ms: z.number().int().min(0).optional(),
});

export type ConfigOverrides = z.infer<typeof ConfigOverridesSchema>;

/**
 * Read orchestration config from environment variables.
 * Empty strings count as unset so `.env` placeholders fall back to defaults.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): OrchestrationConfig {
  const raw: Record<string, string> = {};
  for (const key of Object.keys(EnvConfigSchema.shape)) {
    const value = env[key];
    if (value !== undefined && value.trim() !== '') raw[key] = value.trim();
  }

  const result = EnvConfigSchema.safeParse(raw);
  if (!result.success) {
    const detail = result.error.issues
      .map((issue) => `${issue.path.map(String).join('.')}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid orchestration config: ${detail}`);
  }

  const parsed = result.data;
  return {
    adequacy_threshold: parsed.ADEQUACY_THRESHOLD,
    max_turns: parsed.MAX_TURNS,
    max_stagnant_passes: parsed.MAX_STAGNANT_PASSES,
    max_revisions_per_example: parsed.MAX_REVISIONS_PER_EXAMPLE,
    max_stage_attempts: parsed.MAX_STAGE_ATTEMPTS,
    turn_timeout_ms: parsed.TURN_TIMEOUT_MS,
    session_timeout_ms: parsed.SESSION_TIMEOUT_MS,
    retry_base_delay_ms: parsed.RETRY_BASE_DELAY_MS,
  };
}

/** Positive integer from a raw env value, or `fallback` */
export function parsePositiveInt(raw: string | undefined, fallback: number): number {
  const parsed = Number.parseInt(raw ?? '', 10);
  return Number.isFinite(parsed) && parsed > 0 ? parsed : fallback;
}

export function resolveConfig(
  base: OrchestrationConfig,
  overrides?: ConfigOverrides,
): OrchestrationConfig {
  if (!overrides) return { ...base };
  const defined: Partial<OrchestrationConfig> = {};
  for (const key of CONFIG_KEYS) {
    const value = overrides[key];
    if (value !== undefined) defined[key] = value;
  }
  return { ...base, ...defined };
}
