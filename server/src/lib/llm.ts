import { type LLMProvider, AnthropicProvider, OpenAICompatibleProvider } from './llm-provider.js';
import { MODEL as ANTHROPIC_MODEL } from './anthropic.js';

// ─── Model tiers ─────────────────────────────────────────────────────
// Each collaborator declares a tier; the tier resolves to a concrete model for
// whichever provider is active.

export type ModelTier = 'primary' | 'mid' | 'light';

const OPENAI_MODELS: Record<ModelTier, string> = {
  /** Drafting and revising STAR text */
  primary: process.env.LLM_MODEL_PRIMARY ?? 'gpt-4o',
  /** Scoring, competency checks, QA */
  mid: process.env.LLM_MODEL_MID ?? 'gpt-4o-mini',
  /** Short structured extraction */
  light: process.env.LLM_MODEL_LIGHT ?? 'gpt-4o-mini',
};

const ANTHROPIC_MODELS: Record<ModelTier, string> = {
  primary: ANTHROPIC_MODEL,
  mid: process.env.ANTHROPIC_MODEL_MID ?? ANTHROPIC_MODEL,
  light: process.env.ANTHROPIC_MODEL_LIGHT ?? 'claude-haiku-4-5-20251001',
};

export const MAX_TOKENS = parseInt(process.env.MAX_TOKENS ?? '4096', 10);

// ─── Provider factory ────────────────────────────────────────────────

function createProvider(): LLMProvider {
  const configured = process.env.LLM_PROVIDER?.toLowerCase();
  const providerName = configured === 'openai' || configured === 'anthropic'
    ? configured
    : (process.env.OPENAI_API_KEY ? 'openai' : 'anthropic');

  if (providerName === 'openai') {
    const apiKey = process.env.OPENAI_API_KEY;
    if (!apiKey) {
      throw new Error('OPENAI_API_KEY environment variable is required when LLM_PROVIDER=openai');
    }
    const baseUrl = process.env.OPENAI_BASE_URL ?? 'https://api.openai.com/v1';
    return new OpenAICompatibleProvider({ name: 'openai', apiKey, baseUrl });
  }

  // Anthropic lazily creates its client on first use, so importing this module
  // never requires credentials.
  return new AnthropicProvider();
}

let activeProvider: LLMProvider | null = null;

/** Active LLM provider, created on first use from LLM_PROVIDER / API key env vars */
export function getProvider(): LLMProvider {
  if (!activeProvider) {
    activeProvider = createProvider();
  }
  return activeProvider;
}

/** Resolve a collaborator's model tier for the given provider. */
export function getModelForTier(tier: ModelTier, provider: LLMProvider = getProvider()): string {
  return provider.name === 'anthropic' ? ANTHROPIC_MODELS[tier] : OPENAI_MODELS[tier];
}
