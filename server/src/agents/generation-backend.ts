/**
 * LLM-backed generation backend.
 *
 * Serialises a turn's scoped view into one user message, calls the active
 * LLMProvider and parses the reply as JSON. Provider failures are mapped onto
 * the orchestration taxonomy so the Turn Executor can classify them.
 */

import { getModelForTier, getProvider, MAX_TOKENS } from '../lib/llm.js';
import type { LLMProvider } from '../lib/llm-provider.js';
import { repairJSON } from '../lib/json-repair.js';
import { isTransient } from '../lib/retry.js';
import logger from '../lib/logger.js';
import type { GenerationBackend, GenerationRequest } from './runtime/agent-protocol.js';
import {
  BackendTimeout,
  BackendUnavailable,
  MalformedResponse,
  isOrchestrationError,
} from './runtime/errors.js';

export class LlmGenerationBackend implements GenerationBackend {
  constructor(private readonly provider: LLMProvider = getProvider()) {}

  async generate(request: GenerationRequest, outputSchema: Record<string, unknown>): Promise<unknown> {
    let text: string;
    try {
      const response = await this.provider.chat({
        model: getModelForTier(request.model_tier, this.provider),
        system: request.system_prompt,
        messages: [{ role: 'user', content: buildUserMessage(request, outputSchema) }],
        max_tokens: MAX_TOKENS,
        json_mode: true,
        signal: request.signal,
        session_id: request.session_id,
      });
      text = response.text;
    } catch (err) {
      throw mapProviderError(err, request.signal);
    }

    const parsed = repairJSON(text);
    if (parsed === null || typeof parsed !== 'object' || Array.isArray(parsed)) {
      logger.debug(
        { collaborator: request.collaborator.name, preview: text.slice(0, 200) },
        'Generation reply was not a JSON object',
      );
      throw new MalformedResponse(`${request.collaborator.name} did not return a JSON object`, text);
    }
    return parsed;
  }
}

export function buildUserMessage(request: GenerationRequest, outputSchema: Record<string, unknown>): string {
  const { view } = request;
  const sections: string[] = [];

  if (view.target_example) {
    sections.push(`## Target example\n${JSON.stringify(view.target_example, null, 2)}`);
  }

  sections.push(`## Inputs\n${JSON.stringify(view.inputs, null, 2)}`);
  if (view.missing_inputs.length > 0) {
    sections.push(`## Not yet available\n${view.missing_inputs.join(', ')}`);
  }

  const configLines = [`Adequacy threshold: ${view.config.adequacy_threshold} (of 7)`];
  if (view.config.rubric) configLines.push(`Rubric:\n${view.config.rubric}`);
  configLines.push(`LC4Q framework:\n${JSON.stringify(view.config.competency_framework, null, 2)}`);
  sections.push(`## Configuration\n${configLines.join('\n\n')}`);

  sections.push(`## Output schema\n${JSON.stringify(outputSchema, null, 2)}`);

  if (request.correction) {
    sections.push(`## Correction\nYour previous reply was rejected.\n${request.correction}`);
  }

  return sections.join('\n\n');
}

function mapProviderError(err: unknown, signal: AbortSignal): Error {
  if (isOrchestrationError(err)) return err;
  const error = err instanceof Error ? err : new Error(String(err));
  if (signal.aborted || error.name === 'AbortError') {
    return new BackendTimeout(`Generation aborted: ${error.message}`, err);
  }
  if (isTransient(error, err)) {
    return new BackendUnavailable(`Generation backend unavailable: ${error.message}`, err);
  }
  return new BackendUnavailable(`Generation request failed: ${error.message}`, err, false);
}
