import { ok, err, type Result } from 'neverthrow';
import type { EvidenceBundle } from '../types/search.js';
import { GenerationError, type LLMProvider } from '../types/provider.js';
import { buildAnswerPrompt } from './prompts.js';

/** Hands an evidence bundle to the generative model. */
export class AnswerSynthesizer {
  constructor(private readonly llm: LLMProvider) {}

  async answer(bundle: EvidenceBundle): Promise<Result<string, GenerationError>> {
    const generated = await this.llm.generate(buildAnswerPrompt(bundle));
    if (generated.isErr()) {
      return err(generated.error);
    }
    const answer = generated.value.trim();
    if (answer.length === 0) {
      return err(new GenerationError('Model returned an empty answer'));
    }
    return ok(answer);
  }
}
