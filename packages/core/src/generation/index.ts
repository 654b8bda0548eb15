export { OllamaClient } from './ollama-client.js';
export type { OllamaConfig, ChatMessage, ChatReply, ToolCall, ToolDefinition } from './ollama-client.js';
export {
  buildAnswerPrompt,
  formatEvidenceForPrompt,
  formatFacts,
  formatPassage,
  formatPassages,
  LOW_RELIABILITY_BANNER,
} from './prompts.js';
export { AnswerSynthesizer } from './answer-synthesizer.js';
export {
  RagEvaluator,
  parseJudgement,
  contextRelevancePrompt,
  faithfulnessPrompt,
  answerRelevancePrompt,
} from './rag-evaluator.js';
export type { MetricScore, TriadEvaluation, TriadMetric } from './rag-evaluator.js';
