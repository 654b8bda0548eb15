export { ResearchAgent } from './agent.js';
export type {
  AgentContext,
  AgentController,
  AgentError,
  AgentRun,
  AgentStep,
  ResearchAgentDeps,
  ResearchAgentOptions,
  StepOrigin,
  TerminationReason,
} from './agent.js';
export { decodeAction, describeAction, agentActionSchema, InvalidActionError } from './actions.js';
export type { AgentAction, FinishAction, SearchAction } from './actions.js';
export { OllamaAgentController, buildMessages, toolCallToAction } from './ollama-controller.js';
export type { ChatModel, OllamaAgentControllerConfig } from './ollama-controller.js';
