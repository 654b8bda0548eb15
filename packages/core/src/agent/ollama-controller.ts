import { ok, err, type Result } from 'neverthrow';
import { z } from 'zod';
import { PAGE_TYPES } from '../types/chunk.js';
import type { GenerationError } from '../types/provider.js';
import type {
  ChatMessage,
  ChatReply,
  ToolCall,
  ToolDefinition,
} from '../generation/ollama-client.js';
import { formatPassages } from '../generation/prompts.js';
import type { AgentContext, AgentController } from './agent.js';
import { describeAction } from './actions.js';

/** Anything that can hold a function-calling chat, such as `OllamaClient`. */
export interface ChatModel {
  chat(messages: ChatMessage[], tools?: ToolDefinition[]): Promise<Result<ChatReply, GenerationError>>;
}

export interface OllamaAgentControllerConfig {
  /** School ids the model may pass as `school_id`. */
  schoolIds?: readonly string[];
}

const SYSTEM_PROMPT = [
  'You are a research agent for graduate computer science admissions in North America.',
  'You answer questions by searching a database of official school pages and forum posts.',
  'Call `search` to retrieve passages; call `finish` once the passages cover the question.',
  '',
  'Search strategy:',
  '- Split comparisons and multi-part questions into one search per school and topic.',
  '- Pass school_id whenever the question names a school.',
  '- Use page_type "faq" for policy details, "checklist" for required documents,',
  '  "admissions" for deadlines and "reddit" for applicant experiences.',
  '',
  'Passages marked CAVEAT contain a value outside its plausible range',
  '(GPA 0-4.3, TOEFL iBT 0-120, IELTS 0-9, GRE 130-170 per section).',
  'When a flagged value matters, search again with page_type "faq" to cross-check it.',
].join('\n');

function buildTools(schoolIds: readonly string[]): ToolDefinition[] {
  const schoolHint = schoolIds.length > 0 ? ` One of: ${schoolIds.join(', ')}.` : '';
  return [
    {
      type: 'function',
      function: {
        name: 'search',
        description: 'Semantic search over admissions pages, optionally restricted to one school and page type.',
        parameters: {
          type: 'object',
          properties: {
            query: { type: 'string', description: 'Specific search phrase, in English.' },
            school_id: { type: 'string', description: `School identifier.${schoolHint}` },
            page_type: { type: 'string', description: 'Page type to search.', enum: PAGE_TYPES },
          },
          required: ['query'],
        },
      },
    },
    {
      type: 'function',
      function: {
        name: 'finish',
        description: 'Stop searching; the passages found so far are enough to answer.',
        parameters: { type: 'object', properties: {}, required: [] },
      },
    },
  ];
}

const argumentsSchema = z.record(z.unknown());

function parseArguments(raw: unknown): Record<string, unknown> {
  let value = raw;
  if (typeof raw === 'string') {
    try {
      value = JSON.parse(raw);
    } catch {
      return {};
    }
  }
  const parsed = argumentsSchema.safeParse(value);
  return parsed.success ? parsed.data : {};
}

/** Optional string arguments: models often send "" for "not given". */
function optionalArgument(value: unknown): unknown {
  return value === '' || value === null ? undefined : value;
}

/** Maps a tool call onto the raw action shape the agent validates. */
export function toolCallToAction(call: ToolCall): unknown {
  if (call.name === 'finish') {
    return { kind: 'finish' };
  }
  if (call.name !== 'search') {
    return { kind: call.name };
  }
  const args = parseArguments(call.arguments);
  const filters: Record<string, unknown> = {};
  const schoolId = optionalArgument(args['school_id']);
  const pageType = optionalArgument(args['page_type']);
  if (schoolId !== undefined) filters['schoolId'] = schoolId;
  if (pageType !== undefined) filters['pageType'] = pageType;
  return { kind: 'search', query: args['query'], filters };
}

export function buildMessages(context: AgentContext): ChatMessage[] {
  const messages: ChatMessage[] = [
    { role: 'system', content: SYSTEM_PROMPT },
    { role: 'user', content: context.query },
  ];
  for (const step of context.steps) {
    messages.push({ role: 'assistant', content: `Calling ${describeAction(step.action)}` });
    messages.push({
      role: 'tool',
      content: step.error ? `Search failed: ${step.error.message}` : formatPassages(step.candidates),
    });
  }
  messages.push({
    role: 'user',
    content: `${context.remainingSteps} search(es) left.${
      context.feedback ? ` Your previous action was rejected (${context.feedback}); call search or finish.` : ''
    }`,
  });
  return messages;
}

/** Decisions from a local model through Ollama's function calling. */
export class OllamaAgentController implements AgentController {
  private readonly tools: ToolDefinition[];

  constructor(
    private readonly model: ChatModel,
    config: OllamaAgentControllerConfig = {},
  ) {
    this.tools = buildTools(config.schoolIds ?? []);
  }

  async decide(context: AgentContext): Promise<Result<unknown, GenerationError>> {
    const reply = await this.model.chat(buildMessages(context), this.tools);
    if (reply.isErr()) {
      return err(reply.error);
    }
    const [call] = reply.value.toolCalls;
    if (!call) {
      // A plain text reply means the model is ready to answer.
      const answer = reply.value.content.trim();
      return ok(answer.length > 0 ? { kind: 'finish', answer } : { kind: 'finish' });
    }
    return ok(toolCallToAction(call));
  }
}
