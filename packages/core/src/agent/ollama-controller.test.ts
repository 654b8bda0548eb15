import { describe, it, expect, vi } from 'vitest';
import { ok, err } from 'neverthrow';
import { OllamaAgentController, buildMessages, toolCallToAction } from './ollama-controller.js';
import { GenerationError } from '../types/provider.js';
import type { ChatReply } from '../generation/ollama-client.js';
import type { AgentContext } from './agent.js';

function chatReturning(reply: ChatReply) {
  return { chat: vi.fn().mockResolvedValue(ok(reply)) };
}

const context: AgentContext = { query: 'Does MIT require the GRE?', steps: [], remainingSteps: 5 };

describe('toolCallToAction', () => {
  it('should map search arguments onto filters', () => {
    expect(
      toolCallToAction({ name: 'search', arguments: { query: 'gre', school_id: 'mit', page_type: 'faq' } }),
    ).toEqual({ kind: 'search', query: 'gre', filters: { schoolId: 'mit', pageType: 'faq' } });
  });

  it('should accept arguments encoded as a JSON string', () => {
    expect(toolCallToAction({ name: 'search', arguments: '{"query":"gre"}' })).toEqual({
      kind: 'search',
      query: 'gre',
      filters: {},
    });
  });

  it('should drop empty optional arguments', () => {
    expect(toolCallToAction({ name: 'search', arguments: { query: 'gre', school_id: '', page_type: null } })).toEqual(
      { kind: 'search', query: 'gre', filters: {} },
    );
  });

  it('should pass unknown tools through for validation to reject', () => {
    expect(toolCallToAction({ name: 'search_web', arguments: {} })).toEqual({ kind: 'search_web' });
    expect(toolCallToAction({ name: 'finish', arguments: {} })).toEqual({ kind: 'finish' });
  });
});

describe('buildMessages', () => {
  it('should replay each step as a call and its result', () => {
    const messages = buildMessages({
      query: 'q',
      remainingSteps: 3,
      feedback: 'Invalid action: query: Required',
      steps: [
        {
          index: 0,
          origin: 'controller',
          action: { kind: 'search', query: 'gre', filters: {} },
          candidates: [],
          flags: [],
        },
      ],
    });

    expect(messages.map((m) => m.role)).toEqual(['system', 'user', 'assistant', 'tool', 'user']);
    expect(messages[2]?.content).toBe('Calling search("gre")');
    expect(messages[3]?.content).toBe('No matching passages found.');
    expect(messages[4]?.content).toBe(
      '3 search(es) left. Your previous action was rejected (Invalid action: query: Required); call search or finish.',
    );
  });
});

describe('OllamaAgentController', () => {
  it('should turn the first tool call into a raw action', async () => {
    const model = chatReturning({
      content: '',
      toolCalls: [
        { name: 'search', arguments: { query: 'MIT GRE policy', school_id: 'mit' } },
        { name: 'finish', arguments: {} },
      ],
    });

    const decision = await new OllamaAgentController(model).decide(context);

    expect(decision._unsafeUnwrap()).toEqual({
      kind: 'search',
      query: 'MIT GRE policy',
      filters: { schoolId: 'mit' },
    });
  });

  it('should treat a plain text reply as finishing', async () => {
    const model = chatReturning({ content: ' MIT does not require the GRE. ', toolCalls: [] });

    const decision = await new OllamaAgentController(model).decide(context);

    expect(decision._unsafeUnwrap()).toEqual({ kind: 'finish', answer: 'MIT does not require the GRE.' });
  });

  it('should offer search and finish tools with the known schools', async () => {
    const model = chatReturning({ content: '', toolCalls: [] });

    await new OllamaAgentController(model, { schoolIds: ['cmu', 'mit'] }).decide(context);

    const tools = model.chat.mock.calls[0]?.[1];
    expect(tools.map((t: { function: { name: string } }) => t.function.name)).toEqual(['search', 'finish']);
    expect(tools[0].function.parameters.properties.school_id.description).toBe('School identifier. One of: cmu, mit.');
  });

  it('should propagate chat failures', async () => {
    const failure = new GenerationError('Ollama request failed: ECONNREFUSED');
    const model = { chat: vi.fn().mockResolvedValue(err(failure)) };

    const decision = await new OllamaAgentController(model).decide(context);

    expect(decision._unsafeUnwrapErr()).toBe(failure);
  });
});
