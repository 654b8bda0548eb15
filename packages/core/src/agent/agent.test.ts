import { describe, it, expect, vi } from 'vitest';
import { ok, err, type Result } from 'neverthrow';
import { ResearchAgent, type AgentContext } from './agent.js';
import {
  EmbeddingError,
  GenerationError,
  StoreUnavailableError,
  type SearchError,
} from '../types/provider.js';
import type { SearchCandidate, SearchFilters } from '../types/search.js';
import type { PageType } from '../types/chunk.js';

function candidate(id: string, schoolId: string, pageType: PageType, text: string): SearchCandidate {
  const sourceUrl = `https://${schoolId}.edu/${id}`;
  return {
    chunk: {
      id,
      pageId: id,
      chunkIndex: 0,
      schoolId,
      sourceUrl,
      pageType,
      text,
      startOffset: 0,
      endOffset: text.length,
      metadata: { school_id: schoolId, page_type: pageType, source_url: sourceUrl },
    },
    similarity: 0.8,
  };
}

const redditGpa = candidate('reddit-1', 'cmu', 'reddit', 'Got in with GPA 5.8 somehow');
const faqGpa = candidate('faq-1', 'cmu', 'faq', 'We do not set a minimum GPA; admitted students average 3.7.');
const cleanGeneral = candidate('gen-1', 'cmu', 'general', 'The MSCS program lasts three semesters.');

function scriptedController(decisions: Array<Result<unknown, GenerationError>>) {
  let call = 0;
  return {
    decide: vi.fn(
      async (_context: AgentContext): Promise<Result<unknown, GenerationError>> =>
        decisions[call++] ?? ok({ kind: 'finish' }),
    ),
  };
}

function searchBy(
  handler: (query: string, filters: SearchFilters) => Result<SearchCandidate[], SearchError>,
) {
  return {
    search: vi.fn(
      async (query: string, filters: SearchFilters = {}): Promise<Result<SearchCandidate[], SearchError>> =>
        handler(query, filters),
    ),
  };
}

const search = (query: string, filters: Record<string, unknown> = {}) => ok({ kind: 'search', query, filters });
const finish = () => ok({ kind: 'finish' });

describe('ResearchAgent', () => {
  it('should search until the controller finishes', async () => {
    const controller = scriptedController([search('cmu mscs length', { schoolId: 'cmu' }), finish()]);
    const searcher = searchBy(() => ok([cleanGeneral]));
    const agent = new ResearchAgent({ controller, searcher });

    const run = (await agent.run('How long is the CMU MSCS?'))._unsafeUnwrap();

    expect(run.termination).toBe('finished');
    expect(run.steps).toHaveLength(1);
    expect(run.steps[0]).toMatchObject({
      index: 0,
      origin: 'controller',
      action: { kind: 'search', query: 'cmu mscs length', filters: { schoolId: 'cmu' } },
      flags: [],
    });
    expect(searcher.search).toHaveBeenCalledWith('cmu mscs length', { schoolId: 'cmu' }, 4);
    expect(run.evidence.candidates.map((c) => c.chunk.id)).toEqual(['gen-1']);
    expect(run.evidence.reliability).toBe('normal');
  });

  it('should stop at the step limit when the controller never finishes', async () => {
    const controller = {
      decide: vi.fn(async (): Promise<Result<unknown, GenerationError>> => search('again')),
    };
    const agent = new ResearchAgent({ controller, searcher: searchBy(() => ok([cleanGeneral])) }, { maxSteps: 3 });

    const run = (await agent.run('q'))._unsafeUnwrap();

    expect(run.termination).toBe('step_limit');
    expect(run.steps).toHaveLength(3);
    expect(controller.decide).toHaveBeenCalledTimes(3);
  });

  it('should let a run override the step limit', async () => {
    const controller = {
      decide: vi.fn(async (): Promise<Result<unknown, GenerationError>> => search('again')),
    };
    const agent = new ResearchAgent({ controller, searcher: searchBy(() => ok([])) });

    const run = (await agent.run('q', { maxSteps: 2 }))._unsafeUnwrap();

    expect(run.steps).toHaveLength(2);
  });

  it('should retry a malformed action once with feedback', async () => {
    const controller = scriptedController([
      ok({ kind: 'search', query: '   ' }),
      search('cmu gre'),
      finish(),
    ]);
    const agent = new ResearchAgent({ controller, searcher: searchBy(() => ok([cleanGeneral])) });

    const run = (await agent.run('q'))._unsafeUnwrap();

    expect(run.termination).toBe('finished');
    expect(run.steps).toHaveLength(1);
    expect(controller.decide.mock.calls[1]?.[0].feedback).toBe(
      'Invalid action: query: query must not be empty',
    );
  });

  it('should end with invalid_action after a second malformed action', async () => {
    const controller = scriptedController([ok({ kind: 'browse' }), ok({ kind: 'search' })]);
    const searcher = searchBy(() => ok([]));
    const agent = new ResearchAgent({ controller, searcher });

    const run = (await agent.run('q'))._unsafeUnwrap();

    expect(run.termination).toBe('invalid_action');
    expect(run.steps).toEqual([]);
    expect(searcher.search).not.toHaveBeenCalled();
  });

  it('should reject unknown page types', async () => {
    const controller = scriptedController([
      search('cmu', { pageType: 'wiki' }),
      search('cmu', { pageType: 'blog' }),
    ]);
    const agent = new ResearchAgent({ controller, searcher: searchBy(() => ok([])) });

    expect((await agent.run('q'))._unsafeUnwrap().termination).toBe('invalid_action');
  });

  it('should cross-check a flagged value against FAQ pages before finishing', async () => {
    const controller = scriptedController([search('cmu admit stats', { schoolId: 'cmu' }), finish()]);
    const searcher = searchBy((_query, filters) => ok(filters.pageType === 'faq' ? [faqGpa] : [redditGpa]));
    const agent = new ResearchAgent({ controller, searcher });

    const run = (await agent.run('What GPA do CMU admits have?'))._unsafeUnwrap();

    expect(run.termination).toBe('finished');
    expect(run.steps.map((s) => s.origin)).toEqual(['controller', 'verification']);
    expect(searcher.search).toHaveBeenLastCalledWith('cmu admit stats GPA', { schoolId: 'cmu', pageType: 'faq' }, 4);
    expect(controller.decide).toHaveBeenCalledTimes(2);
    expect(run.evidence.caveats).toEqual([
      {
        rule: 'gpa_out_of_range',
        value: 5.8,
        chunkId: 'reddit-1',
        schoolId: 'cmu',
        sourceUrl: 'https://cmu.edu/reddit-1',
        resolved: true,
        corroboratedBy: 'faq-1',
      },
    ]);
    expect(run.evidence.reliability).toBe('normal');
  });

  it('should verify each rule and school only once', async () => {
    const second = candidate('reddit-2', 'cmu', 'reddit', 'my friend had GPA 6.1');
    const controller = scriptedController([search('cmu gpa'), finish()]);
    const searcher = searchBy((_query, filters) =>
      ok(filters.pageType === 'faq' ? [faqGpa] : [redditGpa, second]),
    );
    const agent = new ResearchAgent({ controller, searcher });

    const run = (await agent.run('q'))._unsafeUnwrap();

    expect(run.steps).toHaveLength(2);
    expect(run.evidence.caveats.map((c) => [c.chunkId, c.resolved])).toEqual([
      ['reddit-1', true],
      ['reddit-2', true],
    ]);
  });

  it('should not verify a flag raised by an FAQ passage', async () => {
    const faqFlagged = candidate('faq-9', 'cmu', 'faq', 'TOEFL minimum 600');
    const controller = scriptedController([search('cmu toefl'), finish()]);
    const agent = new ResearchAgent({ controller, searcher: searchBy(() => ok([faqFlagged])) });

    const run = (await agent.run('q'))._unsafeUnwrap();

    expect(run.steps).toHaveLength(1);
    expect(run.evidence.caveats.map((c) => [c.rule, c.resolved])).toEqual([['toefl_out_of_range', false]]);
    expect(run.evidence.reliability).toBe('low');
  });

  it('should leave caveats unresolved when no steps remain for verification', async () => {
    const controller = scriptedController([search('cmu gpa'), finish()]);
    const searcher = searchBy(() => ok([redditGpa]));
    const agent = new ResearchAgent({ controller, searcher }, { maxSteps: 1 });

    const run = (await agent.run('q'))._unsafeUnwrap();

    expect(run.termination).toBe('step_limit');
    expect(searcher.search).toHaveBeenCalledTimes(1);
    expect(run.evidence.caveats.map((c) => c.resolved)).toEqual([false]);
    expect(run.evidence.reliability).toBe('low');
  });

  it('should record a failed search and keep going', async () => {
    const controller = scriptedController([search('first'), search('second'), finish()]);
    const failure = new StoreUnavailableError('timeout');
    const searcher = searchBy((query) => (query === 'first' ? err(failure) : ok([cleanGeneral])));
    const agent = new ResearchAgent({ controller, searcher });

    const run = (await agent.run('q'))._unsafeUnwrap();

    expect(run.steps.map((s) => s.error)).toEqual([failure, undefined]);
    expect(run.evidence.candidates.map((c) => c.chunk.id)).toEqual(['gen-1']);
  });

  it('should return the last error when every search failed', async () => {
    const controller = scriptedController([search('first'), search('second'), finish()]);
    const last = new EmbeddingError('model unloaded');
    const searcher = searchBy((query) =>
      query === 'first' ? err(new StoreUnavailableError('timeout')) : err(last),
    );

    const result = await new ResearchAgent({ controller, searcher }).run('q');

    expect(result._unsafeUnwrapErr()).toBe(last);
  });

  it('should return the controller error when it fails before any search', async () => {
    const failure = new GenerationError('Ollama request failed: ECONNREFUSED');
    const controller = scriptedController([err(failure), err(failure)]);

    const result = await new ResearchAgent({ controller, searcher: searchBy(() => ok([])) }).run('q');

    expect(result._unsafeUnwrapErr()).toBe(failure);
  });

  it('should keep the evidence when the controller fails after a search', async () => {
    const failure = new GenerationError('timeout');
    const controller = scriptedController([search('cmu'), err(failure), err(failure)]);
    const agent = new ResearchAgent({ controller, searcher: searchBy(() => ok([cleanGeneral])) });

    const run = (await agent.run('q'))._unsafeUnwrap();

    expect(run.termination).toBe('controller_failed');
    expect(run.evidence.candidates).toHaveLength(1);
  });

  it('should keep the finishing text as the answer', async () => {
    const controller = scriptedController([ok({ kind: 'finish', answer: 'Nothing to search.' })]);

    const run = (await new ResearchAgent({ controller, searcher: searchBy(() => ok([])) }).run('hi'))._unsafeUnwrap();

    expect(run.answer).toBe('Nothing to search.');
    expect(run.steps).toEqual([]);
  });
});
