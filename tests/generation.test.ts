import { describe, it, expect, vi, afterEach } from 'vitest';
import {
  buildRagPrompt,
  createChatGenerator,
  createExtractiveGenerator,
  createGenerationGateway
} from '../src/retrieval/generation.js';
import { GenerationUnavailableError } from '../src/errors.js';
import { NO_CONTEXT_REPLY } from '../src/retrieval/synthesize.js';

const CHAT_CONFIG = {
  apiKey: 'test-secret',
  baseUrl: 'https://llm.test/v1/',
  model: 'test-model',
  temperature: 0.7,
  maxTokens: 1024
};

function stubFetch(response: () => Response | Promise<Response>) {
  const fetchMock = vi.fn(async (_url: string, _init?: RequestInit) => response());
  vi.stubGlobal('fetch', fetchMock);
  return fetchMock;
}

afterEach(() => {
  vi.unstubAllGlobals();
});

describe('buildRagPrompt', () => {
  it('places the excerpts before the question', () => {
    const prompt = buildRagPrompt('Who?', 'Alice wrote it.');
    expect(prompt).toContain('DOCUMENT EXCERPTS:\nAlice wrote it.\n\nQUESTION: Who?');
    expect(prompt.endsWith('ANSWER:')).toBe(true);
  });

  it('asks for a general answer when there is no context', () => {
    expect(buildRagPrompt('Who?', '  ').split('\n')[0]).toBe(
      'No document excerpts matched this question. Answer from general knowledge and say'
    );
  });
});

describe('createChatGenerator', () => {
  it('posts the prompt to the chat completions endpoint', async () => {
    const fetchMock = stubFetch(
      () => new Response(JSON.stringify({ choices: [{ message: { content: ' Alice. ' } }] }), { status: 200 })
    );

    const answer = await createChatGenerator(CHAT_CONFIG).generate('Who?', 'Alice wrote it.');

    expect(answer).toBe('Alice.');
    expect(fetchMock).toHaveBeenCalledTimes(1);
    const [url, init] = fetchMock.mock.calls[0];
    expect(url).toBe('https://llm.test/v1/chat/completions');
    expect(init).toMatchObject({ method: 'POST', headers: { Authorization: 'Bearer test-secret' } });
    const body = JSON.parse(String(init?.body));
    expect(body).toMatchObject({ model: 'test-model', temperature: 0.7, max_tokens: 1024 });
    expect(body.messages[1]).toEqual({ role: 'user', content: buildRagPrompt('Who?', 'Alice wrote it.') });
  });

  it('reports HTTP errors as GenerationUnavailable', async () => {
    stubFetch(() => new Response('upstream down', { status: 500, statusText: 'Internal Server Error' }));

    await expect(createChatGenerator(CHAT_CONFIG).generate('Who?', 'ctx')).rejects.toThrow(
      'Generation request failed: 500 Internal Server Error upstream down'
    );
  });

  it('reports network failures and empty answers', async () => {
    stubFetch(() => Promise.reject(new TypeError('fetch failed')));
    await expect(createChatGenerator(CHAT_CONFIG).generate('Who?', 'ctx')).rejects.toMatchObject({
      kind: 'GenerationUnavailable',
      message: 'Generation request failed: fetch failed'
    });

    stubFetch(() => new Response(JSON.stringify({ choices: [] }), { status: 200 }));
    await expect(createChatGenerator(CHAT_CONFIG).generate('Who?', 'ctx')).rejects.toBeInstanceOf(
      GenerationUnavailableError
    );
  });
});

describe('createExtractiveGenerator', () => {
  const generator = createExtractiveGenerator();

  it('answers with cited sentences from the context', async () => {
    const passages = ['The program costs $2,000 per month.', 'Payment is due on the first day.'];
    const answer = await generator.generate('How much does the program cost?', passages.join('\n\n---\n\n'), {
      passages
    });
    expect(answer.split('\n')).toEqual([
      '- The program costs $2,000 per month. [1]',
      '- Payment is due on the first day. [2]'
    ]);
  });

  it('cites passages by position even when a passage contains the delimiter', async () => {
    const passages = [
      'The city park opened in May.\n\n---\n\nThe fountain was installed in spring of that year.',
      'Second source talks about budgets for the city.'
    ];
    const answer = await generator.generate('When was the fountain installed?', passages.join('\n\n---\n\n'), {
      passages
    });
    expect(answer.split('\n')).toEqual([
      '- The fountain was installed in spring of that year. [1]',
      '- The city park opened in May. [1]',
      '- Second source talks about budgets for the city. [2]'
    ]);
  });

  it('adds a note when the context does not mention the question', async () => {
    const answer = await generator.generate('Which color is the sky?', 'The program costs $2,000 per month.');
    expect(answer.split('\n')).toEqual([
      '- The program costs $2,000 per month. [1]',
      '',
      'Note: confidence is low; the excerpts may be only loosely related.'
    ]);
  });

  it('returns the no-context reply for an empty context', async () => {
    await expect(generator.generate('anything', '')).resolves.toBe(NO_CONTEXT_REPLY);
  });
});

describe('createGenerationGateway', () => {
  it('uses the chat endpoint only when a key is configured', () => {
    expect(createGenerationGateway({ ...CHAT_CONFIG, apiKey: null }).name).toBe('extractive');
    expect(createGenerationGateway(CHAT_CONFIG).name).toBe('chat:test-model');
  });
});
