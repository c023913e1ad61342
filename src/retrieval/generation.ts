import { GenerationProviderConfig } from '../config.js';
import { GenerationUnavailableError } from '../errors.js';
import { GenerateOptions, GenerationGateway } from '../types.js';
import { NO_CONTEXT_REPLY, synthesize } from './synthesize.js';

const SYSTEM_PROMPT = 'You are a helpful assistant that answers questions about the user\'s documents.';

export function buildRagPrompt(question: string, context: string): string {
  if (!context.trim()) {
    return [
      'No document excerpts matched this question. Answer from general knowledge and say',
      'that the uploaded documents did not contain the answer.',
      '',
      `QUESTION: ${question}`,
      'ANSWER:'
    ].join('\n');
  }

  return [
    'Answer the question using the document excerpts below.',
    '',
    'DOCUMENT EXCERPTS:',
    context,
    '',
    `QUESTION: ${question}`,
    '',
    'INSTRUCTIONS:',
    '1. Base the answer on the excerpts and say so when you quote them.',
    '2. If the excerpts do not answer the question, say that plainly before adding anything else.',
    '3. Do not claim you lack access to documents when excerpts are provided.',
    '',
    'ANSWER:'
  ].join('\n');
}

interface ChatCompletionResponse {
  choices?: Array<{ message?: { content?: string | null } }>;
}

/** Any OpenAI-compatible `/chat/completions` endpoint (Groq, OpenAI, local servers). */
export function createChatGenerator(config: GenerationProviderConfig & { apiKey: string }): GenerationGateway {
  const url = `${config.baseUrl.replace(/\/$/, '')}/chat/completions`;

  return {
    name: `chat:${config.model}`,
    async generate(question: string, context: string, options?: GenerateOptions) {
      let res: Response;
      try {
        res = await fetch(url, {
          method: 'POST',
          headers: {
            Authorization: `Bearer ${config.apiKey}`,
            'Content-Type': 'application/json'
          },
          body: JSON.stringify({
            model: config.model,
            temperature: config.temperature,
            max_tokens: config.maxTokens,
            messages: [
              { role: 'system', content: SYSTEM_PROMPT },
              { role: 'user', content: buildRagPrompt(question, context) }
            ]
          }),
          signal: options?.signal
        });
      } catch (error) {
        throw new GenerationUnavailableError(
          `Generation request failed: ${error instanceof Error ? error.message : String(error)}`,
          error
        );
      }

      if (!res.ok) {
        const detail = await res.text().catch(() => '');
        throw new GenerationUnavailableError(`Generation request failed: ${res.status} ${res.statusText} ${detail}`.trim());
      }

      const json = (await res.json()) as ChatCompletionResponse;
      const answer = json.choices?.[0]?.message?.content?.trim();
      if (!answer) {
        throw new GenerationUnavailableError('Generation response contained no answer text');
      }
      return answer;
    }
  };
}

/** Offline generator: picks the most relevant sentences out of the context. */
export function createExtractiveGenerator(): GenerationGateway {
  return {
    name: 'extractive',
    async generate(question, context, options) {
      if (!context.trim()) return NO_CONTEXT_REPLY;
      const { answerLines, lowConfidence } = synthesize(question, options?.passages ?? [context]);
      const note = lowConfidence ? ['', 'Note: confidence is low; the excerpts may be only loosely related.'] : [];
      return [...answerLines, ...note].join('\n');
    }
  };
}

export function createGenerationGateway(config: GenerationProviderConfig): GenerationGateway {
  const { apiKey } = config;
  if (!apiKey) return createExtractiveGenerator();
  return createChatGenerator({ ...config, apiKey });
}
