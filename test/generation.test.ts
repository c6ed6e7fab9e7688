import { describe, expect, it } from 'vitest';
import { GenerationError } from '../src/errors.js';
import { OpenAIAnswerGenerator, SYSTEM_INSTRUCTION, buildPrompt, type ChatClient } from '../src/services/generation.js';

type CreateParams = Parameters<ChatClient['chat']['completions']['create']>[0];

function chatClient(reply: () => Promise<string | null>, requests: CreateParams[] = []): ChatClient {
  return {
    chat: {
      completions: {
        create: async (params) => {
          requests.push(params);
          return { choices: [{ message: { content: await reply() } }] };
        },
      },
    },
  };
}

describe('buildPrompt', () => {
  it('puts every context into one message between the instruction and the question', () => {
    expect(buildPrompt('Which course teaches pandas?', ['first chunk', 'second chunk'])).toEqual([
      { role: 'system', content: SYSTEM_INSTRUCTION },
      { role: 'system', content: 'Context:\nfirst chunk\n\n---\n\nsecond chunk' },
      { role: 'user', content: 'Which course teaches pandas?' },
    ]);
  });
});

describe('OpenAIAnswerGenerator', () => {
  it('returns the trimmed completion using the configured model and temperature', async () => {
    const requests: CreateParams[] = [];
    const generator = new OpenAIAnswerGenerator(chatClient(async () => '  Try the pandas course.\n', requests), {
      model: 'test-chat',
      temperature: 0,
    });

    expect(await generator.generate('pandas?', ['ctx'])).toBe('Try the pandas course.');
    expect(requests).toHaveLength(1);
    expect(requests[0].model).toBe('test-chat');
    expect(requests[0].temperature).toBe(0);
    expect(requests[0].messages).toEqual(buildPrompt('pandas?', ['ctx']));
  });

  it('treats an empty completion as a failure', async () => {
    const generator = new OpenAIAnswerGenerator(chatClient(async () => null), { model: 'test-chat', temperature: 0 });
    await expect(generator.generate('q', [])).rejects.toThrow('Answer generation returned an empty completion');
  });

  it('wraps client errors in GenerationError', async () => {
    const generator = new OpenAIAnswerGenerator(
      chatClient(async () => {
        throw new Error('rate limited');
      }),
      { model: 'test-chat', temperature: 0 },
    );
    const failure = generator.generate('q', ['ctx']);
    await expect(failure).rejects.toBeInstanceOf(GenerationError);
    await expect(failure).rejects.toThrow('Answer generation failed: rate limited');
  });
});
