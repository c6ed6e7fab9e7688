// src/services/generation.ts
// What: Grounded answer synthesis over retrieved course chunks.
// How: "Stuffs" every retrieved chunk into a single context message and makes one chat completion call
//      with an instruction to answer only from that context. SDK failures and empty completions
//      surface as GenerationError.

import type { AppConfig } from '../config/env.js';
import { GenerationError, errorMessage } from '../errors.js';
import { createOpenAIClient } from './embeddings.js';

export interface AnswerGenerator {
  generate(query: string, contexts: string[]): Promise<string>;
}

type PromptMessage = { role: 'system'; content: string } | { role: 'user'; content: string };

// The subset of the OpenAI SDK used here.
export interface ChatClient {
  chat: {
    completions: {
      create(params: {
        model: string;
        temperature: number;
        messages: PromptMessage[];
      }): Promise<{ choices: { message: { content: string | null } }[] }>;
    };
  };
}

export const SYSTEM_INSTRUCTION =
  'You are a helpful assistant for an online course catalogue. Use ONLY the provided context to answer ' +
  'the question. If the answer is not in the context, say that you do not know; do not make up an answer.';

const CONTEXT_SEPARATOR = '\n\n---\n\n';

export function buildPrompt(query: string, contexts: string[]): PromptMessage[] {
  return [
    { role: 'system', content: SYSTEM_INSTRUCTION },
    { role: 'system', content: `Context:\n${contexts.join(CONTEXT_SEPARATOR)}` },
    { role: 'user', content: query },
  ];
}

export class OpenAIAnswerGenerator implements AnswerGenerator {
  constructor(
    private readonly client: ChatClient,
    private readonly options: { model: string; temperature: number },
  ) {}

  static fromConfig(
    config: Pick<AppConfig, 'OPENAI_API_KEY' | 'OPENAI_TIMEOUT_MS' | 'OPENAI_CHAT_MODEL' | 'GENERATION_TEMPERATURE'>,
    client: ChatClient = createOpenAIClient(config),
  ): OpenAIAnswerGenerator {
    return new OpenAIAnswerGenerator(client, {
      model: config.OPENAI_CHAT_MODEL,
      temperature: config.GENERATION_TEMPERATURE,
    });
  }

  async generate(query: string, contexts: string[]): Promise<string> {
    let content: string | null | undefined;
    try {
      const completion = await this.client.chat.completions.create({
        model: this.options.model,
        temperature: this.options.temperature,
        messages: buildPrompt(query, contexts),
      });
      content = completion.choices[0]?.message.content;
    } catch (err) {
      throw new GenerationError(`Answer generation failed: ${errorMessage(err)}`, err);
    }

    const answer = content?.trim() ?? '';
    if (answer.length === 0) {
      throw new GenerationError('Answer generation returned an empty completion');
    }
    return answer;
  }
}
