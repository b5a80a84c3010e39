import { z } from 'zod';
import { fetchJson } from '../utils/http.js';
import type { ChatClient, ChatMessage } from '../types.js';

const CompletionJSON = z.object({
  choices: z.array(z.object({
    message: z.object({
      role: z.string().optional(),
      content: z.string().nullable(),
    }),
  })),
});

export interface ChatClientOptions {
  apiKey: string;
  url: string;
  model: string;
  timeoutMs?: number;
  temperature?: number;
  maxTokens?: number;
}

/** OpenAI-compatible chat completions client. */
export function createChatClient(opts: ChatClientOptions): ChatClient {
  return {
    async complete(messages: ChatMessage[]) {
      const res = await fetchJson('chat', opts.url, CompletionJSON, {
        method: 'POST',
        headers: {
          Authorization: `Bearer ${opts.apiKey}`,
          'Content-Type': 'application/json',
        },
        body: JSON.stringify({
          model: opts.model,
          messages,
          temperature: opts.temperature ?? 0.3,
          max_tokens: opts.maxTokens ?? 600,
        }),
        timeoutMs: opts.timeoutMs,
      });
      if (!res.ok) return res;

      const text = res.value.choices[0]?.message.content?.trim();
      if (!text) {
        return { ok: false, error: { kind: 'MalformedResponse', source: 'chat', message: 'completion had no text' } };
      }
      return { ok: true, value: text };
    },
  };
}
