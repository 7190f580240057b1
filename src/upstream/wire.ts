import { z } from 'zod';

export interface ChatMessage {
  role: 'system' | 'user' | 'assistant';
  content: string;
}

export interface ChatCompletionRequest {
  model: string;
  messages: ChatMessage[];
  max_tokens?: number;
  temperature?: number;
  top_p?: number;
  search_mode?: string;
  search_domain_filter?: string[];
  search_recency_filter?: string;
  disable_search?: boolean;
  stream: false;
}

const citationSchema = z.union([
  z.string(),
  z.object({
    number: z.number().int().optional(),
    url: z.string(),
    title: z.string().optional()
  })
]);

const sourceSchema = z.object({
  url: z.string(),
  title: z.string().optional(),
  snippet: z.string().optional()
});

export const chatCompletionResponseSchema = z.object({
  id: z.string().default(''),
  created: z.number().default(0),
  model: z.string().default(''),
  choices: z
    .array(
      z.object({
        index: z.number().int().optional(),
        message: z.object({ role: z.string().optional(), content: z.string() }),
        finish_reason: z.string().nullable().optional()
      })
    )
    .default([]),
  usage: z
    .object({
      prompt_tokens: z.number().int().default(0),
      completion_tokens: z.number().int().default(0),
      total_tokens: z.number().int().default(0)
    })
    .default({}),
  citations: z.array(citationSchema).nullable().optional(),
  sources: z.array(sourceSchema).nullable().optional(),
  search_results: z.array(sourceSchema).nullable().optional()
});

export type ChatCompletionResponse = z.infer<typeof chatCompletionResponseSchema>;

export const apiErrorEnvelopeSchema = z.object({
  error: z.object({
    message: z.string(),
    type: z.string().optional(),
    code: z.union([z.string(), z.number()]).nullable().optional()
  })
});
