import { z } from 'zod';

export const OllamaGenerateResponse = z.object({
  response: z.string(),
  done: z.boolean().optional(),
});
export type OllamaGenerateResponseT = z.infer<typeof OllamaGenerateResponse>;

export const ChatCompletionResponse = z.object({
  choices: z
    .array(
      z.object({
        message: z.object({ content: z.string().nullable().optional() }).optional(),
      }),
    )
    .default([]),
});
export type ChatCompletionResponseT = z.infer<typeof ChatCompletionResponse>;
