import { z } from 'zod';

export const SerperOrganicResult = z.object({
  title: z.string().optional(),
  link: z.string().optional(),
  snippet: z.string().optional(),
});

export const SerperSearchResponse = z.object({
  organic: z.array(SerperOrganicResult).optional(),
});
export type SerperSearchResponseT = z.infer<typeof SerperSearchResponse>;

export const BraveWebResult = z.object({
  title: z.string().optional(),
  url: z.string().optional(),
  description: z.string().optional(),
});

export const BraveSearchResponse = z.object({
  web: z.object({ results: z.array(BraveWebResult).optional() }).optional(),
});
export type BraveSearchResponseT = z.infer<typeof BraveSearchResponse>;
