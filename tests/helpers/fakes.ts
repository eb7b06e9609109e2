import pino from 'pino';
import type { GenerateOptions, TextGenerator } from '../../src/core/llm.js';
import type { PromptName } from '../../src/core/prompts.js';
import type { FetchLike, HttpRequestInit, HttpResponse } from '../../src/util/fetch.js';

export const silentLog = pino({ level: 'silent' });

export function textResponse(
  body: string,
  contentType = 'text/html; charset=utf-8',
  status = 200,
  statusText = 'OK',
): HttpResponse {
  return {
    ok: status >= 200 && status < 300,
    status,
    statusText,
    headers: { get: (name: string) => (name.toLowerCase() === 'content-type' ? contentType : null) },
    text: async () => body,
  };
}

export function jsonResponse(payload: unknown, status = 200, statusText = 'OK'): HttpResponse {
  return textResponse(JSON.stringify(payload), 'application/json', status, statusText);
}

export interface RecordedRequest {
  url: string;
  init?: HttpRequestInit;
}

export type RecordingFetch = FetchLike & { calls: RecordedRequest[] };

/** A fetch that never touches the network and remembers what it was asked for. */
export function fakeFetch(
  handler: (url: string, init?: HttpRequestInit) => HttpResponse | Promise<HttpResponse>,
): RecordingFetch {
  const calls: RecordedRequest[] = [];
  const impl: FetchLike = async (url, init) => {
    calls.push({ url, init });
    return handler(url, init);
  };
  return Object.assign(impl, { calls });
}

/** Resolves only when the request's signal aborts, then rejects like a cancelled fetch. */
export const hangingFetch: FetchLike = (_url, init) =>
  new Promise<HttpResponse>((_resolve, reject) => {
    init?.signal?.addEventListener('abort', () => reject(new Error('The operation was aborted')));
  });

// A phrase unique to each template, used to tell which stage is calling.
const PROMPT_MARKERS: Record<PromptName, string> = {
  email_extractor: 'expert at finding email addresses',
  location_needed: 'Does this request need a location?',
  location_present: 'already contain a location',
  query_planner: 'generate a concise, effective search query',
  url_selector: 'smart web navigator',
  snippet_summary: 'web browser is not available',
  synthesizer: 'Fact-Check and Synthesize',
  email_drafter: 'drafting clear and detailed emails',
};

export function promptKind(prompt: string): PromptName | undefined {
  const names = Object.keys(PROMPT_MARKERS);
  for (const name of names) {
    if (isPromptName(name) && prompt.includes(PROMPT_MARKERS[name])) return name;
  }
  return undefined;
}

function isPromptName(name: string): name is PromptName {
  return Object.prototype.hasOwnProperty.call(PROMPT_MARKERS, name);
}

export interface GeneratorCall {
  kind: PromptName | undefined;
  prompt: string;
  opts?: GenerateOptions;
}

export type ScriptedGenerator = TextGenerator & { calls: GeneratorCall[]; kinds(): Array<PromptName | undefined> };

/**
 * A generator that answers by prompt template. Unscripted templates get an
 * "Error..." reply, the same way a failed backend call would look.
 */
export function scriptedLlm(answers: Partial<Record<PromptName, string | ((prompt: string) => string)>>): ScriptedGenerator {
  const calls: GeneratorCall[] = [];
  return {
    model: 'test-model',
    calls,
    kinds: () => calls.map((c) => c.kind),
    async generate(prompt, opts) {
      const kind = promptKind(prompt);
      calls.push({ kind, prompt, opts });
      const answer = kind ? answers[kind] : undefined;
      if (answer === undefined) return `Error: no scripted answer for ${kind ?? 'unknown prompt'}`;
      return typeof answer === 'function' ? answer(prompt) : answer;
    },
  };
}
