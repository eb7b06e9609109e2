import type { Logger } from 'pino';
import type { LlmConfig } from '../config/agent.js';
import { ChatCompletionResponse, OllamaGenerateResponse } from '../schemas/llm.js';
import { requestJSON, type FetchLike } from '../util/fetch.js';
import { errorMessage, isTimeout } from '../tools/errors.js';

export type ResponseFormat = 'text' | 'json';

export interface GenerateOptions {
  /** 'json' asks the backend for structured (machine-parseable) output. */
  responseFormat?: ResponseFormat;
}

/**
 * One blocking, non-streaming generation call. Implementations never throw:
 * transport failures and timeouts come back as text starting with "Error".
 */
export interface TextGenerator {
  readonly model: string;
  generate(prompt: string, opts?: GenerateOptions): Promise<string>;
}

/** What a planning stage needs: the generator and somewhere to log. */
export interface LlmStageDeps {
  llm: TextGenerator;
  log: Logger;
}

export interface GeneratorDeps {
  log: Logger;
  fetchImpl?: FetchLike;
}

// Simple token counter (approximate, for logs only)
export function countTokens(text: string): number {
  return Math.ceil(text.length / 4);
}

function temperatureFor(format: ResponseFormat, configured?: number): number {
  if (configured !== undefined) return configured;
  return format === 'json' ? 0.2 : 0.5;
}

export function createOllamaGenerator(
  cfg: Extract<LlmConfig, { provider: 'ollama' }>,
  deps: GeneratorDeps,
): TextGenerator {
  const { log, fetchImpl } = deps;
  const url = `${cfg.host.replace(/\/$/, '')}/api/generate`;

  return {
    model: cfg.model,
    async generate(prompt, opts = {}) {
      const format = opts.responseFormat ?? 'text';
      log.debug(`🤖 LLM Call - Input: ${countTokens(prompt)} tokens, Format: ${format}`);
      const body = {
        model: cfg.model,
        prompt,
        stream: false,
        ...(format === 'json' ? { format: 'json' } : {}),
        options: { temperature: temperatureFor(format, cfg.temperature) },
      };
      try {
        const raw = await requestJSON(url, {
          target: 'ollama',
          timeoutMs: cfg.timeoutMs,
          method: 'POST',
          headers: { 'Content-Type': 'application/json' },
          body: JSON.stringify(body),
          fetchImpl,
        });
        const parsed = OllamaGenerateResponse.safeParse(raw);
        if (!parsed.success) {
          log.debug({ errors: parsed.error.issues }, 'ollama_response_schema_failed');
          return 'Error parsing Ollama response: missing "response" field';
        }
        const out = parsed.data.response.trim();
        log.debug(`✅ Model ${cfg.model} succeeded - Output: ${countTokens(out)} tokens`);
        return out;
      } catch (e) {
        if (isTimeout(e)) {
          log.warn({ model: cfg.model, timeoutMs: cfg.timeoutMs }, 'ollama_timeout');
          return 'Error: Ollama API request timed out. The model might be taking too long to respond.';
        }
        log.warn({ model: cfg.model, error: errorMessage(e) }, 'ollama_call_failed');
        return `Error calling Ollama API: ${errorMessage(e)}. Is Ollama running?`;
      }
    },
  };
}

export function createOpenAiGenerator(
  cfg: Extract<LlmConfig, { provider: 'openai' }>,
  deps: GeneratorDeps,
): TextGenerator {
  const { log, fetchImpl } = deps;
  const url = `${cfg.baseUrl.replace(/\/$/, '')}/chat/completions`;

  return {
    model: cfg.model,
    async generate(prompt, opts = {}) {
      const format = opts.responseFormat ?? 'text';
      log.debug(`🔗 Trying model: ${cfg.model} at ${cfg.baseUrl}, Format: ${format}`);
      const body = {
        model: cfg.model,
        messages: [{ role: 'user', content: prompt }],
        temperature: temperatureFor(format, cfg.temperature),
        stream: false,
        ...(format === 'json' ? { response_format: { type: 'json_object' } } : {}),
      };
      try {
        const raw = await requestJSON(url, {
          target: 'llm',
          timeoutMs: cfg.timeoutMs,
          method: 'POST',
          headers: { 'Content-Type': 'application/json', Authorization: `Bearer ${cfg.apiKey}` },
          body: JSON.stringify(body),
          fetchImpl,
        });
        const parsed = ChatCompletionResponse.safeParse(raw);
        if (!parsed.success) {
          log.warn({ model: cfg.model, issues: parsed.error.issues }, 'llm_unexpected_response');
          return 'Error: LLM returned an unexpected response shape';
        }
        const content = parsed.data.choices[0]?.message?.content ?? '';
        if (!content.trim()) {
          log.debug(`❌ Model ${cfg.model} returned empty content`);
          return 'Error: LLM returned empty content';
        }
        return content.trim();
      } catch (e) {
        if (isTimeout(e)) {
          log.warn({ model: cfg.model, timeoutMs: cfg.timeoutMs }, 'llm_timeout');
          return 'Error: LLM API request timed out.';
        }
        log.warn({ model: cfg.model, error: errorMessage(e) }, 'llm_call_failed');
        return `Error calling LLM API: ${errorMessage(e)}`;
      }
    },
  };
}

export function createGenerator(cfg: LlmConfig, deps: GeneratorDeps): TextGenerator {
  return cfg.provider === 'ollama' ? createOllamaGenerator(cfg, deps) : createOpenAiGenerator(cfg, deps);
}

function tryParseJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}

/**
 * Try to extract a JSON object from an LLM response safely.
 * Returns undefined if no valid JSON object can be found.
 */
export function safeExtractJson(text: string): unknown {
  const direct = tryParseJson(text.trim());
  if (direct !== undefined) return direct;
  const m = text.match(/\{[\s\S]*\}/);
  if (!m) return undefined;
  return tryParseJson(m[0]);
}
