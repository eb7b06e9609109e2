import { z } from 'zod';

export class ConfigurationError extends Error {
  readonly issues: string[];
  constructor(issues: string[]) {
    super(`Invalid configuration: ${issues.join('; ')}`);
    this.name = 'ConfigurationError';
    this.issues = issues;
  }
}

// Unset and blank env vars are the same thing here.
const blank = (value: unknown) => (typeof value === 'string' && value.trim() === '' ? undefined : value);

const flag = (value: unknown) => {
  const v = blank(value);
  if (typeof v !== 'string') return v;
  const lower = v.trim().toLowerCase();
  if (['true', '1', 'yes', 'on'].includes(lower)) return true;
  if (['false', '0', 'no', 'off'].includes(lower)) return false;
  return v;
};

const text = () => z.preprocess(blank, z.string().trim().optional());
const ms = (fallback: number, min = 100) => z.preprocess(blank, z.coerce.number().int().min(min).default(fallback));

const EnvSchema = z.object({
  LLM_PROVIDER: z.preprocess(blank, z.enum(['ollama', 'openai']).default('ollama')),
  OLLAMA_HOST: z.preprocess(blank, z.string().url().default('http://localhost:11434')),
  OLLAMA_MODEL: z.preprocess(blank, z.string().default('gemma3:latest')),
  LLM_PROVIDER_BASEURL: z.preprocess(blank, z.string().url().optional()),
  LLM_API_KEY: text(),
  LLM_MODEL: text(),
  LLM_TIMEOUT_MS: ms(60000, 1000),
  LLM_TEMPERATURE: z.preprocess(blank, z.coerce.number().min(0).max(2).optional()),

  SEARCH_PROVIDER: z.preprocess(blank, z.enum(['serper', 'brave']).default('serper')),
  SERPER_API_KEY: text(),
  BRAVE_SEARCH_API_KEY: text(),
  SEARCH_RESULT_LIMIT: z.preprocess(blank, z.coerce.number().int().min(1).max(20).default(5)),
  SEARCH_TIMEOUT_MS: ms(10000),

  FETCH_TIMEOUT_MS: ms(15000),
  PAGE_TEXT_MAX_CHARS: z.preprocess(blank, z.coerce.number().int().min(200).default(8000)),

  LOCATION_URL: z.preprocess(blank, z.string().url().default('http://ip-api.com/json/')),
  LOCATION_TIMEOUT_MS: ms(5000),

  SMTP_HOST: text(),
  SMTP_PORT: z.preprocess(blank, z.coerce.number().int().min(1).max(65535).default(465)),
  SMTP_SECURE: z.preprocess(flag, z.boolean().optional()),
  SMTP_USER: text(),
  SMTP_PASSWORD: z.preprocess(blank, z.string().optional()),
  SMTP_FROM: text(),
  SMTP_TIMEOUT_MS: ms(30000),
});

type Env = z.infer<typeof EnvSchema>;

export type LlmConfig =
  | { provider: 'ollama'; host: string; model: string; timeoutMs: number; temperature?: number }
  | { provider: 'openai'; baseUrl: string; apiKey: string; model: string; timeoutMs: number; temperature?: number };

export type SearchConfig = {
  provider: 'serper' | 'brave';
  apiKey: string;
  limit: number;
  timeoutMs: number;
};

export type SmtpConfig = {
  host: string;
  port: number;
  secure: boolean;
  user: string;
  password: string;
  from: string;
  timeoutMs: number;
};

export type AgentConfig = {
  llm: LlmConfig;
  search: SearchConfig;
  fetch: { timeoutMs: number; maxChars: number };
  location: { url: string; timeoutMs: number };
  /** Undefined when the mail settings are incomplete; sending then reports an error. */
  smtp?: SmtpConfig;
};

function buildLlm(env: Env, issues: string[]): LlmConfig | undefined {
  if (env.LLM_PROVIDER === 'ollama') {
    return {
      provider: 'ollama',
      host: env.OLLAMA_HOST,
      model: env.OLLAMA_MODEL,
      timeoutMs: env.LLM_TIMEOUT_MS,
      temperature: env.LLM_TEMPERATURE,
    };
  }
  const { LLM_PROVIDER_BASEURL: baseUrl, LLM_API_KEY: apiKey, LLM_MODEL: model } = env;
  if (!baseUrl) issues.push('LLM_PROVIDER_BASEURL is required when LLM_PROVIDER=openai');
  if (!apiKey) issues.push('LLM_API_KEY is required when LLM_PROVIDER=openai');
  if (!model) issues.push('LLM_MODEL is required when LLM_PROVIDER=openai');
  if (!baseUrl || !apiKey || !model) return undefined;
  return { provider: 'openai', baseUrl, apiKey, model, timeoutMs: env.LLM_TIMEOUT_MS, temperature: env.LLM_TEMPERATURE };
}

function buildSearch(env: Env, issues: string[]): SearchConfig | undefined {
  const keyName = env.SEARCH_PROVIDER === 'brave' ? 'BRAVE_SEARCH_API_KEY' : 'SERPER_API_KEY';
  const apiKey = env[keyName];
  if (!apiKey) {
    issues.push(`${keyName} is required when SEARCH_PROVIDER=${env.SEARCH_PROVIDER}`);
    return undefined;
  }
  return { provider: env.SEARCH_PROVIDER, apiKey, limit: env.SEARCH_RESULT_LIMIT, timeoutMs: env.SEARCH_TIMEOUT_MS };
}

function buildSmtp(env: Env): SmtpConfig | undefined {
  const { SMTP_HOST: host, SMTP_USER: user, SMTP_PASSWORD: password } = env;
  if (!host || !user || !password) return undefined;
  return {
    host,
    port: env.SMTP_PORT,
    // Implicit TLS on 465, STARTTLS elsewhere, unless stated
    secure: env.SMTP_SECURE ?? env.SMTP_PORT === 465,
    user,
    password,
    from: env.SMTP_FROM ?? user,
    timeoutMs: env.SMTP_TIMEOUT_MS,
  };
}

/**
 * Resolves the process-wide configuration once at startup.
 * Throws ConfigurationError naming every missing or invalid key.
 */
export function loadAgentConfig(source: NodeJS.ProcessEnv = process.env): AgentConfig {
  const parsed = EnvSchema.safeParse(source);
  if (!parsed.success) {
    throw new ConfigurationError(parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`));
  }
  const env = parsed.data;
  const issues: string[] = [];
  const llm = buildLlm(env, issues);
  const search = buildSearch(env, issues);
  if (!llm || !search) throw new ConfigurationError(issues);

  return {
    llm,
    search,
    fetch: { timeoutMs: env.FETCH_TIMEOUT_MS, maxChars: env.PAGE_TEXT_MAX_CHARS },
    location: { url: env.LOCATION_URL, timeoutMs: env.LOCATION_TIMEOUT_MS },
    smtp: buildSmtp(env),
  };
}

export function describeModel(cfg: LlmConfig): string {
  return cfg.provider === 'ollama' ? `${cfg.model} (Ollama)` : cfg.model;
}
