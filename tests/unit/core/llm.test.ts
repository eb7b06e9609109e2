import {
  countTokens,
  createGenerator,
  createOllamaGenerator,
  createOpenAiGenerator,
  safeExtractJson,
} from '../../../src/core/llm.js';
import { fakeFetch, hangingFetch, jsonResponse, silentLog, textResponse } from '../../helpers/fakes.js';

const ollama = {
  provider: 'ollama' as const,
  host: 'http://ollama.example.test:11434/',
  model: 'gemma3:latest',
  timeoutMs: 1000,
};

const openai = {
  provider: 'openai' as const,
  baseUrl: 'https://llm.example.test/v1',
  apiKey: 'test-secret',
  model: 'small-model',
  timeoutMs: 1000,
};

function sentBody(init: { body?: string } | undefined): unknown {
  return JSON.parse(init?.body ?? 'null');
}

describe('Ollama generator', () => {
  it('posts a non-streaming request and returns the trimmed response', async () => {
    const fetchImpl = fakeFetch(() => jsonResponse({ response: '  Three bakeries found.  ', done: true }));
    const llm = createOllamaGenerator(ollama, { log: silentLog, fetchImpl });

    await expect(llm.generate('Find bakeries')).resolves.toBe('Three bakeries found.');
    expect(llm.model).toBe('gemma3:latest');
    expect(fetchImpl.calls[0]?.url).toBe('http://ollama.example.test:11434/api/generate');
    expect(sentBody(fetchImpl.calls[0]?.init)).toEqual({
      model: 'gemma3:latest',
      prompt: 'Find bakeries',
      stream: false,
      options: { temperature: 0.5 },
    });
  });

  it('asks for JSON output with a lower temperature', async () => {
    const fetchImpl = fakeFetch(() => jsonResponse({ response: '{"send_email": false}' }));
    const llm = createOllamaGenerator(ollama, { log: silentLog, fetchImpl });

    await llm.generate('Decide', { responseFormat: 'json' });
    expect(sentBody(fetchImpl.calls[0]?.init)).toEqual({
      model: 'gemma3:latest',
      prompt: 'Decide',
      stream: false,
      format: 'json',
      options: { temperature: 0.2 },
    });
  });

  it('uses a configured temperature for every call', async () => {
    const fetchImpl = fakeFetch(() => jsonResponse({ response: 'ok' }));
    const llm = createOllamaGenerator({ ...ollama, temperature: 0.9 }, { log: silentLog, fetchImpl });

    await llm.generate('Decide', { responseFormat: 'json' });
    expect(sentBody(fetchImpl.calls[0]?.init)).toMatchObject({ options: { temperature: 0.9 } });
  });

  it('reports a response without the "response" field', async () => {
    const fetchImpl = fakeFetch(() => jsonResponse({ done: true }));
    const llm = createOllamaGenerator(ollama, { log: silentLog, fetchImpl });
    await expect(llm.generate('x')).resolves.toBe('Error parsing Ollama response: missing "response" field');
  });

  it('reports a failed call', async () => {
    const fetchImpl = fakeFetch(() => textResponse('oops', 'text/plain', 500, 'Internal Server Error'));
    const llm = createOllamaGenerator(ollama, { log: silentLog, fetchImpl });
    await expect(llm.generate('x')).resolves.toBe(
      'Error calling Ollama API: HTTP 500 Internal Server Error. Is Ollama running?',
    );
  });

  it('reports a timeout', async () => {
    const llm = createOllamaGenerator({ ...ollama, timeoutMs: 20 }, { log: silentLog, fetchImpl: hangingFetch });
    await expect(llm.generate('x')).resolves.toBe(
      'Error: Ollama API request timed out. The model might be taking too long to respond.',
    );
  });
});

describe('OpenAI-compatible generator', () => {
  it('posts a chat completion with a bearer token', async () => {
    const fetchImpl = fakeFetch(() => jsonResponse({ choices: [{ message: { content: ' Hello there ' } }] }));
    const llm = createOpenAiGenerator(openai, { log: silentLog, fetchImpl });

    await expect(llm.generate('Say hello')).resolves.toBe('Hello there');
    const request = fetchImpl.calls[0];
    expect(request?.url).toBe('https://llm.example.test/v1/chat/completions');
    expect(request?.init?.headers).toEqual({ 'Content-Type': 'application/json', Authorization: 'Bearer test-secret' });
    expect(sentBody(request?.init)).toEqual({
      model: 'small-model',
      messages: [{ role: 'user', content: 'Say hello' }],
      temperature: 0.5,
      stream: false,
    });
  });

  it('requests a JSON object for structured output', async () => {
    const fetchImpl = fakeFetch(() => jsonResponse({ choices: [{ message: { content: '{}' } }] }));
    const llm = createOpenAiGenerator(openai, { log: silentLog, fetchImpl });

    await llm.generate('Decide', { responseFormat: 'json' });
    expect(sentBody(fetchImpl.calls[0]?.init)).toMatchObject({
      temperature: 0.2,
      response_format: { type: 'json_object' },
    });
  });

  it('reports empty content', async () => {
    const fetchImpl = fakeFetch(() => jsonResponse({ choices: [] }));
    const llm = createOpenAiGenerator(openai, { log: silentLog, fetchImpl });
    await expect(llm.generate('x')).resolves.toBe('Error: LLM returned empty content');
  });

  it('reports a reply that does not look like a chat completion', async () => {
    const fetchImpl = fakeFetch(() => jsonResponse({ choices: 'unavailable' }));
    const llm = createOpenAiGenerator(openai, { log: silentLog, fetchImpl });
    await expect(llm.generate('x')).resolves.toBe('Error: LLM returned an unexpected response shape');
  });

  it('reports transport failures', async () => {
    const fetchImpl = fakeFetch(() => Promise.reject(new Error('socket hang up')));
    const llm = createOpenAiGenerator(openai, { log: silentLog, fetchImpl });
    await expect(llm.generate('x')).resolves.toBe('Error calling LLM API: socket hang up');
  });

  it('reports a timeout', async () => {
    const llm = createOpenAiGenerator({ ...openai, timeoutMs: 20 }, { log: silentLog, fetchImpl: hangingFetch });
    await expect(llm.generate('x')).resolves.toBe('Error: LLM API request timed out.');
  });
});

describe('createGenerator', () => {
  it('picks the backend named by the configuration', () => {
    expect(createGenerator(openai, { log: silentLog }).model).toBe('small-model');
    expect(createGenerator(ollama, { log: silentLog }).model).toBe('gemma3:latest');
  });
});

describe('safeExtractJson', () => {
  it('parses a bare JSON object', () => {
    expect(safeExtractJson(' {"send_email": false} ')).toEqual({ send_email: false });
  });

  it('finds an object wrapped in prose', () => {
    expect(safeExtractJson('Sure! Here it is:\n{"send_email": true, "subject": "S", "body": "B"}\nThanks')).toEqual({
      send_email: true,
      subject: 'S',
      body: 'B',
    });
  });

  it('returns undefined when there is no object', () => {
    expect(safeExtractJson('no json here')).toBeUndefined();
    expect(safeExtractJson('{broken')).toBeUndefined();
  });
});

describe('countTokens', () => {
  it('approximates four characters per token', () => {
    expect(countTokens('abcdefgh')).toBe(2);
    expect(countTokens('abcde')).toBe(2);
  });
});
