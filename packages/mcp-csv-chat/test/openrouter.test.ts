import { AxiosError, type AxiosAdapter, type AxiosResponse, type InternalAxiosRequestConfig } from 'axios';
import { describe, expect, it } from 'vitest';
import { OpenRouterChatClient } from '../src/services/openrouter.ts';
import { OpenRouterAPIError } from '../src/utils/errors.ts';

/** In-process stand-in for the HTTP transport; records every request it sees. */
function fakeApi(status: number, data: unknown) {
  const seen: InternalAxiosRequestConfig[] = [];
  const adapter: AxiosAdapter = async (config) => {
    seen.push(config);
    const response: AxiosResponse = { data, status, statusText: String(status), headers: {}, config };
    if (status >= 400) {
      throw new AxiosError(`Request failed with status code ${status}`, AxiosError.ERR_BAD_RESPONSE, config, null, response);
    }
    return response;
  };
  return { adapter, seen };
}

const request = {
  messages: [
    { role: 'system' as const, content: 'You are a test analyst.' },
    { role: 'user' as const, content: 'What is the average sales?' },
  ],
  model: 'test-model',
  temperature: 0,
};

describe('OpenRouterChatClient', () => {
  it('posts the messages and returns the answer text', async () => {
    const { adapter, seen } = fakeApi(200, {
      choices: [{ message: { role: 'assistant', content: 'The average is 200.' } }],
    });
    const client = new OpenRouterChatClient('test-key', { baseUrl: 'https://llm.test/v1/', adapter });

    await expect(client.invoke(request)).resolves.toBe('The average is 200.');

    const [config] = seen;
    expect(config?.baseURL).toBe('https://llm.test/v1');
    expect(config?.url).toBe('/chat/completions');
    expect(config?.method).toBe('post');
    expect(config?.headers.get('Authorization')).toBe('Bearer test-key');
    expect(JSON.parse(String(config?.data))).toEqual({
      model: 'test-model',
      temperature: 0,
      messages: request.messages,
    });
  });

  it('joins text parts when the content is an array', async () => {
    const { adapter } = fakeApi(200, {
      choices: [{ message: { content: [{ type: 'text', text: 'Two ' }, { type: 'text', text: 'parts' }] } }],
    });
    const client = new OpenRouterChatClient('test-key', { adapter });

    await expect(client.invoke(request)).resolves.toBe('Two parts');
  });

  it('reports the API error message and status', async () => {
    const { adapter } = fakeApi(401, { error: { message: 'Invalid API key' } });
    const client = new OpenRouterChatClient('test-key', { adapter });

    const failure = client.invoke(request);
    await expect(failure).rejects.toBeInstanceOf(OpenRouterAPIError);
    await expect(failure).rejects.toMatchObject({
      message: 'OpenRouter API error: Invalid API key',
      statusCode: 401,
    });
  });

  it('rejects a response without answer text', async () => {
    const { adapter } = fakeApi(200, { choices: [] });
    const client = new OpenRouterChatClient('test-key', { adapter });

    await expect(client.invoke(request)).rejects.toThrow('No answer text in OpenRouter response.');
  });
});
