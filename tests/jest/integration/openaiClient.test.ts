import { createServer, type IncomingMessage, type Server } from 'node:http';
import OpenAI from 'openai';
import { z } from 'zod';
import { OpenAIInferenceProvider } from '../../../src/services/openaiClient';
import { createProvider } from '../../../src/services/providerFactory';
import { loadEnv } from '../../../src/env';
import { RouterOutputSchema } from '../../../src/validators/agentOutputs';
import type { InferenceRequest } from '../../../src/services/inferenceProvider';
import type { RouterOutput } from '../../../src/validators/agentOutputs';
import { silenceConsole } from '../helpers/scriptedProvider';

const CompletionBodySchema = z.object({ model: z.string() });

async function readBody(req: IncomingMessage): Promise<string> {
  const chunks: Buffer[] = [];
  for await (const chunk of req) {
    chunks.push(Buffer.from(chunk));
  }
  return Buffer.concat(chunks).toString('utf-8');
}

function completion(model: string, content: string) {
  return {
    id: 'chatcmpl-test',
    object: 'chat.completion',
    created: 0,
    model,
    choices: [{ index: 0, message: { role: 'assistant', content }, finish_reason: 'stop', logprobs: null }],
  };
}

const routerRequest: InferenceRequest<RouterOutput> = {
  role: 'router',
  instructions: 'Classify.',
  responseShape: '- intent',
  context: { message: 'Indexes speed up reads.' },
  schema: RouterOutputSchema,
  temperature: 0,
  tier: 'fast',
};

describe('OpenAIInferenceProvider', () => {
  silenceConsole();

  let server: Server;
  let baseURL: string;
  const models: string[] = [];
  let reply: (model: string) => { status: number; body: unknown };

  beforeEach(async () => {
    models.length = 0;
    server = createServer((req, res) => {
      readBody(req)
        .then((raw) => {
          const { model } = CompletionBodySchema.parse(JSON.parse(raw));
          models.push(model);
          const { status, body } = reply(model);
          res.writeHead(status, { 'Content-Type': 'application/json' });
          res.end(JSON.stringify(body));
        })
        .catch((error: unknown) => {
          res.writeHead(500, { 'Content-Type': 'application/json' });
          res.end(JSON.stringify({ error: { message: String(error) } }));
        });
    });
    server.listen(0);
    await new Promise<void>((resolve) => server.once('listening', () => resolve()));
    const address = server.address();
    if (address === null || typeof address === 'string') {
      throw new Error('Server is not listening on a TCP port');
    }
    baseURL = `http://127.0.0.1:${address.port}/v1`;
  });

  afterEach(async () => {
    server.closeAllConnections();
    await new Promise<void>((resolve, reject) => server.close((error) => (error ? reject(error) : resolve())));
  });

  function provider(): OpenAIInferenceProvider {
    return new OpenAIInferenceProvider({
      strongModel: 'strong-model',
      fastModel: 'fast-model',
      client: new OpenAI({ apiKey: 'test-secret', baseURL, maxRetries: 0 }),
    });
  }

  test('parses and validates the JSON answer', async () => {
    reply = (model) => ({ status: 200, body: completion(model, '{"intent":"answer","thought":"On topic."}') });

    await expect(provider().infer(routerRequest)).resolves.toEqual({ intent: 'answer', thought: 'On topic.' });
    expect(models).toEqual(['fast-model']);
  });

  test('falls back to the small model when the configured one does not exist', async () => {
    reply = (model) =>
      model === 'gpt-4o-mini'
        ? { status: 200, body: completion(model, '{"intent":"question"}') }
        : { status: 404, body: { error: { message: 'The model does not exist', code: 'model_not_found' } } };

    await expect(provider().infer({ ...routerRequest, tier: 'strong' })).resolves.toEqual({
      intent: 'question',
      thought: '',
    });
    expect(models).toEqual(['strong-model', 'gpt-4o-mini']);
  });

  test('rejects content that is not JSON', async () => {
    reply = (model) => ({ status: 200, body: completion(model, 'answer') });

    await expect(provider().infer(routerRequest)).rejects.toMatchObject({
      code: 'INVALID_PROVIDER_OUTPUT',
      message: 'router: response is not valid JSON',
    });
  });

  test('rejects JSON outside the schema', async () => {
    reply = (model) => ({ status: 200, body: completion(model, '{"intent":"chat"}') });

    await expect(provider().infer(routerRequest)).rejects.toMatchObject({ code: 'INVALID_PROVIDER_OUTPUT' });
  });

  test('requires an API key when no client is injected', async () => {
    const keyless = new OpenAIInferenceProvider({ strongModel: 'strong-model', fastModel: 'fast-model' });
    await expect(keyless.infer(routerRequest)).rejects.toMatchObject({ code: 'PROVIDER_FAILURE' });
  });
});

describe('createProvider', () => {
  silenceConsole();

  test('uses the heuristic provider offline or without a key', () => {
    expect(createProvider(loadEnv({ OPENAI_API_KEY: 'test-secret' }), true).name).toBe('heuristic');
    expect(createProvider(loadEnv({})).name).toBe('heuristic');
  });

  test('uses OpenAI when a key is configured', () => {
    expect(createProvider(loadEnv({ OPENAI_API_KEY: 'test-secret' })).name).toBe('openai');
  });
});
