import { strict as assert } from 'node:assert';
import { describe, it } from 'node:test';

import { GenerationClientError } from '../src/lib/generation/errors';
import { StableDiffusionClient } from '../src/lib/generation/sdClient';

interface RecordedRequest {
  url: string;
  method: string;
  body: string | null;
}

const createFakeFetch = (routes: Record<string, () => Response>) => {
  const requests: RecordedRequest[] = [];

  const fakeFetch = async (input: string | URL | Request, init?: RequestInit): Promise<Response> => {
    const url = typeof input === 'string' ? input : input instanceof URL ? input.toString() : input.url;
    requests.push({
      url,
      method: init?.method ?? 'GET',
      body: typeof init?.body === 'string' ? init.body : null,
    });

    const path = new URL(url).pathname;
    const route = routes[path];
    if (!route) {
      throw new TypeError('fetch failed');
    }
    return route();
  };

  return { fakeFetch, requests };
};

const json = (value: unknown, status = 200) =>
  new Response(JSON.stringify(value), { status, headers: { 'content-type': 'application/json' } });

describe('StableDiffusionClient', () => {
  it('posts the payload body to the endpoint and parses the info string', async () => {
    const { fakeFetch, requests } = createFakeFetch({
      '/sdapi/v1/img2img': () =>
        json({ images: ['aW1n', 7], info: JSON.stringify({ seed: 1234 }), parameters: { steps: 20 } }),
    });
    const client = new StableDiffusionClient({ baseUrl: 'localhost:7860/', timeoutMs: 1000, fetch: fakeFetch });

    const output = await client.submit({ endpoint: 'img2img', body: { prompt: 'harbour', init_images: ['AAAA'] } });

    assert.deepEqual(output, { images: ['aW1n'], info: { seed: 1234 }, parameters: { steps: 20 } });
    assert.deepEqual(requests, [
      {
        url: 'http://localhost:7860/sdapi/v1/img2img',
        method: 'POST',
        body: '{"prompt":"harbour","init_images":["AAAA"]}',
      },
    ]);
  });

  it('keeps an unparseable info string under raw', async () => {
    const { fakeFetch } = createFakeFetch({
      '/sdapi/v1/txt2img': () => json({ images: [], info: 'not json' }),
    });
    const client = new StableDiffusionClient({ baseUrl: 'http://sd.local', timeoutMs: 1000, fetch: fakeFetch });

    const output = await client.submit({ endpoint: 'txt2img', body: {} });
    assert.deepEqual(output, { images: [], info: { raw: 'not json' }, parameters: {} });
  });

  it('classifies transport, status and body failures', async () => {
    const { fakeFetch } = createFakeFetch({
      '/sdapi/v1/txt2img': () => new Response('Internal Server Error', { status: 500 }),
      '/sdapi/v1/img2img': () => new Response('<html>', { status: 200 }),
    });
    const client = new StableDiffusionClient({ baseUrl: 'http://sd.local', timeoutMs: 1000, fetch: fakeFetch });
    const offline = new StableDiffusionClient({
      baseUrl: 'http://sd.local',
      timeoutMs: 1000,
      fetch: async () => {
        throw new TypeError('fetch failed');
      },
    });

    await assert.rejects(client.submit({ endpoint: 'txt2img', body: {} }), (error: unknown) => {
      assert.ok(error instanceof GenerationClientError);
      assert.equal(error.kind, 'http');
      assert.equal(error.statusCode, 500);
      assert.equal(error.responseBody, 'Internal Server Error');
      return true;
    });
    await assert.rejects(client.submit({ endpoint: 'img2img', body: {} }), (error: unknown) => {
      assert.ok(error instanceof GenerationClientError);
      assert.equal(error.kind, 'malformed');
      return true;
    });
    await assert.rejects(offline.submit({ endpoint: 'txt2img', body: {} }), (error: unknown) => {
      assert.ok(error instanceof GenerationClientError);
      assert.equal(error.kind, 'unreachable');
      assert.equal(error.responseBody, 'fetch failed');
      return true;
    });
  });

  it('treats a response without images as malformed', async () => {
    const { fakeFetch } = createFakeFetch({ '/sdapi/v1/txt2img': () => json({ detail: 'queued' }) });
    const client = new StableDiffusionClient({ baseUrl: 'http://sd.local', timeoutMs: 1000, fetch: fakeFetch });

    await assert.rejects(client.submit({ endpoint: 'txt2img', body: {} }), GenerationClientError);
  });

  it('reports online, error and offline status', async () => {
    const online = new StableDiffusionClient({
      baseUrl: 'http://sd.local',
      timeoutMs: 1000,
      fetch: createFakeFetch({ '/sdapi/v1/options': () => json({}) }).fakeFetch,
    });
    const failing = new StableDiffusionClient({
      baseUrl: 'http://sd.local',
      timeoutMs: 1000,
      fetch: createFakeFetch({ '/sdapi/v1/options': () => new Response('nope', { status: 503 }) }).fakeFetch,
    });
    const offline = new StableDiffusionClient({
      baseUrl: 'http://sd.local',
      timeoutMs: 1000,
      fetch: createFakeFetch({}).fakeFetch,
    });

    assert.deepEqual(await online.getStatus(), { status: 'online' });
    assert.deepEqual(await failing.getStatus(), { status: 'error', statusCode: 503 });
    assert.deepEqual(await offline.getStatus(), { status: 'offline', error: 'fetch failed' });
  });

  it('lists resources and falls back when optional listings are missing', async () => {
    const { fakeFetch } = createFakeFetch({
      '/sdapi/v1/sd-models': () => json([{ model_name: 'base_v1' }, { title: 'untitled' }]),
      '/sdapi/v1/samplers': () => json([{ name: 'Euler a' }, { name: 'DPM++ 2M Karras' }]),
      '/sdapi/v1/upscalers': () => json([{ name: 'Latent' }]),
      '/sdapi/v1/sd-vae': () => new Response('missing', { status: 404 }),
      '/controlnet/model_list': () => json({ model_list: ['control_canny', 3] }),
    });
    const client = new StableDiffusionClient({ baseUrl: 'http://sd.local', timeoutMs: 1000, fetch: fakeFetch });

    assert.deepEqual(await client.listResources(), {
      checkpoints: ['base_v1'],
      vaes: ['Automatic', 'None'],
      samplers: ['Euler a', 'DPM++ 2M Karras'],
      upscalers: ['Latent'],
      controlModels: ['control_canny'],
    });
  });
});
