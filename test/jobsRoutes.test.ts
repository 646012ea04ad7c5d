import { strict as assert } from 'node:assert';
import type { NextFunction, Request, Response, Router } from 'express';
import test from 'node:test';

import type { AuthenticatedCaller } from '../src/lib/auth';
import { AdmissionController } from '../src/lib/generation/admission';
import { GenerationQueue } from '../src/lib/generation/jobQueue';
import { JobStore } from '../src/lib/generation/jobStore';
import { GenerationPipeline } from '../src/lib/generation/pipeline';
import type { AppServices } from '../src/lib/services';
import { createJobsRouter } from '../src/routes/jobs';
import { createClock, createOutput, createRequest, createSession, ManualExecutor } from './helpers';

type Handler = (req: Request, res: Response, next: NextFunction) => unknown;

// The last layer on a route is the handler; earlier ones are middleware such as requireAuth.
const getRouteHandler = (router: Router, path: string): Handler => {
  const layer = (router as unknown as { stack: unknown[] }).stack.find((entry: unknown) => {
    const candidate = entry as { route?: { path?: string; methods?: Record<string, boolean> } };
    return candidate.route?.path === path && Boolean(candidate.route?.methods?.get);
  }) as { route?: { stack: { handle: unknown }[] } } | undefined;

  const handle = layer?.route?.stack.at(-1)?.handle;
  if (!handle) {
    throw new Error(`Route handler for ${path} not found`);
  }

  return handle as Handler;
};

const createResponse = () => {
  let payload: unknown;
  let statusCode = 200;
  const res = {
    status: (code: number) => {
      statusCode = code;
      return res;
    },
    json: (value: unknown) => {
      payload = value;
      return res;
    },
  } as unknown as Response;

  return {
    res,
    getPayload: () => payload,
    getStatus: () => statusCode,
  };
};

const caller = (id: string, role: AuthenticatedCaller['role'] = 'USER'): AuthenticatedCaller => ({
  id,
  role,
  displayName: id,
  privileged: role === 'ADMIN',
});

const setup = () => {
  const clock = createClock();
  const executor = new ManualExecutor();
  const store = new JobStore({ now: clock.now });
  const admission = new AdmissionController({ cooldownSeconds: 15, now: clock.now });
  const queue = new GenerationQueue({ store, executor, admission, now: clock.now });
  const pipeline = new GenerationPipeline({
    admission,
    store,
    queue,
    sessions: { getSnapshot: (callerId) => createSession({ callerId }) },
  });
  const router = createJobsRouter({ pipeline } as unknown as AppServices);

  return { executor, pipeline, router };
};

const invoke = async (handler: Handler, params: Record<string, string>, who: AuthenticatedCaller) => {
  const request = { params, query: {}, caller: who } as unknown as Request;
  const response = createResponse();

  await handler(request, response.res, (error?: unknown) => {
    if (error) {
      throw error;
    }
  });

  return response;
};

test('job status is visible to its owner and hidden from other callers', async () => {
  const { executor, pipeline, router } = setup();
  const outcome = pipeline.submit('direct', createRequest({ callerId: 'alice' }), { privileged: false });
  assert.ok(outcome.accepted);
  const handler = getRouteHandler(router, '/:id');

  const owner = await invoke(handler, { id: outcome.job.id }, caller('alice'));
  assert.equal(owner.getStatus(), 200);
  assert.deepEqual(owner.getPayload(), {
    job: {
      id: outcome.job.id,
      callerId: 'alice',
      kind: 'direct',
      endpoint: 'txt2img',
      state: 'queued',
      position: 1,
      createdAt: '2024-05-01T12:00:00.000Z',
      startedAt: null,
      completedAt: null,
      message: null,
    },
  });

  const stranger = await invoke(handler, { id: outcome.job.id }, caller('bob'));
  assert.equal(stranger.getStatus(), 404);
  assert.deepEqual(stranger.getPayload(), { code: 'JOB_NOT_FOUND', message: 'Job not found.' });

  const admin = await invoke(handler, { id: outcome.job.id }, caller('root', 'ADMIN'));
  assert.equal(admin.getStatus(), 200);

  await executor.waitForCalls(1);
  executor.call(0).resolve(createOutput());
  await pipeline.onIdle();
});

test('job result answers 409 until the job finishes and 404 for unknown ids', async () => {
  const { executor, pipeline, router } = setup();
  const outcome = pipeline.submit('direct', createRequest({ callerId: 'alice' }), { privileged: false });
  assert.ok(outcome.accepted);
  const handler = getRouteHandler(router, '/:id/result');

  const early = await invoke(handler, { id: outcome.job.id }, caller('alice'));
  assert.equal(early.getStatus(), 409);
  assert.deepEqual(early.getPayload(), {
    code: 'RESULT_NOT_READY',
    message: 'The job has not finished yet.',
    state: 'queued',
  });

  await executor.waitForCalls(1);
  executor.call(0).resolve(createOutput('final'));
  await pipeline.onIdle();

  const done = await invoke(handler, { id: outcome.job.id }, caller('alice'));
  assert.equal(done.getStatus(), 200);
  assert.deepEqual(done.getPayload(), {
    result: {
      jobId: outcome.job.id,
      status: 'completed',
      images: ['final-base64'],
      info: { seed: 42 },
      parameters: {},
      error: null,
      completedAt: '2024-05-01T12:00:00.000Z',
    },
  });

  const unknown = await invoke(handler, { id: 'missing' }, caller('alice'));
  assert.equal(unknown.getStatus(), 404);
});

test('job listing only shows the caller’s own jobs', async () => {
  const { executor, pipeline, router } = setup();
  const mine = pipeline.submit('direct', createRequest({ callerId: 'alice' }), { privileged: false });
  pipeline.submit('direct', createRequest({ callerId: 'bob' }), { privileged: false });
  assert.ok(mine.accepted);

  const response = await invoke(getRouteHandler(router, '/'), {}, caller('alice'));
  const payload = response.getPayload();
  assert.ok(payload && typeof payload === 'object' && 'jobs' in payload && 'queueDepth' in payload);
  assert.equal(payload.queueDepth, 2);
  assert.ok(Array.isArray(payload.jobs));
  assert.equal(payload.jobs.length, 1);

  await executor.waitForCalls(1);
  executor.call(0).resolve(createOutput());
  await executor.waitForCalls(2);
  executor.call(1).resolve(createOutput());
  await pipeline.onIdle();
});
