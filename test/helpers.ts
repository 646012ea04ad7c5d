import type {
  GenerationExecutor,
  GenerationOutput,
  GenerationRequest,
  ResolvedPayload,
  UserSession,
} from '../src/lib/generation/types';

export const createRequest = (overrides: Partial<GenerationRequest> = {}): GenerationRequest => ({
  callerId: 'caller-1',
  prompt: 'a lighthouse at dusk',
  negativePrompt: '',
  samplerName: 'DPM++ 2M Karras',
  steps: 20,
  cfgScale: 7,
  width: 512,
  height: 512,
  batchCount: 1,
  batchSize: 1,
  seed: -1,
  denoisingStrength: 0.7,
  resizeMode: 0,
  ...overrides,
});

export const createSession = (overrides: Partial<UserSession> = {}): UserSession => ({
  callerId: 'caller-1',
  modifiers: [],
  controlPresets: [],
  customSettings: {},
  lastModified: '2024-01-01T00:00:00.000Z',
  ...overrides,
});

export const createOutput = (label = 'img'): GenerationOutput => ({
  images: [`${label}-base64`],
  info: { seed: 42 },
  parameters: {},
});

interface PendingCall {
  payload: ResolvedPayload;
  resolve: (output: GenerationOutput) => void;
  reject: (error: unknown) => void;
}

/** Executor whose calls stay pending until the test settles them. */
export class ManualExecutor implements GenerationExecutor {
  readonly calls: PendingCall[] = [];

  private waiters: (() => void)[] = [];

  submit(payload: ResolvedPayload): Promise<GenerationOutput> {
    return new Promise<GenerationOutput>((resolve, reject) => {
      this.calls.push({ payload, resolve, reject });
      const waiters = this.waiters;
      this.waiters = [];
      waiters.forEach((wake) => wake());
    });
  }

  /** Resolves once at least `count` submissions have been made. */
  async waitForCalls(count: number) {
    while (this.calls.length < count) {
      await new Promise<void>((resolve) => {
        this.waiters.push(resolve);
      });
    }
  }

  call(index: number): PendingCall {
    const call = this.calls[index];
    if (!call) {
      throw new Error(`No executor call at index ${index}`);
    }
    return call;
  }
}

export class ImmediateExecutor implements GenerationExecutor {
  readonly payloads: ResolvedPayload[] = [];

  constructor(private readonly outcome: (payload: ResolvedPayload) => Promise<GenerationOutput>) {}

  submit(payload: ResolvedPayload) {
    this.payloads.push(payload);
    return this.outcome(payload);
  }
}

export const createClock = (start = Date.parse('2024-05-01T12:00:00.000Z')) => {
  let current = start;
  return {
    now: () => current,
    advance: (ms: number) => {
      current += ms;
    },
    set: (value: number) => {
      current = value;
    },
  };
};

/** Lets every pending microtask, including listener deliveries, run to completion. */
export const settle = () =>
  new Promise<void>((resolve) => {
    setImmediate(resolve);
  });
