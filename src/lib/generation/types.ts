export type JobKind = 'direct' | 'image' | 'structure' | 'regional';

export type JobState = 'queued' | 'processing' | 'completed' | 'failed';

export type TerminalJobState = Extract<JobState, 'completed' | 'failed'>;

export type RegionalLayout = 'vertical' | 'horizontal' | 'three_columns' | 'four_columns' | 'quadrants';

export type DownstreamEndpoint = 'txt2img' | 'img2img';

export interface HighResFix {
  scale: number;
  upscaler?: string;
  secondPassSteps: number;
  denoisingStrength: number;
}

export interface RegionalSpec {
  layout: RegionalLayout;
  common: string;
  region1: string;
  region2: string;
  region3?: string;
  region4?: string;
}

export interface ControlUnitSettings {
  enabled: boolean;
  model: string;
  module?: string;
  weight: number;
  guidanceStart: number;
  guidanceEnd: number;
  processorRes: number;
  thresholdA: number;
  thresholdB: number;
  controlMode: number;
  pixelPerfect: boolean;
}

export interface GenerationRequest {
  callerId: string;
  prompt: string;
  negativePrompt: string;
  samplerName: string;
  steps: number;
  cfgScale: number;
  width: number;
  height: number;
  batchCount: number;
  batchSize: number;
  seed: number;
  highResFix?: HighResFix;
  checkpoint?: string;
  vae?: string;
  regional?: RegionalSpec;
  controlUnits?: ControlUnitSettings[];
  /** Base64 PNG produced by the image normalizer. */
  sourceImage?: string;
  denoisingStrength: number;
  resizeMode: number;
}

export interface StyleModifier {
  name: string;
  weight: number;
}

export interface UserSession {
  callerId: string;
  modifiers: StyleModifier[];
  controlPresets: ControlUnitSettings[];
  customSettings: Record<string, unknown>;
  lastModified: string;
}

export interface ResolvedPayload {
  readonly endpoint: DownstreamEndpoint;
  readonly body: Readonly<Record<string, unknown>>;
}

export interface Job {
  id: string;
  callerId: string;
  kind: JobKind;
  payload: ResolvedPayload;
  state: JobState;
  createdAt: string;
  startedAt: string | null;
  completedAt: string | null;
  message: string | null;
}

export interface GenerationOutput {
  images: string[];
  info: Record<string, unknown>;
  parameters: Record<string, unknown>;
}

export interface JobResult {
  jobId: string;
  status: TerminalJobState;
  images: string[];
  info: Record<string, unknown>;
  parameters: Record<string, unknown>;
  error: string | null;
  completedAt: string;
}

export interface GenerationExecutor {
  submit(payload: ResolvedPayload): Promise<GenerationOutput>;
}

export type QueueUpdate =
  | { jobId: string; state: 'queued'; position: number }
  | { jobId: string; state: 'processing' }
  | { jobId: string; state: TerminalJobState; message: string | null };

export interface QueueListener {
  notify(update: QueueUpdate): void | Promise<void>;
}
