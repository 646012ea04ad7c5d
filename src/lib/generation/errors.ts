import type { JobState } from './types';

export class ValidationError extends Error {
  constructor(message: string, readonly issues: Record<string, string[] | undefined> = {}) {
    super(message);
    this.name = 'ValidationError';
  }
}

export type GenerationClientErrorKind = 'unreachable' | 'http' | 'malformed';

export class GenerationClientError extends Error {
  constructor(
    message: string,
    readonly kind: GenerationClientErrorKind,
    readonly statusCode?: number,
    readonly responseBody?: string,
  ) {
    super(message);
    this.name = 'GenerationClientError';
  }
}

export class JobNotFoundError extends Error {
  constructor(readonly jobId: string) {
    super(`Job ${jobId} not found.`);
    this.name = 'JobNotFoundError';
  }
}

export class ResultNotReadyError extends Error {
  constructor(readonly jobId: string, readonly state: JobState) {
    super(`Job ${jobId} has not finished yet (state: ${state}).`);
    this.name = 'ResultNotReadyError';
  }
}

export class InvalidJobTransitionError extends Error {
  constructor(readonly jobId: string, readonly from: JobState, readonly to: JobState) {
    super(`Job ${jobId} cannot move from ${from} to ${to}.`);
    this.name = 'InvalidJobTransitionError';
  }
}

/**
 * Text safe to show the caller for a failed generation. Raw downstream output
 * stays in the job result.
 */
export const describeGenerationFailure = (error: unknown): string => {
  if (error instanceof GenerationClientError) {
    switch (error.kind) {
      case 'unreachable':
        return 'The image service could not be reached. Please try again later.';
      case 'http':
        return `The image service rejected the request (HTTP ${error.statusCode ?? 'unknown'}).`;
      case 'malformed':
        return 'The image service returned an unreadable response.';
      default:
        return 'Image generation failed.';
    }
  }

  return 'Image generation failed.';
};

/** Raw text kept on a failed job's result. */
export const rawFailureText = (error: unknown): string => {
  if (error instanceof GenerationClientError) {
    if (error.kind === 'http') {
      return `HTTP ${error.statusCode ?? 'unknown'}: ${error.responseBody ?? ''}`;
    }
    return error.responseBody ? `${error.message} ${error.responseBody}` : error.message;
  }

  return error instanceof Error ? error.message : String(error);
};
