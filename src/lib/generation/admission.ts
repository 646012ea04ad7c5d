export interface AdmissionState {
  generating: boolean;
  lastCompletedAt?: number;
}

export type AdmissionDecision =
  | { accepted: true }
  | { accepted: false; reason: 'already_generating' }
  | { accepted: false; reason: 'cooldown_active'; remainingSeconds: number; retryAt: number };

export interface AdmissionDependencies {
  cooldownSeconds: number;
  now?: () => number;
}

/**
 * Per-caller throttle in front of the queue. Check and acceptance happen in the
 * same synchronous call, so two submissions in one tick cannot both pass.
 */
export class AdmissionController {
  private readonly states = new Map<string, AdmissionState>();

  private readonly cooldownMs: number;

  private readonly now: () => number;

  constructor(dependencies: AdmissionDependencies) {
    this.cooldownMs = Math.max(0, dependencies.cooldownSeconds) * 1000;
    this.now = dependencies.now ?? (() => Date.now());
  }

  tryAdmit(callerId: string, privileged: boolean): AdmissionDecision {
    const state = this.ensureState(callerId);

    if (privileged) {
      state.generating = true;
      return { accepted: true };
    }

    if (state.generating) {
      return { accepted: false, reason: 'already_generating' };
    }

    if (state.lastCompletedAt !== undefined) {
      const elapsed = this.now() - state.lastCompletedAt;
      if (elapsed < this.cooldownMs) {
        const retryAt = state.lastCompletedAt + this.cooldownMs;
        return {
          accepted: false,
          reason: 'cooldown_active',
          remainingSeconds: Math.ceil((this.cooldownMs - elapsed) / 1000),
          retryAt,
        };
      }
    }

    state.generating = true;
    return { accepted: true };
  }

  complete(callerId: string, at: number = this.now()) {
    const state = this.ensureState(callerId);
    state.generating = false;
    state.lastCompletedAt = at;
  }

  /** Stamps the cooldown start without touching `generating`, which a newer job may hold. */
  recordCompletion(callerId: string, at: number = this.now()) {
    this.ensureState(callerId).lastCompletedAt = at;
  }

  unlock(callerId: string) {
    const state = this.states.get(callerId);
    if (state) {
      state.generating = false;
    }
  }

  getState(callerId: string): AdmissionState | undefined {
    const state = this.states.get(callerId);
    return state ? { ...state } : undefined;
  }

  private ensureState(callerId: string) {
    let state = this.states.get(callerId);
    if (!state) {
      state = { generating: false };
      this.states.set(callerId, state);
    }

    return state;
  }
}
