import { strict as assert } from 'node:assert';
import { describe, it } from 'node:test';

import { AdmissionController } from '../src/lib/generation/admission';
import { createClock } from './helpers';

describe('AdmissionController', () => {
  it('rejects a second submission while the first is generating', () => {
    const admission = new AdmissionController({ cooldownSeconds: 15 });

    assert.deepEqual(admission.tryAdmit('alice', false), { accepted: true });
    assert.deepEqual(admission.tryAdmit('alice', false), { accepted: false, reason: 'already_generating' });
    assert.deepEqual(admission.getState('alice'), { generating: true });
  });

  it('keeps callers independent of each other', () => {
    const admission = new AdmissionController({ cooldownSeconds: 15 });

    assert.equal(admission.tryAdmit('alice', false).accepted, true);
    assert.equal(admission.tryAdmit('bob', false).accepted, true);
  });

  it('reports the cooldown rounded up to whole seconds', () => {
    const clock = createClock();
    const admission = new AdmissionController({ cooldownSeconds: 15, now: clock.now });
    const completedAt = clock.now();

    admission.tryAdmit('alice', false);
    admission.complete('alice', completedAt);
    clock.advance(4200);

    assert.deepEqual(admission.tryAdmit('alice', false), {
      accepted: false,
      reason: 'cooldown_active',
      remainingSeconds: 11,
      retryAt: completedAt + 15000,
    });
  });

  it('admits again once the cooldown has fully elapsed', () => {
    const clock = createClock();
    const admission = new AdmissionController({ cooldownSeconds: 15, now: clock.now });

    admission.tryAdmit('alice', false);
    admission.complete('alice', clock.now());
    clock.advance(15000);

    assert.deepEqual(admission.tryAdmit('alice', false), { accepted: true });
  });

  it('never rejects privileged callers', () => {
    const clock = createClock();
    const admission = new AdmissionController({ cooldownSeconds: 15, now: clock.now });

    assert.deepEqual(admission.tryAdmit('admin', true), { accepted: true });
    assert.deepEqual(admission.tryAdmit('admin', true), { accepted: true });
    admission.complete('admin', clock.now());
    assert.deepEqual(admission.tryAdmit('admin', true), { accepted: true });
  });

  it('unlock clears generating without starting a cooldown', () => {
    const admission = new AdmissionController({ cooldownSeconds: 15 });

    admission.tryAdmit('alice', false);
    admission.unlock('alice');

    assert.deepEqual(admission.getState('alice'), { generating: false });
    assert.deepEqual(admission.tryAdmit('alice', false), { accepted: true });
  });

  it('recordCompletion starts the cooldown but leaves a held lock in place', () => {
    const clock = createClock();
    const admission = new AdmissionController({ cooldownSeconds: 15, now: clock.now });

    admission.tryAdmit('alice', false);
    admission.recordCompletion('alice', clock.now());

    assert.deepEqual(admission.getState('alice'), { generating: true, lastCompletedAt: clock.now() });
    assert.deepEqual(admission.tryAdmit('alice', false), { accepted: false, reason: 'already_generating' });

    admission.unlock('alice');
    assert.equal(admission.tryAdmit('alice', false).accepted, false);
  });

  it('returns copies of the per-caller state', () => {
    const admission = new AdmissionController({ cooldownSeconds: 15 });
    assert.equal(admission.getState('nobody'), undefined);

    admission.tryAdmit('alice', false);
    const snapshot = admission.getState('alice');
    assert.ok(snapshot);
    snapshot.generating = false;

    assert.deepEqual(admission.getState('alice'), { generating: true });
  });
});
