import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { SignOnService } from '../../src/features/signon/SignOnService';
import { SignOnState } from '../../src/features/signon/machine/types';

describe('SignOnService', () => {
  let service: SignOnService;
  const openWindow = vi.fn();
  const closeAllWindows = vi.fn();
  const stateChange = vi.fn();

  beforeEach(() => {
    vi.useFakeTimers();
    vi.clearAllMocks();
    service = new SignOnService({ now: () => 42 });
    service.on('openWindow', openWindow);
    service.on('closeAllWindows', closeAllWindows);
    service.on('stateChange', stateChange);
  });

  afterEach(() => {
    service.destroy();
  });

  it('walks the dial-up script on the default schedule', () => {
    service.signOn('Admin');
    expect(service.getState()).toBe(SignOnState.DIALING);
    expect(service.getContext()).toEqual({ signedIn: false, screenName: 'Admin', startedAt: 42 });

    vi.advanceTimersByTime(1499);
    expect(service.getState()).toBe(SignOnState.DIALING);
    vi.advanceTimersByTime(1);
    expect(service.getState()).toBe(SignOnState.VERIFYING);

    vi.advanceTimersByTime(1500);
    expect(service.getState()).toBe(SignOnState.CONNECTED);
    expect(service.getContext().signedIn).toBe(false);
    expect(openWindow).not.toHaveBeenCalled();

    vi.advanceTimersByTime(1000);
    expect(service.getContext().signedIn).toBe(true);
    expect(openWindow).toHaveBeenCalledTimes(1);
    expect(openWindow).toHaveBeenCalledWith('buddy', 'Buddy List');
    expect(service.pendingTimers()).toBe(0);
  });

  it('notifies every state change once', () => {
    service.signOn('Guest');
    vi.runAllTimers();

    expect(stateChange.mock.calls.map(([state, context]) => [state, context.signedIn])).toEqual([
      ['dialing', false],
      ['verifying', false],
      ['connected', false],
      ['connected', true],
    ]);
  });

  it('ignores repeated sign-on clicks', () => {
    service.signOn('Guest');
    vi.advanceTimersByTime(500);
    service.signOn('Admin');

    expect(service.getContext().screenName).toBe('Guest');
    expect(service.pendingTimers()).toBe(1);

    vi.runAllTimers();
    expect(openWindow).toHaveBeenCalledTimes(1);
  });

  it('honours custom timing', () => {
    const quick = new SignOnService({ config: { dialingMs: 10, verifyingMs: 10, sessionMs: 10 } });
    quick.signOn('Guest');

    vi.advanceTimersByTime(30);

    expect(quick.getContext().signedIn).toBe(true);
    quick.destroy();
  });

  it('signs off, closing windows and cancelling pending timers', () => {
    service.signOn('Guest');
    vi.advanceTimersByTime(2000);

    service.signOff();

    expect(service.getState()).toBe(SignOnState.IDLE);
    expect(service.pendingTimers()).toBe(0);
    expect(closeAllWindows).toHaveBeenCalledTimes(1);

    vi.runAllTimers();
    expect(service.getState()).toBe(SignOnState.IDLE);
    expect(openWindow).not.toHaveBeenCalled();
  });

  it('never fires timers after destroy', () => {
    service.signOn('Guest');
    service.destroy();

    vi.runAllTimers();

    expect(service.getState()).toBe(SignOnState.DIALING);
    expect(stateChange).toHaveBeenCalledTimes(1);
    expect(service.pendingTimers()).toBe(0);
  });

  it('reports transitions to the transition handler', () => {
    const transition = vi.fn();
    service.on('transition', transition);

    service.signOn('Guest');

    expect(transition).toHaveBeenCalledWith({ fromState: 'idle', toState: 'dialing', event: 'sign_on' });

    service.off('transition');
    vi.advanceTimersByTime(1500);
    expect(transition).toHaveBeenCalledTimes(1);
  });
});
