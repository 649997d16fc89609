import { describe, it, expect } from 'vitest';
import {
  canSignOn,
  getStatusText,
  getValidEvents,
  isSigningOn,
  isValidTransition,
  transitionSignOn,
} from '../../src/features/signon/machine/stateMachine';
import {
  DEFAULT_SIGN_ON_CONFIG,
  INITIAL_SIGN_ON_CONTEXT,
  SignOnEvent,
  SignOnSideEffectType,
  SignOnState,
} from '../../src/features/signon/machine/types';
import type { SignOnContext } from '../../src/features/signon/machine/types';

const config = DEFAULT_SIGN_ON_CONFIG;

const dialingContext: SignOnContext = { signedIn: false, screenName: 'Admin', startedAt: 1000 };

describe('Sign-On State Machine', () => {
  describe('Dial-up sequence', () => {
    it('starts dialing on SIGN_ON and schedules the dial', () => {
      const result = transitionSignOn(
        SignOnState.IDLE,
        { type: SignOnEvent.SIGN_ON, payload: { screenName: 'Admin', at: 1000 } },
        INITIAL_SIGN_ON_CONTEXT,
        config
      );

      expect(result.nextState).toBe(SignOnState.DIALING);
      expect(result.nextContext).toEqual(dialingContext);
      expect(result.sideEffects).toEqual([
        {
          type: SignOnSideEffectType.LOG_EVENT,
          payload: { fromState: 'idle', toState: 'dialing', event: 'sign_on' },
        },
        {
          type: SignOnSideEffectType.START_TIMER,
          payload: { event: SignOnEvent.DIAL_COMPLETE, delayMs: 1500 },
        },
      ]);
    });

    it('advances dialing -> verifying -> connected with the configured delays', () => {
      const verifying = transitionSignOn(SignOnState.DIALING, { type: SignOnEvent.DIAL_COMPLETE }, dialingContext, config);
      expect(verifying.nextState).toBe(SignOnState.VERIFYING);
      expect(verifying.sideEffects).toContainEqual({
        type: SignOnSideEffectType.START_TIMER,
        payload: { event: SignOnEvent.VERIFIED, delayMs: 1500 },
      });

      const connected = transitionSignOn(SignOnState.VERIFYING, { type: SignOnEvent.VERIFIED }, dialingContext, config);
      expect(connected.nextState).toBe(SignOnState.CONNECTED);
      expect(connected.nextContext.signedIn).toBe(false);
      expect(connected.sideEffects).toContainEqual({
        type: SignOnSideEffectType.START_TIMER,
        payload: { event: SignOnEvent.SESSION_READY, delayMs: 1000 },
      });
    });

    it('signs in on SESSION_READY and opens the buddy list', () => {
      const result = transitionSignOn(SignOnState.CONNECTED, { type: SignOnEvent.SESSION_READY }, dialingContext, config);

      expect(result.nextState).toBe(SignOnState.CONNECTED);
      expect(result.nextContext.signedIn).toBe(true);
      expect(result.sideEffects).toContainEqual({
        type: SignOnSideEffectType.OPEN_WINDOW,
        payload: { type: 'buddy', title: 'Buddy List' },
      });
    });

    it('does not open a second buddy list when already signed in', () => {
      const signedIn = { ...dialingContext, signedIn: true };
      const result = transitionSignOn(SignOnState.CONNECTED, { type: SignOnEvent.SESSION_READY }, signedIn, config);

      expect(result.sideEffects).toEqual([]);
    });
  });

  describe('Ignored events', () => {
    it('ignores SIGN_ON once dialing has started', () => {
      const result = transitionSignOn(
        SignOnState.DIALING,
        { type: SignOnEvent.SIGN_ON, payload: { screenName: 'Guest', at: 2000 } },
        dialingContext,
        config
      );

      expect(result.nextState).toBe(SignOnState.DIALING);
      expect(result.nextContext).toEqual(dialingContext);
      expect(result.sideEffects).toEqual([]);
    });

    it('ignores out-of-order timer events', () => {
      const result = transitionSignOn(SignOnState.DIALING, { type: SignOnEvent.VERIFIED }, dialingContext, config);

      expect(result.nextState).toBe(SignOnState.DIALING);
      expect(result.sideEffects).toEqual([]);
    });

    it('ignores SIGN_OFF while idle', () => {
      const result = transitionSignOn(SignOnState.IDLE, { type: SignOnEvent.SIGN_OFF }, INITIAL_SIGN_ON_CONTEXT, config);

      expect(result.nextState).toBe(SignOnState.IDLE);
      expect(result.sideEffects).toEqual([]);
    });
  });

  describe('Sign off', () => {
    it('returns to idle, clears timers and closes every window', () => {
      const signedIn = { ...dialingContext, signedIn: true };
      const result = transitionSignOn(SignOnState.CONNECTED, { type: SignOnEvent.SIGN_OFF }, signedIn, config);

      expect(result.nextState).toBe(SignOnState.IDLE);
      expect(result.nextContext).toEqual({ signedIn: false, screenName: 'Admin', startedAt: null });
      expect(result.sideEffects.map((effect) => effect.type)).toEqual([
        SignOnSideEffectType.LOG_EVENT,
        SignOnSideEffectType.CLEAR_TIMERS,
        SignOnSideEffectType.CLOSE_ALL_WINDOWS,
      ]);
    });

    it('aborts a dial in progress', () => {
      const result = transitionSignOn(SignOnState.VERIFYING, { type: SignOnEvent.SIGN_OFF }, dialingContext, config);

      expect(result.nextState).toBe(SignOnState.IDLE);
      expect(result.sideEffects.map((effect) => effect.type)).toContain(SignOnSideEffectType.CLEAR_TIMERS);
    });
  });

  describe('Helpers', () => {
    it('lists the events each state accepts', () => {
      expect(getValidEvents(SignOnState.IDLE, INITIAL_SIGN_ON_CONTEXT)).toEqual([SignOnEvent.SIGN_ON]);
      expect(getValidEvents(SignOnState.CONNECTED, { ...dialingContext, signedIn: true })).toEqual([SignOnEvent.SIGN_OFF]);
      expect(isValidTransition(SignOnState.DIALING, SignOnEvent.DIAL_COMPLETE, dialingContext)).toBe(true);
      expect(isValidTransition(SignOnState.DIALING, SignOnEvent.SIGN_ON, dialingContext)).toBe(false);
    });

    it('only allows signing on from idle', () => {
      expect(canSignOn(SignOnState.IDLE)).toBe(true);
      expect(canSignOn(SignOnState.DIALING)).toBe(false);
      expect(canSignOn(SignOnState.CONNECTED)).toBe(false);
    });

    it('reports the dial-up as in progress until signed in', () => {
      expect(isSigningOn(SignOnState.IDLE, INITIAL_SIGN_ON_CONTEXT)).toBe(false);
      expect(isSigningOn(SignOnState.CONNECTED, dialingContext)).toBe(true);
      expect(isSigningOn(SignOnState.CONNECTED, { ...dialingContext, signedIn: true })).toBe(false);
    });

    it('maps each state to its status line', () => {
      expect(getStatusText(SignOnState.IDLE)).toBe('Ready to connect.');
      expect(getStatusText(SignOnState.DIALING)).toBe('Step 1: Dialing...');
      expect(getStatusText(SignOnState.VERIFYING)).toBe('Step 2: Verifying password...');
      expect(getStatusText(SignOnState.CONNECTED)).toBe('Welcome!');
    });
  });
});
