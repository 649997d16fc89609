/**
 * Sign-on state machine implementation
 */

import {
  SignOnEvent,
  SignOnSideEffectType,
  SignOnState,
  STATUS_TEXT,
  INITIAL_SIGN_ON_CONTEXT,
} from './types';
import type {
  SignOnContext,
  SignOnSideEffect,
  SignOnTransitionFn,
} from './types';

/**
 * State transition function - pure, all timing is expressed as side effects
 */
export const transitionSignOn: SignOnTransitionFn = (currentState, event, context, config) => {
  const sideEffects: SignOnSideEffect[] = [];
  let nextState = currentState;
  let nextContext: SignOnContext = { ...context };

  switch (currentState) {
    case SignOnState.IDLE:
      if (event.type === SignOnEvent.SIGN_ON) {
        nextState = SignOnState.DIALING;
        nextContext = {
          signedIn: false,
          screenName: event.payload.screenName,
          startedAt: event.payload.at,
        };
        sideEffects.push({
          type: SignOnSideEffectType.START_TIMER,
          payload: { event: SignOnEvent.DIAL_COMPLETE, delayMs: config.dialingMs },
        });
      }
      break;

    case SignOnState.DIALING:
      if (event.type === SignOnEvent.DIAL_COMPLETE) {
        nextState = SignOnState.VERIFYING;
        sideEffects.push({
          type: SignOnSideEffectType.START_TIMER,
          payload: { event: SignOnEvent.VERIFIED, delayMs: config.verifyingMs },
        });
      }
      break;

    case SignOnState.VERIFYING:
      if (event.type === SignOnEvent.VERIFIED) {
        nextState = SignOnState.CONNECTED;
        sideEffects.push({
          type: SignOnSideEffectType.START_TIMER,
          payload: { event: SignOnEvent.SESSION_READY, delayMs: config.sessionMs },
        });
      }
      break;

    case SignOnState.CONNECTED:
      if (event.type === SignOnEvent.SESSION_READY && !context.signedIn) {
        nextContext.signedIn = true;
        sideEffects.push({
          type: SignOnSideEffectType.OPEN_WINDOW,
          payload: { ...config.welcomeWindow },
        });
      }
      break;
  }

  // Sign-off is accepted from every state but idle and also aborts a dial in progress
  if (event.type === SignOnEvent.SIGN_OFF && currentState !== SignOnState.IDLE) {
    nextState = SignOnState.IDLE;
    nextContext = { ...INITIAL_SIGN_ON_CONTEXT, screenName: context.screenName };
    sideEffects.push(
      { type: SignOnSideEffectType.CLEAR_TIMERS },
      { type: SignOnSideEffectType.CLOSE_ALL_WINDOWS }
    );
  }

  if (nextState !== currentState || nextContext.signedIn !== context.signedIn) {
    sideEffects.unshift({
      type: SignOnSideEffectType.LOG_EVENT,
      payload: { fromState: currentState, toState: nextState, event: event.type },
    });
  }

  return { nextState, nextContext, sideEffects };
};

/**
 * Events each state reacts to; anything else is ignored
 */
export function getValidEvents(state: SignOnState, context: SignOnContext): SignOnEvent[] {
  switch (state) {
    case SignOnState.IDLE:
      return [SignOnEvent.SIGN_ON];
    case SignOnState.DIALING:
      return [SignOnEvent.DIAL_COMPLETE, SignOnEvent.SIGN_OFF];
    case SignOnState.VERIFYING:
      return [SignOnEvent.VERIFIED, SignOnEvent.SIGN_OFF];
    case SignOnState.CONNECTED:
      return context.signedIn ? [SignOnEvent.SIGN_OFF] : [SignOnEvent.SESSION_READY, SignOnEvent.SIGN_OFF];
  }
}

export function isValidTransition(state: SignOnState, event: SignOnEvent, context: SignOnContext): boolean {
  return getValidEvents(state, context).includes(event);
}

export function canSignOn(state: SignOnState): boolean {
  return state === SignOnState.IDLE;
}

export function isSigningOn(state: SignOnState, context: SignOnContext): boolean {
  return state !== SignOnState.IDLE && !context.signedIn;
}

export function getStatusText(state: SignOnState): string {
  return STATUS_TEXT[state];
}
