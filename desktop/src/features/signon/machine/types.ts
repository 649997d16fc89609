/**
 * Sign-on state machine types
 *
 * The dial-up sequence is a fixed script: each state schedules the event
 * that advances it, so a sign-on always takes dialingMs + verifyingMs +
 * sessionMs from click to desktop.
 */

import type { WindowType } from '@/features/windows/types';

export const SignOnState = {
  IDLE: 'idle',
  DIALING: 'dialing',
  VERIFYING: 'verifying',
  CONNECTED: 'connected',
} as const;

export type SignOnState = typeof SignOnState[keyof typeof SignOnState];

export const SignOnEvent = {
  SIGN_ON: 'sign_on',
  DIAL_COMPLETE: 'dial_complete',
  VERIFIED: 'verified',
  SESSION_READY: 'session_ready',
  SIGN_OFF: 'sign_off',
} as const;

export type SignOnEvent = typeof SignOnEvent[keyof typeof SignOnEvent];

/** Events the service fires from its own timers. */
export type TimedSignOnEvent =
  | typeof SignOnEvent.DIAL_COMPLETE
  | typeof SignOnEvent.VERIFIED
  | typeof SignOnEvent.SESSION_READY;

export const SCREEN_NAMES = ['Guest', 'Admin'] as const;

export type ScreenName = typeof SCREEN_NAMES[number];

export interface SignOnContext {
  signedIn: boolean;
  screenName: ScreenName;
  /** Epoch millis of the SIGN ON click; null while idle. */
  startedAt: number | null;
}

export type SignOnEventWithPayload =
  | { type: typeof SignOnEvent.SIGN_ON; payload: { screenName: ScreenName; at: number } }
  | { type: TimedSignOnEvent }
  | { type: typeof SignOnEvent.SIGN_OFF };

export interface SignOnConfig {
  dialingMs: number;
  verifyingMs: number;
  sessionMs: number;
  /** Window opened once the session is ready. */
  welcomeWindow: { type: WindowType; title: string };
}

export const DEFAULT_SIGN_ON_CONFIG: SignOnConfig = {
  dialingMs: 1500,
  verifyingMs: 1500,
  sessionMs: 1000,
  welcomeWindow: { type: 'buddy', title: 'Buddy List' },
};

export const SignOnSideEffectType = {
  START_TIMER: 'start_timer',
  CLEAR_TIMERS: 'clear_timers',
  OPEN_WINDOW: 'open_window',
  CLOSE_ALL_WINDOWS: 'close_all_windows',
  LOG_EVENT: 'log_event',
} as const;

export type SignOnSideEffectType = typeof SignOnSideEffectType[keyof typeof SignOnSideEffectType];

export interface SignOnTransitionLog {
  fromState: SignOnState;
  toState: SignOnState;
  event: SignOnEvent;
}

export type SignOnSideEffect =
  | { type: typeof SignOnSideEffectType.START_TIMER; payload: { event: TimedSignOnEvent; delayMs: number } }
  | { type: typeof SignOnSideEffectType.CLEAR_TIMERS }
  | { type: typeof SignOnSideEffectType.OPEN_WINDOW; payload: { type: WindowType; title: string } }
  | { type: typeof SignOnSideEffectType.CLOSE_ALL_WINDOWS }
  | { type: typeof SignOnSideEffectType.LOG_EVENT; payload: SignOnTransitionLog };

export interface SignOnTransition {
  nextState: SignOnState;
  nextContext: SignOnContext;
  sideEffects: SignOnSideEffect[];
}

export type SignOnTransitionFn = (
  currentState: SignOnState,
  event: SignOnEventWithPayload,
  context: SignOnContext,
  config: SignOnConfig
) => SignOnTransition;

export const INITIAL_SIGN_ON_STATE: SignOnState = SignOnState.IDLE;

export const INITIAL_SIGN_ON_CONTEXT: SignOnContext = {
  signedIn: false,
  screenName: 'Guest',
  startedAt: null,
};

export const STATUS_TEXT: Record<SignOnState, string> = {
  [SignOnState.IDLE]: 'Ready to connect.',
  [SignOnState.DIALING]: 'Step 1: Dialing...',
  [SignOnState.VERIFYING]: 'Step 2: Verifying password...',
  [SignOnState.CONNECTED]: 'Welcome!',
};
