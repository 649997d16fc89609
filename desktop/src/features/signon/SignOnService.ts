/**
 * Sign-on service
 * Drives the sign-on state machine and owns the timers it schedules
 */

import {
  DEFAULT_SIGN_ON_CONFIG,
  INITIAL_SIGN_ON_CONTEXT,
  INITIAL_SIGN_ON_STATE,
  SignOnEvent,
  SignOnSideEffectType,
} from './machine/types';
import type {
  ScreenName,
  SignOnConfig,
  SignOnContext,
  SignOnEventWithPayload,
  SignOnSideEffect,
  SignOnState,
  SignOnTransitionLog,
  TimedSignOnEvent,
} from './machine/types';
import type { WindowType } from '@/features/windows/types';
import { canSignOn, transitionSignOn } from './machine/stateMachine';

export interface SignOnServiceEvents {
  stateChange: (state: SignOnState, context: SignOnContext) => void;
  openWindow: (type: WindowType, title: string) => void;
  closeAllWindows: () => void;
  transition: (entry: SignOnTransitionLog) => void;
}

export interface SignOnServiceOptions {
  config?: Partial<SignOnConfig>;
  now?: () => number;
}

export class SignOnService {
  private state: SignOnState = INITIAL_SIGN_ON_STATE;
  private context: SignOnContext = { ...INITIAL_SIGN_ON_CONTEXT };
  private readonly config: SignOnConfig;
  private readonly now: () => number;
  private eventHandlers: Partial<SignOnServiceEvents> = {};
  private timers: Map<TimedSignOnEvent, ReturnType<typeof setTimeout>> = new Map();

  constructor(options: SignOnServiceOptions = {}) {
    this.config = { ...DEFAULT_SIGN_ON_CONFIG, ...options.config };
    this.now = options.now ?? (() => Date.now());
  }

  getState(): SignOnState {
    return this.state;
  }

  getContext(): SignOnContext {
    return { ...this.context };
  }

  getConfig(): SignOnConfig {
    return { ...this.config };
  }

  /** Number of scheduled timers still pending. */
  pendingTimers(): number {
    return this.timers.size;
  }

  on<K extends keyof SignOnServiceEvents>(event: K, handler: SignOnServiceEvents[K]): void {
    this.eventHandlers[event] = handler;
  }

  off<K extends keyof SignOnServiceEvents>(event: K): void {
    delete this.eventHandlers[event];
  }

  /**
   * Start dialing. Ignored unless idle, so repeated clicks cannot stack timers.
   */
  signOn(screenName: ScreenName): void {
    if (!canSignOn(this.state)) {
      return;
    }
    this.dispatchEvent({ type: SignOnEvent.SIGN_ON, payload: { screenName, at: this.now() } });
  }

  signOff(): void {
    this.dispatchEvent({ type: SignOnEvent.SIGN_OFF });
  }

  private dispatchEvent(event: SignOnEventWithPayload): void {
    const previousState = this.state;
    const previousSignedIn = this.context.signedIn;
    const { nextState, nextContext, sideEffects } = transitionSignOn(
      this.state,
      event,
      this.context,
      this.config
    );

    this.state = nextState;
    this.context = nextContext;

    sideEffects.forEach((sideEffect) => this.executeSideEffect(sideEffect));

    if (previousState !== nextState || previousSignedIn !== nextContext.signedIn) {
      this.eventHandlers.stateChange?.(nextState, { ...nextContext });
    }
  }

  private executeSideEffect(sideEffect: SignOnSideEffect): void {
    switch (sideEffect.type) {
      case SignOnSideEffectType.START_TIMER:
        this.setTimer(sideEffect.payload.event, sideEffect.payload.delayMs);
        break;

      case SignOnSideEffectType.CLEAR_TIMERS:
        this.clearAllTimers();
        break;

      case SignOnSideEffectType.OPEN_WINDOW:
        this.eventHandlers.openWindow?.(sideEffect.payload.type, sideEffect.payload.title);
        break;

      case SignOnSideEffectType.CLOSE_ALL_WINDOWS:
        this.eventHandlers.closeAllWindows?.();
        break;

      case SignOnSideEffectType.LOG_EVENT:
        this.eventHandlers.transition?.(sideEffect.payload);
        break;
    }
  }

  private setTimer(event: TimedSignOnEvent, delayMs: number): void {
    this.clearTimer(event);
    this.timers.set(
      event,
      setTimeout(() => {
        this.timers.delete(event);
        this.dispatchEvent({ type: event });
      }, delayMs)
    );
  }

  private clearTimer(event: TimedSignOnEvent): void {
    const timer = this.timers.get(event);
    if (timer !== undefined) {
      clearTimeout(timer);
      this.timers.delete(event);
    }
  }

  private clearAllTimers(): void {
    this.timers.forEach((timer) => clearTimeout(timer));
    this.timers.clear();
  }

  /**
   * Cleanup resources; pending timers never fire after this
   */
  destroy(): void {
    this.clearAllTimers();
    this.eventHandlers = {};
  }
}
