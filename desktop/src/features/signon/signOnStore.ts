/**
 * Sign-on store using Zustand
 * Mirrors the SignOnService state and forwards its window side effects to the window store
 */

import { create } from 'zustand';
import { devtools, subscribeWithSelector } from 'zustand/middleware';
import { SignOnService } from './SignOnService';
import type { SignOnServiceOptions } from './SignOnService';
import { INITIAL_SIGN_ON_CONTEXT, INITIAL_SIGN_ON_STATE } from './machine/types';
import type { ScreenName, SignOnContext, SignOnState } from './machine/types';
import { canSignOn, getStatusText, isSigningOn } from './machine/stateMachine';
import { useWindowStore } from '@/features/windows/windowStore';

export interface SignOnStoreState {
  service: SignOnService | null;
  state: SignOnState;
  context: SignOnContext;

  // Derived states for easy access
  statusText: string;
  canSignOn: boolean;
  isSigningOn: boolean;

  initializeService: (options?: SignOnServiceOptions) => SignOnService;
  signOn: (screenName: ScreenName) => void;
  signOff: () => void;
  destroy: () => void;
}

type SignOnActions = Pick<SignOnStoreState, 'initializeService' | 'signOn' | 'signOff' | 'destroy'>;

type SignOnStoreData = Omit<SignOnStoreState, keyof SignOnActions>;

const deriveState = (state: SignOnState, context: SignOnContext) => ({
  state,
  context,
  statusText: getStatusText(state),
  canSignOn: canSignOn(state),
  isSigningOn: isSigningOn(state, context),
});

const createBaseState = (): SignOnStoreData => ({
  service: null,
  ...deriveState(INITIAL_SIGN_ON_STATE, { ...INITIAL_SIGN_ON_CONTEXT }),
});

export const useSignOnStore = create<SignOnStoreState>()(
  devtools(
    subscribeWithSelector((set, get) => {
      const actions: SignOnActions = {
        initializeService: (options) => {
          get().service?.destroy();

          const service = new SignOnService(options);

          service.on('stateChange', (state, context) => {
            set(deriveState(state, context));
          });

          service.on('openWindow', (type, title) => {
            useWindowStore.getState().openWindow(type, title);
          });

          service.on('closeAllWindows', () => {
            useWindowStore.getState().closeAll();
          });

          service.on('transition', (entry) => {
            if (import.meta.env.DEV) {
              console.debug('Sign-on transition:', entry);
            }
          });

          set({ service, ...deriveState(service.getState(), service.getContext()) });
          return service;
        },

        signOn: (screenName) => {
          const service = get().service ?? get().initializeService();
          service.signOn(screenName);
        },

        signOff: () => {
          get().service?.signOff();
        },

        destroy: () => {
          get().service?.destroy();
          set(createBaseState());
        },
      };

      return {
        ...createBaseState(),
        ...actions,
      };
    }),
    { name: 'sign-on-store' }
  )
);

export const useSignOnState = () => useSignOnStore((state) => state.state);
export const useIsSignedIn = () => useSignOnStore((state) => state.context.signedIn);
export const useScreenName = () => useSignOnStore((state) => state.context.screenName);
