/**
 * AppContext
 *
 * Global state management for the TUI using React Context + useReducer.
 */

import React, { createContext, useContext, useReducer, ReactNode } from 'react';
import type { DatabaseCheck, Notice } from '../../types/index.js';
import type { QueryViewState } from '../../query/controller.js';
import { loadConfig, TuiConfig } from '../utils/config.js';

export type PanelId = 1 | 2 | 3 | 4;

export type DatabaseStatus =
  | { phase: 'unknown' }
  | { phase: 'checking' }
  | { phase: 'done'; check: DatabaseCheck; checkedAt: Date }
  | { phase: 'unreachable'; error: string; checkedAt: Date };

export interface AppState {
  // UI State
  focusedPanel: PanelId;
  modalOpen: 'help' | null;
  inputCapture: 'question' | null;

  // Config
  config: TuiConfig;

  // Data
  view: QueryViewState;
  database: DatabaseStatus;
  pollWarning: string | null;
  toast: Notice | null;
}

// Actions
export type AppAction =
  | { type: 'SET_FOCUSED_PANEL'; panel: PanelId }
  | { type: 'OPEN_MODAL'; modal: AppState['modalOpen'] }
  | { type: 'CLOSE_MODAL' }
  | { type: 'SET_INPUT_CAPTURE'; capture: AppState['inputCapture'] }
  | { type: 'SET_VIEW'; view: QueryViewState }
  | { type: 'SET_DATABASE_STATUS'; status: DatabaseStatus }
  | { type: 'SET_POLL_WARNING'; warning: string | null }
  | { type: 'SHOW_TOAST'; toast: Notice | null };

export const emptyView: QueryViewState = {
  transcript: [],
  pollerState: 'idle',
  submitting: false,
  inProgress: false,
  question: null,
  outcome: null,
  notice: null,
};

export function createInitialState(config: TuiConfig = loadConfig()): AppState {
  return {
    focusedPanel: 1,
    modalOpen: null,
    inputCapture: null,
    config,
    view: emptyView,
    database: { phase: 'unknown' },
    pollWarning: null,
    toast: null,
  };
}

// Reducer
export function appReducer(state: AppState, action: AppAction): AppState {
  switch (action.type) {
    case 'SET_FOCUSED_PANEL':
      return { ...state, focusedPanel: action.panel };

    case 'OPEN_MODAL':
      return { ...state, modalOpen: action.modal };

    case 'CLOSE_MODAL':
      return { ...state, modalOpen: null };

    case 'SET_INPUT_CAPTURE':
      return { ...state, inputCapture: action.capture };

    case 'SET_VIEW':
      return {
        ...state,
        view: action.view,
        // A fresh round clears the last poll warning
        pollWarning: action.view.pollerState === 'idle' ? null : state.pollWarning,
        // Only a notice the controller just raised replaces the current toast
        toast: action.view.notice !== null && action.view.notice !== state.view.notice
          ? action.view.notice
          : state.toast,
      };

    case 'SET_DATABASE_STATUS':
      return { ...state, database: action.status };

    case 'SET_POLL_WARNING':
      return { ...state, pollWarning: action.warning };

    case 'SHOW_TOAST':
      return { ...state, toast: action.toast };

    default:
      return state;
  }
}

// Context
const AppContext = createContext<{
  state: AppState;
  dispatch: React.Dispatch<AppAction>;
} | null>(null);

// Provider
export const AppProvider: React.FC<{ children: ReactNode; config?: TuiConfig }> = ({ children, config }) => {
  const [state, dispatch] = useReducer(appReducer, config, createInitialState);

  return (
    <AppContext.Provider value={{ state, dispatch }}>
      {children}
    </AppContext.Provider>
  );
};

// Hook
export function useAppContext() {
  const context = useContext(AppContext);
  if (!context) {
    throw new Error('useAppContext must be used within an AppProvider');
  }
  return context;
}

export default AppContext;
