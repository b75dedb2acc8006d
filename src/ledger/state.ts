import fs from 'fs';
import { AdviceRequest, AdvisorConfig, AdvisorState, Recommendation, StrategyDefaults } from '../core/types';
import { validateState } from '../core/schema';
import { readJSONFile, writeJSONFile } from '../core/utils';
import { errorMessage } from '../core/errors';
import { getStateFile } from './storage';

export const defaultsFromConfig = (config: AdvisorConfig): StrategyDefaults => ({
  ticker: config.ticker,
  d: config.d,
  band: config.band,
  contrib: config.contrib
});

export const initialState = (config: AdvisorConfig): AdvisorState => ({
  saveDefaults: false,
  defaults: defaultsFromConfig(config)
});

export const loadState = (config: AdvisorConfig): AdvisorState => {
  const file = getStateFile();
  if (!fs.existsSync(file)) return initialState(config);
  try {
    const result = validateState(readJSONFile(file));
    if (result.success) return result.value;
    console.warn(`State file ${file} failed validation (${result.errors.join('; ')}); starting from config defaults.`);
  } catch (err) {
    console.warn(`State file ${file} unreadable (${errorMessage(err)}); starting from config defaults.`);
  }
  return initialState(config);
};

export const saveState = (state: AdvisorState) => {
  writeJSONFile(getStateFile(), state);
};

/** Folds one advice run into the state. Strategy defaults only move when saveDefaults is on. */
export const applyAdvice = (
  state: AdvisorState,
  request: AdviceRequest,
  recommendation: Recommendation,
  now: Date = new Date()
): AdvisorState => ({
  ...state,
  defaults: state.saveDefaults
    ? { ticker: request.ticker, d: request.d, band: request.band, contrib: request.contrib }
    : state.defaults,
  lastInputs: request,
  lastRecommendation: recommendation,
  updatedAt: now.toISOString()
});

export const withSaveDefaults = (state: AdvisorState, saveDefaults: boolean): AdvisorState => ({ ...state, saveDefaults });
