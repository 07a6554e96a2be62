import type { Verdict } from '../eval/types';

/**
 * Base interface for all evaluation events.
 * All events include common metadata fields.
 */
export interface BaseEvent {
  /** Schema version for event format compatibility */
  schemaVersion: number;
  /** ISO 8601 timestamp when the event occurred */
  timestamp: string;
  /** Scenario the event belongs to */
  scenario: string;
  /** Event type discriminator */
  type: string;
}

/**
 * Emitted when a scenario run starts against a project directory.
 */
export interface ScenarioStarted extends BaseEvent {
  type: 'ScenarioStarted';
  payload: {
    mode: string;
    projectDir: string;
    criteriaCount: number;
  };
}

/** Emitted after each success criterion has produced an outcome */
export interface CheckFinished extends BaseEvent {
  type: 'CheckFinished';
  payload: {
    /** Zero-based position of the criterion in the scenario */
    index: number;
    check: string;
    method?: string;
    verdict: Verdict;
    durationMs: number;
    error?: string;
  };
}

/** Emitted once the score has been computed */
export interface ScenarioFinished extends BaseEvent {
  type: 'ScenarioFinished';
  payload: {
    total: number;
    maxTotal: number;
    percentage: number;
    durationMs: number;
  };
}

export type EvalEvent = ScenarioStarted | CheckFinished | ScenarioFinished;

export const EVENT_SCHEMA_VERSION = 1;
