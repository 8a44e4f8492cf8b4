/**
 * Pattern 4.2: Event-Sourced State
 *
 * Append-only event log with state derivation. Never lose history.
 * The step history is what the proposer reads; this log is what a human
 * reads afterwards: when each action was proposed, how long it took, which
 * state transitions the executor went through.
 */

import { promises as fs } from 'fs';

// =============================================================================
// EVENT TYPES
// =============================================================================

interface BaseEvent {
  type: string;
  timestamp: number;
  metadata?: Record<string, unknown>;
}

export interface SessionStartedEvent extends BaseEvent {
  type: 'session_started';
  task: string;
  actions: string[];
  stepBudget: number;
}

export interface ActionProposedEvent extends BaseEvent {
  type: 'action_proposed';
  step: number;
  action: string;
  parameters: Record<string, unknown>;
  rationale: string;
}

/**
 * Outcome of one dispatched action. `errorCode` is set on failures.
 */
export interface ActionObservedEvent extends BaseEvent {
  type: 'action_observed';
  step: number;
  action: string;
  success: boolean;
  statusCode: number;
  errorCode?: string;
  durationMs: number;
}

export interface StateChangedEvent extends BaseEvent {
  type: 'state_changed';
  key: string;
  oldValue: unknown;
  newValue: unknown;
}

export interface SessionCompletedEvent extends BaseEvent {
  type: 'session_completed';
  status: 'done' | 'aborted';
  reason: string;
  success: boolean;
  totalSteps: number;
  totalDurationMs: number;
}

export interface ErrorOccurredEvent extends BaseEvent {
  type: 'error_occurred';
  error: string;
  recoverable: boolean;
  context?: Record<string, unknown>;
}

export type SessionEvent =
  | SessionStartedEvent
  | ActionProposedEvent
  | ActionObservedEvent
  | StateChangedEvent
  | SessionCompletedEvent
  | ErrorOccurredEvent;

/** An event as handed to `append`; the store stamps the time. */
export type UnstampedEvent<E extends SessionEvent = SessionEvent> = E extends SessionEvent
  ? Omit<E, 'timestamp'>
  : never;

const EVENT_TYPES: ReadonlySet<string> = new Set<SessionEvent['type']>([
  'session_started',
  'action_proposed',
  'action_observed',
  'state_changed',
  'session_completed',
  'error_occurred',
]);

function isSessionEvent(value: unknown): value is SessionEvent {
  if (typeof value !== 'object' || value === null) return false;
  if (!('type' in value) || !('timestamp' in value)) return false;
  return (
    typeof value.type === 'string' &&
    EVENT_TYPES.has(value.type) &&
    typeof value.timestamp === 'number'
  );
}

/** A line of the log, or undefined when it is not JSON (e.g. a torn write). */
function parseLine(line: string): unknown {
  try {
    return JSON.parse(line);
  } catch (error) {
    if (error instanceof SyntaxError) return undefined;
    throw error;
  }
}

// =============================================================================
// SESSION STATE (derived from events)
// =============================================================================

export interface SessionState {
  status: 'running' | 'done' | 'aborted' | 'failed';
  task: string;
  startTime: number;
  endTime?: number;
  steps: number;
  actions: {
    total: number;
    successful: number;
    failed: number;
    byAction: Record<string, number>;
    byErrorCode: Record<string, number>;
  };
  variables: Record<string, unknown>;
  errors: string[];
}

/**
 * Derive current state from event history.
 * This is the "fold" operation in event sourcing.
 */
export function deriveState(events: readonly SessionEvent[]): SessionState {
  const state: SessionState = {
    status: 'running',
    task: '',
    startTime: 0,
    steps: 0,
    actions: {
      total: 0,
      successful: 0,
      failed: 0,
      byAction: {},
      byErrorCode: {},
    },
    variables: {},
    errors: [],
  };

  for (const event of events) {
    switch (event.type) {
      case 'session_started':
        state.task = event.task;
        state.startTime = event.timestamp;
        break;

      case 'action_proposed':
        state.actions.total++;
        state.actions.byAction[event.action] = (state.actions.byAction[event.action] ?? 0) + 1;
        break;

      case 'action_observed':
        state.steps = Math.max(state.steps, event.step);
        if (event.success) {
          state.actions.successful++;
        } else {
          state.actions.failed++;
          if (event.errorCode) {
            state.actions.byErrorCode[event.errorCode] =
              (state.actions.byErrorCode[event.errorCode] ?? 0) + 1;
          }
        }
        break;

      case 'state_changed':
        state.variables[event.key] = event.newValue;
        break;

      case 'session_completed':
        state.status = event.status;
        state.endTime = event.timestamp;
        state.steps = event.totalSteps;
        break;

      case 'error_occurred':
        state.errors.push(event.error);
        if (!event.recoverable) {
          state.status = 'failed';
        }
        break;
    }
  }

  return state;
}

// =============================================================================
// EVENT STORE
// =============================================================================

/**
 * Append-only event store with optional persistence.
 *
 * Usage:
 *   const store = new EventStore('./events.jsonl');
 *   await store.append({ type: 'session_started', task: '...', actions: [], stepBudget: 20 });
 *   const state = deriveState(store.all());
 */
export class EventStore {
  private events: SessionEvent[] = [];
  private persistPath?: string;

  constructor(persistPath?: string) {
    this.persistPath = persistPath;
  }

  /**
   * Append an event to the store.
   * Timestamp is added automatically.
   */
  async append(event: UnstampedEvent): Promise<void> {
    const stamped: SessionEvent = { ...event, timestamp: Date.now() };
    this.events.push(stamped);

    if (this.persistPath) {
      await this.persist();
    }
  }

  all(): SessionEvent[] {
    return [...this.events];
  }

  filter<K extends SessionEvent['type']>(type: K): Extract<SessionEvent, { type: K }>[] {
    return this.events.filter((e): e is Extract<SessionEvent, { type: K }> => e.type === type);
  }

  getState(): SessionState {
    return deriveState(this.events);
  }

  /**
   * Persist events to disk (JSON Lines format).
   */
  async persist(): Promise<void> {
    if (!this.persistPath) return;
    const lines = this.events.map((e) => JSON.stringify(e)).join('\n');
    await fs.writeFile(this.persistPath, lines);
  }

  /**
   * Load events from disk. A missing file means a fresh log; lines that are
   * not JSON, or not events, are skipped.
   */
  async load(): Promise<void> {
    if (!this.persistPath) return;
    let content: string;
    try {
      content = await fs.readFile(this.persistPath, 'utf-8');
    } catch (error) {
      if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
        this.events = [];
        return;
      }
      throw error;
    }

    this.events = content
      .split('\n')
      .filter((line) => line.trim())
      .map(parseLine)
      .filter(isSessionEvent);
  }

  clear(): void {
    this.events = [];
  }

  getSummary(): string {
    const state = this.getState();
    const duration = state.endTime
      ? state.endTime - state.startTime
      : Date.now() - state.startTime;
    const errorCodes = Object.entries(state.actions.byErrorCode)
      .map(([code, count]) => `${code}×${count}`)
      .join(', ');

    return [
      `Status: ${state.status}`,
      `Task: ${state.task}`,
      `Steps: ${state.steps}`,
      `Actions: ${state.actions.total} (${state.actions.successful} ok, ${state.actions.failed} failed)`,
      errorCodes ? `Rejections: ${errorCodes}` : null,
      `Duration: ${duration}ms`,
      state.errors.length > 0 ? `Errors: ${state.errors.join(', ')}` : null,
    ]
      .filter(Boolean)
      .join('\n');
  }
}
