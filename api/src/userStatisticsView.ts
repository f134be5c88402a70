// api/src/userStatisticsView.ts
// Материализованное представление статистики одного пользователя:
// Idle / InSession, сворачивается по событиям журнала.

import { ExerciseStatistics } from "./exerciseStatistics.js";
import { SuggestionStore, EMPTY_SUGGESTIONS } from "./suggestionStore.js";
import type {
  EventEnvelope,
  ExamplesResult,
  MuscleGroupKey,
  SessionId,
  SessionProperties,
  SuggestionSet,
  UserExerciseEvent,
} from "./types.js";

export type ViewMode =
  | { kind: "idle" }
  | { kind: "in_session"; sessionId: SessionId; sessionProperties: SessionProperties };

export interface ViewState {
  mode: ViewMode;
  statistics: ExerciseStatistics;
  suggestions: SuggestionSet;
}

type InSessionMode = Extract<ViewMode, { kind: "in_session" }>;

export const IDLE: ViewMode = Object.freeze({ kind: "idle" });

export const INITIAL_VIEW_STATE: ViewState = Object.freeze({
  mode: IDLE,
  statistics: ExerciseStatistics.empty,
  suggestions: EMPTY_SUGGESTIONS,
});

function whileIdle(state: ViewState, event: UserExerciseEvent): ViewState {
  switch (event.type) {
    case "SessionStarted":
      return {
        ...state,
        mode: { kind: "in_session", sessionId: event.sessionId, sessionProperties: event.sessionProperties },
      };
    case "SuggestionsSet":
      return { ...state, suggestions: event.suggestionSet };
    default:
      return state;
  }
}

function whileInSession(state: ViewState, mode: InSessionMode, event: UserExerciseEvent): ViewState {
  switch (event.type) {
    case "ExerciseObserved":
      return { ...state, statistics: state.statistics.withObservedExercise(mode.sessionProperties, event.exercise) };
    case "SessionEnded":
      return { ...state, mode: IDLE };
    case "SuggestionsSet":
      return { ...state, suggestions: event.suggestionSet };
    default:
      return state;
  }
}

/**
 * Pure transition function. Transient deliveries and unrecognized events
 * leave the state untouched.
 */
export function foldEvent(state: ViewState, envelope: EventEnvelope): ViewState {
  if (!envelope.persistent) return state;
  const { event } = envelope;
  if (event.type === "Unrecognized") return state;

  switch (state.mode.kind) {
    case "idle":
      return whileIdle(state, event);
    case "in_session":
      return whileInSession(state, state.mode, event);
  }
}

export function foldEvents(envelopes: Iterable<EventEnvelope>, initial: ViewState = INITIAL_VIEW_STATE): ViewState {
  let state = initial;
  for (const envelope of envelopes) state = foldEvent(state, envelope);
  return state;
}

export class UserStatisticsView {
  private mode: ViewMode = IDLE;
  private statistics: ExerciseStatistics = ExerciseStatistics.empty;
  private readonly suggestions = new SuggestionStore();

  apply(envelope: EventEnvelope): void {
    const next = foldEvent(this.snapshot(), envelope);
    this.mode = next.mode;
    this.statistics = next.statistics;
    this.suggestions.set(next.suggestions);
  }

  snapshot(): ViewState {
    return { mode: this.mode, statistics: this.statistics, suggestions: this.suggestions.get() };
  }

  /**
   * Examples for an explicit session or muscle-group selection.
   * A session id only succeeds while that very session is active.
   */
  examples(sessionId?: SessionId, muscleGroupKeys?: readonly MuscleGroupKey[]): ExamplesResult {
    if (sessionId !== undefined) return this.examplesForSession(sessionId);
    if (muscleGroupKeys !== undefined) return { success: true, data: this.statistics.examples(muscleGroupKeys) };
    return { success: true, data: this.statistics.examples() };
  }

  examplesForSession(sessionId: SessionId): ExamplesResult {
    const mode = this.mode;
    if (mode.kind !== "in_session" || mode.sessionId !== sessionId) {
      return { success: false, error: "no_examples" };
    }
    const { muscleGroupKeys, intendedIntensity } = mode.sessionProperties;
    return { success: true, data: this.statistics.examples(muscleGroupKeys, intendedIntensity) };
  }

  getSuggestions(): SuggestionSet {
    return this.suggestions.get();
  }
}
