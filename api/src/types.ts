export type UserId = string;
export type SessionId = string;
export type MuscleGroupKey = string;

export interface MuscleGroup {
  key: MuscleGroupKey;
  title: string;
  exercises: readonly string[];
}

export type ExerciseMetadata = Record<string, unknown>;

export interface Exercise {
  name: string;
  intensity?: number;
  metadata?: ExerciseMetadata;
}

export interface SessionProperties {
  startDate: string;
  muscleGroupKeys: MuscleGroupKey[];
  intendedIntensity: number;
}

export type SuggestionSource = "history" | "programme" | "expert";

export type Suggestion =
  | {
      type: "session";
      date: string;
      source: SuggestionSource;
      muscleGroupKeys: MuscleGroupKey[];
      intendedIntensity: number;
    }
  | { type: "rest"; date: string; source: SuggestionSource };

export interface SuggestionSet {
  suggestions: Suggestion[];
}

// События журнала пользователя (только чтение)
export type UserExerciseEvent =
  | { type: "SessionStarted"; sessionId: SessionId; sessionProperties: SessionProperties }
  | { type: "ExerciseObserved"; sessionId: SessionId; metadata?: ExerciseMetadata; exercise: Exercise }
  | { type: "SessionEnded"; sessionId: SessionId }
  | { type: "SuggestionsSet"; suggestionSet: SuggestionSet };

export type UserExerciseEventType = UserExerciseEvent["type"];

/** Event as delivered to a view: `persistent` is false for transient deliveries. */
export interface EventEnvelope {
  offset: number;
  persistent: boolean;
  event: UserExerciseEvent | { type: "Unrecognized"; originalType: string };
}

export type GetExamples = {
  kind: "GetExamples";
  userId: UserId;
  sessionId?: SessionId;
  muscleGroupKeys?: MuscleGroupKey[];
};

export type GetSuggestions = { kind: "GetSuggestions"; userId: UserId };

export type StatisticsRequest = GetExamples | GetSuggestions;

export type ExamplesResult =
  | { success: true; data: Exercise[] }
  | { success: false; error: "no_examples" };
