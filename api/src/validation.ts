// Валидация с использованием zod
import { z } from "zod";
import type { UserExerciseEvent, UserExerciseEventType } from "./types.js";

const IntensitySchema = z.number().finite();
const MetadataSchema = z.record(z.unknown());

export const ExerciseSchema = z.object({
  name: z.string().min(1),
  intensity: IntensitySchema.optional(),
  metadata: MetadataSchema.optional(),
});

export const SessionPropertiesSchema = z.object({
  startDate: z.string().min(1),
  muscleGroupKeys: z.array(z.string().min(1)),
  intendedIntensity: IntensitySchema,
});

const SuggestionSourceSchema = z.enum(["history", "programme", "expert"]);

export const SuggestionSchema = z.discriminatedUnion("type", [
  z.object({
    type: z.literal("session"),
    date: z.string().min(1),
    source: SuggestionSourceSchema,
    muscleGroupKeys: z.array(z.string().min(1)),
    intendedIntensity: IntensitySchema,
  }),
  z.object({
    type: z.literal("rest"),
    date: z.string().min(1),
    source: SuggestionSourceSchema,
  }),
]);

export const SuggestionSetSchema = z.object({
  suggestions: z.array(SuggestionSchema),
});

// Payload схемы по типу события журнала
const SessionStartedSchema = z.object({
  sessionId: z.string().min(1),
  sessionProperties: SessionPropertiesSchema,
});

const ExerciseObservedSchema = z.object({
  sessionId: z.string().min(1),
  metadata: MetadataSchema.optional(),
  exercise: ExerciseSchema,
});

const SessionEndedSchema = z.object({
  sessionId: z.string().min(1),
});

const SuggestionsSetSchema = z.object({
  suggestionSet: SuggestionSetSchema,
});

export const KNOWN_EVENT_TYPES: readonly UserExerciseEventType[] = [
  "SessionStarted",
  "ExerciseObserved",
  "SessionEnded",
  "SuggestionsSet",
];

const knownEventTypes = new Set<string>(KNOWN_EVENT_TYPES);

export function isKnownEventType(type: string): type is UserExerciseEventType {
  return knownEventTypes.has(type);
}

/** Parses the payload of a known event type into a typed event. */
export function parseEventPayload(
  type: UserExerciseEventType,
  payload: unknown
): { success: true; data: UserExerciseEvent } | { success: false; error: string } {
  switch (type) {
    case "SessionStarted": {
      const r = validate(SessionStartedSchema, payload);
      return r.success ? { success: true, data: { type, ...r.data } } : r;
    }
    case "ExerciseObserved": {
      const r = validate(ExerciseObservedSchema, payload);
      return r.success ? { success: true, data: { type, ...r.data } } : r;
    }
    case "SessionEnded": {
      const r = validate(SessionEndedSchema, payload);
      return r.success ? { success: true, data: { type, ...r.data } } : r;
    }
    case "SuggestionsSet": {
      const r = validate(SuggestionsSetSchema, payload);
      return r.success ? { success: true, data: { type, ...r.data } } : r;
    }
  }
}

const csvList = z
  .string()
  .transform((s) => s.split(",").map((x) => x.trim()).filter(Boolean));

export const ExamplesQuerySchema = z.object({
  sessionId: z.string().min(1).optional(),
  muscleGroupKeys: z.union([csvList, z.array(z.string().min(1))]).optional(),
});

export const UserIdParamSchema = z.object({
  userId: z.string().min(1).max(200),
});

// Функция для валидации
export function validate<T>(
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  data: unknown
): { success: true; data: T } | { success: false; error: string } {
  try {
    const validated = schema.parse(data);
    return { success: true, data: validated };
  } catch (error) {
    if (error instanceof z.ZodError) {
      return {
        success: false,
        error: error.errors.map((e) => `${e.path.join(".")}: ${e.message}`).join("; "),
      };
    }
    return { success: false, error: "Validation failed" };
  }
}
