// api/src/exerciseCatalog.ts
// Справочник групп мышц: используется как запасной список примеров,
// когда у пользователя ещё нет истории по упражнению.

import type { MuscleGroup, MuscleGroupKey } from "./types.js";
import type { StatEntry } from "./exerciseStatistics.js";

export const SUPPORTED_MUSCLE_GROUPS: readonly MuscleGroup[] = Object.freeze([
  { key: "legs", title: "Legs", exercises: ["squat", "leg press", "leg extension", "leg curl", "lunge"] },
  { key: "core", title: "Core", exercises: ["crunch", "side bend", "cable crunch", "sit up", "leg raises"] },
  { key: "back", title: "Back", exercises: ["pull up", "row", "deadlift", "hyper-extension"] },
  {
    key: "arms",
    title: "Arms",
    exercises: [
      "bicep curl",
      "hammer curl",
      "pronated curl",
      "tricep push down",
      "tricep overhead extension",
      "tricep dip",
      "close-grip bench press",
    ],
  },
  { key: "chest", title: "Chest", exercises: ["chest press", "butterfly", "cable cross-over", "incline chest press", "push up"] },
  {
    key: "shoulders",
    title: "Shoulders",
    exercises: ["shoulder press", "lateral raise", "front raise", "rear raise", "upright row", "shrug"],
  },
  { key: "cardiovascular", title: "Cardiovascular", exercises: ["running", "cycling", "swimming", "elliptical", "rowing"] },
]);

let cachedEntries: readonly StatEntry[] | null = null;

/**
 * Every (muscle group, exercise) pair of the catalog as a zero-count placeholder entry.
 */
export function allExampleEntries(): readonly StatEntry[] {
  if (!cachedEntries) {
    cachedEntries = Object.freeze(
      SUPPORTED_MUSCLE_GROUPS.flatMap((mg) =>
        mg.exercises.map(
          (name): StatEntry => ({ muscleGroupKey: mg.key, intendedIntensity: 0, count: 0, exercise: { name } })
        )
      )
    );
  }
  return cachedEntries;
}

export function muscleGroupByKey(key: MuscleGroupKey): MuscleGroup | null {
  return SUPPORTED_MUSCLE_GROUPS.find((mg) => mg.key === key) ?? null;
}
