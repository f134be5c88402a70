// api/src/exerciseStatistics.ts
// Неизменяемая таблица счётчиков упражнений пользователя.

import { allExampleEntries } from "./exerciseCatalog.js";
import type { Exercise, MuscleGroupKey, SessionProperties } from "./types.js";

/**
 * One row of the statistics table: how many times `exercise` was observed in
 * sessions that targeted `muscleGroupKey` at `intendedIntensity`.
 */
export interface StatEntry {
  muscleGroupKey: MuscleGroupKey;
  intendedIntensity: number;
  count: number;
  exercise: Exercise;
}

const DEFAULT_EXAMPLE_INTENSITY = 0.5;

/** Intensities are compared on a 0.1 grid. */
export function intensityBucket(intensity: number): number {
  return Math.round(intensity * 10);
}

export function intensitiesClose(a: number, b: number): boolean {
  return intensityBucket(a) === intensityBucket(b);
}

export function exercisesMatch(a: Exercise, b: Exercise): boolean {
  if (a.name !== b.name) return false;
  if (a.intensity === undefined || b.intensity === undefined) {
    return a.intensity === undefined && b.intensity === undefined;
  }
  return intensitiesClose(a.intensity, b.intensity);
}

export function entryMatches(entry: StatEntry, props: SessionProperties, exercise: Exercise): boolean {
  return (
    props.muscleGroupKeys.includes(entry.muscleGroupKey) &&
    intensitiesClose(entry.intendedIntensity, props.intendedIntensity) &&
    exercisesMatch(entry.exercise, exercise)
  );
}

const byName = (l: Exercise, r: Exercise) => (l.name < r.name ? -1 : l.name > r.name ? 1 : 0);

export class ExerciseStatistics {
  static readonly empty = new ExerciseStatistics([]);

  private constructor(private readonly rows: readonly StatEntry[]) {}

  get size(): number {
    return this.rows.length;
  }

  entries(): readonly StatEntry[] {
    return this.rows;
  }

  /**
   * Returns a new aggregate with the first matching row incremented, or with
   * one new row per session muscle group when nothing matched yet.
   */
  withObservedExercise(props: SessionProperties, exercise: Exercise): ExerciseStatistics {
    const idx = this.rows.findIndex((row) => entryMatches(row, props, exercise));
    if (idx >= 0) {
      const next = this.rows.slice();
      next[idx] = { ...next[idx], count: next[idx].count + 1 };
      return new ExerciseStatistics(next);
    }

    const keys = Array.from(new Set(props.muscleGroupKeys));
    const added = keys.map(
      (key): StatEntry => ({ muscleGroupKey: key, intendedIntensity: props.intendedIntensity, count: 1, exercise })
    );
    return new ExerciseStatistics([...this.rows, ...added]);
  }

  /**
   * Exercises seen in the filtered rows, least observed first, each with the
   * mean intensity of its rows; followed by the remaining catalog exercises of
   * the filtered groups in alphabetical order.
   */
  rankedExamples(muscleGroups?: readonly MuscleGroupKey[], intendedIntensity?: number): Exercise[] {
    const groupFilter = muscleGroups ? new Set(muscleGroups) : null;
    const matchesGroup = (entry: StatEntry) => !groupFilter || groupFilter.has(entry.muscleGroupKey);
    const matchesIntensity = (entry: StatEntry) =>
      intendedIntensity === undefined || intensitiesClose(entry.intendedIntensity, intendedIntensity);

    // Map сохраняет порядок вставки, поэтому при равных счётчиках порядок стабилен
    const grouped = new Map<string, { total: number; intensities: number[] }>();
    for (const row of this.rows) {
      if (!matchesGroup(row) || !matchesIntensity(row)) continue;
      const group = grouped.get(row.exercise.name) ?? { total: 0, intensities: [] };
      group.total += row.count;
      group.intensities.push(row.exercise.intensity ?? DEFAULT_EXAMPLE_INTENSITY);
      grouped.set(row.exercise.name, group);
    }

    const userExercises: Exercise[] = Array.from(grouped.entries())
      .sort(([, a], [, b]) => a.total - b.total)
      .map(([name, group]) => ({
        name,
        intensity: group.intensities.reduce((sum, x) => sum + x, 0) / group.intensities.length,
      }));

    const seen = new Set(userExercises.map((e) => e.name));
    const rest: Exercise[] = [];
    for (const entry of allExampleEntries()) {
      if (!matchesGroup(entry) || seen.has(entry.exercise.name)) continue;
      seen.add(entry.exercise.name);
      rest.push({ name: entry.exercise.name });
    }

    return [...userExercises, ...rest.sort(byName)];
  }

  examples(muscleGroups: readonly MuscleGroupKey[], intendedIntensity: number): Exercise[];
  examples(muscleGroups: readonly MuscleGroupKey[]): Exercise[];
  examples(): Exercise[];
  examples(muscleGroups?: readonly MuscleGroupKey[], intendedIntensity?: number): Exercise[] {
    return this.rankedExamples(muscleGroups, intendedIntensity);
  }
}
