// api/src/pgEventJournal.ts
// Журнал событий в Postgres: таблица user_exercise_events (пишет её другой сервис)

import { z } from "zod";
import { ReplayInconsistencyError } from "./middleware/errorHandler.js";
import { validate } from "./validation.js";
import type { EventJournal, JournalRow } from "./eventJournal.js";

export type RowQuery = (text: string, params: unknown[]) => Promise<unknown[]>;

const UserExerciseEventRowSchema = z.object({
  // bigint приходит из pg строкой
  seq: z
    .union([z.string().regex(/^\d+$/), z.number().int().nonnegative()])
    .transform(Number)
    .refine(Number.isSafeInteger, "seq is out of the safe integer range"),
  event_type: z.string(),
  payload: z.unknown(),
});

function parsePayload(value: unknown): unknown {
  if (typeof value !== "string") return value;
  try {
    return JSON.parse(value);
  } catch {
    // пусть валидация события отклонит строку как есть
    return value;
  }
}

export class PgEventJournal implements EventJournal {
  constructor(private readonly query: RowQuery) {}

  async readEvents(persistenceId: string, afterOffset: number, limit: number): Promise<JournalRow[]> {
    const rows = await this.query(
      `SELECT seq, event_type, payload
         FROM user_exercise_events
        WHERE persistence_id = $1
          AND seq > $2
        ORDER BY seq ASC
        LIMIT $3`,
      [persistenceId, afterOffset, limit]
    );

    return rows.map((raw) => {
      const row = validate(UserExerciseEventRowSchema, raw);
      if (!row.success) {
        throw new ReplayInconsistencyError("Malformed journal row", { persistenceId, reason: row.error });
      }
      return { offset: row.data.seq, type: row.data.event_type, payload: parsePayload(row.data.payload) };
    });
  }
}
