// api/src/eventJournal.ts
// Чтение журнала событий пользователя (журнал внешний, представление только читает)

import { ReplayInconsistencyError } from "./middleware/errorHandler.js";
import { isKnownEventType, parseEventPayload } from "./validation.js";
import type { EventEnvelope } from "./types.js";

export type JournalRow = {
  offset: number;
  type: string;
  payload: unknown;
};

export interface EventJournal {
  /** Events of one stream with offset > `afterOffset`, ascending, at most `limit`. */
  readEvents(persistenceId: string, afterOffset: number, limit: number): Promise<JournalRow[]>;
}

/**
 * Turns a stored row into an envelope. Unknown types become `Unrecognized`;
 * a known type with a malformed payload is a replay inconsistency.
 */
export function decodeJournalRow(persistenceId: string, row: JournalRow): EventEnvelope {
  if (!isKnownEventType(row.type)) {
    return { offset: row.offset, persistent: true, event: { type: "Unrecognized", originalType: row.type } };
  }

  const parsed = parseEventPayload(row.type, row.payload);
  if (!parsed.success) {
    throw new ReplayInconsistencyError(`Malformed ${row.type} event`, {
      persistenceId,
      offset: row.offset,
      reason: parsed.error,
    });
  }
  return { offset: row.offset, persistent: true, event: parsed.data };
}

/** Journal kept in process memory; used for local runs and tests. */
export class InMemoryEventJournal implements EventJournal {
  private readonly streams = new Map<string, JournalRow[]>();
  private lastOffset = 0;

  append(persistenceId: string, type: string, payload: unknown): number {
    const offset = ++this.lastOffset;
    const stream = this.streams.get(persistenceId) ?? [];
    stream.push({ offset, type, payload });
    this.streams.set(persistenceId, stream);
    return offset;
  }

  async readEvents(persistenceId: string, afterOffset: number, limit: number): Promise<JournalRow[]> {
    const stream = this.streams.get(persistenceId) ?? [];
    return stream.filter((row) => row.offset > afterOffset).slice(0, limit);
  }
}
