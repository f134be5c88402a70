// api/src/viewRegistry.ts
// Хост представлений: по одной сущности на пользователя, последовательная
// очередь задач на сущность, периодическая догонка журнала и выселение по простою.

import { decodeJournalRow, type EventJournal } from "./eventJournal.js";
import { ReplayInconsistencyError } from "./middleware/errorHandler.js";
import { DEFAULT_SHARD_COUNT, assertShardCount, entityKeyOf, persistenceIdOf, routeKey, type RouteKey } from "./shardRouting.js";
import { UserStatisticsView } from "./userStatisticsView.js";
import type {
  ExamplesResult,
  GetExamples,
  GetSuggestions,
  StatisticsRequest,
  SuggestionSet,
  UserId,
} from "./types.js";

export interface ViewRegistryOptions {
  journal: EventJournal;
  shardCount?: number;
  refreshIntervalMs?: number;
  passivationTimeoutMs?: number;
  refreshBatchSize?: number;
  now?: () => number;
  verbose?: boolean;
}

function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}

class ViewEntity {
  readonly view = new UserStatisticsView();
  lastOffset = 0;
  recovered = false;
  evicted = false;
  refreshPending = false;
  private tail: Promise<void> = Promise.resolve();

  constructor(
    readonly userId: UserId,
    readonly persistenceId: string,
    readonly route: RouteKey,
    public lastActivity: number
  ) {}

  /** Runs `task` after every task enqueued before it. */
  enqueue<T>(task: () => Promise<T>): Promise<T> {
    const run = this.tail.then(task);
    // очередь продолжает работу; ошибку получает тот, кто поставил задачу
    this.tail = run.then(
      () => undefined,
      () => undefined
    );
    return run;
  }
}

export class ViewRegistry {
  private readonly entities = new Map<string, ViewEntity>();
  private readonly journal: EventJournal;
  private readonly shardCount: number;
  private readonly refreshIntervalMs: number;
  private readonly passivationTimeoutMs: number;
  private readonly refreshBatchSize: number;
  private readonly now: () => number;
  private readonly verbose: boolean;
  private refreshTimer: NodeJS.Timeout | null = null;
  private reaperTimer: NodeJS.Timeout | null = null;

  constructor(options: ViewRegistryOptions) {
    this.journal = options.journal;
    this.shardCount = options.shardCount ?? DEFAULT_SHARD_COUNT;
    this.refreshIntervalMs = options.refreshIntervalMs ?? 1_000;
    this.passivationTimeoutMs = options.passivationTimeoutMs ?? 360_000;
    this.refreshBatchSize = options.refreshBatchSize ?? 500;
    this.now = options.now ?? Date.now;
    this.verbose = options.verbose ?? false;
    assertShardCount(this.shardCount);
    if (this.refreshBatchSize <= 0) throw new RangeError("refreshBatchSize must be positive");
  }

  get size(): number {
    return this.entities.size;
  }

  isLive(userId: UserId): boolean {
    return this.entities.has(entityKeyOf(userId));
  }

  placementOf(userId: UserId): RouteKey {
    return routeKey({ kind: "GetSuggestions", userId }, this.shardCount);
  }

  ask(request: GetExamples): Promise<ExamplesResult>;
  ask(request: GetSuggestions): Promise<SuggestionSet>;
  ask(request: StatisticsRequest): Promise<ExamplesResult | SuggestionSet>;
  ask(request: StatisticsRequest): Promise<ExamplesResult | SuggestionSet> {
    switch (request.kind) {
      case "GetExamples":
        return this.getExamples(request);
      case "GetSuggestions":
        return this.getSuggestions(request);
    }
  }

  getExamples(request: GetExamples): Promise<ExamplesResult> {
    return this.deliver(request.userId, (view) => view.examples(request.sessionId, request.muscleGroupKeys));
  }

  getSuggestions(request: GetSuggestions): Promise<SuggestionSet> {
    return this.deliver(request.userId, (view) => view.getSuggestions());
  }

  /**
   * Catch-up for every live entity. Runs through each entity's queue, so it
   * never overlaps a query on the same user.
   */
  async refreshAll(): Promise<void> {
    const pending: Promise<void>[] = [];
    for (const entity of this.entities.values()) {
      if (entity.refreshPending) continue;
      entity.refreshPending = true;
      pending.push(
        entity.enqueue(async () => {
          try {
            await this.refreshEntity(entity);
          } finally {
            entity.refreshPending = false;
          }
        })
      );
    }
    await Promise.all(pending);
  }

  /** Evicts entities idle for at least the passivation window. */
  reapIdle(): number {
    const now = this.now();
    let evicted = 0;
    for (const entity of Array.from(this.entities.values())) {
      if (now - entity.lastActivity >= this.passivationTimeoutMs) {
        this.evict(entity, "idle");
        evicted++;
      }
    }
    return evicted;
  }

  start(): void {
    if (this.refreshTimer) return;

    this.refreshTimer = setInterval(() => {
      this.refreshAll().catch((e) => console.warn("[ViewRegistry] refresh tick failed:", errorMessage(e)));
    }, this.refreshIntervalMs);
    this.refreshTimer.unref();

    this.reaperTimer = setInterval(() => this.reapIdle(), Math.min(this.passivationTimeoutMs, 5_000));
    this.reaperTimer.unref();
  }

  stop(): void {
    if (this.refreshTimer) clearInterval(this.refreshTimer);
    if (this.reaperTimer) clearInterval(this.reaperTimer);
    this.refreshTimer = null;
    this.reaperTimer = null;
    for (const entity of Array.from(this.entities.values())) this.evict(entity, "shutdown");
  }

  private entityFor(userId: UserId): ViewEntity {
    const key = entityKeyOf(userId);
    const existing = this.entities.get(key);
    if (existing) return existing;

    const route = routeKey({ kind: "GetSuggestions", userId }, this.shardCount);
    const entity = new ViewEntity(userId, persistenceIdOf(userId), route, this.now());
    this.entities.set(key, entity);
    if (this.verbose) console.log(`[ViewRegistry] started ${key} on shard ${entity.route.shardId}`);
    return entity;
  }

  private deliver<T>(userId: UserId, query: (view: UserStatisticsView) => T): Promise<T> {
    const entity = this.entityFor(userId);
    entity.lastActivity = this.now();

    return entity.enqueue(async () => {
      if (!entity.recovered) {
        try {
          const folded = await this.catchUp(entity);
          if (this.verbose) console.log(`[ViewRegistry] ${entity.persistenceId} replayed ${folded} events`);
        } catch (e) {
          this.evict(entity, "recovery failed");
          throw e;
        }
      }
      entity.lastActivity = this.now();
      return query(entity.view);
    });
  }

  private async refreshEntity(entity: ViewEntity): Promise<void> {
    if (entity.evicted) return;
    try {
      const folded = await this.catchUp(entity);
      if (folded > 0) entity.lastActivity = this.now();
    } catch (e) {
      if (e instanceof ReplayInconsistencyError) {
        console.error("[ViewRegistry] replay inconsistency:", e.message, e.details);
        this.evict(entity, "replay inconsistency");
        return;
      }
      // ошибка чтения журнала: попробуем на следующем тике
      console.warn(`[ViewRegistry] refresh of ${entity.persistenceId} failed:`, errorMessage(e));
    }
  }

  /** Folds every event after the entity's last offset. */
  private async catchUp(entity: ViewEntity): Promise<number> {
    let folded = 0;
    for (;;) {
      const rows = await this.journal.readEvents(entity.persistenceId, entity.lastOffset, this.refreshBatchSize);
      for (const row of rows) {
        if (!Number.isFinite(row.offset) || row.offset <= entity.lastOffset) {
          throw new ReplayInconsistencyError("Journal offset did not increase", {
            persistenceId: entity.persistenceId,
            offset: row.offset,
            lastOffset: entity.lastOffset,
          });
        }
        entity.view.apply(decodeJournalRow(entity.persistenceId, row));
        entity.lastOffset = row.offset;
        folded++;
      }
      if (rows.length < this.refreshBatchSize) break;
    }
    entity.recovered = true;
    return folded;
  }

  private evict(entity: ViewEntity, reason: string): void {
    entity.evicted = true;
    const key = entityKeyOf(entity.userId);
    if (this.entities.get(key) === entity) {
      this.entities.delete(key);
      if (this.verbose) console.log(`[ViewRegistry] evicted ${key} (${reason})`);
    }
  }
}

