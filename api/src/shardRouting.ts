// api/src/shardRouting.ts
// Чистые функции размещения: пользователь -> ключ сущности и номер шарда.

import type { StatisticsRequest, UserId } from "./types.js";

export const SHARD_NAME = "user-exercises-statistics";
export const DEFAULT_SHARD_COUNT = 10;

export type RouteKey = { entityKey: string; shardId: string };

/** 32-bit polynomial string hash (h = 31 * h + charCode). */
export function stringHash(value: string): number {
  let h = 0;
  for (let i = 0; i < value.length; i++) {
    h = (Math.imul(31, h) + value.charCodeAt(i)) | 0;
  }
  return h;
}

export function assertShardCount(shardCount: number): void {
  if (!Number.isInteger(shardCount) || shardCount <= 0) {
    throw new RangeError(`shardCount must be a positive integer, got ${shardCount}`);
  }
}

export function entityKeyOf(userId: UserId): string {
  return String(userId);
}

export function shardIdOf(userId: UserId, shardCount: number = DEFAULT_SHARD_COUNT): string {
  assertShardCount(shardCount);
  const h = stringHash(entityKeyOf(userId));
  return String(((h % shardCount) + shardCount) % shardCount);
}

export function routeKey(request: StatisticsRequest, shardCount: number = DEFAULT_SHARD_COUNT): RouteKey {
  return { entityKey: entityKeyOf(request.userId), shardId: shardIdOf(request.userId, shardCount) };
}

/** Journal stream of a user. */
export function persistenceIdOf(userId: UserId): string {
  return `user-exercises-${userId}`;
}

export function viewIdOf(userId: UserId): string {
  return `${SHARD_NAME}-${userId}`;
}
