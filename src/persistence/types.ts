export type IdempotencyCheck =
  | { status: 'new' }
  | { status: 'duplicate_recent'; firstSeenAt: Date };

export interface IdempotencyStats {
  size: number;
  maxSize: number;
  ttlMs: number;
  type: 'redis' | 'memory';
}

export interface IdempotencyStore {
  checkAndMark(key: string): Promise<IdempotencyCheck>;
  getStats(): IdempotencyStats;
}
