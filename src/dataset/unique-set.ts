// Множество уникальных целых без ограничения размера одного Set (в V8 ~16.7M).

// Верхняя граница размера одного шарда с запасом до лимита V8.
export const MAX_SHARD_SIZE = 1 << 23;

/**
 * Набор уникальных целых, разложенный по нескольким Set.
 * Шард выбирается по остатку от деления значения, поэтому одно и то же
 * значение всегда попадает в один шард и повтор отбрасывается до вставки.
 */
export class ShardedIntegerSet {
  private readonly shards: Set<number>[];
  private total = 0;

  constructor(expectedSize: number, maxShardSize: number = MAX_SHARD_SIZE) {
    const shardCount = Math.max(1, Math.ceil(expectedSize / maxShardSize));
    this.shards = Array.from({ length: shardCount }, () => new Set<number>());
  }

  get size(): number {
    return this.total;
  }

  get shardCount(): number {
    return this.shards.length;
  }

  has(value: number): boolean {
    return this.shardFor(value).has(value);
  }

  // Возвращает false, если значение уже было.
  add(value: number): boolean {
    const shard = this.shardFor(value);
    if (shard.has(value)) {
      return false;
    }
    shard.add(value);
    this.total++;
    return true;
  }

  toSortedArray(): number[] {
    const values = new Float64Array(this.total);
    let offset = 0;
    for (const shard of this.shards) {
      for (const value of shard) {
        values[offset++] = value;
      }
    }
    // Сортировка типизированного массива числовая.
    values.sort();
    return Array.from(values);
  }

  private shardFor(value: number): Set<number> {
    const count = this.shards.length;
    return this.shards[((value % count) + count) % count]!;
  }
}
