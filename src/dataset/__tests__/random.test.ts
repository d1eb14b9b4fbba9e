import { describe, it, expect } from 'vitest';
import { createRandom } from '../random.js';

describe('createRandom', () => {
  it('детерминирован при одинаковом seed', () => {
    const a = createRandom(2024);
    const b = createRandom(2024);

    const seqA = Array.from({ length: 20 }, () => a.next());
    const seqB = Array.from({ length: 20 }, () => b.next());

    expect(seqA).toEqual(seqB);
  });

  it('разные экземпляры не делят состояние', () => {
    const a = createRandom(1);
    const b = createRandom(1);

    a.next();
    a.next();

    expect(b.next()).toBe(createRandom(1).next());
  });

  it('next() возвращает значения в [0, 1)', () => {
    const random = createRandom(99);

    for (let i = 0; i < 1000; i++) {
      const value = random.next();
      expect(value).toBeGreaterThanOrEqual(0);
      expect(value).toBeLessThan(1);
    }
  });

  it('nextInt() покрывает обе границы узкого диапазона', () => {
    const random = createRandom(5);
    const seen = new Set<number>();

    for (let i = 0; i < 500; i++) {
      const value = random.nextInt(-2, 2);
      expect(Number.isInteger(value)).toBe(true);
      expect(value).toBeGreaterThanOrEqual(-2);
      expect(value).toBeLessThanOrEqual(2);
      seen.add(value);
    }

    expect([...seen].sort((a, b) => a - b)).toEqual([-2, -1, 0, 1, 2]);
  });

  it('nextInt(x, x) всегда возвращает x', () => {
    const random = createRandom(3);

    expect(random.nextInt(7, 7)).toBe(7);
    expect(random.nextInt(7, 7)).toBe(7);
  });
});
