// Источник псевдослучайных чисел, которым владеет вызывающий код.
// Каждая генерация получает свой экземпляр — общего состояния между вызовами нет.

export interface RandomSource {
  // Равномерно распределённое целое в [min, max] включительно.
  nextInt(min: number, max: number): number;
  // Число с плавающей точкой в [0, 1).
  next(): number;
}

// Генератор mulberry32: 32-битное состояние, детерминирован при заданном seed.
class Mulberry32 implements RandomSource {
  private state: number;

  constructor(seed: number) {
    this.state = seed >>> 0;
  }

  next(): number {
    this.state = (this.state + 0x6d2b79f5) >>> 0;
    let t = this.state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  }

  nextInt(min: number, max: number): number {
    const span = max - min + 1;
    return min + Math.floor(this.next() * span);
  }
}

/**
 * Создаёт новый источник случайных чисел.
 * Без seed — инициализируется от текущего времени высокого разрешения.
 */
export function createRandom(seed?: number): RandomSource {
  const initial = seed ?? Number(process.hrtime.bigint() & 0xffffffffn);
  return new Mulberry32(initial);
}
