// splitmix64 기반 결정적 RNG: 런마다 seed + cursor를 저장해 재현 가능

import { Injectable } from '@nestjs/common';

const MASK_64 = 0xffffffffffffffffn;

export interface RngState {
  seed: string;
  cursor: number;
}

export class Rng {
  private state: bigint;
  private _cursor: number;
  private _consumed: number;

  constructor(
    readonly seed: string,
    cursor: number = 0,
  ) {
    this.state = this.hashSeed(seed);
    this._cursor = cursor;
    this._consumed = 0;
    // 커서 위치까지 상태만 진행
    for (let i = 0; i < cursor; i++) {
      this.advanceState();
    }
  }

  private hashSeed(seed: string): bigint {
    let h = 0n;
    for (let i = 0; i < seed.length; i++) {
      h = ((h << 5n) - h + BigInt(seed.charCodeAt(i))) & MASK_64;
    }
    return h === 0n ? 1n : h;
  }

  private advanceState(): void {
    this.state = (this.state + 0x9e3779b97f4a7c15n) & MASK_64;
  }

  private nextRaw(): bigint {
    this._cursor++;
    this._consumed++;
    this.advanceState();
    let z = this.state;
    z = ((z ^ (z >> 30n)) * 0xbf58476d1ce4e5b9n) & MASK_64;
    z = ((z ^ (z >> 27n)) * 0x94d049bb133111ebn) & MASK_64;
    return (z ^ (z >> 31n)) & MASK_64;
  }

  /** [0, 1) 실수: 상위 53비트만 사용 */
  next(): number {
    return Number(this.nextRaw() >> 11n) / 2 ** 53;
  }

  /** [0, n) 정수. n <= 0 이면 0 */
  int(n: number): number {
    if (n <= 0) {
      this.nextRaw();
      return 0;
    }
    return Number(this.nextRaw() % BigInt(Math.floor(n)));
  }

  /** min~max 정수 (inclusive) */
  range(min: number, max: number): number {
    return min + this.int(max - min + 1);
  }

  /** percent(0~100) 확률로 true */
  chance(percent: number): boolean {
    return this.next() * 100 < percent;
  }

  /** 공정한 동전 던지기 */
  coin(): boolean {
    return (this.nextRaw() & 1n) === 1n;
  }

  /** 배열에서 하나 선택. 빈 배열이면 undefined (RNG는 소비하지 않음) */
  pick<T>(items: readonly T[]): T | undefined {
    if (items.length === 0) return undefined;
    return items[this.int(items.length)];
  }

  getState(): RngState {
    return { seed: this.seed, cursor: this._cursor };
  }

  get cursor(): number {
    return this._cursor;
  }

  get consumed(): number {
    return this._consumed;
  }
}

@Injectable()
export class RngService {
  /** seed + cursor 기반 결정적 RNG 인스턴스 생성 */
  create(seed: string, cursor: number = 0): Rng {
    return new Rng(seed, cursor);
  }

  restore(state: RngState): Rng {
    return new Rng(state.seed, state.cursor);
  }
}
