// splitmix64 기반 결정적 RNG: 전투 1회당 인스턴스 1개, 모든 확률 판정이 이 순서대로 소비

import { Injectable } from '@nestjs/common';
import { InvalidArgumentError } from '../../common/errors/game-errors.js';

const MASK64 = 0xffffffffffffffffn;
const GAMMA = 0x9e3779b97f4a7c15n;
const TWO_POW_53 = 2 ** 53;

export type RngSeed = string | number;

export interface RngState {
  seed: string;
  cursor: number;
}

export class Rng {
  private state = 1n;
  private _seed = '';
  private _cursor = 0;
  private _consumed = 0;

  constructor(seed: RngSeed, cursor: number = 0) {
    this.reseed(seed, cursor);
  }

  private hashSeed(seed: string): bigint {
    let h = 0n;
    for (let i = 0; i < seed.length; i++) {
      h = ((h << 5n) - h + BigInt(seed.charCodeAt(i))) & MASK64;
    }
    return h === 0n ? 1n : h;
  }

  private advanceState(): void {
    this.state = (this.state + GAMMA) & MASK64;
  }

  private nextRaw(): bigint {
    this._cursor++;
    this._consumed++;
    this.advanceState();
    let z = this.state;
    z = ((z ^ (z >> 30n)) * 0xbf58476d1ce4e5b9n) & MASK64;
    z = ((z ^ (z >> 27n)) * 0x94d049bb133111ebn) & MASK64;
    return (z ^ (z >> 31n)) & MASK64;
  }

  /** 상태·커서 초기화 후 cursor 위치까지 fast-forward */
  reseed(seed: RngSeed, cursor: number = 0): void {
    this._seed = String(seed);
    this.state = this.hashSeed(this._seed);
    this._cursor = cursor;
    this._consumed = 0;
    for (let i = 0; i < cursor; i++) {
      this.advanceState();
    }
  }

  /** [0, 1): 상위 53비트 */
  next(): number {
    return Number(this.nextRaw() >> 11n) / TWO_POW_53;
  }

  /** min~max 정수 (inclusive) */
  range(min: number, max: number): number {
    if (!Number.isInteger(min) || !Number.isInteger(max) || max < min) {
      throw new InvalidArgumentError(`Invalid range: ${min}..${max}`, {
        min,
        max,
      });
    }
    return Math.floor(this.next() * (max - min + 1)) + min;
  }

  /** p 는 0~1 비율. 0 이하/1 이상은 추첨 없이 확정 */
  chance(p: number): boolean {
    if (p <= 0) return false;
    if (p >= 1) return true;
    return this.next() < p;
  }

  choiceIndex(n: number): number {
    if (!Number.isInteger(n) || n <= 0) {
      throw new InvalidArgumentError(`choiceIndex requires n > 0: ${n}`, { n });
    }
    return Math.floor(this.next() * n);
  }

  /** Fisher-Yates, 제자리 */
  shuffle<T>(items: T[]): T[] {
    for (let i = items.length - 1; i > 0; i--) {
      const j = this.choiceIndex(i + 1);
      const tmp = items[i];
      items[i] = items[j];
      items[j] = tmp;
    }
    return items;
  }

  getState(): RngState {
    return { seed: this._seed, cursor: this._cursor };
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
  create(seed: RngSeed, cursor: number = 0): Rng {
    return new Rng(seed, cursor);
  }
}
