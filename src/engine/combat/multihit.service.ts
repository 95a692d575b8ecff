// 다중 타격: mhr 100 당 확정 1타, 나머지는 확률

import { Injectable } from '@nestjs/common';
import type { Rng } from '../rng/rng.service.js';

/** x = mhr/100 <= 0 이면 추첨 없이 0. 아니면 1회 추첨: r < frac(x) ? floor(x)+1 : floor(x) */
export function rollExtraHits(totalMhr: number, rng: Rng): number {
  const x = totalMhr / 100;
  if (x <= 0) return 0;
  const n = Math.floor(x);
  const f = x - n;
  return rng.next() < f ? n + 1 : n;
}

@Injectable()
export class MultihitService {
  rollExtraHits(totalMhr: number, rng: Rng): number {
    return rollExtraHits(totalMhr, rng);
  }

  totalHits(baseHits: number, totalMhr: number, rng: Rng): { total: number; extra: number } {
    const extra = rollExtraHits(totalMhr, rng);
    return { total: baseHits + extra, extra };
  }
}
