// AoE 확장: 주 대상 1.0 이 항상 첫 번째, 중복 slot 은 처음 것만 유지

import { Injectable } from '@nestjs/common';
import { behindInLine, crossNeighbors, requireSlot, rowNeighbors } from '../grid/grid.js';
import type { AoETarget, AoeRatios, AoeShape, SlotId } from '../../types/index.js';

export const DEFAULT_SPLASH_RATIO = 0.5;
export const DEFAULT_LINE_NEAR_RATIO = 0.75;
export const DEFAULT_LINE_FAR_RATIO = 0.5;

@Injectable()
export class AoeService {
  expand(primary: SlotId, shape: AoeShape, ratios: AoeRatios = {}): AoETarget[] {
    const out: AoETarget[] = [{ slot: requireSlot(primary), ratio: 1 }];
    const push = (slot: SlotId | null, ratio: number) => {
      if (slot === null || out.some((t) => t.slot === slot)) return;
      out.push({ slot, ratio });
    };

    switch (shape) {
      case 'single':
        break;
      case 'row_adjacent':
        for (const s of rowNeighbors(primary)) {
          push(s, ratios.splash ?? DEFAULT_SPLASH_RATIO);
        }
        break;
      case 'cross':
        for (const s of crossNeighbors(primary)) {
          push(s, ratios.splash ?? DEFAULT_SPLASH_RATIO);
        }
        break;
      case 'line':
        push(behindInLine(primary, 1), ratios.near ?? DEFAULT_LINE_NEAR_RATIO);
        push(behindInLine(primary, 2), ratios.far ?? DEFAULT_LINE_FAR_RATIO);
        break;
    }
    return out;
  }
}
