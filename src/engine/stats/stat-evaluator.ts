// 스탯 평가 파이프라인: 순수 함수, 난수 없음
//
//   (base + Σbase) × (1 + Σinc/100) × Π(1 + more/100) × Π(1 + less'/100)
//   less' = v <= 0 ? v : -v   (less 는 부호와 무관하게 항상 감소)

import type { ModifierLine } from '../../types/index.js';

export function evaluateStat(
  statKey: string,
  baseValue: number,
  modifiers: readonly ModifierLine[],
  clampMin?: number,
  clampMax?: number,
): number {
  let flat = 0;
  let incSum = 0;
  let moreMult = 1;
  let lessMult = 1;

  for (const m of modifiers) {
    if (m.stat !== statKey) continue;
    switch (m.tag) {
      case 'base':
        flat += m.value;
        break;
      case 'inc':
        incSum += m.value;
        break;
      case 'more':
        moreMult *= 1 + m.value / 100;
        break;
      case 'less': {
        const v = m.value <= 0 ? m.value : -m.value;
        lessMult *= 1 + v / 100;
        break;
      }
      default:
        // special: 규칙 레이어 전용
        break;
    }
  }

  let value = (baseValue + flat) * (1 + incSum / 100) * moreMult * lessMult;
  if (clampMin !== undefined && value < clampMin) value = clampMin;
  if (clampMax !== undefined && value > clampMax) value = clampMax;
  return value;
}
