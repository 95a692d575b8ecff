// 레벨 → K (방어 완화 / 스킬 계수 기준값)

import { InvalidArgumentError } from '../../common/errors/game-errors.js';

type KBand = { readonly min: number; readonly max: number; readonly k: number };

export const K_TABLE: readonly KBand[] = [
  { min: 1, max: 9, k: 4 },
  { min: 10, max: 19, k: 126 },
  { min: 20, max: 29, k: 358 },
  { min: 30, max: 39, k: 657 },
  { min: 40, max: 49, k: 1012 },
  { min: 50, max: 59, k: 1414 },
  { min: 60, max: 69, k: 1859 },
  { min: 70, max: 79, k: 2343 },
  { min: 80, max: 89, k: 2862 },
  { min: 90, max: 99, k: 3415 },
  { min: 100, max: 100, k: 4000 },
];

/** 테이블 밖(100 초과)은 가장 가까운 구간으로 clamp. 0 이하는 오류 */
export function kForLevel(level: number): number {
  if (!Number.isFinite(level) || level <= 0) {
    throw new InvalidArgumentError(`Invalid level: ${level}`, { level });
  }
  const lv = Math.floor(level);
  const first = K_TABLE[0];
  const last = K_TABLE[K_TABLE.length - 1];
  if (lv < first.min) return first.k;
  if (lv > last.max) return last.k;
  const band = K_TABLE.find((b) => lv >= b.min && lv <= b.max);
  return band ? band.k : last.k;
}
