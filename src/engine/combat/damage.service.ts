// 피해 공식: 완화율 A/(A+K), 치명타 배율, 상태 배율

import { Injectable } from '@nestjs/common';
import type { Rng } from '../rng/rng.service.js';
import type { StatusFrame, UnitStats } from '../../types/index.js';

export const MAX_MITIGATION = 0.95;

export type DamageType = 'attack' | 'skill' | 'pure';

export interface HitInput {
  attacker: UnitStats;
  attackerFrame: StatusFrame;
  defender: UnitStats;
  defenderFrame: StatusFrame;
  ratio: number;
  damageType: DamageType;
  rng: Rng;
}

export interface HitResult {
  damage: number;
  isCrit: boolean;
  mitigation: number;
  raw: number;
}

/** defense <= 0 → 0, 그 외 defense/(defense+K) 를 [0, 0.95] 로 */
export function mitigation(defense: number, k: number): number {
  if (defense <= 0) return 0;
  const m = defense / (defense + k);
  return Math.max(0, Math.min(MAX_MITIGATION, m));
}

export function applyMitigation(raw: number, m: number): number {
  if (raw <= 0) return 0;
  return raw * (1 - m);
}

/** 150 → 1.5 */
export function critMultiplier(critDamagePct: number): number {
  return Math.max(0, critDamagePct / 100);
}

export function rawAttack(
  attack: number,
  ratio: number,
  isCrit: boolean,
  critDamagePct: number,
): number {
  const raw = attack * ratio;
  return isCrit ? raw * critMultiplier(critDamagePct) : raw;
}

@Injectable()
export class DamageService {
  /**
   * 1타 피해:
   *   attack: 공격력 × 비율 (치명타) × 공격 배율, 방어구(armour) 완화
   *   skill : 공격력 × 비율 × (1 + 스킬 파워) (치명타) × 스킬 배율, 마법 저항(mr) 완화
   *   pure  : 공격력 × 비율 (치명타) × 공격 배율, 완화 없음
   * 방어 측 받는 피해 배율 적용 후 반올림. 치명 판정 1회 소비.
   */
  computeHit(input: HitInput): HitResult {
    const { attacker, attackerFrame, defender, defenderFrame, ratio, damageType, rng } =
      input;
    const isCrit = rng.chance(attacker.critChance / 100);

    let raw = 0;
    let m = 0;
    switch (damageType) {
      case 'attack':
        raw =
          rawAttack(attacker.attack, ratio, isCrit, attacker.critDamage) *
          attackerFrame.attackDamageMult;
        m = mitigation(defender.armour + defenderFrame.armourBaseDelta, defender.k);
        break;
      case 'skill':
        raw =
          rawAttack(attacker.attack * (1 + attacker.skillPower), ratio, isCrit, attacker.critDamage) *
          attackerFrame.skillDamageMult;
        m = mitigation(defender.mr + defenderFrame.mrBaseDelta, defender.k);
        break;
      case 'pure':
        raw =
          rawAttack(attacker.attack, ratio, isCrit, attacker.critDamage) *
          attackerFrame.attackDamageMult;
        break;
    }

    const damage = Math.round(
      applyMitigation(raw, m) * defenderFrame.damageTakenMult,
    );
    return { damage: Math.max(0, damage), isCrit, mitigation: m, raw };
  }
}
