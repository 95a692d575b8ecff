// 유닛 스탯 빌더: 장비/패시브 라인 수집 → 평가 파이프라인 → 스냅샷

import { Injectable } from '@nestjs/common';
import { ContentLoaderService } from '../../content/content-loader.service.js';
import type { PassiveOption } from '../../content/content.types.js';
import type {
  CatalogModifier,
  ModifierLine,
  PassiveChoice,
  Unit,
  UnitStats,
} from '../../types/index.js';
import { evaluateStat } from './stat-evaluator.js';
import { kForLevel } from './k-table.js';

const SKILL_POWER_PER_INT_K = 0.000005125;
const BASE_AP_GAIN = 100;

type ApAdjust = { apBaseDelta: number; apLessPct: number; apMorePct: number };
type Passives = Partial<Record<'1' | '2' | '3', PassiveOption>>;

/** 능력치 → 파생 기본값 */
export interface DerivedBases {
  attack: number;
  mhr: number;
  mp: number;
  mr: number;
  hp: number;
  skillPower: number;
}

export function deriveFromAttributes(
  attrs: { str: number; dex: number; int: number; vit: number },
  k: number,
): DerivedBases {
  return {
    attack: attrs.str,
    mhr: 0.05 * attrs.dex,
    mp: 100 * attrs.int,
    mr: attrs.int,
    hp: 50 * attrs.vit,
    skillPower: attrs.int * k * SKILL_POWER_PER_INT_K,
  };
}

/** kScale 라인 → value × kScale × K */
export function resolveCatalogModifier(
  mod: CatalogModifier,
  k: number,
): ModifierLine {
  const value = mod.kScale === undefined ? mod.value : mod.value * mod.kScale * k;
  return { stat: mod.stat, tag: mod.tag, value, source: mod.source };
}

/** 무기/보조장비 AP 보정 → ap_gain 라인 */
export function apAdjustLines(adjust: ApAdjust, source: string): ModifierLine[] {
  const lines: ModifierLine[] = [];
  if (adjust.apBaseDelta !== 0) {
    lines.push({ stat: 'ap_gain', tag: 'base', value: adjust.apBaseDelta, source });
  }
  if (adjust.apLessPct !== 0) {
    lines.push({ stat: 'ap_gain', tag: 'less', value: adjust.apLessPct, source });
  }
  if (adjust.apMorePct !== 0) {
    lines.push({ stat: 'ap_gain', tag: 'more', value: adjust.apMorePct, source });
  }
  return lines;
}

function chosenPassive(
  passives: Passives,
  choice: PassiveChoice,
): PassiveOption | undefined {
  if (choice === 1) return passives['1'];
  if (choice === 2) return passives['2'];
  if (choice === 3) return passives['3'];
  return undefined;
}

@Injectable()
export class StatsService {
  constructor(private readonly content: ContentLoaderService) {}

  resolveK(unit: Unit): number {
    return unit.build.k ?? kForLevel(unit.base.level);
  }

  /** 장비 + 무기(기본/패시브) + 보조장비(기본/패시브) + AP 보정 */
  collectLines(unit: Unit, k: number = this.resolveK(unit)): ModifierLine[] {
    const { build } = unit;
    const raw: CatalogModifier[] = [];

    for (const gearKey of build.gearKeys) {
      raw.push(...this.content.getGearItem(gearKey).mods);
    }

    const weapon = this.content.getWeapon(build.weaponKey);
    raw.push(...weapon.defaultMods);
    raw.push(...(chosenPassive(weapon.passives, build.weaponPassive)?.mods ?? []));

    const lines = raw.map((m) => resolveCatalogModifier(m, k));
    lines.push(...apAdjustLines(weapon, weapon.key));

    if (build.offhandKey !== null) {
      const offhand = this.content.getOffhand(build.offhandKey);
      const offRaw = [
        ...offhand.defaultMods,
        ...(chosenPassive(offhand.passives, build.offhandPassive)?.mods ?? []),
      ];
      lines.push(...offRaw.map((m) => resolveCatalogModifier(m, k)));
      lines.push(...apAdjustLines(offhand, offhand.key));
    }

    return lines;
  }

  computeStats(unit: Unit): UnitStats {
    const k = this.resolveK(unit);
    const lines = this.collectLines(unit, k);
    const { base } = unit;

    const attrs = {
      str: evaluateStat('str', base.str, lines),
      dex: evaluateStat('dex', base.dex, lines),
      int: evaluateStat('int', base.int, lines),
      vit: evaluateStat('vit', base.vit, lines),
    };
    const d = deriveFromAttributes(attrs, k);

    return {
      hpMax: evaluateStat('hp', d.hp, lines, 1),
      mpMax: evaluateStat('mp', d.mp, lines, 0),
      attack: evaluateStat('attack', d.attack, lines, 0),
      armour: evaluateStat('armour', 0, lines, 0),
      mr: evaluateStat('mr', d.mr, lines, 0),
      mhr: evaluateStat('mhr', d.mhr, lines, 0),
      critChance: evaluateStat('crit_chance', base.critChance, lines, 0),
      critDamage: evaluateStat('crit_damage', base.critDamage, lines, 0),
      accuracy: evaluateStat('accuracy', base.accuracy, lines, 0),
      evasion: evaluateStat('evasion', base.evasion, lines, 0),
      skillEvasion: evaluateStat('skill_evasion', base.skillEvasion, lines, 0),
      apGain: evaluateStat('ap_gain', BASE_AP_GAIN, lines, 0),
      skillPower: d.skillPower,
      k,
    };
  }

  /** 스냅샷 저장. hp/mp 는 최초 1회만 최대치로 초기화 */
  recompute(unit: Unit): UnitStats {
    const stats = this.computeStats(unit);
    unit.stats = stats;
    if (!unit.resourcesInitialized) {
      unit.hp = stats.hpMax;
      unit.mp = stats.mpMax;
      unit.resourcesInitialized = true;
    }
    return stats;
  }

  /** 턴 시작 AP 획득량: 상태 프레임의 ap_gain base 보정 포함, 반올림 */
  computeApGain(unit: Unit, apGainBaseDelta: number = 0): number {
    const lines = this.collectLines(unit);
    if (apGainBaseDelta !== 0) {
      lines.push({
        stat: 'ap_gain',
        tag: 'base',
        value: apGainBaseDelta,
        source: 'status',
      });
    }
    return Math.round(evaluateStat('ap_gain', BASE_AP_GAIN, lines, 0));
  }
}
