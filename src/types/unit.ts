import type { SlotId, TeamId } from './team.js';
import type { StatusInstance } from './status.js';

/** 장비 외 기본 능력치 */
export type UnitBase = {
  level: number;
  str: number;
  dex: number;
  int: number;
  vit: number;
  critChance: number; // %
  critDamage: number; // % (150 = 1.5x)
  accuracy: number; // %
  evasion: number; // %
  skillEvasion: number; // %
};

export type PassiveChoice = 0 | 1 | 2 | 3; // 0 = 기본 패시브만

export type UnitBuild = {
  weaponKey: string;
  weaponPassive: PassiveChoice;
  offhandKey: string | null;
  offhandPassive: PassiveChoice;
  gearKeys: string[];
  skillKeys: string[];
  /** 지정 시 레벨 테이블 대신 사용 */
  k?: number;
};

/** 최종 전투 스탯: base + build 의 순수 함수 */
export type UnitStats = {
  hpMax: number;
  mpMax: number;
  attack: number;
  armour: number;
  mr: number;
  mhr: number;
  critChance: number;
  critDamage: number;
  accuracy: number;
  evasion: number;
  skillEvasion: number;
  apGain: number;
  skillPower: number;
  k: number;
};

export type Unit = {
  id: string; // "A-1"
  team: TeamId;
  slot: SlotId;
  name: string;
  base: UnitBase;
  build: UnitBuild;
  stats: UnitStats | null;
  hp: number;
  mp: number;
  ap: number;
  resourcesInitialized: boolean;
  statuses: Map<string, StatusInstance>;
  cooldowns: Map<string, number>;
};
