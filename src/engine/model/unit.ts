import { requireSlot } from '../grid/grid.js';
import type {
  TeamId,
  Unit,
  UnitBase,
  UnitBuild,
} from '../../types/index.js';

export const DEFAULT_UNIT_BASE: Omit<UnitBase, 'level' | 'str' | 'dex' | 'int' | 'vit'> = {
  critChance: 5,
  critDamage: 150,
  accuracy: 100,
  evasion: 0,
  skillEvasion: 0,
};

export type UnitSpec = {
  team: TeamId;
  slot: number;
  name: string;
  base: Pick<UnitBase, 'level' | 'str' | 'dex' | 'int' | 'vit'> & Partial<UnitBase>;
  build: Pick<UnitBuild, 'weaponKey'> & Partial<UnitBuild>;
};

export function unitId(team: TeamId, slot: number): string {
  return `${team}-${slot}`;
}

export function createUnit(spec: UnitSpec): Unit {
  const slot = requireSlot(spec.slot);
  return {
    id: unitId(spec.team, slot),
    team: spec.team,
    slot,
    name: spec.name,
    base: { ...DEFAULT_UNIT_BASE, ...spec.base },
    build: {
      weaponPassive: 0,
      offhandKey: null,
      offhandPassive: 0,
      gearKeys: [],
      skillKeys: [],
      ...spec.build,
    },
    stats: null,
    hp: 0,
    mp: 0,
    ap: 0,
    resourcesInitialized: false,
    statuses: new Map(),
    cooldowns: new Map(),
  };
}

/** HP 0 이하 = 사망. 자원은 StatsService.recompute 최초 호출 때 채워짐 */
export function isAlive(unit: Unit): boolean {
  return unit.hp > 0;
}

/** "A-1 Vanguard" */
export function unitLabel(unit: Unit): string {
  return `${unit.id} ${unit.name}`;
}
