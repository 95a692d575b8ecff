// 양 팀 3x3 보드: 팀당 slot 하나에 유닛 하나

import { InvalidInputError } from '../../common/errors/game-errors.js';
import { ALL_SLOTS, requireSlot, slotsInLine } from '../grid/grid.js';
import { TEAM_IDS, type SlotId, type TeamId, type Unit } from '../../types/index.js';
import { isAlive } from './unit.js';

export class Board {
  private readonly teams: Record<TeamId, Map<SlotId, Unit>> = {
    A: new Map(),
    B: new Map(),
  };

  constructor(units: Iterable<Unit> = []) {
    for (const u of units) this.place(u);
  }

  place(unit: Unit): void {
    const slot = requireSlot(unit.slot);
    const side = this.teams[unit.team];
    if (side.has(slot)) {
      throw new InvalidInputError(`Slot already occupied: ${unit.team}-${slot}`, {
        team: unit.team,
        slot,
      });
    }
    side.set(slot, unit);
  }

  get(team: TeamId, slot: SlotId): Unit | undefined {
    return this.teams[team].get(slot);
  }

  /** slot 오름차순 */
  units(team: TeamId): Unit[] {
    return ALL_SLOTS.flatMap((s) => {
      const u = this.teams[team].get(s);
      return u ? [u] : [];
    });
  }

  /** A 팀 → B 팀, 각 slot 오름차순 */
  allUnits(): Unit[] {
    return TEAM_IDS.flatMap((t) => this.units(t));
  }

  aliveUnits(team: TeamId): Unit[] {
    return this.units(team).filter(isAlive);
  }

  aliveSlots(team: TeamId): SlotId[] {
    return this.aliveUnits(team).map((u) => u.slot);
  }

  isAliveAt(team: TeamId, slot: SlotId): boolean {
    const u = this.get(team, slot);
    return u !== undefined && isAlive(u);
  }

  isDefeated(team: TeamId): boolean {
    return this.aliveUnits(team).length === 0;
  }

  /** line 별 전열→후열 첫 생존 slot (line 순서) */
  exposedFrontline(team: TeamId): SlotId[] {
    const exposed: SlotId[] = [];
    for (let line = 0; line < 3; line++) {
      const first = slotsInLine(line).find((s) => this.isAliveAt(team, s));
      if (first !== undefined) exposed.push(first);
    }
    return exposed;
  }
}
