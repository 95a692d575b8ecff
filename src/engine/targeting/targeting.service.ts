// 대상 선정: 합법 후보 계산, 선호 대상 → 같은 line 재지정 → 무작위/첫 후보

import { Injectable } from '@nestjs/common';
import { lineOf } from '../grid/grid.js';
import type { Board } from '../model/board.js';
import type { Rng } from '../rng/rng.service.js';
import {
  otherTeam,
  type SlotId,
  type TargetPick,
  type TargetRef,
  type TargetSide,
  type TargetingSpec,
  type TeamId,
  type Unit,
} from '../../types/index.js';

export interface PickPrimaryTargetInput {
  board: Board;
  actor: Unit;
  spec: TargetingSpec;
  preferredTeam?: TeamId;
  preferredSlot?: SlotId;
  rng?: Rng;
}

export type ResolvedTargets =
  | { ok: true; targets: TargetRef[] }
  | { ok: false; reason: 'no_legal_target' | 'preferred_invalid' };

export function resolveSideTeams(actorTeam: TeamId, side: TargetSide): TeamId[] {
  switch (side) {
    case 'enemy':
      return [otherTeam(actorTeam)];
    case 'ally':
    case 'self':
      return [actorTeam];
    case 'both':
      return [actorTeam, otherTeam(actorTeam)];
  }
}

@Injectable()
export class TargetingService {
  exposedFrontline(board: Board, team: TeamId): SlotId[] {
    return board.exposedFrontline(team);
  }

  candidates(board: Board, actor: Unit, spec: TargetingSpec, team: TeamId): SlotId[] {
    switch (spec.location) {
      case 'self':
        return team === actor.team && board.isAliveAt(team, actor.slot)
          ? [actor.slot]
          : [];
      case 'frontline':
        return board.exposedFrontline(team);
      case 'anywhere':
        return board.aliveSlots(team);
    }
  }

  pickPrimaryTarget(input: PickPrimaryTargetInput): TargetPick {
    const { board, actor, spec, rng } = input;
    if (spec.scope !== 'single') {
      return { ok: false, reason: 'scope_not_single' };
    }

    if (spec.side === 'self' || spec.location === 'self') {
      return board.isAliveAt(actor.team, actor.slot)
        ? { ok: true, team: actor.team, slot: actor.slot, reason: 'self' }
        : { ok: false, reason: 'no_legal_target' };
    }

    // 후보는 한 팀에서만: side 에 속한 선호 팀, 아니면 side 의 첫 팀
    const teams = resolveSideTeams(actor.team, spec.side);
    const { preferredTeam, preferredSlot } = input;
    const team =
      preferredTeam !== undefined && teams.includes(preferredTeam) ? preferredTeam : teams[0];
    const pool = this.candidates(board, actor, spec, team);

    if (preferredSlot !== undefined) {
      if (pool.includes(preferredSlot)) {
        return { ok: true, team, slot: preferredSlot, reason: 'preferred_ok' };
      }
      if (!spec.allowRetarget) {
        return { ok: false, reason: 'preferred_invalid' };
      }
      if (spec.location === 'frontline') {
        const line = lineOf(preferredSlot);
        const same = pool.find((s) => lineOf(s) === line);
        if (same !== undefined) {
          return { ok: true, team, slot: same, reason: 'retarget_same_line_exposed' };
        }
      }
    }

    if (pool.length === 0) {
      return { ok: false, reason: 'no_legal_target' };
    }

    const retargeted = preferredSlot !== undefined;
    if (rng) {
      const slot = pool[rng.choiceIndex(pool.length)];
      return { ok: true, team, slot, reason: retargeted ? 'retarget_random' : 'random' };
    }
    return { ok: true, team, slot: pool[0], reason: retargeted ? 'retarget_first' : 'first' };
  }

  /** single → 주 대상 1개, team → 해당 팀 생존 전원, all_alive → A 팀 먼저 양 팀 전원 */
  resolveTargets(input: PickPrimaryTargetInput): ResolvedTargets {
    const { board, actor, spec } = input;
    if (spec.scope === 'single') {
      const pick = this.pickPrimaryTarget(input);
      if (!pick.ok) {
        return {
          ok: false,
          reason: pick.reason === 'preferred_invalid' ? 'preferred_invalid' : 'no_legal_target',
        };
      }
      return { ok: true, targets: [{ team: pick.team, slot: pick.slot }] };
    }

    const teams: TeamId[] =
      spec.scope === 'all_alive' ? ['A', 'B'] : resolveSideTeams(actor.team, spec.side).slice(0, 1);
    const targets = teams.flatMap((team) =>
      board.aliveSlots(team).map((slot) => ({ team, slot })),
    );
    return targets.length > 0
      ? { ok: true, targets }
      : { ok: false, reason: 'no_legal_target' };
  }
}
