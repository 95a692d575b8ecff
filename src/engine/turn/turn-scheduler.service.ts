// 팀 턴 스케줄러: 교대 순서, 2턴 tick, AP 획득, 행동자 선정

import { Injectable } from '@nestjs/common';
import { fmt } from '../battle/battle-log.js';
import type { BattleState } from '../model/battle-state.js';
import { isAlive, unitLabel } from '../model/unit.js';
import { StatsService } from '../stats/stats.service.js';
import { StatusService } from '../status/status.service.js';
import { otherTeam, type StatusFrame, type TeamId, type Unit } from '../../types/index.js';
import { CooldownService } from './cooldown.service.js';

/** 팀 턴 1~4 의 행동자 수 (AP 기준 무시) */
export const EARLY_TURN_CAPS: Readonly<Record<number, number>> = {
  1: 2,
  2: 3,
  3: 4,
  4: 5,
};

export const TICK_LOG_LINE = '  [TICK] Two-turn rule tick: cooldowns/durations -1';

export interface TurnRule {
  maxActors: number;
  ignoreApRule: boolean;
  apThreshold: number;
}

export interface TeamTurnStart {
  team: TeamId;
  ticked: boolean;
  rule: TurnRule;
  actors: Unit[];
  frames: Map<string, StatusFrame>;
}

export function actingTeam(teamTurn: number, startingTeam: TeamId): TeamId {
  return teamTurn % 2 === 1 ? startingTeam : otherTeam(startingTeam);
}

export function turnRule(
  teamTurn: number,
  apThreshold: number,
  normalMaxActors: number,
): TurnRule {
  const early = EARLY_TURN_CAPS[teamTurn];
  return early !== undefined
    ? { maxActors: early, ignoreApRule: true, apThreshold }
    : { maxActors: normalMaxActors, ignoreApRule: false, apThreshold };
}

export function ruleLabel(rule: TurnRule, teamTurn: number): string {
  return rule.ignoreApRule
    ? `ignore AP>=${rule.apThreshold} (early fairness T${teamTurn})`
    : `AP>=${rule.apThreshold}`;
}

/** AP 내림차순, 같으면 slot 오름차순 */
export function rankByAp(units: Unit[]): Unit[] {
  return [...units].sort((a, b) => b.ap - a.ap || a.slot - b.slot);
}

@Injectable()
export class TurnSchedulerService {
  constructor(
    private readonly stats: StatsService,
    private readonly status: StatusService,
    private readonly cooldowns: CooldownService,
  ) {}

  /** 짝수 턴마다 전 유닛 상태 지속/쿨다운 -1 */
  twoTurnTick(state: BattleState, teamTurn: number): boolean {
    if (teamTurn <= 0 || teamTurn % 2 !== 0) return false;
    state.log.write(TICK_LOG_LINE);
    for (const unit of state.board.allUnits()) {
      this.status.tick(unit);
      this.cooldowns.tick(unit);
    }
    return true;
  }

  startTeamTurn(state: BattleState, teamTurn: number): TeamTurnStart {
    const { board, config, log } = state;
    const team = actingTeam(teamTurn, state.startingTeam);
    const ticked = this.twoTurnTick(state, teamTurn);

    const frames = new Map<string, StatusFrame>();
    for (const unit of board.aliveUnits(team)) {
      const frame = this.status.resolve(unit);
      frames.set(unit.id, frame);

      const before = unit.ap;
      const gain = frame.blockApGain
        ? 0
        : this.stats.computeApGain(unit, frame.apGainBaseDelta);
      unit.ap = before + gain;
      log.write(`  AP gain: ${unit.id}: ${before} -> ${unit.ap} (+${gain})`);

      for (const ev of frame.events) {
        if (ev.type === 'log') {
          log.write(`  STATUS: ${ev.message}`);
          continue;
        }
        const hpBefore = unit.hp;
        unit.hp = Math.max(0, unit.hp - ev.amount);
        log.write(
          `  DOT: ${unitLabel(unit)} takes ${fmt(ev.amount)} (${ev.statusKey}) HP ${fmt(hpBefore)} -> ${fmt(unit.hp)}`,
        );
        if (!isAlive(unit)) log.write(`  ${unitLabel(unit)} is defeated`);
      }
    }

    const rule = turnRule(teamTurn, config.apThreshold, config.normalMaxActors);
    let candidates = rankByAp(
      board.aliveUnits(team).filter((u) => frames.get(u.id)?.canAct !== false),
    );
    if (!rule.ignoreApRule) {
      candidates = candidates.filter((u) => u.ap >= rule.apThreshold);
    }
    const actors = candidates.slice(0, rule.maxActors);

    const actorStr =
      actors.length > 0
        ? actors.map((a) => `${a.id}(AP=${a.ap})`).join(', ')
        : '(none)';
    log.write(
      `  Actors selected: max=${rule.maxActors}, rule=${ruleLabel(rule, teamTurn)}: ${actorStr}`,
    );

    return { team, ticked, rule, actors, frames };
  }
}
