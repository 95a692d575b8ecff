// 전투 엔진: 팀 턴 루프, 전투 시작 준비, 승패 판정

import { Injectable, Logger } from '@nestjs/common';
import type { BattleStrategy } from '../combat/action.types.js';
import { ProcService } from '../combat/proc.service.js';
import { SkillService } from '../combat/skill.service.js';
import type { BattleState } from '../model/battle-state.js';
import { isAlive } from '../model/unit.js';
import { StatsService } from '../stats/stats.service.js';
import { CooldownService } from '../turn/cooldown.service.js';
import { TurnSchedulerService, actingTeam } from '../turn/turn-scheduler.service.js';
import {
  otherTeam,
  type BattleConfig,
  type BattleWinner,
  type TeamId,
  type TeamTurnResult,
} from '../../types/index.js';
import { writeHeader } from './battle-log.js';

@Injectable()
export class BattleService {
  private readonly logger = new Logger(BattleService.name);

  constructor(
    private readonly stats: StatsService,
    private readonly cooldowns: CooldownService,
    private readonly procs: ProcService,
    private readonly skills: SkillService,
    private readonly scheduler: TurnSchedulerService,
  ) {}

  /** 최초 1회: 스탯 스냅샷, 쿨다운 잠금, battle_start proc, 오라 */
  setup(state: BattleState): void {
    if (state.setupDone) return;
    const units = state.board.allUnits();
    for (const unit of units) this.stats.recompute(unit);
    this.cooldowns.startBattleCooldownLock(units);
    for (const unit of units) {
      this.procs.fireBattleStart(state, unit);
      this.skills.applyAuras(state, unit);
    }
    state.setupDone = true;
  }

  private winnerAfter(state: BattleState, team: TeamId): TeamId | null {
    const enemy = otherTeam(team);
    if (state.board.isDefeated(enemy)) return team;
    if (state.board.isDefeated(team)) return enemy;
    return null;
  }

  /** 이미 한 팀이 전멸한 상태면 그 승자 */
  private decidedWinner(state: BattleState): TeamId | null {
    if (state.board.isDefeated('B')) return 'A';
    if (state.board.isDefeated('A')) return 'B';
    return null;
  }

  private announce(state: BattleState, winner: TeamId): void {
    state.log.write(`==> Team ${winner} wins (Team ${otherTeam(winner)} defeated)`);
  }

  step(
    state: BattleState,
    strategy: BattleStrategy,
    config?: Partial<BattleConfig>,
  ): TeamTurnResult {
    if (config) state.config = { ...state.config, ...config };
    this.setup(state);

    // 결판난 전투는 턴을 더 진행하지 않음
    const decided = this.decidedWinner(state);
    if (decided !== null) {
      const last = actingTeam(Math.max(state.teamTurn, 1), state.startingTeam);
      return { teamTurn: state.teamTurn, team: last, actors: [], winner: decided };
    }

    state.teamTurn += 1;
    const teamTurn = state.teamTurn;
    const team = actingTeam(teamTurn, state.startingTeam);
    writeHeader(state.log, `TEAM TURN ${teamTurn} - Team ${team} starts`);

    const start = this.scheduler.startTeamTurn(state, teamTurn);
    const actorIds = start.actors.map((a) => a.id);

    // 턴 시작 DOT 로 전멸했을 수 있음
    const early = this.winnerAfter(state, team);
    if (early !== null) {
      this.announce(state, early);
      return { teamTurn, team, actors: actorIds, winner: early };
    }

    for (const actor of start.actors) {
      if (!isAlive(actor)) continue;
      strategy.execute(state, actor, team);

      const winner = this.winnerAfter(state, team);
      if (winner !== null) {
        this.announce(state, winner);
        return { teamTurn, team, actors: actorIds, winner };
      }
    }

    return { teamTurn, team, actors: actorIds, winner: null };
  }

  run(
    state: BattleState,
    strategy: BattleStrategy,
    config?: Partial<BattleConfig>,
  ): BattleWinner {
    if (config) state.config = { ...state.config, ...config };

    while (state.teamTurn < state.config.maxTeamTurns) {
      const { winner } = this.step(state, strategy);
      if (winner !== null) {
        this.logger.debug(`Battle finished: winner=${winner} turns=${state.teamTurn}`);
        return winner;
      }
    }

    state.log.write(`==> Draw after ${state.teamTurn} team turns`);
    this.logger.debug(`Battle finished: draw turns=${state.teamTurn}`);
    return 'DRAW';
  }
}
