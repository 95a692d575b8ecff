import type { Rng } from '../rng/rng.service.js';
import type { BattleConfig, TeamId } from '../../types/index.js';
import { DEFAULT_BATTLE_CONFIG } from '../../types/index.js';
import type { BattleLogSink } from '../battle/battle-log.js';
import { MemoryLogSink } from '../battle/battle-log.js';
import type { Board } from './board.js';

export interface BattleState {
  board: Board;
  rng: Rng;
  /** 0 에서 시작, step 마다 정확히 +1 */
  teamTurn: number;
  startingTeam: TeamId;
  config: BattleConfig;
  log: BattleLogSink;
  setupDone: boolean;
}

export function createBattleState(params: {
  board: Board;
  rng: Rng;
  startingTeam?: TeamId;
  config?: Partial<BattleConfig>;
  log?: BattleLogSink;
}): BattleState {
  return {
    board: params.board,
    rng: params.rng,
    teamTurn: 0,
    startingTeam: params.startingTeam ?? 'A',
    config: { ...DEFAULT_BATTLE_CONFIG, ...params.config },
    log: params.log ?? new MemoryLogSink(),
    setupDone: false,
  };
}
