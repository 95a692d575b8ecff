import type { TeamId } from './team.js';

export type BattleConfig = {
  maxTeamTurns: number;
  actionApCost: number;
  apThreshold: number;
  normalMaxActors: number;
};

export const DEFAULT_BATTLE_CONFIG: BattleConfig = {
  maxTeamTurns: 200,
  actionApCost: 100,
  apThreshold: 100,
  normalMaxActors: 5,
};

export type TeamTurnResult = {
  teamTurn: number;
  team: TeamId;
  actors: string[];
  winner: TeamId | null;
};
