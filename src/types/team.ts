export const TEAM_IDS = ['A', 'B'] as const;
export type TeamId = (typeof TEAM_IDS)[number];

/** 1..9 (grid.ts 에서 검증) */
export type SlotId = number;

export type BattleWinner = TeamId | 'DRAW';

export function otherTeam(team: TeamId): TeamId {
  return team === 'A' ? 'B' : 'A';
}
