import type { SlotId, TeamId } from './team.js';

export const TARGET_SIDES = ['enemy', 'ally', 'self', 'both'] as const;
export type TargetSide = (typeof TARGET_SIDES)[number];

export const TARGET_LOCATIONS = ['anywhere', 'frontline', 'self'] as const;
export type TargetLocation = (typeof TARGET_LOCATIONS)[number];

export const TARGET_SCOPES = ['single', 'team', 'all_alive'] as const;
export type TargetScope = (typeof TARGET_SCOPES)[number];

export type TargetingSpec = {
  readonly side: TargetSide;
  readonly location: TargetLocation;
  readonly scope: TargetScope;
  readonly allowRetarget: boolean;
};

export const AOE_SHAPES = ['single', 'row_adjacent', 'cross', 'line'] as const;
export type AoeShape = (typeof AOE_SHAPES)[number];

export type AoeRatios = {
  /** row_adjacent / cross 주변 칸 */
  splash?: number;
  /** line: 바로 뒤 칸 */
  near?: number;
  /** line: 두 칸 뒤 */
  far?: number;
};

export type AoETarget = {
  readonly slot: SlotId;
  readonly ratio: number;
};

export type TargetPickReason =
  | 'preferred_ok'
  | 'retarget_same_line_exposed'
  | 'retarget_random'
  | 'retarget_first'
  | 'random'
  | 'first'
  | 'self';

export type TargetPickFailure =
  | 'no_legal_target'
  | 'preferred_invalid'
  | 'scope_not_single';

export type TargetPick =
  | { ok: true; team: TeamId; slot: SlotId; reason: TargetPickReason }
  | { ok: false; reason: TargetPickFailure };

export type TargetRef = { team: TeamId; slot: SlotId };
