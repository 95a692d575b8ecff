import type { BattleState } from '../model/battle-state.js';
import type { TargetRef, TeamId, Unit } from '../../types/index.js';

export type CastFailure = 'silenced' | 'cooldown' | 'insufficient_ap' | 'insufficient_mp';

export type CastCheck = { ok: true; reason: 'ok' } | { ok: false; reason: CastFailure };

export type ActionKind = 'basic_attack' | 'skill' | 'skip';

export type ActionFailure =
  | CastFailure
  | 'cannot_act'
  | 'cannot_basic_attack'
  | 'not_active_skill'
  | 'no_legal_target'
  | 'no_action';

export type ActionResult =
  | { ok: true; reason: 'ok'; kind: ActionKind; targets: TargetRef[] }
  | { ok: false; reason: ActionFailure; kind: ActionKind; targets: TargetRef[] };

/** 행동자가 무엇을 할지 정하는 전략 (주입) */
export interface BattleStrategy {
  execute(state: BattleState, actor: Unit, team: TeamId): ActionResult;
}

export function failed(kind: ActionKind, reason: ActionFailure): ActionResult {
  return { ok: false, reason, kind, targets: [] };
}
