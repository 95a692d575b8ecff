// 기본 행동 전략: 준비된 첫 액티브 스킬, 없으면 기본 공격, 둘 다 안 되면 대기

import { Injectable } from '@nestjs/common';
import { lineOf, posToSlot } from '../grid/grid.js';
import type { BattleState } from '../model/battle-state.js';
import { unitLabel } from '../model/unit.js';
import { StatusService } from '../status/status.service.js';
import { otherTeam, type TargetRef, type TeamId, type Unit } from '../../types/index.js';
import { failed, type ActionResult, type BattleStrategy } from './action.types.js';
import { CombatService } from './combat.service.js';
import { SkillService } from './skill.service.js';

@Injectable()
export class ActionPolicyService implements BattleStrategy {
  constructor(
    private readonly status: StatusService,
    private readonly skills: SkillService,
    private readonly combat: CombatService,
  ) {}

  /** 같은 line 의 적 전열 slot */
  preferredTarget(actor: Unit, team: TeamId): TargetRef {
    return { team: otherTeam(team), slot: posToSlot(0, lineOf(actor.slot)) };
  }

  execute(state: BattleState, actor: Unit, team: TeamId): ActionResult {
    const frame = this.status.resolve(actor);
    if (!frame.canAct) {
      state.log.write(`  SKIP: ${unitLabel(actor)} (cannot_act)`);
      return failed('skip', 'cannot_act');
    }

    const preferred = this.preferredTarget(actor, team);
    if (frame.canUseActiveSkills) {
      for (const skill of this.skills.activeSkills(actor)) {
        if (!this.skills.canCast(actor, skill.key, frame).ok) continue;
        const cast = this.combat.castSkill(state, actor, skill.key, preferred);
        if (cast.ok) return cast;
      }
    }

    const attack = this.combat.basicAttack(state, actor, preferred);
    if (attack.ok) return attack;

    state.log.write(`  SKIP: ${unitLabel(actor)} (${attack.reason})`);
    return failed('skip', attack.reason);
  }
}
