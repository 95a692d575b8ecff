// 스킬: 액티브 시전 가능 판정, 오라(전투 시작) 적용

import { Injectable } from '@nestjs/common';
import { ContentLoaderService } from '../../content/content-loader.service.js';
import type { SkillDefinition } from '../../content/content.types.js';
import type { BattleState } from '../model/battle-state.js';
import { unitLabel } from '../model/unit.js';
import { CooldownService } from '../turn/cooldown.service.js';
import type { StatusFrame, Unit } from '../../types/index.js';
import type { CastCheck } from './action.types.js';
import { ProcService } from './proc.service.js';

@Injectable()
export class SkillService {
  constructor(
    private readonly content: ContentLoaderService,
    private readonly cooldowns: CooldownService,
    private readonly procs: ProcService,
  ) {}

  skill(key: string): SkillDefinition {
    return this.content.getSkill(key);
  }

  /** 보유 순서 유지 */
  activeSkills(unit: Unit): SkillDefinition[] {
    return unit.build.skillKeys
      .map((k) => this.content.getSkill(k))
      .filter((s) => s.kind === 'active');
  }

  canCast(unit: Unit, skillKey: string, frame: StatusFrame): CastCheck {
    const skill = this.content.getSkill(skillKey);
    if (!frame.canUseActiveSkills) return { ok: false, reason: 'silenced' };
    if (!this.cooldowns.isSkillReady(unit, skillKey)) {
      return { ok: false, reason: 'cooldown' };
    }
    if (unit.ap < skill.apCost) return { ok: false, reason: 'insufficient_ap' };
    if (unit.mp < skill.mpCost) return { ok: false, reason: 'insufficient_mp' };
    return { ok: true, reason: 'ok' };
  }

  /** 오라 스킬의 battle_start proc 실행: proc 에 지속이 없으면 스킬 지속 사용 */
  applyAuras(state: BattleState, unit: Unit): void {
    for (const key of unit.build.skillKeys) {
      const skill = this.content.getSkill(key);
      if (skill.kind !== 'aura') continue;
      state.log.write(`  AURA: ${unitLabel(unit)} activates ${skill.name}`);
      this.procs.fire(
        skill.procs.filter((p) => p.trigger === 'battle_start'),
        {
          state,
          source: unit,
          target: null,
          hitDamage: 0,
          durationFallback: skill.duration > 0 ? skill.duration : undefined,
        },
      );
    }
  }
}
