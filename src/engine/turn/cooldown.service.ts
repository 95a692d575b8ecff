// 스킬 쿨다운: 2턴 규칙 tick 으로만 감소

import { Injectable } from '@nestjs/common';
import { ContentLoaderService } from '../../content/content-loader.service.js';
import type { Unit } from '../../types/index.js';

@Injectable()
export class CooldownService {
  constructor(private readonly content: ContentLoaderService) {}

  /** 전투 시작 시 액티브 스킬은 기본 쿨다운부터 카운트다운 */
  startBattleCooldownLock(units: Iterable<Unit>): void {
    for (const unit of units) {
      for (const key of unit.build.skillKeys) {
        const skill = this.content.getSkill(key);
        if (skill.kind === 'active' && skill.cooldown > 0) {
          unit.cooldowns.set(key, skill.cooldown);
        }
      }
    }
  }

  remaining(unit: Unit, skillKey: string): number {
    return unit.cooldowns.get(skillKey) ?? 0;
  }

  isSkillReady(unit: Unit, skillKey: string): boolean {
    return this.remaining(unit, skillKey) <= 0;
  }

  putOnCooldown(unit: Unit, skillKey: string, baseCooldown: number): void {
    unit.cooldowns.set(skillKey, Math.max(0, Math.floor(baseCooldown)));
  }

  tick(unit: Unit): void {
    for (const [key, value] of unit.cooldowns) {
      unit.cooldowns.set(key, value > 0 ? value - 1 : 0);
    }
  }
}
