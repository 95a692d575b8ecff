import { Module } from '@nestjs/common';
import { RngService } from './rng/rng.service.js';
import { StatsService } from './stats/stats.service.js';
import { StatusService } from './status/status.service.js';
import { AoeService } from './targeting/aoe.service.js';
import { TargetingService } from './targeting/targeting.service.js';
import { CooldownService } from './turn/cooldown.service.js';
import { TurnSchedulerService } from './turn/turn-scheduler.service.js';
import { DamageService } from './combat/damage.service.js';
import { MultihitService } from './combat/multihit.service.js';
import { ProcService } from './combat/proc.service.js';
import { SkillService } from './combat/skill.service.js';
import { CombatService } from './combat/combat.service.js';
import { ActionPolicyService } from './combat/action-policy.service.js';
import { BattleService } from './battle/battle.service.js';

const providers = [
  // Layer 1: RNG
  RngService,
  // Layer 2: 스탯
  StatsService,
  // Layer 3: 상태이상
  StatusService,
  // Layer 4: 대상 선정
  AoeService,
  TargetingService,
  // Layer 5: 턴
  CooldownService,
  TurnSchedulerService,
  // Layer 6: 전투
  DamageService,
  MultihitService,
  ProcService,
  SkillService,
  CombatService,
  ActionPolicyService,
  // Layer 7: 전투 루프
  BattleService,
];

@Module({
  providers,
  exports: providers,
})
export class EngineModule {}
