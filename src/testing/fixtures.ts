// 테스트 전용: 소형 인메모리 카탈로그 + 유닛 헬퍼

import { ContentLoaderService } from '../content/content-loader.service.js';
import type { ContentBundleInput } from '../content/content.schema.js';
import { SimConfigService } from '../config/sim-config.service.js';
import { ActionPolicyService } from '../engine/combat/action-policy.service.js';
import { CombatService } from '../engine/combat/combat.service.js';
import { DamageService } from '../engine/combat/damage.service.js';
import { MultihitService } from '../engine/combat/multihit.service.js';
import { ProcService } from '../engine/combat/proc.service.js';
import { SkillService } from '../engine/combat/skill.service.js';
import { BattleService } from '../engine/battle/battle.service.js';
import { createUnit, type UnitSpec } from '../engine/model/unit.js';
import { StatsService } from '../engine/stats/stats.service.js';
import { StatusService } from '../engine/status/status.service.js';
import { AoeService } from '../engine/targeting/aoe.service.js';
import { TargetingService } from '../engine/targeting/targeting.service.js';
import { CooldownService } from '../engine/turn/cooldown.service.js';
import { TurnSchedulerService } from '../engine/turn/turn-scheduler.service.js';
import type { TeamId, Unit } from '../types/index.js';

export function testContentBundle(): ContentBundleInput {
  return {
    weapons: [
      {
        key: 'TestSword',
        range: 'melee',
        aoe: 'single',
        location: 'frontline',
        apBaseDelta: -20,
        passives: {
          '1': {
            name: 'Retaliate always',
            procs: [{ key: 'retaliate', trigger: 'on_hit_taken', ratio: 1 }],
          },
          '2': {
            name: 'STR +10% increased',
            mods: [{ stat: 'str', tag: 'inc', value: 10, source: 'TestSword: passive 2' }],
          },
        },
      },
      {
        key: 'TestBow',
        range: 'ranged',
        aoe: 'single',
        location: 'anywhere',
      },
      {
        key: 'TestAxe',
        range: 'melee',
        aoe: 'adjacent_1',
        location: 'frontline',
        aoeRatios: { splash: 0.5 },
        apLessPct: 30,
        defaultProcs: [{ key: 'apply_status', status: 'stun', duration: 1 }],
      },
      {
        key: 'TestGun',
        range: 'ranged',
        aoe: 'line',
        location: 'frontline',
        passives: {
          '1': {
            name: 'Bleed on hit',
            procs: [{ key: 'apply_status', status: 'bleeding', duration: 2 }],
          },
        },
      },
    ],
    offhands: [
      {
        key: 'TestShield',
        apLessPct: 20,
        passives: {
          '1': {
            name: 'Armour +20% more',
            mods: [{ stat: 'armour', tag: 'more', value: 20, source: 'TestShield: passive 1' }],
          },
        },
      },
      {
        key: 'TestKit',
        passives: {
          '1': {
            name: 'STR +10%K',
            mods: [{ stat: 'str', tag: 'base', value: 1, kScale: 0.1, source: 'TestKit: passive 1' }],
          },
        },
      },
    ],
    statuses: [
      { key: 'immunity', kind: 'buff', positive: true },
      { key: 'deliberate', kind: 'buff', positive: true },
      { key: 'stun', kind: 'control', positive: false },
      { key: 'immobilized', kind: 'control', positive: false },
      { key: 'silence', kind: 'control', positive: false },
      { key: 'disarm', kind: 'control', positive: false },
      { key: 'break', kind: 'debuff', positive: false },
      { key: 'panic', kind: 'debuff', positive: false, params: { skillDamageLessPct: 20 } },
      { key: 'weaken', kind: 'debuff', positive: false, params: { attackDamageLessPct: 25 } },
      { key: 'brand', kind: 'debuff', positive: false, params: { damageTakenMorePct: 50 } },
      { key: 'dull', kind: 'debuff', positive: false, params: { accuracyIncPct: -20 } },
      { key: 'slow', kind: 'debuff', positive: false, params: { apBaseDelta: -10 } },
      { key: 'chill', kind: 'debuff', positive: false },
      {
        key: 'shred',
        kind: 'debuff',
        positive: false,
        stackable: true,
        maxStacks: 3,
        params: { armourBaseDelta: -20 },
      },
      { key: 'sunder', kind: 'debuff', positive: false, params: { mrBaseDelta: -15 } },
      {
        key: 'bleeding',
        kind: 'dot',
        positive: false,
        stackable: true,
        maxStacks: 5,
        params: { dotRatio: 0.5, hitDamage: 0 },
      },
      { key: 'frozen', kind: 'control', positive: false, frameFlags: { blockApGain: true } },
    ],
    skills: [
      {
        key: 'strike',
        name: 'Strike',
        kind: 'active',
        apCost: 100,
        cooldown: 3,
        targeting: { side: 'enemy', location: 'frontline' },
        ratio: 2,
        damageType: 'attack',
      },
      {
        key: 'blast',
        name: 'Blast',
        kind: 'active',
        apCost: 50,
        mpCost: 300,
        targeting: { side: 'enemy', location: 'anywhere' },
        aoe: 'cross',
        ratio: 1,
        damageType: 'pure',
      },
      {
        key: 'ward',
        name: 'Ward',
        kind: 'aura',
        duration: 2,
        damageType: 'none',
        procs: [{ key: 'apply_status', status: 'deliberate', target: 'team', trigger: 'battle_start' }],
      },
      {
        key: 'spikes',
        name: 'Spikes',
        kind: 'passive',
        damageType: 'none',
        procs: [{ key: 'apply_status', status: 'shred', duration: 2 }],
      },
    ],
    gear: [
      {
        key: 'plate',
        name: 'Plate',
        slot: 'armor',
        mods: [
          { stat: 'armour', tag: 'base', value: 100, source: 'Plate' },
          { stat: 'ap_gain', tag: 'less', value: 10, source: 'Plate' },
        ],
      },
      {
        key: 'ring',
        name: 'Ring',
        slot: 'ring',
        mods: [{ stat: 'hp', tag: 'more', value: 10, source: 'Ring' }],
      },
    ],
  };
}

export function createTestContent(
  bundle: ContentBundleInput = testContentBundle(),
): ContentLoaderService {
  const content = new ContentLoaderService(new SimConfigService());
  content.loadBundle(bundle);
  return content;
}

/** level 1 (K=4), str 100 / dex 40 / int 10 / vit 20, TestBow */
export function makeUnit(
  team: TeamId,
  slot: number,
  overrides: Partial<Omit<UnitSpec, 'team' | 'slot'>> = {},
): Unit {
  return createUnit({
    team,
    slot,
    name: overrides.name ?? `${team}${slot}`,
    base: overrides.base ?? { level: 1, str: 100, dex: 40, int: 10, vit: 20 },
    build: overrides.build ?? { weaponKey: 'TestBow' },
  });
}

/** 전투 중 유닛: 자원 초기화 완료 상태 */
export function liveUnit(
  team: TeamId,
  slot: number,
  hp: number = 1000,
  overrides: Partial<Omit<UnitSpec, 'team' | 'slot'>> = {},
): Unit {
  const u = makeUnit(team, slot, overrides);
  u.hp = hp;
  u.resourcesInitialized = true;
  return u;
}

export function kill(unit: Unit): void {
  unit.hp = 0;
}

export interface TestEngine {
  content: ContentLoaderService;
  stats: StatsService;
  status: StatusService;
  cooldowns: CooldownService;
  procs: ProcService;
  skills: SkillService;
  combat: CombatService;
  policy: ActionPolicyService;
  scheduler: TurnSchedulerService;
  battle: BattleService;
}

/** Nest 컨테이너 없이 엔진 서비스 그래프 구성 */
export function createTestEngine(
  content: ContentLoaderService = createTestContent(),
): TestEngine {
  const stats = new StatsService(content);
  const status = new StatusService(content);
  const cooldowns = new CooldownService(content);
  const procs = new ProcService(content, status);
  const skills = new SkillService(content, cooldowns, procs);
  const combat = new CombatService(
    content,
    stats,
    status,
    new TargetingService(),
    new AoeService(),
    new DamageService(),
    new MultihitService(),
    procs,
    skills,
    cooldowns,
  );
  const policy = new ActionPolicyService(status, skills, combat);
  const scheduler = new TurnSchedulerService(stats, status, cooldowns);
  const battle = new BattleService(stats, cooldowns, procs, skills, scheduler);
  return { content, stats, status, cooldowns, procs, skills, combat, policy, scheduler, battle };
}
