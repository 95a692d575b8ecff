// 행동 실행: 기본 공격(다중 타격 + AoE), 액티브 스킬 시전, 타격별 proc/반격

import { Injectable } from '@nestjs/common';
import {
  InsufficientResourceError,
  NoLegalTargetError,
} from '../../common/errors/game-errors.js';
import { ContentLoaderService } from '../../content/content-loader.service.js';
import type { ProcDefinition } from '../../content/content.types.js';
import { fmt } from '../battle/battle-log.js';
import type { BattleState } from '../model/battle-state.js';
import { isAlive, unitLabel } from '../model/unit.js';
import { StatsService } from '../stats/stats.service.js';
import { StatusService } from '../status/status.service.js';
import { AoeService } from '../targeting/aoe.service.js';
import { TargetingService } from '../targeting/targeting.service.js';
import { CooldownService } from '../turn/cooldown.service.js';
import type {
  SlotId,
  TargetRef,
  TargetingSpec,
  TeamId,
  Unit,
  UnitStats,
} from '../../types/index.js';
import { failed, type ActionResult } from './action.types.js';
import { DamageService, type DamageType } from './damage.service.js';
import { MultihitService } from './multihit.service.js';
import { ProcService } from './proc.service.js';
import { SkillService } from './skill.service.js';

interface HitOptions {
  ratio: number;
  damageType: DamageType;
  onHitProcs: readonly ProcDefinition[];
  /** false 면 proc/반격 없음 (반격 타격 자체) */
  reactions: boolean;
}

type PlannedHit = { team: TeamId; slot: SlotId; ratio: number };

function addTarget(list: TargetRef[], team: TeamId, slot: SlotId): void {
  if (!list.some((t) => t.team === team && t.slot === slot)) list.push({ team, slot });
}

@Injectable()
export class CombatService {
  constructor(
    private readonly content: ContentLoaderService,
    private readonly stats: StatsService,
    private readonly status: StatusService,
    private readonly targeting: TargetingService,
    private readonly aoe: AoeService,
    private readonly damage: DamageService,
    private readonly multihit: MultihitService,
    private readonly procs: ProcService,
    private readonly skills: SkillService,
    private readonly cooldowns: CooldownService,
  ) {}

  private statsOf(unit: Unit): UnitStats {
    return unit.stats ?? this.stats.recompute(unit);
  }

  basicAttack(state: BattleState, actor: Unit, preferred?: TargetRef): ActionResult {
    const { board, rng, log } = state;
    const frame = this.status.resolve(actor);
    if (!frame.canAct) return failed('basic_attack', 'cannot_act');
    if (!frame.canBasicAttack) return failed('basic_attack', 'cannot_basic_attack');

    const weapon = this.content.getWeapon(actor.build.weaponKey);
    const spec: TargetingSpec = {
      side: 'enemy',
      location: weapon.location,
      scope: 'single',
      allowRetarget: true,
    };
    const first = this.targeting.pickPrimaryTarget({
      board,
      actor,
      spec,
      preferredTeam: preferred?.team,
      preferredSlot: preferred?.slot,
      rng,
    });
    if (!first.ok) return failed('basic_attack', 'no_legal_target');

    actor.ap = Math.max(0, actor.ap - state.config.actionApCost);
    log.write(
      `  ACTION: ${unitLabel(actor)} attacks ${first.team}-${first.slot} with ${weapon.key} (aoe=${weapon.aoe})`,
    );

    const hits = this.multihit.totalHits(
      1,
      this.statsOf(actor).mhr + frame.mhrBaseDelta,
      rng,
    );
    if (hits.extra > 0) {
      log.write(`    Multi-hit: ${hits.total} hits (+${hits.extra})`);
    }

    const onHitProcs = this.procs.collect(actor, 'on_hit', frame.ignorePassives);
    const targets: TargetRef[] = [];
    const team = first.team;
    let primary = first.slot;

    for (let i = 0; i < hits.total; i++) {
      if (!isAlive(actor)) break;
      if (!board.isAliveAt(team, primary)) {
        const next = this.targeting.pickPrimaryTarget({
          board,
          actor,
          spec,
          preferredTeam: team,
          preferredSlot: primary,
          rng,
        });
        if (!next.ok) break;
        primary = next.slot;
      }

      for (const t of this.aoe.expand(primary, weapon.aoe, weapon.aoeRatios)) {
        const defender = board.get(team, t.slot);
        if (defender === undefined || !isAlive(defender) || t.ratio <= 0) continue;
        this.hit(state, actor, defender, {
          ratio: weapon.mainRatio * t.ratio,
          damageType: 'attack',
          onHitProcs,
          reactions: true,
        });
        addTarget(targets, team, t.slot);
      }
    }

    return { ok: true, reason: 'ok', kind: 'basic_attack', targets };
  }

  castSkill(
    state: BattleState,
    actor: Unit,
    skillKey: string,
    preferred?: TargetRef,
  ): ActionResult {
    const { board, rng, log } = state;
    const skill = this.skills.skill(skillKey);
    if (skill.kind !== 'active') return failed('skill', 'not_active_skill');

    const frame = this.status.resolve(actor);
    if (!frame.canAct) return failed('skill', 'cannot_act');
    const check = this.skills.canCast(actor, skillKey, frame);
    if (!check.ok) return failed('skill', check.reason);

    let planned: PlannedHit[];
    if (skill.targeting.scope === 'single') {
      const usePreferred = skill.targeting.side === 'enemy' ? preferred : undefined;
      const pick = this.targeting.pickPrimaryTarget({
        board,
        actor,
        spec: skill.targeting,
        preferredTeam: usePreferred?.team,
        preferredSlot: usePreferred?.slot,
        rng,
      });
      if (!pick.ok) return failed('skill', 'no_legal_target');
      planned = this.aoe
        .expand(pick.slot, skill.aoe, skill.aoeRatios)
        .map((t) => ({ team: pick.team, slot: t.slot, ratio: t.ratio }));
    } else {
      const res = this.targeting.resolveTargets({ board, actor, spec: skill.targeting });
      if (!res.ok) return failed('skill', 'no_legal_target');
      planned = res.targets.map((t) => ({ ...t, ratio: 1 }));
    }

    actor.ap = Math.max(0, actor.ap - skill.apCost);
    actor.mp = Math.max(0, actor.mp - skill.mpCost);
    this.cooldowns.putOnCooldown(actor, skill.key, skill.cooldown);
    log.write(
      `  CAST: ${unitLabel(actor)} uses ${skill.name} -> ${planned[0].team}-${planned[0].slot} ` +
        `(aoe=${skill.aoe}) AP-${skill.apCost} MP-${skill.mpCost} CD=${skill.cooldown}`,
    );

    const skillProcs = skill.procs.filter((p) => p.trigger === 'on_hit');
    const targets: TargetRef[] = [];

    if (skill.damageType === 'none') {
      for (const t of planned) {
        const unit = board.get(t.team, t.slot);
        if (unit === undefined || !isAlive(unit)) continue;
        this.procs.fire(skillProcs, {
          state,
          source: actor,
          target: unit,
          hitDamage: 0,
          durationFallback: skill.duration > 0 ? skill.duration : undefined,
        });
        addTarget(targets, t.team, t.slot);
      }
      return { ok: true, reason: 'ok', kind: 'skill', targets };
    }

    const onHitProcs = [
      ...skillProcs,
      ...this.procs.collect(actor, 'on_hit', frame.ignorePassives),
    ];
    for (const t of planned) {
      if (!isAlive(actor)) break;
      const defender = board.get(t.team, t.slot);
      if (defender === undefined || !isAlive(defender) || t.ratio <= 0) continue;
      this.hit(state, actor, defender, {
        ratio: skill.ratio * t.ratio,
        damageType: skill.damageType,
        onHitProcs,
        reactions: true,
      });
      addTarget(targets, t.team, t.slot);
    }
    return { ok: true, reason: 'ok', kind: 'skill', targets };
  }

  /** 호출자가 시전을 강제할 때: 자원 부족/대상 없음은 예외로 */
  forceCast(
    state: BattleState,
    actor: Unit,
    skillKey: string,
    preferred?: TargetRef,
  ): ActionResult {
    const res = this.castSkill(state, actor, skillKey, preferred);
    if (res.reason === 'insufficient_ap' || res.reason === 'insufficient_mp') {
      throw new InsufficientResourceError(`${actor.id} cannot pay for ${skillKey}`, {
        unitId: actor.id,
        skillKey,
        reason: res.reason,
        ap: actor.ap,
        mp: actor.mp,
      });
    }
    if (res.reason === 'no_legal_target') {
      throw new NoLegalTargetError(`${actor.id} has no legal target for ${skillKey}`, {
        unitId: actor.id,
        skillKey,
      });
    }
    return res;
  }

  /** 1타: 순수 피해 판정 → 치명/피해 → 공격자 on_hit proc → 피격자 on_hit_taken (반격) */
  hit(state: BattleState, attacker: Unit, defender: Unit, opts: HitOptions): number {
    const { rng, log } = state;
    const attackerFrame = this.status.resolve(attacker);
    const defenderFrame = this.status.resolve(defender);
    const ctx = { state, source: attacker, target: defender, hitDamage: 0 };

    const pure =
      opts.damageType === 'pure' ||
      (opts.reactions && this.procs.rollPure(opts.onHitProcs, ctx));
    const res = this.damage.computeHit({
      attacker: this.statsOf(attacker),
      attackerFrame,
      defender: this.statsOf(defender),
      defenderFrame,
      ratio: opts.ratio,
      damageType: pure ? 'pure' : opts.damageType,
      rng,
    });

    const before = defender.hp;
    defender.hp = Math.max(0, defender.hp - res.damage);
    const tags = [res.isCrit ? ' crit' : '', pure ? ' pure' : ''].join('');
    log.write(
      `    HIT: ${attacker.id} -> ${defender.id} ${res.damage} dmg${tags} HP ${fmt(before)} -> ${fmt(defender.hp)}`,
    );
    if (!isAlive(defender)) log.write(`    ${unitLabel(defender)} is defeated`);

    if (!opts.reactions) return res.damage;

    this.procs.fire(opts.onHitProcs, { ...ctx, hitDamage: res.damage });

    if (isAlive(defender) && isAlive(attacker)) {
      const taken = this.procs.collect(defender, 'on_hit_taken', defenderFrame.ignorePassives);
      const { retaliations } = this.procs.fire(taken, {
        state,
        source: defender,
        target: attacker,
        hitDamage: res.damage,
      });
      for (const ratio of retaliations) {
        if (!isAlive(defender) || !isAlive(attacker) || !defenderFrame.canBasicAttack) break;
        log.write(`    RETALIATE: ${defender.id} -> ${attacker.id} (x${ratio})`);
        this.hit(state, defender, attacker, {
          ratio,
          damageType: 'attack',
          onHitProcs: [],
          reactions: false,
        });
      }
    }
    return res.damage;
  }
}
