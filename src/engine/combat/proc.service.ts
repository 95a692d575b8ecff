// 발동 효과(proc): 장비/패시브 수집, 확률 판정, 효과 적용

import { Injectable, Logger } from '@nestjs/common';
import { ContentLoaderService } from '../../content/content-loader.service.js';
import type {
  PassiveOption,
  ProcDefinition,
  ProcTrigger,
} from '../../content/content.types.js';
import type { BattleState } from '../model/battle-state.js';
import { isAlive, unitLabel } from '../model/unit.js';
import { StatusService } from '../status/status.service.js';
import type { PassiveChoice, Unit } from '../../types/index.js';

type ApplyStatusProc = Extract<ProcDefinition, { key: 'apply_status' }>;

export interface ProcContext {
  state: BattleState;
  source: Unit;
  /** 피격자. battle_start 에서는 없음 */
  target: Unit | null;
  /** 방금 준 피해: 출혈 등 hitDamage 파라미터에 기록 */
  hitDamage: number;
  /** proc 에 지속이 없을 때 사용 (오라 스킬 지속 등) */
  durationFallback?: number;
}

export interface ProcOutcome {
  retaliations: number[];
}

function passiveOf(
  passives: Partial<Record<'1' | '2' | '3', PassiveOption>>,
  choice: PassiveChoice,
): PassiveOption | undefined {
  if (choice === 1) return passives['1'];
  if (choice === 2) return passives['2'];
  if (choice === 3) return passives['3'];
  return undefined;
}

@Injectable()
export class ProcService {
  private readonly logger = new Logger(ProcService.name);

  constructor(
    private readonly content: ContentLoaderService,
    private readonly status: StatusService,
  ) {}

  /**
   * 기본 proc(무기/보조장비)은 항상, 선택 패시브와 패시브 스킬 proc 은
   * ignorePassives(break) 중에는 제외
   */
  collect(unit: Unit, trigger: ProcTrigger, ignorePassives: boolean): ProcDefinition[] {
    const { build } = unit;
    const procs: ProcDefinition[] = [];
    const passive: ProcDefinition[] = [];

    const weapon = this.content.getWeapon(build.weaponKey);
    procs.push(...weapon.defaultProcs);
    passive.push(...(passiveOf(weapon.passives, build.weaponPassive)?.procs ?? []));

    if (build.offhandKey !== null) {
      const offhand = this.content.getOffhand(build.offhandKey);
      procs.push(...offhand.defaultProcs);
      passive.push(...(passiveOf(offhand.passives, build.offhandPassive)?.procs ?? []));
    }

    for (const key of build.skillKeys) {
      const skill = this.content.getSkill(key);
      if (skill.kind === 'passive') passive.push(...skill.procs);
    }

    if (!ignorePassives) procs.push(...passive);
    return procs.filter((p) => p.trigger === trigger);
  }

  /** chancePct/100 로 판정 (0, 100 은 추첨 없음) */
  roll(proc: ProcDefinition, ctx: ProcContext): boolean {
    return ctx.state.rng.chance(proc.chancePct / 100);
  }

  /** 이번 타격이 완화를 무시하는지: pure_damage proc 중 하나라도 성공 */
  rollPure(procs: readonly ProcDefinition[], ctx: ProcContext): boolean {
    let pure = false;
    for (const proc of procs) {
      if (proc.key === 'pure_damage' && this.roll(proc, ctx)) pure = true;
    }
    return pure;
  }

  /** 판정 + 적용. 반격(retaliate) 은 비율만 모아서 반환: 실행은 전투 쪽 */
  fire(procs: readonly ProcDefinition[], ctx: ProcContext): ProcOutcome {
    const outcome: ProcOutcome = { retaliations: [] };
    for (const proc of procs) {
      if (proc.key === 'pure_damage') continue;
      if (!this.roll(proc, ctx)) continue;

      switch (proc.key) {
        case 'apply_status':
          this.applyStatus(proc, ctx);
          break;
        case 'drain_ap': {
          const victim = ctx.target;
          if (victim === null || !isAlive(victim)) break;
          const before = victim.ap;
          victim.ap = Math.max(0, victim.ap - proc.amount);
          ctx.state.log.write(
            `    PROC: ${ctx.source.id} drains AP from ${victim.id}: ${before} -> ${victim.ap}`,
          );
          break;
        }
        case 'retaliate':
          outcome.retaliations.push(proc.ratio);
          break;
      }
    }
    return outcome;
  }

  private applyStatus(proc: ApplyStatusProc, ctx: ProcContext): void {
    const { state, source } = ctx;
    const recipients: Unit[] =
      proc.target === 'self'
        ? [source]
        : proc.target === 'team'
          ? state.board.aliveUnits(source.team)
          : [ctx.target ?? source];

    const def = this.status.definition(proc.status);
    const params = { ...proc.params };
    if ('hitDamage' in def.params && !('hitDamage' in params)) {
      params.hitDamage = ctx.hitDamage;
    }

    for (const unit of recipients) {
      if (!isAlive(unit)) continue;
      const applied = this.status.apply(unit, proc.status, {
        duration: proc.duration ?? ctx.durationFallback,
        stacksAdd: proc.stacks,
        params,
        sourceId: source.id,
      });
      state.log.write(
        applied
          ? `    STATUS: ${unitLabel(unit)} gains ${proc.status} (from ${source.id})`
          : `    STATUS: ${unitLabel(unit)} resists ${proc.status} (immune)`,
      );
    }
  }

  /** 전투 시작 proc: 무기/보조장비/패시브의 battle_start */
  fireBattleStart(state: BattleState, unit: Unit): void {
    const procs = this.collect(unit, 'battle_start', false);
    if (procs.length === 0) return;
    this.logger.debug(`battle_start procs: ${unit.id} x${procs.length}`);
    this.fire(procs, { state, source: unit, target: null, hitDamage: 0 });
  }
}
