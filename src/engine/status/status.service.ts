// 상태이상 엔진: 유닛별 상태 맵 관리 + phase 별 StatusFrame 집계

import { Injectable } from '@nestjs/common';
import { ContentLoaderService } from '../../content/content-loader.service.js';
import type { StatusDefinition } from '../../content/content.types.js';
import {
  emptyStatusFrame,
  type StatusFrame,
  type StatusInstance,
  type StatusParams,
  type Unit,
} from '../../types/index.js';

/** 제어 → 잠금 → 배율 → 스탯 보정 → DOT 순. 그 외 키는 등장 순서대로 뒤에 */
export const STATUS_PRIORITY = [
  'stun',
  'immobilized',
  'silence',
  'disarm',
  'break',
  'panic',
  'weaken',
  'brand',
  'dull',
  'slow',
  'chill',
  'shred',
  'sunder',
  'bleeding',
] as const;

export const IMMUNITY_KEY = 'immunity';

export interface ApplyStatusOptions {
  duration?: number;
  stacksAdd?: number;
  params?: StatusParams;
  sourceId?: string | null;
}

export function numParam(
  params: StatusParams,
  key: string,
  fallback: number,
): number {
  const v = params[key];
  return typeof v === 'number' && Number.isFinite(v) ? v : fallback;
}

function clamp(v: number, min: number, max: number): number {
  return Math.max(min, Math.min(max, v));
}

function lessToMult(pct: number): number {
  return Math.max(0, 1 - Math.max(0, pct) / 100);
}

function moreToMult(pct: number): number {
  return Math.max(0, 1 + pct / 100);
}

@Injectable()
export class StatusService {
  constructor(private readonly content: ContentLoaderService) {}

  definition(key: string): StatusDefinition {
    return this.content.getStatus(key);
  }

  has(unit: Unit, key: string): boolean {
    const inst = unit.statuses.get(key);
    return inst !== undefined && inst.remaining > 0;
  }

  /** 면역 중이면 비이로운 상태는 차단 (false, 변경 없음) */
  apply(unit: Unit, key: string, opts: ApplyStatusOptions = {}): boolean {
    const def = this.definition(key);
    if (this.has(unit, IMMUNITY_KEY) && !def.positive) {
      return false;
    }

    const duration = Math.max(0, Math.floor(opts.duration ?? def.defaultDuration));
    const stacksAdd = opts.stacksAdd ?? 1;
    const existing = unit.statuses.get(key);

    if (existing === undefined) {
      unit.statuses.set(key, {
        key,
        remaining: duration,
        stacks: def.stackable ? clamp(stacksAdd, 1, def.maxStacks) : 1,
        params: { ...def.params, ...opts.params },
        sourceId: opts.sourceId ?? null,
      });
      return true;
    }

    if (def.stackable) {
      existing.stacks = clamp(existing.stacks + stacksAdd, 1, def.maxStacks);
    }
    if (def.refreshOnReapply) {
      existing.remaining = Math.max(existing.remaining, duration);
    }
    if (opts.params) {
      existing.params = { ...existing.params, ...opts.params };
    }
    if (opts.sourceId !== undefined && opts.sourceId !== null) {
      existing.sourceId = opts.sourceId;
    }
    return true;
  }

  remove(unit: Unit, key: string): boolean {
    return unit.statuses.delete(key);
  }

  cleanupExpired(unit: Unit): void {
    for (const [key, inst] of unit.statuses) {
      if (inst.remaining <= 0) unit.statuses.delete(key);
    }
  }

  /** 2턴 규칙 tick: 남은 턴 -1 (0 하한), 0 이 되면 제거 */
  tick(unit: Unit): string[] {
    const expired: string[] = [];
    for (const [key, inst] of unit.statuses) {
      inst.remaining = Math.max(0, inst.remaining - 1);
      if (inst.remaining === 0) {
        unit.statuses.delete(key);
        expired.push(key);
      }
    }
    return expired;
  }

  private orderedActive(unit: Unit): StatusInstance[] {
    const ordered: StatusInstance[] = [];
    for (const key of STATUS_PRIORITY) {
      const inst = unit.statuses.get(key);
      if (inst && inst.remaining > 0) ordered.push(inst);
    }
    const known = new Set<string>(STATUS_PRIORITY);
    for (const inst of unit.statuses.values()) {
      if (!known.has(inst.key) && inst.remaining > 0) ordered.push(inst);
    }
    return ordered;
  }

  /** 턴 시작 프레임: 매 phase 재계산 */
  resolve(unit: Unit): StatusFrame {
    this.cleanupExpired(unit);
    const frame = emptyStatusFrame();

    for (const inst of this.orderedActive(unit)) {
      const p = inst.params;
      switch (inst.key) {
        case 'stun':
        case 'immobilized':
          frame.canAct = false;
          break;
        case 'silence':
          frame.canUseActiveSkills = false;
          break;
        case 'disarm':
          frame.canBasicAttack = false;
          break;
        case 'break':
          frame.ignorePassives = true;
          break;
        case 'panic':
          frame.skillDamageMult *= lessToMult(numParam(p, 'skillDamageLessPct', 0));
          break;
        case 'weaken':
          frame.attackDamageMult *= lessToMult(numParam(p, 'attackDamageLessPct', 0));
          break;
        case 'brand':
          frame.damageTakenMult *= moreToMult(numParam(p, 'damageTakenMorePct', 0));
          break;
        case 'dull':
          frame.accuracyIncPctDelta += numParam(p, 'accuracyIncPct', 0);
          break;
        case 'slow':
          frame.apGainBaseDelta += numParam(p, 'apBaseDelta', 0);
          break;
        case 'chill':
          frame.apGainBaseDelta += numParam(p, 'apBaseDelta', -5);
          frame.mhrBaseDelta += numParam(p, 'mhrBaseDelta', -10);
          break;
        case 'shred':
          frame.armourBaseDelta += numParam(p, 'armourBaseDelta', 0);
          break;
        case 'sunder':
          frame.mrBaseDelta += numParam(p, 'mrBaseDelta', 0);
          break;
        case 'bleeding': {
          const amount =
            numParam(p, 'hitDamage', 0) * numParam(p, 'dotRatio', 0) * inst.stacks;
          if (amount > 0) {
            frame.events.push({
              type: 'damage',
              targetId: unit.id,
              statusKey: inst.key,
              amount,
            });
          }
          break;
        }
        default:
          break;
      }

      // 정의에 선언된 범용 플래그 (제한 방향으로만)
      const flags = this.definition(inst.key).frameFlags;
      if (flags.canAct === false) frame.canAct = false;
      if (flags.canUseActiveSkills === false) frame.canUseActiveSkills = false;
      if (flags.canBasicAttack === false) frame.canBasicAttack = false;
      if (flags.ignorePassives === true) frame.ignorePassives = true;
      if (flags.blockApGain === true) frame.blockApGain = true;
    }

    if (!frame.canAct) {
      frame.canBasicAttack = false;
      frame.canUseActiveSkills = false;
      frame.events.push({
        type: 'log',
        targetId: unit.id,
        message: `${unit.id} cannot act due to status`,
      });
    }

    return frame;
  }
}
