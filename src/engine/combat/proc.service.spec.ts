import type { ProcDefinition } from '../../content/content.types.js';
import { MemoryLogSink } from '../battle/battle-log.js';
import { createBattleState, type BattleState } from '../model/battle-state.js';
import { Board } from '../model/board.js';
import { Rng } from '../rng/rng.service.js';
import { StatusService } from '../status/status.service.js';
import {
  createTestContent,
  kill,
  liveUnit,
  makeUnit,
  testContentBundle,
} from '../../testing/fixtures.js';
import type { Unit } from '../../types/index.js';
import { ProcService } from './proc.service.js';

function statusProc(
  status: string,
  extra: Partial<Omit<Extract<ProcDefinition, { key: 'apply_status' }>, 'key'>> = {},
): ProcDefinition {
  return {
    key: 'apply_status',
    chancePct: 100,
    trigger: 'on_hit',
    status,
    stacks: 1,
    params: {},
    target: 'target',
    ...extra,
  };
}

describe('ProcService', () => {
  let procs: ProcService;
  let status: StatusService;

  beforeEach(() => {
    const bundle = testContentBundle();
    bundle.weapons.push({
      key: 'TestOrb',
      range: 'ranged',
      aoe: 'single',
      location: 'anywhere',
      defaultProcs: [
        {
          key: 'apply_status',
          status: 'immunity',
          target: 'self',
          trigger: 'battle_start',
          duration: 4,
        },
      ],
    });
    const content = createTestContent(bundle);
    status = new StatusService(content);
    procs = new ProcService(content, status);
  });

  function setup(units: Unit[], seed = 'proc'): { state: BattleState; log: MemoryLogSink } {
    const log = new MemoryLogSink();
    const state = createBattleState({ board: new Board(units), rng: new Rng(seed, 0), log });
    return { state, log };
  }

  describe('collect', () => {
    it('선택 패시브 proc 은 trigger 별로', () => {
      const unit = makeUnit('B', 1, { build: { weaponKey: 'TestSword', weaponPassive: 1 } });
      expect(procs.collect(unit, 'on_hit_taken', false)).toEqual([
        { key: 'retaliate', chancePct: 100, trigger: 'on_hit_taken', ratio: 1 },
      ]);
      expect(procs.collect(unit, 'on_hit', false)).toEqual([]);
    });

    it('패시브 미선택이면 없음', () => {
      const unit = makeUnit('B', 1, { build: { weaponKey: 'TestSword' } });
      expect(procs.collect(unit, 'on_hit_taken', false)).toEqual([]);
    });

    it('break 중에는 기본 proc 만 남음', () => {
      const unit = makeUnit('A', 1, {
        build: { weaponKey: 'TestAxe', skillKeys: ['spikes'] },
      });
      expect(procs.collect(unit, 'on_hit', false).map((p) => p.key)).toEqual([
        'apply_status',
        'apply_status',
      ]);
      const kept = procs.collect(unit, 'on_hit', true);
      expect(kept).toHaveLength(1);
      expect(kept[0]).toMatchObject({ key: 'apply_status', status: 'stun' });
    });
  });

  describe('fire', () => {
    it('apply_status → 대상에게 상태 + 로그', () => {
      const a = liveUnit('A', 1);
      const b = liveUnit('B', 2);
      const { state, log } = setup([a, b]);
      procs.fire([statusProc('stun', { duration: 1 })], {
        state,
        source: a,
        target: b,
        hitDamage: 0,
      });
      expect(status.has(b, 'stun')).toBe(true);
      expect(b.statuses.get('stun')?.sourceId).toBe('A-1');
      expect(log.lines).toEqual(['    STATUS: B-2 B2 gains stun (from A-1)']);
    });

    it('면역이면 저항 로그, 상태 없음', () => {
      const a = liveUnit('A', 1);
      const b = liveUnit('B', 2);
      status.apply(b, 'immunity', { duration: 2 });
      const { state, log } = setup([a, b]);
      procs.fire([statusProc('stun', { duration: 1 })], {
        state,
        source: a,
        target: b,
        hitDamage: 0,
      });
      expect(status.has(b, 'stun')).toBe(false);
      expect(log.lines).toEqual(['    STATUS: B-2 B2 resists stun (immune)']);
    });

    it('출혈은 방금 준 피해를 hitDamage 로 기록', () => {
      const a = liveUnit('A', 1);
      const b = liveUnit('B', 2);
      const { state } = setup([a, b]);
      procs.fire([statusProc('bleeding', { duration: 2 })], {
        state,
        source: a,
        target: b,
        hitDamage: 40,
      });
      expect(b.statuses.get('bleeding')?.params).toEqual({ dotRatio: 0.5, hitDamage: 40 });
    });

    it('target=team → 살아있는 아군 전원', () => {
      const a1 = liveUnit('A', 1);
      const a2 = liveUnit('A', 2);
      const a3 = liveUnit('A', 3);
      kill(a3);
      const { state, log } = setup([a1, a2, a3]);
      procs.fire([statusProc('deliberate', { duration: 2, target: 'team' })], {
        state,
        source: a1,
        target: null,
        hitDamage: 0,
      });
      expect(log.lines).toEqual([
        '    STATUS: A-1 A1 gains deliberate (from A-1)',
        '    STATUS: A-2 A2 gains deliberate (from A-1)',
      ]);
      expect(status.has(a3, 'deliberate')).toBe(false);
    });

    it('drain_ap: 0 하한', () => {
      const a = liveUnit('A', 1);
      const b = liveUnit('B', 2);
      b.ap = 20;
      const { state, log } = setup([a, b]);
      procs.fire(
        [{ key: 'drain_ap', chancePct: 100, trigger: 'on_hit', amount: 30 }],
        { state, source: a, target: b, hitDamage: 10 },
      );
      expect(b.ap).toBe(0);
      expect(log.lines).toEqual(['    PROC: A-1 drains AP from B-2: 20 -> 0']);
    });

    it('retaliate 는 비율만 반환', () => {
      const a = liveUnit('A', 1);
      const b = liveUnit('B', 2);
      const { state, log } = setup([a, b]);
      const out = procs.fire(
        [{ key: 'retaliate', chancePct: 100, trigger: 'on_hit_taken', ratio: 0.5 }],
        { state, source: b, target: a, hitDamage: 10 },
      );
      expect(out.retaliations).toEqual([0.5]);
      expect(log.lines).toEqual([]);
    });

    it('chancePct 0 → 추첨 없이 불발', () => {
      const a = liveUnit('A', 1);
      const b = liveUnit('B', 2);
      const { state } = setup([a, b]);
      procs.fire([statusProc('stun', { chancePct: 0, duration: 1 })], {
        state,
        source: a,
        target: b,
        hitDamage: 0,
      });
      expect(status.has(b, 'stun')).toBe(false);
      expect(state.rng.cursor).toBe(0);
    });

    it('확률 proc 은 1회 추첨, 시드 고정이면 결과 동일', () => {
      const results = [0, 1].map(() => {
        const a = liveUnit('A', 1);
        const b = liveUnit('B', 2);
        const { state } = setup([a, b], 'proc-chance');
        procs.fire([statusProc('stun', { chancePct: 50, duration: 1 })], {
          state,
          source: a,
          target: b,
          hitDamage: 0,
        });
        expect(state.rng.cursor).toBe(1);
        return status.has(b, 'stun');
      });
      expect(results[0]).toBe(results[1]);
    });
  });

  describe('rollPure', () => {
    it('pure_damage 성공 여부', () => {
      const a = liveUnit('A', 1);
      const b = liveUnit('B', 2);
      const { state } = setup([a, b]);
      const ctx = { state, source: a, target: b, hitDamage: 0 };
      expect(
        procs.rollPure([{ key: 'pure_damage', chancePct: 100, trigger: 'on_hit' }], ctx),
      ).toBe(true);
      expect(procs.rollPure([statusProc('stun')], ctx)).toBe(false);
    });
  });

  describe('fireBattleStart', () => {
    it('battle_start proc → 자기 자신에게 면역', () => {
      const orb = liveUnit('A', 5, 1000, { build: { weaponKey: 'TestOrb' } });
      const { state, log } = setup([orb]);
      procs.fireBattleStart(state, orb);
      expect(orb.statuses.get('immunity')?.remaining).toBe(4);
      expect(log.lines).toEqual(['    STATUS: A-5 A5 gains immunity (from A-5)']);
    });

    it('battle_start proc 없으면 아무 일도 없음', () => {
      const unit = makeUnit('A', 1);
      const { state, log } = setup([unit]);
      procs.fireBattleStart(state, unit);
      expect(unit.statuses.size).toBe(0);
      expect(log.lines).toEqual([]);
    });
  });
});
