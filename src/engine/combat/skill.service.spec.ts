import { MemoryLogSink } from '../battle/battle-log.js';
import { createBattleState } from '../model/battle-state.js';
import { Board } from '../model/board.js';
import { Rng } from '../rng/rng.service.js';
import { createTestEngine, liveUnit, makeUnit, type TestEngine } from '../../testing/fixtures.js';
import { emptyStatusFrame } from '../../types/index.js';

describe('SkillService', () => {
  let engine: TestEngine;

  beforeEach(() => {
    engine = createTestEngine();
  });

  it('activeSkills: 보유 순서대로 액티브만', () => {
    const unit = makeUnit('A', 1, {
      build: { weaponKey: 'TestBow', skillKeys: ['ward', 'blast', 'spikes', 'strike'] },
    });
    expect(engine.skills.activeSkills(unit).map((s) => s.key)).toEqual(['blast', 'strike']);
  });

  describe('canCast', () => {
    function caster() {
      const unit = liveUnit('A', 1);
      unit.ap = 100;
      unit.mp = 300;
      return unit;
    }

    it('조건 충족 → ok', () => {
      expect(engine.skills.canCast(caster(), 'blast', emptyStatusFrame())).toEqual({
        ok: true,
        reason: 'ok',
      });
    });

    it('침묵 → silenced', () => {
      const frame = { ...emptyStatusFrame(), canUseActiveSkills: false };
      expect(engine.skills.canCast(caster(), 'blast', frame).reason).toBe('silenced');
    });

    it('쿨다운 → cooldown', () => {
      const unit = caster();
      engine.cooldowns.putOnCooldown(unit, 'blast', 2);
      expect(engine.skills.canCast(unit, 'blast', emptyStatusFrame()).reason).toBe('cooldown');
    });

    it('AP 부족 → insufficient_ap', () => {
      const unit = caster();
      unit.ap = 49;
      expect(engine.skills.canCast(unit, 'blast', emptyStatusFrame()).reason).toBe(
        'insufficient_ap',
      );
    });

    it('MP 부족 → insufficient_mp', () => {
      const unit = caster();
      unit.mp = 299;
      expect(engine.skills.canCast(unit, 'blast', emptyStatusFrame()).reason).toBe(
        'insufficient_mp',
      );
    });
  });

  describe('applyAuras', () => {
    it('오라 proc 은 스킬 지속을 사용해 팀 전원에게', () => {
      const a1 = liveUnit('A', 1, 1000, { build: { weaponKey: 'TestBow', skillKeys: ['ward'] } });
      const a2 = liveUnit('A', 2);
      const b1 = liveUnit('B', 1);
      const log = new MemoryLogSink();
      const state = createBattleState({
        board: new Board([a1, a2, b1]),
        rng: new Rng('aura', 0),
        log,
      });

      engine.skills.applyAuras(state, a1);

      expect(log.lines).toEqual([
        '  AURA: A-1 A1 activates Ward',
        '    STATUS: A-1 A1 gains deliberate (from A-1)',
        '    STATUS: A-2 A2 gains deliberate (from A-1)',
      ]);
      expect(a2.statuses.get('deliberate')?.remaining).toBe(2);
      expect(b1.statuses.size).toBe(0);
    });

    it('오라 없으면 로그 없음', () => {
      const unit = makeUnit('A', 1, { build: { weaponKey: 'TestBow', skillKeys: ['strike'] } });
      const log = new MemoryLogSink();
      const state = createBattleState({ board: new Board([unit]), rng: new Rng('aura', 0), log });
      engine.skills.applyAuras(state, unit);
      expect(log.lines).toEqual([]);
    });
  });
});
