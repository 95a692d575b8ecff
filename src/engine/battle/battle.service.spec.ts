import { createBattleState, type BattleState } from '../model/battle-state.js';
import { Board } from '../model/board.js';
import { Rng } from '../rng/rng.service.js';
import { createTestEngine, makeUnit, type TestEngine } from '../../testing/fixtures.js';
import type { BattleConfig, TeamId, Unit } from '../../types/index.js';
import { HEADER_WIDTH, MemoryLogSink } from './battle-log.js';

const BAR = '='.repeat(HEADER_WIDTH);

function roster(): Unit[] {
  return [
    makeUnit('A', 1, { build: { weaponKey: 'TestSword', weaponPassive: 1 } }),
    makeUnit('A', 5, { build: { weaponKey: 'TestBow', skillKeys: ['ward', 'strike'] } }),
    makeUnit('A', 8, { build: { weaponKey: 'TestGun', weaponPassive: 1 } }),
    makeUnit('B', 2, { build: { weaponKey: 'TestAxe', gearKeys: ['plate'] } }),
    makeUnit('B', 3, { build: { weaponKey: 'TestBow', skillKeys: ['spikes'] } }),
    makeUnit('B', 6, { build: { weaponKey: 'TestBow', offhandKey: 'TestShield' } }),
  ];
}

describe('BattleService', () => {
  let engine: TestEngine;

  beforeEach(() => {
    engine = createTestEngine();
  });

  function setup(
    units: Unit[],
    opts: { seed?: string; startingTeam?: TeamId; config?: Partial<BattleConfig> } = {},
  ): { state: BattleState; log: MemoryLogSink } {
    const log = new MemoryLogSink();
    const state = createBattleState({
      board: new Board(units),
      rng: new Rng(opts.seed ?? 'battle', 0),
      startingTeam: opts.startingTeam,
      config: opts.config,
      log,
    });
    return { state, log };
  }

  describe('setup', () => {
    it('스탯/자원 초기화, 쿨다운 잠금, 오라는 1회만', () => {
      const units = roster();
      const { state, log } = setup(units);

      engine.battle.setup(state);
      engine.battle.setup(state);

      const caster = units[1];
      expect(caster.hp).toBe(1000);
      expect(caster.cooldowns.get('strike')).toBe(3);
      expect(log.lines).toEqual([
        '  AURA: A-5 A5 activates Ward',
        '    STATUS: A-1 A1 gains deliberate (from A-5)',
        '    STATUS: A-5 A5 gains deliberate (from A-5)',
        '    STATUS: A-8 A8 gains deliberate (from A-5)',
      ]);
      expect(state.setupDone).toBe(true);
    });
  });

  describe('step', () => {
    it('헤더 3줄 후 AP 획득 로그, teamTurn +1', () => {
      const { state, log } = setup([makeUnit('A', 1), makeUnit('B', 1)]);

      const res = engine.battle.step(state, engine.policy);

      expect(state.teamTurn).toBe(1);
      expect(res.teamTurn).toBe(1);
      expect(res.team).toBe('A');
      expect(res.actors).toEqual(['A-1']);
      expect(log.lines.slice(0, 4)).toEqual([
        BAR,
        'TEAM TURN 1 - Team A starts',
        BAR,
        '  AP gain: A-1: 0 -> 100 (+100)',
      ]);
    });

    it('선공 팀 B 면 홀수 턴은 B', () => {
      const { state, log } = setup([makeUnit('A', 1), makeUnit('B', 1)], {
        startingTeam: 'B',
      });
      expect(engine.battle.step(state, engine.policy).team).toBe('B');
      expect(log.lines[1]).toBe('TEAM TURN 1 - Team B starts');
      expect(engine.battle.step(state, engine.policy).team).toBe('A');
    });

    it('상대 전멸 시 즉시 승리 선언', () => {
      const a = makeUnit('A', 1);
      const b = makeUnit('B', 1);
      b.resourcesInitialized = true;
      b.hp = 1;
      const { state, log } = setup([a, b]);

      const res = engine.battle.step(state, engine.policy);

      expect(res.winner).toBe('A');
      expect(b.hp).toBe(0);
      expect(log.lines[log.lines.length - 1]).toBe('==> Team A wins (Team B defeated)');
    });

    it('결판난 전투는 다시 step 해도 진행하지 않음', () => {
      const a = makeUnit('A', 1);
      const b = makeUnit('B', 1);
      b.resourcesInitialized = true;
      b.hp = 1;
      const { state, log } = setup([a, b]);
      engine.battle.step(state, engine.policy);
      const linesBefore = log.lines.length;
      const apBefore = a.ap;

      const again = engine.battle.step(state, engine.policy);

      expect(again).toEqual({ teamTurn: 1, team: 'A', actors: [], winner: 'A' });
      expect(state.teamTurn).toBe(1);
      expect(a.ap).toBe(apBefore);
      expect(log.lines).toHaveLength(linesBefore);
    });

    it('턴 시작 DOT 로 전멸하면 행동 전에 종료', () => {
      const a = makeUnit('A', 1);
      const b = makeUnit('B', 1);
      b.resourcesInitialized = true;
      b.hp = 10;
      engine.status.apply(b, 'bleeding', { duration: 2, params: { hitDamage: 40 } });
      const { state, log } = setup([a, b], { startingTeam: 'B' });

      const res = engine.battle.step(state, engine.policy);

      expect(res.winner).toBe('A');
      expect(log.lines).toContain('  DOT: B-1 B1 takes 20 (bleeding) HP 10 -> 0');
      expect(log.lines[log.lines.length - 1]).toBe('==> Team A wins (Team B defeated)');
      expect(a.hp).toBe(1000);
    });
  });

  describe('run', () => {
    it('최대 팀 턴 도달 → 무승부', () => {
      const { state, log } = setup(roster(), { config: { maxTeamTurns: 2 } });

      expect(engine.battle.run(state, engine.policy)).toBe('DRAW');
      expect(state.teamTurn).toBe(2);
      expect(log.lines[log.lines.length - 1]).toBe('==> Draw after 2 team turns');
    });

    it('호출 시 설정 덮어쓰기', () => {
      const { state } = setup(roster());
      expect(engine.battle.run(state, engine.policy, { maxTeamTurns: 1 })).toBe('DRAW');
      expect(state.teamTurn).toBe(1);
    });

    it('같은 시드 → 같은 승자, 같은 로그', () => {
      const first = setup(roster(), { seed: 'replay' });
      const second = setup(roster(), { seed: 'replay' });

      const w1 = engine.battle.run(first.state, engine.policy);
      const w2 = createTestEngine().battle.run(second.state, createTestEngine().policy);

      expect(w2).toBe(w1);
      expect(second.log.lines).toEqual(first.log.lines);
      expect(second.state.rng.cursor).toBe(first.state.rng.cursor);
    });

    it('결판이 나면 승자 반환', () => {
      const a = makeUnit('A', 1);
      const b = makeUnit('B', 1);
      b.resourcesInitialized = true;
      b.hp = 1;
      const { state } = setup([a, b]);
      expect(engine.battle.run(state, engine.policy)).toBe('A');
      expect(state.teamTurn).toBe(1);
    });
  });
});
