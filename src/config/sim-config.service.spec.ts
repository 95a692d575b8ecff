import { InvalidInputError } from '../common/errors/game-errors.js';
import { SimConfigService, parseSimConfig } from './sim-config.service.js';

describe('parseSimConfig', () => {
  it('미설정 → 기본값', () => {
    expect(parseSimConfig({})).toEqual({
      seed: null,
      startingTeam: 'A',
      battle: {
        maxTeamTurns: 200,
        actionApCost: 100,
        apThreshold: 100,
        normalMaxActors: 5,
      },
      contentDir: 'content/v1',
      roster: 'demo',
      runs: 1,
      logFile: null,
      echoBattleLog: true,
    });
  });

  it('문자열 환경변수 → 숫자 변환', () => {
    const cfg = parseSimConfig({
      SIM_SEED: 'abc',
      SIM_MAX_TEAM_TURNS: '50',
      SIM_STARTING_TEAM: 'B',
      SIM_RUNS: '10',
      SIM_LOG_FILE: 'battle.log',
      SIM_ECHO_LOG: 'false',
    });
    expect(cfg.seed).toBe('abc');
    expect(cfg.battle.maxTeamTurns).toBe(50);
    expect(cfg.startingTeam).toBe('B');
    expect(cfg.runs).toBe(10);
    expect(cfg.logFile).toBe('battle.log');
    expect(cfg.echoBattleLog).toBe(false);
  });

  it('빈 문자열은 미설정', () => {
    expect(parseSimConfig({ SIM_SEED: '', SIM_MAX_TEAM_TURNS: '' }).battle.maxTeamTurns).toBe(200);
  });

  it('SIM_ 접두사 아닌 변수는 무시', () => {
    expect(parseSimConfig({ PATH: '/usr/bin', HOME: '/root' }).roster).toBe('demo');
  });

  it('잘못된 값 → InvalidInputError', () => {
    expect(() => parseSimConfig({ SIM_MAX_TEAM_TURNS: '0' })).toThrow(InvalidInputError);
    expect(() => parseSimConfig({ SIM_MAX_TEAM_TURNS: 'many' })).toThrow(InvalidInputError);
    expect(() => parseSimConfig({ SIM_STARTING_TEAM: 'C' })).toThrow(InvalidInputError);
  });
});

describe('SimConfigService', () => {
  it('생성 시 process.env 를 읽음', () => {
    const saved = process.env.SIM_ROSTER;
    process.env.SIM_ROSTER = 'duel';
    try {
      expect(new SimConfigService().get().roster).toBe('duel');
    } finally {
      if (saved === undefined) delete process.env.SIM_ROSTER;
      else process.env.SIM_ROSTER = saved;
    }
  });
});
