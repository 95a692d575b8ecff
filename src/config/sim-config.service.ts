// 시뮬레이터 설정: .env 기본값 + zod 검증

import { Injectable } from '@nestjs/common';
import { z } from 'zod';
import { parseWithSchema } from '../common/validation/zod-parse.js';
import type { BattleConfig, TeamId } from '../types/index.js';

const intFromEnv = (fallback: number) =>
  z.coerce.number().int().default(fallback);

export const SimEnvSchema = z.object({
  SIM_SEED: z.string().min(1).optional(),
  SIM_MAX_TEAM_TURNS: intFromEnv(200).pipe(z.number().positive()),
  SIM_ACTION_AP_COST: intFromEnv(100).pipe(z.number().nonnegative()),
  SIM_AP_THRESHOLD: intFromEnv(100).pipe(z.number().nonnegative()),
  SIM_NORMAL_MAX_ACTORS: intFromEnv(5).pipe(z.number().positive()),
  SIM_STARTING_TEAM: z.enum(['A', 'B']).default('A'),
  SIM_CONTENT_DIR: z.string().min(1).default('content/v1'),
  SIM_ROSTER: z.string().min(1).default('demo'),
  SIM_RUNS: intFromEnv(1).pipe(z.number().positive()),
  SIM_LOG_FILE: z.string().min(1).optional(),
  SIM_ECHO_LOG: z.enum(['true', 'false']).default('true'),
});

export interface SimConfig {
  /** 미설정이면 로스터 시드 사용 */
  seed: string | null;
  startingTeam: TeamId;
  battle: BattleConfig;
  contentDir: string;
  roster: string;
  runs: number;
  logFile: string | null;
  echoBattleLog: boolean;
}

/** process.env → SimConfig (빈 문자열은 미설정으로 취급) */
export function parseSimConfig(env: NodeJS.ProcessEnv): SimConfig {
  const present = Object.fromEntries(
    Object.entries(env).filter(([k, v]) => k.startsWith('SIM_') && v !== ''),
  );
  const parsed = parseWithSchema(SimEnvSchema, present, 'environment');
  return {
    seed: parsed.SIM_SEED ?? null,
    startingTeam: parsed.SIM_STARTING_TEAM,
    battle: {
      maxTeamTurns: parsed.SIM_MAX_TEAM_TURNS,
      actionApCost: parsed.SIM_ACTION_AP_COST,
      apThreshold: parsed.SIM_AP_THRESHOLD,
      normalMaxActors: parsed.SIM_NORMAL_MAX_ACTORS,
    },
    contentDir: parsed.SIM_CONTENT_DIR,
    roster: parsed.SIM_ROSTER,
    runs: parsed.SIM_RUNS,
    logFile: parsed.SIM_LOG_FILE ?? null,
    echoBattleLog: parsed.SIM_ECHO_LOG === 'true',
  };
}

@Injectable()
export class SimConfigService {
  private readonly config: SimConfig;

  constructor() {
    this.config = parseSimConfig(process.env);
  }

  get(): SimConfig {
    return this.config;
  }
}
