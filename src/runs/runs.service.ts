// 로스터 → 전투 실행. 단일 실행과 다중 시드 집계

import { Injectable, Logger } from '@nestjs/common';
import { randomUUID } from 'crypto';
import { readFile } from 'fs/promises';
import { join } from 'path';
import {
  InvalidArgumentError,
  UnknownKeyError,
} from '../common/errors/game-errors.js';
import { parseWithSchema } from '../common/validation/zod-parse.js';
import { SimConfigService } from '../config/sim-config.service.js';
import { ContentLoaderService } from '../content/content-loader.service.js';
import {
  MemoryLogSink,
  TeeLogSink,
  type BattleLogSink,
} from '../engine/battle/battle-log.js';
import { BattleService } from '../engine/battle/battle.service.js';
import { ActionPolicyService } from '../engine/combat/action-policy.service.js';
import { createBattleState, type BattleState } from '../engine/model/battle-state.js';
import { Board } from '../engine/model/board.js';
import { createUnit } from '../engine/model/unit.js';
import { RngService } from '../engine/rng/rng.service.js';
import { TEAM_IDS, type BattleWinner, type TeamId } from '../types/index.js';
import { RosterSchema, type Roster } from './dto/create-run.dto.js';

export const DEFAULT_SEED = '12345';

export interface RunOptions {
  seed?: string;
  startingTeam?: TeamId;
  /** 메모리 수집과 함께 추가로 받을 sink */
  log?: BattleLogSink;
}

export interface RunResult {
  runId: string;
  roster: string;
  seed: string;
  startingTeam: TeamId;
  winner: BattleWinner;
  teamTurns: number;
  rngCursor: number;
  lines: string[];
  /** lines 를 줄바꿈으로 이은 전투 로그 */
  text: string;
}

export interface RunSummary {
  roster: string;
  runs: number;
  wins: Record<BattleWinner, number>;
  avgTeamTurns: number;
  results: RunResult[];
}

/** count 1 이면 base 그대로, 아니면 base-1 .. base-N */
export function seedsFor(base: string, count: number): string[] {
  if (!Number.isInteger(count) || count <= 0) {
    throw new InvalidArgumentError(`seed count must be positive: ${count}`, { count });
  }
  if (count === 1) return [base];
  return Array.from({ length: count }, (_, i) => `${base}-${i + 1}`);
}

@Injectable()
export class RunsService {
  private readonly logger = new Logger(RunsService.name);

  constructor(
    private readonly config: SimConfigService,
    private readonly content: ContentLoaderService,
    private readonly rng: RngService,
    private readonly battle: BattleService,
    private readonly policy: ActionPolicyService,
  ) {}

  async loadRoster(name: string = this.config.get().roster): Promise<Roster> {
    const path = join(this.content.contentDir(), 'rosters', `${name}.json`);
    let raw: string;
    try {
      raw = await readFile(path, 'utf-8');
    } catch (err) {
      throw new UnknownKeyError(`Unknown roster: ${name}`, {
        key: name,
        path,
        cause: err instanceof Error ? err.message : String(err),
      });
    }
    return this.parseRoster(JSON.parse(raw));
  }

  /** 스키마 검증 + 카탈로그 키 확인 (모르는 키는 UnknownKeyError) */
  parseRoster(raw: unknown): Roster {
    const roster = parseWithSchema(RosterSchema, raw, 'roster');
    for (const team of TEAM_IDS) {
      for (const unit of roster.teams[team]) {
        const { build } = unit;
        this.content.getWeapon(build.weaponKey);
        if (build.offhandKey !== null) this.content.getOffhand(build.offhandKey);
        for (const key of build.gearKeys) this.content.getGearItem(key);
        for (const key of build.skillKeys) this.content.getSkill(key);
      }
    }
    return roster;
  }

  /** 시드 우선순위: 옵션 → 환경 설정 → 로스터 → 기본값 */
  createRun(roster: Roster, opts: RunOptions = {}): BattleState {
    const cfg = this.config.get();
    const seed = opts.seed ?? cfg.seed ?? roster.seed ?? DEFAULT_SEED;
    const units = TEAM_IDS.flatMap((team) =>
      roster.teams[team].map((u) =>
        createUnit({ team, slot: u.slot, name: u.name, base: u.base, build: u.build }),
      ),
    );

    return createBattleState({
      board: new Board(units),
      rng: this.rng.create(seed),
      startingTeam: opts.startingTeam ?? roster.startingTeam ?? cfg.startingTeam,
      config: cfg.battle,
      log: opts.log,
    });
  }

  run(roster: Roster, opts: RunOptions = {}): RunResult {
    const memory = new MemoryLogSink();
    const log = opts.log ? new TeeLogSink(memory, opts.log) : memory;
    const state = this.createRun(roster, { ...opts, log });

    const winner = this.battle.run(state, this.policy);
    const { seed, cursor } = state.rng.getState();
    this.logger.log(
      `Run finished: roster=${roster.name} seed=${seed} winner=${winner} turns=${state.teamTurn}`,
    );

    return {
      runId: randomUUID(),
      roster: roster.name,
      seed,
      startingTeam: state.startingTeam,
      winner,
      teamTurns: state.teamTurn,
      rngCursor: cursor,
      lines: memory.lines,
      text: memory.exportText(),
    };
  }

  /** 시드마다 새 상태/RNG: 실행 간 공유 상태 없음 */
  simulateMany(roster: Roster, seeds: readonly string[]): RunSummary {
    if (seeds.length === 0) {
      throw new InvalidArgumentError('simulateMany requires at least one seed');
    }
    const wins: Record<BattleWinner, number> = { A: 0, B: 0, DRAW: 0 };
    const results: RunResult[] = [];
    let turns = 0;

    for (const seed of seeds) {
      const result = this.run(roster, { seed });
      wins[result.winner] += 1;
      turns += result.teamTurns;
      results.push(result);
    }

    this.logger.log(
      `Simulated ${seeds.length} runs: A=${wins.A} B=${wins.B} DRAW=${wins.DRAW}`,
    );
    return {
      roster: roster.name,
      runs: seeds.length,
      wins,
      avgTeamTurns: turns / seeds.length,
      results,
    };
  }
}
