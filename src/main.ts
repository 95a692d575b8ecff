import 'reflect-metadata';
import { Logger } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { writeFile } from 'fs/promises';
import { AppModule } from './app.module.js';
import { SimConfigService } from './config/sim-config.service.js';
import { LoggerLogSink } from './engine/battle/battle-log.js';
import { DEFAULT_SEED, RunsService, seedsFor } from './runs/runs.service.js';

async function bootstrap() {
  const app = await NestFactory.createApplicationContext(AppModule, {
    logger: ['log', 'warn', 'error'],
  });
  const logger = new Logger('Bootstrap');

  try {
    const config = app.get(SimConfigService).get();
    const runs = app.get(RunsService);
    const roster = await runs.loadRoster(config.roster);
    const baseSeed = config.seed ?? roster.seed ?? DEFAULT_SEED;

    if (config.runs === 1) {
      const result = runs.run(roster, {
        seed: baseSeed,
        log: config.echoBattleLog ? new LoggerLogSink('Battle') : undefined,
      });
      logger.log(
        `Winner: ${result.winner} after ${result.teamTurns} team turns (seed=${result.seed})`,
      );
      if (config.logFile !== null) {
        await writeFile(config.logFile, result.text + '\n', 'utf-8');
        logger.log(`Battle log written: ${config.logFile}`);
      }
    } else {
      const summary = runs.simulateMany(roster, seedsFor(baseSeed, config.runs));
      logger.log(
        `Roster ${summary.roster}: ${summary.runs} runs, ` +
          `A=${summary.wins.A} B=${summary.wins.B} DRAW=${summary.wins.DRAW}, ` +
          `avg turns=${summary.avgTeamTurns.toFixed(1)}`,
      );
      if (config.logFile !== null) {
        const text = summary.results
          .map((r) => `# seed=${r.seed} winner=${r.winner}\n${r.text}`)
          .join('\n\n');
        await writeFile(config.logFile, text + '\n', 'utf-8');
        logger.log(`Battle logs written: ${config.logFile}`);
      }
    }
  } finally {
    await app.close();
  }
}

bootstrap().catch((err: unknown) => {
  new Logger('Bootstrap').error(err instanceof Error ? err.stack ?? err.message : String(err));
  process.exitCode = 1;
});
