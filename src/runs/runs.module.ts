import { Module } from '@nestjs/common';
import { EngineModule } from '../engine/engine.module.js';
import { RunsService } from './runs.service.js';

@Module({
  imports: [EngineModule],
  providers: [RunsService],
  exports: [RunsService],
})
export class RunsModule {}
