import { Module } from '@nestjs/common';
import { SimConfigModule } from './config/sim-config.module.js';
import { ContentModule } from './content/content.module.js';
import { EngineModule } from './engine/engine.module.js';
import { RunsModule } from './runs/runs.module.js';

@Module({
  imports: [SimConfigModule, ContentModule, EngineModule, RunsModule],
})
export class AppModule {}
