import { Global, Module } from '@nestjs/common';
import { SimConfigService } from './sim-config.service.js';

@Global()
@Module({
  providers: [SimConfigService],
  exports: [SimConfigService],
})
export class SimConfigModule {}
