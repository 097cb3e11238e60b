import { Module } from '@nestjs/common';
import { ConfigModule } from '../../infra/config/config.module';
import { EvictionSweeperService } from './eviction-sweeper.service';
import { LivenessRegistryService } from './liveness-registry.service';
import { MatchmakerController } from './matchmaker.controller';

/**
 * Matchmaker module: liveness registry and its eviction sweeper.
 * Expects ScheduleModule.forRoot() in the root module.
 */
@Module({
  imports: [ConfigModule],
  controllers: [MatchmakerController],
  providers: [LivenessRegistryService, EvictionSweeperService],
  exports: [LivenessRegistryService],
})
export class MatchmakerModule {}
