import { Module } from '@nestjs/common';
import { ScheduleModule } from '@nestjs/schedule';
import { AppController } from './app.controller';
import { ConfigModule } from './infra/config/config.module';
import { FactoryModule } from './modules/factory/factory.module';
import { MatchmakerModule } from './modules/matchmaker/matchmaker.module';

/** Root application module. ConfigModule loads .env first; container env overrides it. */
@Module({
  imports: [ScheduleModule.forRoot(), ConfigModule, FactoryModule, MatchmakerModule],
  controllers: [AppController],
})
export class AppModule {}
