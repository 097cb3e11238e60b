import { Module } from '@nestjs/common';
import { ConfigModule as NestConfigModule } from '@nestjs/config';
import {
  FACTORY_CONFIG,
  MATCHMAKER_CONFIG,
  RUNTIME_CONFIG,
  getFactoryConfig,
  getMatchmakerConfig,
  getRuntimeConfig,
} from './env.config';
import { CLOCK, systemClock } from '../time/clock';

/**
 * Config module: loads .env and provides the typed config objects.
 * Factories run after .env is loaded, so env files take effect. Tests override the tokens.
 * CLOCK: wall-clock time source for the registries.
 */
@Module({
  imports: [
    NestConfigModule.forRoot({
      isGlobal: true,
      envFilePath: ['.env.local', '.env'],
    }),
  ],
  providers: [
    { provide: FACTORY_CONFIG, useFactory: getFactoryConfig },
    { provide: MATCHMAKER_CONFIG, useFactory: getMatchmakerConfig },
    { provide: RUNTIME_CONFIG, useFactory: getRuntimeConfig },
    { provide: CLOCK, useValue: systemClock },
  ],
  exports: [NestConfigModule, FACTORY_CONFIG, MATCHMAKER_CONFIG, RUNTIME_CONFIG, CLOCK],
})
export class ConfigModule {}
