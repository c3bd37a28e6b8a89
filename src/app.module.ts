import { Module } from '@nestjs/common';
import { APP_FILTER } from '@nestjs/core';
import { JwtModule } from '@nestjs/jwt';
import { ConfigModule } from './config/config.module.js';
import { GameConfigService } from './config/game-config.service.js';
import { DrizzleModule } from './db/drizzle.module.js';
import { GameExceptionFilter } from './common/filters/game-exception.filter.js';
import { ContentModule } from './content/content.module.js';
import { EngineModule } from './engine/engine.module.js';
import { RunsModule } from './runs/runs.module.js';

@Module({
  imports: [
    ConfigModule,
    JwtModule.registerAsync({
      global: true,
      inject: [GameConfigService],
      useFactory: (config: GameConfigService) => ({
        secret: config.get().jwtSecret,
      }),
    }),
    DrizzleModule,
    ContentModule,
    EngineModule,
    RunsModule,
  ],
  providers: [
    {
      provide: APP_FILTER,
      useClass: GameExceptionFilter,
    },
  ],
})
export class AppModule {}
