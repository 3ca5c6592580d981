import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';

import { AiModule } from '../ai/ai.module';
import { LoggingModule } from '../logging/logging.module';
import { VisitorsModule } from '../visitors/visitors.module';
import { AppController } from './app.controller';

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
    }),
    LoggingModule,
    VisitorsModule,
    AiModule,
  ],
  controllers: [AppController],
})
export class AppModule {}
