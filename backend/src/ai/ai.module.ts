import { Module } from '@nestjs/common';

import { VisitorsModule } from '../visitors/visitors.module';
import { AiEngineService } from './ai-engine.service';
import { ChatController } from './chat.controller';
import { DataRetrieverService } from './data.retriever';
import { IntentService } from './intent.service';
import { ResponseGeneratorService } from './response.generator';
import { OpenAiTextGenerator, TextGenerator } from './text.generator';

@Module({
  imports: [VisitorsModule],
  controllers: [ChatController],
  providers: [
    AiEngineService,
    IntentService,
    DataRetrieverService,
    ResponseGeneratorService,
    { provide: TextGenerator, useClass: OpenAiTextGenerator },
  ],
  exports: [AiEngineService],
})
export class AiModule {}
