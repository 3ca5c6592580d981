import { Body, Controller, HttpCode, Post } from '@nestjs/common';

import { AiEngineService } from './ai-engine.service';
import { ChatAnswer } from './ai.types';
import { ChatQueryDto } from './dto/chat-query.dto';

@Controller('chat')
export class ChatController {
  constructor(private readonly aiEngine: AiEngineService) {}

  @Post()
  @HttpCode(200)
  ask(@Body() dto: ChatQueryDto): Promise<ChatAnswer> {
    return this.aiEngine.processQuery(dto.query);
  }
}
