import { Controller, Get } from '@nestjs/common';

export interface ApiInfo {
  message: string;
  version: string;
  endpoints: Record<string, string>;
}

@Controller()
export class AppController {
  @Get()
  getInfo(): ApiInfo {
    return {
      message: 'Welcome to the Visitor Parking Management API',
      version: '1.0',
      endpoints: {
        visitors: '/api/visitors',
        stats: '/api/visitors/stats',
        chat: '/api/chat',
      },
    };
  }
}
