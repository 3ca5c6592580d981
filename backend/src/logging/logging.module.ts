import { Global, Module } from '@nestjs/common';

import { LoggingService } from './logging.service';

// ConfigModule is registered globally by AppModule.
@Global()
@Module({
  providers: [LoggingService],
  exports: [LoggingService],
})
export class LoggingModule {}
