import { Module } from '@nestjs/common';

import { DatabaseModule } from '../database/database.module';
import { PgVisitorStore } from './pg-visitor.store';
import { VisitorStore } from './visitor.store';
import { VisitorsController } from './visitors.controller';
import { VisitorsService } from './visitors.service';

@Module({
  imports: [DatabaseModule],
  controllers: [VisitorsController],
  providers: [VisitorsService, { provide: VisitorStore, useClass: PgVisitorStore }],
  exports: [VisitorsService],
})
export class VisitorsModule {}
