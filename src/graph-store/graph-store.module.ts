import { Module } from '@nestjs/common';
import { CLOCK, systemClock } from '../common/clock';
import { GroupingModule } from '../grouping/grouping.module';
import { GraphPersistence } from './graph-persistence';
import { GraphStoreService } from './graph-store.service';
import { KyselyGraphPersistence } from './kysely-graph-persistence';

@Module({
  imports: [GroupingModule],
  providers: [
    GraphStoreService,
    { provide: GraphPersistence, useClass: KyselyGraphPersistence },
    { provide: CLOCK, useValue: systemClock },
  ],
  exports: [GraphStoreService, CLOCK],
})
export class GraphStoreModule {}
