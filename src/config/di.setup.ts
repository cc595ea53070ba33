import 'reflect-metadata';
import { container, Lifecycle } from 'tsyringe';
import { InMemoryShipmentStore } from '../adapters/store/in-memory-shipment.store';
import { openMongooseCollection, ShipmentCollectionOpener } from '../adapters/store/mongo-shipment.collection';
import { MongoShipmentStore } from '../adapters/store/mongo-shipment.store';
import { IShipmentStore } from '../adapters/store/shipment-store.interface';
import { CsvProcessorService } from '../services/csv-processor.service';
import { ICsvProcessor } from '../services/csv-processor.interface';
import { IDurationAllocator } from '../services/duration-allocator.interface';
import { DurationAllocatorService } from '../services/duration-allocator.service';
import { IIncidentResolver } from '../services/incident-resolver.interface';
import { IncidentResolverService } from '../services/incident-resolver.service';
import { IProgressionScheduler } from '../services/progression-scheduler.interface';
import { ProgressionSchedulerService } from '../services/progression-scheduler.service';
import { IShipmentFactory } from '../services/shipment-factory.interface';
import { ShipmentFactoryService } from '../services/shipment-factory.service';
import { IShipmentQuery } from '../services/shipment-query.interface';
import { ShipmentQueryService } from '../services/shipment-query.service';
import { IClock, SystemClock } from '../utils/clock.util';
import { IRandomSource, MathRandomSource } from '../utils/random.util';
import { AppConfig } from './app.config';

export function setupDI(config: AppConfig): void {
  // Register configuration values
  container.register('AppConfig', { useValue: config });

  // Register runtime primitives
  container.register<IRandomSource>('IRandomSource', { useValue: new MathRandomSource() });
  container.register<IClock>('IClock', { useValue: new SystemClock() });

  container.register<ShipmentCollectionOpener>('ShipmentCollectionOpener', { useValue: openMongooseCollection });

  // The store holds the connection and the per-record locks: one per process
  container.register<IShipmentStore>(
    'IShipmentStore',
    { useClass: config.store.driver === 'memory' ? InMemoryShipmentStore : MongoShipmentStore },
    { lifecycle: Lifecycle.Singleton }
  );

  // Register services
  container.register<IDurationAllocator>('IDurationAllocator', {
    useClass: DurationAllocatorService
  });

  container.register<IShipmentFactory>('IShipmentFactory', {
    useClass: ShipmentFactoryService
  });

  container.register<IIncidentResolver>('IIncidentResolver', {
    useClass: IncidentResolverService
  });

  container.register<IProgressionScheduler>(
    'IProgressionScheduler',
    { useClass: ProgressionSchedulerService },
    { lifecycle: Lifecycle.Singleton }
  );

  container.register<IShipmentQuery>('IShipmentQuery', {
    useClass: ShipmentQueryService
  });

  container.register<ICsvProcessor>('ICsvProcessor', {
    useClass: CsvProcessorService
  });
}
