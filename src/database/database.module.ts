import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { DatabaseService } from './database.service';
import { DeliveryLog } from './delivery-log';
import { PostgresDeliveryLog } from './postgres-delivery-log';

/**
 * PostgreSQL pool plus the delivery log built on it.
 * Consumers inject the abstract {@link DeliveryLog}.
 */
@Module({
  imports: [ConfigModule],
  providers: [
    DatabaseService,
    { provide: DeliveryLog, useClass: PostgresDeliveryLog },
  ],
  exports: [DatabaseService, DeliveryLog],
})
export class DatabaseModule {}
