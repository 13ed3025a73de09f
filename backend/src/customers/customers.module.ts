import { Module } from '@nestjs/common';
import { ApiTokenGuard } from '../auth/api-token.guard';
import { DatabaseService } from '../database/database.service';
import { RequestLoggingInterceptor } from '../logging/request-logging.interceptor';
import { CustomersController } from './customers.controller';
import { CustomersMemoryRepository } from './customers.memory.repository';
import { CustomersPgRepository } from './customers.pg.repository';
import { CUSTOMERS_REPOSITORY } from './customers.repository';
import { CustomersService } from './customers.service';

@Module({
  controllers: [CustomersController],
  providers: [
    {
      provide: CUSTOMERS_REPOSITORY,
      useFactory: (database: DatabaseService) =>
        database.enabled
          ? new CustomersPgRepository(database)
          : new CustomersMemoryRepository(),
      inject: [DatabaseService],
    },
    CustomersService,
    ApiTokenGuard,
    RequestLoggingInterceptor,
  ],
})
export class CustomersModule {}
