import {
  Body,
  Controller,
  Delete,
  Get,
  HttpCode,
  HttpStatus,
  Param,
  Post,
  Put,
  Query,
  UseGuards,
  UseInterceptors,
} from '@nestjs/common';
import { ApiTokenGuard } from '../auth/api-token.guard';
import { RequestLoggingInterceptor } from '../logging/request-logging.interceptor';
import { unwrapOutcome } from '../shared/outcome';
import {
  CreateCustomerRequestDto,
  GetCustomersQueryDto,
  UpdateCustomerRequestDto,
} from './customers.dto';
import { CustomersService } from './customers.service';
import type {
  CustomerDto,
  DeleteCustomerResponse,
  PageResult,
} from './customers.types';

@Controller('customers')
@UseGuards(ApiTokenGuard)
@UseInterceptors(RequestLoggingInterceptor)
export class CustomersController {
  constructor(private readonly customersService: CustomersService) {}

  @Get()
  async listCustomers(
    @Query() query: GetCustomersQueryDto,
  ): Promise<PageResult<CustomerDto>> {
    return unwrapOutcome(await this.customersService.listCustomers(query));
  }

  @Get(':customerId')
  async getCustomer(
    @Param('customerId') customerId: string,
  ): Promise<CustomerDto> {
    return unwrapOutcome(await this.customersService.getCustomer(customerId));
  }

  @Post()
  @HttpCode(HttpStatus.OK)
  async createCustomer(
    @Body() payload: CreateCustomerRequestDto,
  ): Promise<CustomerDto> {
    return unwrapOutcome(await this.customersService.createCustomer(payload));
  }

  @Put(':customerId')
  async updateCustomer(
    @Param('customerId') customerId: string,
    @Body() payload: UpdateCustomerRequestDto,
  ): Promise<CustomerDto> {
    return unwrapOutcome(
      await this.customersService.updateCustomer(customerId, payload),
    );
  }

  @Delete(':customerId')
  async deleteCustomer(
    @Param('customerId') customerId: string,
  ): Promise<DeleteCustomerResponse> {
    return unwrapOutcome(
      await this.customersService.deleteCustomer(customerId),
    );
  }
}
