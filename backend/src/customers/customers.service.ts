import { Inject, Injectable } from '@nestjs/common';
import { APP_CONFIG } from '../config/app.constants';
import type { AppConfig } from '../config/app.config';
import { ageOn } from '../shared/calendar';
import { isOk, notFound, ok, type Outcome } from '../shared/outcome';
import {
  sameAddresses,
  toCustomerDto,
  toCustomerPage,
  toNewCustomerRecord,
} from './customers.mapper';
import {
  CUSTOMERS_REPOSITORY,
  type CustomersRepository,
} from './customers.repository';
import type {
  CreateCustomerRequest,
  CustomerDto,
  CustomerRecord,
  DeleteCustomerResponse,
  GetCustomersRequest,
  PageResult,
  UpdateCustomerRequest,
} from './customers.types';
import {
  normalizeFullName,
  readDateOfBirth,
  validateAddresses,
  validateCustomerExists,
  validateDateOfBirth,
  validateFullName,
  validateIdentifier,
  validateIdentifierMatch,
  validatePaging,
  validateSortField,
} from './customers.validators';

@Injectable()
export class CustomersService {
  constructor(
    @Inject(CUSTOMERS_REPOSITORY)
    private readonly repository: CustomersRepository,
    @Inject(APP_CONFIG) private readonly config: AppConfig,
  ) {}

  async listCustomers(
    request: GetCustomersRequest,
  ): Promise<Outcome<PageResult<CustomerDto>>> {
    const paging = validatePaging(
      request.pageIndex,
      request.pageSize,
      this.config.defaultPageSize,
      this.config.maximumPageSize,
    );
    if (!isOk(paging)) {
      return paging;
    }
    const sort = validateSortField(request.sortField);
    if (!isOk(sort)) {
      return sort;
    }

    const records = await this.repository.listCustomers();
    return ok(toCustomerPage(records, paging.value, sort.value, new Date()));
  }

  async getCustomer(rawCustomerId: unknown): Promise<Outcome<CustomerDto>> {
    const customerId = validateIdentifier(rawCustomerId);
    if (!isOk(customerId)) {
      return customerId;
    }
    const customer = await this.loadCustomer(customerId.value);
    if (!isOk(customer)) {
      return customer;
    }
    return ok(toCustomerDto(customer.value, new Date()));
  }

  async createCustomer(
    request: CreateCustomerRequest,
  ): Promise<Outcome<CustomerDto>> {
    const now = new Date();
    const fullName = validateFullName(request.fullName);
    if (!isOk(fullName)) {
      return fullName;
    }
    const dateOfBirth = validateDateOfBirth(
      request.dateOfBirth,
      now,
      this.config.maximumAgeYears,
    );
    if (!isOk(dateOfBirth)) {
      return dateOfBirth;
    }
    const address = validateAddresses(request.address ?? []);
    if (!isOk(address)) {
      return address;
    }

    const created = await this.repository.createCustomer(
      toNewCustomerRecord(
        {
          fullName: fullName.value,
          dateOfBirth: dateOfBirth.value,
          address: address.value,
        },
        now,
      ),
    );
    return ok(toCustomerDto(created, now));
  }

  /**
   * Applies the fields present in the request. Only fields that differ from
   * the stored record are validated. Writes once when any of them differs
   * and never otherwise.
   */
  async updateCustomer(
    rawCustomerId: unknown,
    request: UpdateCustomerRequest,
  ): Promise<Outcome<CustomerDto>> {
    const now = new Date();
    const customerId = validateIdentifierMatch(
      rawCustomerId,
      request.customerId,
    );
    if (!isOk(customerId)) {
      return customerId;
    }
    const current = await this.loadCustomer(customerId.value);
    if (!isOk(current)) {
      return current;
    }

    const next: CustomerRecord = { ...current.value };
    let modified = false;

    if (
      typeof request.fullName === 'string' &&
      normalizeFullName(request.fullName) !== next.fullName
    ) {
      const fullName = validateFullName(request.fullName);
      if (!isOk(fullName)) {
        return fullName;
      }
      next.fullName = fullName.value;
      modified = true;
    }

    if (request.dateOfBirth !== undefined && request.dateOfBirth !== null) {
      const written = readDateOfBirth(request.dateOfBirth);
      if (!isOk(written)) {
        return written;
      }
      // An unchanged date is not re-checked against today's limits.
      if (written.value !== next.dateOfBirth) {
        const dateOfBirth = validateDateOfBirth(
          request.dateOfBirth,
          now,
          this.config.maximumAgeYears,
        );
        if (!isOk(dateOfBirth)) {
          return dateOfBirth;
        }
        next.dateOfBirth = dateOfBirth.value;
        modified = true;
      }
    }

    if (request.address !== undefined && request.address !== null) {
      const address = validateAddresses(request.address);
      if (!isOk(address)) {
        return address;
      }
      if (!sameAddresses(address.value, next.address)) {
        next.address = address.value;
        modified = true;
      }
    }

    if (!modified) {
      return ok(toCustomerDto(current.value, now));
    }
    next.age = ageOn(next.dateOfBirth, now);
    const updated = await this.repository.updateCustomer(next);
    return ok(toCustomerDto(updated, now));
  }

  async deleteCustomer(
    rawCustomerId: unknown,
  ): Promise<Outcome<DeleteCustomerResponse>> {
    const customerId = validateIdentifier(rawCustomerId);
    if (!isOk(customerId)) {
      return customerId;
    }
    const existing = await this.loadCustomer(customerId.value);
    if (!isOk(existing)) {
      return existing;
    }
    const deletedId = await this.repository.deleteCustomerById(
      customerId.value,
    );
    if (deletedId === null) {
      return notFound(`Customer ${customerId.value} not found.`);
    }
    return ok({ customerId: deletedId });
  }

  private async loadCustomer(
    customerId: number,
  ): Promise<Outcome<CustomerRecord>> {
    const record = await this.repository.getCustomerById(customerId);
    return validateCustomerExists(record, customerId);
  }
}
