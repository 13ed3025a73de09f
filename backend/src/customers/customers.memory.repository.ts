import { Injectable } from '@nestjs/common';
import { copyAddress } from './customers.mapper';
import type { CustomersRepository } from './customers.repository';
import type { CustomerRecord, NewCustomerRecord } from './customers.types';

/** Process-local store used when no database connection is configured. */
@Injectable()
export class CustomersMemoryRepository implements CustomersRepository {
  private readonly customers = new Map<number, CustomerRecord>();
  private nextId = 1;

  async listCustomers(): Promise<CustomerRecord[]> {
    return [...this.customers.values()]
      .sort((a, b) => a.customerId - b.customerId)
      .map((customer) => this.clone(customer));
  }

  async getCustomerById(customerId: number): Promise<CustomerRecord | null> {
    const customer = this.customers.get(customerId);
    return customer ? this.clone(customer) : null;
  }

  async createCustomer(customer: NewCustomerRecord): Promise<CustomerRecord> {
    const timestamp = new Date().toISOString();
    const created: CustomerRecord = {
      ...customer,
      address: customer.address.map(copyAddress),
      customerId: this.nextId++,
      createdAt: timestamp,
      updatedAt: timestamp,
    };
    this.customers.set(created.customerId, created);
    return this.clone(created);
  }

  async updateCustomer(customer: CustomerRecord): Promise<CustomerRecord> {
    const existing = this.customers.get(customer.customerId);
    if (!existing) {
      throw new Error(`Customer ${customer.customerId} vanished during update.`);
    }
    const updated: CustomerRecord = {
      ...customer,
      address: customer.address.map(copyAddress),
      createdAt: existing.createdAt,
      updatedAt: new Date().toISOString(),
    };
    this.customers.set(updated.customerId, updated);
    return this.clone(updated);
  }

  async deleteCustomerById(customerId: number): Promise<number | null> {
    return this.customers.delete(customerId) ? customerId : null;
  }

  private clone(customer: CustomerRecord): CustomerRecord {
    return { ...customer, address: customer.address.map(copyAddress) };
  }
}
