import type { CustomerRecord, NewCustomerRecord } from './customers.types';

export const CUSTOMERS_REPOSITORY = Symbol('CUSTOMERS_REPOSITORY');

export interface CustomersRepository {
  listCustomers(): Promise<CustomerRecord[]>;
  getCustomerById(customerId: number): Promise<CustomerRecord | null>;
  createCustomer(customer: NewCustomerRecord): Promise<CustomerRecord>;
  updateCustomer(customer: CustomerRecord): Promise<CustomerRecord>;
  /** Resolves with the deleted id, or null when nothing was deleted. */
  deleteCustomerById(customerId: number): Promise<number | null>;
}
