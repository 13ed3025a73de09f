import { Injectable, Logger } from '@nestjs/common';
import type { PoolClient } from 'pg';
import { DatabaseService } from '../database/database.service';
import type { CustomersRepository } from './customers.repository';
import type {
  AddressRecord,
  CustomerRecord,
  NewCustomerRecord,
} from './customers.types';

interface AddressRow {
  line1: string;
  line2: string | null;
  city: string;
  state: string | null;
  postalCode: string;
  country: string;
}

interface CustomerRow {
  customer_id: number;
  full_name: string;
  date_of_birth: string;
  age: number;
  address: AddressRow[] | null;
  created_at: Date;
  updated_at: Date;
}

const CUSTOMER_SELECT = `
  SELECT c.customer_id,
         c.full_name,
         to_char(c.date_of_birth, 'YYYY-MM-DD') AS date_of_birth,
         c.age,
         c.created_at,
         c.updated_at,
         COALESCE(
           jsonb_agg(
             jsonb_build_object(
               'line1', a.line1,
               'line2', a.line2,
               'city', a.city,
               'state', a.state,
               'postalCode', a.postal_code,
               'country', a.country
             )
             ORDER BY a.position
           ) FILTER (WHERE a.customer_id IS NOT NULL),
           '[]'::jsonb
         ) AS address
  FROM customer c
  LEFT JOIN customer_address a ON a.customer_id = c.customer_id
`;

@Injectable()
export class CustomersPgRepository implements CustomersRepository {
  private readonly logger = new Logger(CustomersPgRepository.name);

  constructor(private readonly database: DatabaseService) {}

  async listCustomers(): Promise<CustomerRecord[]> {
    const result = await this.database.query<CustomerRow>(
      `${CUSTOMER_SELECT}
       GROUP BY c.customer_id
       ORDER BY c.customer_id`,
    );
    return result.rows.map((row) => this.mapRow(row));
  }

  async getCustomerById(customerId: number): Promise<CustomerRecord | null> {
    const result = await this.database.query<CustomerRow>(
      `${CUSTOMER_SELECT}
       WHERE c.customer_id = $1
       GROUP BY c.customer_id`,
      [customerId],
    );
    const row = result.rows[0];
    return row ? this.mapRow(row) : null;
  }

  async createCustomer(customer: NewCustomerRecord): Promise<CustomerRecord> {
    const customerId = await this.inTransaction(
      'Failed to create customer',
      async (client) => {
        const inserted = await client.query<{ customer_id: number }>(
          `INSERT INTO customer (full_name, date_of_birth, age, created_at, updated_at)
           VALUES ($1, $2::date, $3, now(), now())
           RETURNING customer_id`,
          [customer.fullName, customer.dateOfBirth, customer.age],
        );
        const row = inserted.rows[0];
        if (!row) {
          throw new Error('Customer insert returned no id.');
        }
        await this.insertAddresses(client, row.customer_id, customer.address);
        return row.customer_id;
      },
    );
    const created = await this.getCustomerById(customerId);
    if (!created) {
      throw new Error('Created customer not found.');
    }
    return created;
  }

  async updateCustomer(customer: CustomerRecord): Promise<CustomerRecord> {
    await this.inTransaction('Failed to update customer', async (client) => {
      const updated = await client.query(
        `UPDATE customer
         SET full_name = $2,
             date_of_birth = $3::date,
             age = $4,
             updated_at = now()
         WHERE customer_id = $1`,
        [
          customer.customerId,
          customer.fullName,
          customer.dateOfBirth,
          customer.age,
        ],
      );
      if (!updated.rowCount) {
        throw new Error(`Customer ${customer.customerId} vanished during update.`);
      }
      await client.query('DELETE FROM customer_address WHERE customer_id = $1', [
        customer.customerId,
      ]);
      await this.insertAddresses(client, customer.customerId, customer.address);
    });
    const reloaded = await this.getCustomerById(customer.customerId);
    if (!reloaded) {
      throw new Error('Updated customer not found.');
    }
    return reloaded;
  }

  async deleteCustomerById(customerId: number): Promise<number | null> {
    const result = await this.database.query<{ customer_id: number }>(
      'DELETE FROM customer WHERE customer_id = $1 RETURNING customer_id',
      [customerId],
    );
    return result.rows[0]?.customer_id ?? null;
  }

  private async inTransaction<T>(
    failureMessage: string,
    work: (client: PoolClient) => Promise<T>,
  ): Promise<T> {
    return this.database.withClient(async (client) => {
      await client.query('BEGIN');
      try {
        const result = await work(client);
        await client.query('COMMIT');
        return result;
      } catch (error) {
        await client.query('ROLLBACK');
        this.logger.error(
          failureMessage,
          error instanceof Error ? error.stack : String(error),
        );
        throw error;
      }
    });
  }

  private async insertAddresses(
    client: PoolClient,
    customerId: number,
    addresses: AddressRecord[],
  ): Promise<void> {
    if (!addresses.length) {
      return;
    }
    const payload = addresses.map((address, position) => ({
      position,
      line1: address.line1,
      line2: address.line2 ?? null,
      city: address.city,
      state: address.state ?? null,
      postalCode: address.postalCode,
      country: address.country,
    }));
    await client.query(
      `
        INSERT INTO customer_address (
          customer_id, position, line1, line2, city, state, postal_code, country
        )
        SELECT $1, a.position, a.line1, a.line2, a.city, a.state, a."postalCode", a.country
        FROM jsonb_to_recordset($2::jsonb)
             AS a(
               position INTEGER,
               line1 TEXT,
               line2 TEXT,
               city TEXT,
               state TEXT,
               "postalCode" TEXT,
               country TEXT
             )
      `,
      [customerId, JSON.stringify(payload)],
    );
  }

  private mapRow(row: CustomerRow): CustomerRecord {
    return {
      customerId: Number(row.customer_id),
      fullName: row.full_name,
      dateOfBirth: row.date_of_birth,
      age: row.age,
      address: (row.address ?? []).map((address) => this.mapAddress(address)),
      createdAt: row.created_at.toISOString(),
      updatedAt: row.updated_at.toISOString(),
    };
  }

  private mapAddress(row: AddressRow): AddressRecord {
    return {
      line1: row.line1,
      ...(row.line2 ? { line2: row.line2 } : {}),
      city: row.city,
      ...(row.state ? { state: row.state } : {}),
      postalCode: row.postalCode,
      country: row.country,
    };
  }
}
