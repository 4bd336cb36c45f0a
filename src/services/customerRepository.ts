/**
 * PostgreSQL-backed customer store.
 * Uniqueness of email is enforced by the `customers_email_lower_key` index on LOWER(email).
 */

import type { Customer, CustomerStore, InsertOutcome, NewCustomer } from '../types/index.js';
import { DatabaseService, UNIQUE_VIOLATION, pgErrorCode } from './database.js';

interface CustomerRow {
  id: number;
  name: string;
  email: string;
  age: number;
  source: string;
  created_at: Date;
}

const DEFAULT_PAGE_SIZE = 500;

function mapRowToCustomer(row: CustomerRow): Customer {
  return {
    id: row.id,
    name: row.name,
    email: row.email,
    age: row.age,
    source: row.source,
    createdAt: row.created_at,
  };
}

export class CustomerRepository implements CustomerStore {
  constructor(private db: DatabaseService) {}

  async insert(customer: NewCustomer): Promise<InsertOutcome> {
    try {
      await this.db.query(
        `INSERT INTO customers (name, email, age, source)
         VALUES ($1, $2, $3, $4)`,
        [customer.name, customer.email, customer.age, customer.source]
      );
      return 'inserted';
    } catch (error) {
      if (pgErrorCode(error) === UNIQUE_VIOLATION) {
        return 'duplicate';
      }
      throw error;
    }
  }

  async listRecent(limit: number): Promise<Customer[]> {
    const rows = await this.db.queryMany<CustomerRow>(
      `SELECT id, name, email, age, source, created_at
       FROM customers
       ORDER BY id DESC
       LIMIT $1`,
      [limit]
    );
    return rows.map(mapRowToCustomer);
  }

  async *streamAll(pageSize = DEFAULT_PAGE_SIZE): AsyncGenerator<Customer> {
    let lastId = 0;

    while (true) {
      const rows = await this.db.queryMany<CustomerRow>(
        `SELECT id, name, email, age, source, created_at
         FROM customers
         WHERE id > $1
         ORDER BY id
         LIMIT $2`,
        [lastId, pageSize]
      );

      for (const row of rows) {
        yield mapRowToCustomer(row);
      }

      const last = rows[rows.length - 1];
      if (!last || rows.length < pageSize) return;
      lastId = last.id;
    }
  }

  async healthCheck(): Promise<boolean> {
    return this.db.healthCheck();
  }
}
