/**
 * Customer types
 * A customer is one validated `name,email,age` row persisted by an import.
 */

export interface Customer {
  id: number;
  name: string;
  email: string;
  age: number;
  source: string;
  createdAt: Date;
}

export interface NewCustomer {
  name: string;
  email: string;
  age: number;
  source: string;
}

export type InsertOutcome = 'inserted' | 'duplicate';

/**
 * Persistence seam used by the import engine and the export/listing routes.
 * Email uniqueness is case-insensitive and enforced by the store itself.
 */
export interface CustomerStore {
  insert(customer: NewCustomer): Promise<InsertOutcome>;
  listRecent(limit: number): Promise<Customer[]>;
  /** Pages through every customer in id order. */
  streamAll(pageSize?: number): AsyncGenerator<Customer>;
  healthCheck(): Promise<boolean>;
}
