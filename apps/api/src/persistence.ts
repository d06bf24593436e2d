import { Pool } from 'pg';

import type { PageRequest, ServiceChanges, ServiceFields, ServiceRecord } from '@salonsvc/contracts';

export interface ServiceRepository {
  init(): Promise<void>;
  close(): Promise<void>;
  create(fields: ServiceFields): Promise<ServiceRecord>;
  get(serviceId: number): Promise<ServiceRecord | null>;
  /** Ordered by id. Without a page the full listing is returned; paging is never clamped here. */
  list(page?: PageRequest): Promise<ServiceRecord[]>;
  update(serviceId: number, changes: ServiceChanges): Promise<ServiceRecord | null>;
  delete(serviceId: number): Promise<boolean>;
}

function toNumber(value: unknown, fallback = 0): number {
  const n = Number(value);
  return Number.isFinite(n) ? n : fallback;
}

function toIsoString(value: unknown): string {
  if (value instanceof Date) return value.toISOString();
  const ts = new Date(String(value)).getTime();
  return Number.isFinite(ts) ? new Date(ts).toISOString() : String(value);
}

export function toServiceRecord(row: Record<string, unknown>): ServiceRecord {
  return {
    serviceId: toNumber(row.service_id),
    name: String(row.name),
    description: row.description === null || row.description === undefined ? null : String(row.description),
    duration: toNumber(row.duration),
    // NUMERIC comes back from pg as a string.
    price: toNumber(row.price),
    imageUrl: row.image_url ? String(row.image_url) : null,
    salonId: toNumber(row.salon_id),
    createdAt: toIsoString(row.created_at),
    updatedAt: toIsoString(row.updated_at),
  };
}

const SERVICE_FIELDS: Array<keyof ServiceFields> = ['name', 'description', 'duration', 'price', 'imageUrl', 'salonId'];

const COLUMN_BY_FIELD: Record<keyof ServiceFields, string> = {
  name: 'name',
  description: 'description',
  duration: 'duration',
  price: 'price',
  imageUrl: 'image_url',
  salonId: 'salon_id',
};

const SELECT_COLUMNS = `
  service_id,
  name,
  description,
  duration,
  price,
  image_url,
  salon_id,
  created_at,
  updated_at
`;

export class PgServiceRepository implements ServiceRepository {
  private readonly pool: Pool;

  constructor(databaseUrl: string) {
    this.pool = new Pool({
      connectionString: databaseUrl,
    });
  }

  async init(): Promise<void> {
    await this.pool.query(`
      CREATE TABLE IF NOT EXISTS services (
        service_id SERIAL PRIMARY KEY,
        name TEXT NOT NULL,
        description TEXT,
        duration INT NOT NULL,
        price NUMERIC(10,2) NOT NULL,
        image_url TEXT,
        salon_id INT NOT NULL,
        created_at TIMESTAMPTZ NOT NULL DEFAULT NOW(),
        updated_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
      );
    `);

    await this.pool.query(`
      CREATE INDEX IF NOT EXISTS idx_services_salon_id ON services(salon_id);
    `);
  }

  async close(): Promise<void> {
    await this.pool.end();
  }

  async create(fields: ServiceFields): Promise<ServiceRecord> {
    const result = await this.pool.query(`
      INSERT INTO services (
        name,
        description,
        duration,
        price,
        image_url,
        salon_id
      ) VALUES (
        $1,$2,$3,$4,$5,$6
      )
      RETURNING ${SELECT_COLUMNS}
    `, [
      fields.name,
      fields.description,
      fields.duration,
      fields.price,
      fields.imageUrl,
      fields.salonId,
    ]);

    return toServiceRecord(result.rows[0]);
  }

  async get(serviceId: number): Promise<ServiceRecord | null> {
    const result = await this.pool.query(`
      SELECT ${SELECT_COLUMNS}
      FROM services
      WHERE service_id = $1
      LIMIT 1
    `, [serviceId]);

    const row = result.rows[0];
    if (!row) return null;
    return toServiceRecord(row);
  }

  async list(page?: PageRequest): Promise<ServiceRecord[]> {
    const result = page
      ? await this.pool.query(`
          SELECT ${SELECT_COLUMNS}
          FROM services
          ORDER BY service_id ASC
          OFFSET $1
          LIMIT $2
        `, [page.offset, page.limit])
      : await this.pool.query(`
          SELECT ${SELECT_COLUMNS}
          FROM services
          ORDER BY service_id ASC
        `);

    return result.rows.map((row: Record<string, unknown>) => toServiceRecord(row));
  }

  async update(serviceId: number, changes: ServiceChanges): Promise<ServiceRecord | null> {
    const assignments: string[] = [];
    const values: unknown[] = [];

    SERVICE_FIELDS.forEach((field) => {
      if (!(field in changes)) return;
      values.push(changes[field] ?? null);
      assignments.push(`${COLUMN_BY_FIELD[field]} = $${values.length}`);
    });

    values.push(serviceId);
    const result = await this.pool.query(`
      UPDATE services
      SET ${[...assignments, 'updated_at = NOW()'].join(',\n          ')}
      WHERE service_id = $${values.length}
      RETURNING ${SELECT_COLUMNS}
    `, values);

    const row = result.rows[0];
    if (!row) return null;
    return toServiceRecord(row);
  }

  async delete(serviceId: number): Promise<boolean> {
    const result = await this.pool.query(`
      DELETE FROM services
      WHERE service_id = $1
    `, [serviceId]);

    return (result.rowCount ?? 0) > 0;
  }
}

/** Process-local store used when no DATABASE_URL is configured, and by tests. */
export class InMemoryServiceRepository implements ServiceRepository {
  private readonly rows = new Map<number, ServiceRecord>();

  private nextId = 1;

  constructor(private readonly clock: () => Date = () => new Date()) {}

  async init(): Promise<void> {}

  async close(): Promise<void> {
    this.rows.clear();
  }

  async create(fields: ServiceFields): Promise<ServiceRecord> {
    const at = this.clock().toISOString();
    const record: ServiceRecord = {
      serviceId: this.nextId,
      ...fields,
      createdAt: at,
      updatedAt: at,
    };
    this.nextId += 1;
    this.rows.set(record.serviceId, record);
    return { ...record };
  }

  async get(serviceId: number): Promise<ServiceRecord | null> {
    const record = this.rows.get(serviceId);
    return record ? { ...record } : null;
  }

  async list(page?: PageRequest): Promise<ServiceRecord[]> {
    const ordered = [...this.rows.values()].sort((a, b) => a.serviceId - b.serviceId);
    const window = page ? ordered.slice(page.offset, page.offset + page.limit) : ordered;
    return window.map((record) => ({ ...record }));
  }

  async update(serviceId: number, changes: ServiceChanges): Promise<ServiceRecord | null> {
    const existing = this.rows.get(serviceId);
    if (!existing) return null;

    const updated: ServiceRecord = {
      ...existing,
      ...changes,
      updatedAt: this.clock().toISOString(),
    };
    this.rows.set(serviceId, updated);
    return { ...updated };
  }

  async delete(serviceId: number): Promise<boolean> {
    return this.rows.delete(serviceId);
  }
}
