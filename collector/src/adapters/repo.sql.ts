import * as fs from "fs";
import * as path from "path";
import { Pool, PoolClient, PoolConfig } from "pg";
import { Logger } from "@listing-tracker/shared-utils";
import {
  ApiRequestRecord,
  DatabaseStats,
  DateKey,
  Listing,
  ListingDetails,
  Price,
  RawRecord,
} from "../core/dto";
import { ApiLedgerPort, ListingStorePort, ListingTx } from "../core/ports";

interface ListingRow {
  property_code: string;
  first_seen_at: Date;
  last_seen_at: Date;
  publication_date: string | null;
  is_active: boolean;
  sold_or_withdrawn_at: string | null;
  republished: boolean;
  republished_at: Date | null;
}

export interface DetailsRow {
  property_code: string;
  price: string;
  previous_prices: Record<string, number> | null;
  all_fields_json: RawRecord;
}

interface StatsRow {
  total: string;
  active: string;
  inactive: string;
  republished: string;
}

// DATE columns are rendered as text so they never pass through a local-time Date
const LISTING_COLUMNS = `
  property_code,
  first_seen_at,
  last_seen_at,
  to_char(publication_date, 'YYYY-MM-DD') AS publication_date,
  is_active,
  to_char(sold_or_withdrawn_at, 'YYYY-MM-DD') AS sold_or_withdrawn_at,
  republished,
  republished_at`;

function rowToListing(row: ListingRow): Listing {
  return {
    propertyCode: row.property_code,
    firstSeenAt: row.first_seen_at,
    lastSeenAt: row.last_seen_at,
    publicationDate: row.publication_date,
    isActive: row.is_active,
    soldOrWithdrawnAt: row.sold_or_withdrawn_at,
    republished: row.republished,
    republishedAt: row.republished_at,
  };
}

const SCHEMA_PATH = path.join(__dirname, "../../sql/init.sql");

export function loadSchema(schemaPath = SCHEMA_PATH): string {
  return fs.readFileSync(schemaPath, "utf-8");
}

/** NUMERIC parameter text; `String` gives the shortest form that parses back to `price` */
export function toPriceParam(price: Price): string {
  return String(price);
}

export function rowToDetails(row: DetailsRow): ListingDetails {
  return {
    propertyCode: row.property_code,
    price: Number(row.price),
    previousPrices: row.previous_prices ?? {},
    allFields: row.all_fields_json,
  };
}

class SqlListingTx implements ListingTx {
  private released = false;

  constructor(private client: PoolClient) {}

  async getListing(propertyCode: string): Promise<Listing | null> {
    const result = await this.client.query<ListingRow>(
      `SELECT ${LISTING_COLUMNS} FROM listings WHERE property_code = $1`,
      [propertyCode]
    );
    return result.rows.length > 0 ? rowToListing(result.rows[0]) : null;
  }

  async getDetails(propertyCode: string): Promise<ListingDetails | null> {
    const result = await this.client.query<DetailsRow>(
      `SELECT property_code, price, previous_prices, all_fields_json
       FROM listing_details WHERE property_code = $1`,
      [propertyCode]
    );
    return result.rows.length > 0 ? rowToDetails(result.rows[0]) : null;
  }

  async insertListing(listing: Listing): Promise<void> {
    await this.client.query(
      `INSERT INTO listings (
        property_code,
        first_seen_at,
        last_seen_at,
        publication_date,
        is_active,
        sold_or_withdrawn_at,
        republished,
        republished_at
      ) VALUES ($1, $2, $3, $4, $5, $6, $7, $8)`,
      [
        listing.propertyCode,
        listing.firstSeenAt,
        listing.lastSeenAt,
        listing.publicationDate,
        listing.isActive,
        listing.soldOrWithdrawnAt,
        listing.republished,
        listing.republishedAt,
      ]
    );
  }

  async insertDetails(details: ListingDetails): Promise<void> {
    await this.client.query(
      `INSERT INTO listing_details (
        property_code,
        price,
        previous_prices,
        all_fields_json
      ) VALUES ($1, $2, $3, $4)`,
      [
        details.propertyCode,
        toPriceParam(details.price),
        JSON.stringify(details.previousPrices),
        JSON.stringify(details.allFields),
      ]
    );
  }

  async updateListing(listing: Listing): Promise<void> {
    await this.client.query(
      `UPDATE listings SET
        last_seen_at = $2,
        publication_date = $3,
        is_active = $4,
        sold_or_withdrawn_at = $5,
        republished = $6,
        republished_at = $7
      WHERE property_code = $1`,
      [
        listing.propertyCode,
        listing.lastSeenAt,
        listing.publicationDate,
        listing.isActive,
        listing.soldOrWithdrawnAt,
        listing.republished,
        listing.republishedAt,
      ]
    );
  }

  async updateDetails(details: ListingDetails): Promise<void> {
    await this.client.query(
      `UPDATE listing_details SET
        price = $2,
        previous_prices = $3,
        all_fields_json = $4
      WHERE property_code = $1`,
      [
        details.propertyCode,
        toPriceParam(details.price),
        JSON.stringify(details.previousPrices),
        JSON.stringify(details.allFields),
      ]
    );
  }

  async deactivateUnseen(before: Date, on: DateKey): Promise<number> {
    const result = await this.client.query(
      `UPDATE listings
       SET is_active = FALSE, sold_or_withdrawn_at = $2
       WHERE is_active = TRUE AND last_seen_at < $1`,
      [before, on]
    );
    return result.rowCount ?? 0;
  }

  async commit(): Promise<void> {
    try {
      await this.client.query("COMMIT");
    } finally {
      this.release();
    }
  }

  async rollback(): Promise<void> {
    try {
      await this.client.query("ROLLBACK");
    } finally {
      this.release();
    }
  }

  private release(): void {
    if (!this.released) {
      this.released = true;
      this.client.release();
    }
  }
}

/**
 * PostgreSQL listing store. Each transaction holds one pooled client from
 * BEGIN until COMMIT/ROLLBACK.
 */
export class SqlListingStore implements ListingStorePort, ApiLedgerPort {
  private pool: Pool;

  constructor(config: PoolConfig, private logger?: Logger) {
    this.pool = new Pool({
      max: 5,
      idleTimeoutMillis: 30000,
      connectionTimeoutMillis: 5000,
      ...config,
    });
  }

  async healthCheck(): Promise<boolean> {
    try {
      const client = await this.pool.connect();
      try {
        await client.query("SELECT 1");
        return true;
      } finally {
        client.release();
      }
    } catch (error) {
      this.logger?.error("Database health check failed:", error);
      return false;
    }
  }

  async begin(): Promise<ListingTx> {
    const client = await this.pool.connect();
    try {
      await client.query("BEGIN");
    } catch (error) {
      client.release();
      throw error;
    }
    return new SqlListingTx(client);
  }

  async getStatistics(): Promise<DatabaseStats> {
    const result = await this.pool.query<StatsRow>(`
      SELECT
        COUNT(*) AS total,
        COUNT(*) FILTER (WHERE is_active) AS active,
        COUNT(*) FILTER (WHERE NOT is_active) AS inactive,
        COUNT(*) FILTER (WHERE republished) AS republished
      FROM listings
    `);
    const row = result.rows[0];
    return {
      totalListings: parseInt(row.total, 10),
      activeListings: parseInt(row.active, 10),
      inactiveListings: parseInt(row.inactive, 10),
      republishedListings: parseInt(row.republished, 10),
    };
  }

  async recordApiRequest(request: ApiRequestRecord): Promise<void> {
    await this.pool.query(
      `INSERT INTO api_requests (
        request_type,
        endpoint,
        status_code,
        duration_ms,
        request_params,
        error_message,
        job_id
      ) VALUES ($1, $2, $3, $4, $5, $6, $7)`,
      [
        request.requestType,
        request.endpoint,
        request.statusCode ?? null,
        request.durationMs ?? null,
        request.requestParams ? JSON.stringify(request.requestParams) : null,
        request.errorMessage ?? null,
        request.jobId ?? null,
      ]
    );
  }

  /**
   * Apply sql/init.sql. Every statement is idempotent.
   */
  async ensureSchema(schemaPath = SCHEMA_PATH): Promise<void> {
    await this.pool.query(loadSchema(schemaPath));
    this.logger?.info(`Schema applied from ${schemaPath}`);
  }

  async close(): Promise<void> {
    await this.pool.end();
  }
}
