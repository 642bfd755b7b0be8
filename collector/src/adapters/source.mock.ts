import * as fs from "fs";
import * as path from "path";
import { RawRecord, SearchPage, SearchQuery } from "../core/dto";
import { SourcePort } from "../core/ports";

// Recency filters understood by the search API, in days
const SINCE_WINDOWS: Record<string, number> = {
  T: 1,
  Y: 2,
  W: 7,
  M: 31,
};

export function loadFixtures(
  fixturesPath = path.join(__dirname, "../../fixtures/listings.json")
): RawRecord[] {
  const parsed: unknown = JSON.parse(fs.readFileSync(fixturesPath, "utf-8"));
  if (!Array.isArray(parsed)) {
    throw new Error(`Fixtures at ${fixturesPath} must be a JSON array`);
  }
  return parsed.filter(
    (item): item is RawRecord => typeof item === "object" && item !== null
  );
}

function numberField(record: RawRecord, field: string): number {
  const value = record[field];
  return typeof value === "number" ? value : 0;
}

/**
 * Serves fixture records with the search API's paging, ordering and
 * recency filtering. `publishedDaysAgo` on each record stands in for the
 * publication date.
 */
export class MockSource implements SourcePort {
  private records: RawRecord[];

  constructor(records?: RawRecord[]) {
    this.records = records ?? loadFixtures();
  }

  setRecords(records: RawRecord[]): void {
    this.records = records;
  }

  async search(query: SearchQuery): Promise<SearchPage> {
    let filtered = [...this.records];

    if (query.sinceDate) {
      const windowDays = SINCE_WINDOWS[query.sinceDate];
      if (windowDays === undefined) {
        throw new Error(`Unsupported sinceDate filter: ${query.sinceDate}`);
      }
      filtered = filtered.filter(
        (r) => numberField(r, "publishedDaysAgo") <= windowDays
      );
    }

    // Newest first means fewest days ago first
    const key =
      query.order === "price"
        ? (r: RawRecord) => numberField(r, "price")
        : (r: RawRecord) => -numberField(r, "publishedDaysAgo");
    const direction = query.sort === "asc" ? 1 : -1;
    filtered.sort((a, b) => (key(a) - key(b)) * direction);

    const total = filtered.length;
    const totalPages = Math.ceil(total / query.pageSize);
    const start = (query.page - 1) * query.pageSize;
    const items = filtered.slice(start, start + query.pageSize);

    return {
      total,
      totalPages,
      items,
      raw: {
        elementList: items,
        total,
        totalPages,
        actualPage: query.page,
        itemsPerPage: query.pageSize,
      },
    };
  }
}
