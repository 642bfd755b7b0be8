import { JobType, SearchQuery } from "./dto";

export interface JobDefinition {
  type: JobType;
  /** Prefix of the job id, e.g. `weekly-20240115-030000` */
  idPrefix: string;
  /** Only a full sweep can prove a listing is gone */
  deactivate: boolean;
  query: Pick<
    SearchQuery,
    "operation" | "propertyType" | "sinceDate" | "order" | "sort"
  >;
}

export const JOBS: Record<JobType, JobDefinition> = {
  daily_new_listings: {
    type: "daily_new_listings",
    idPrefix: "daily",
    deactivate: false,
    query: {
      operation: "sale",
      propertyType: "homes",
      sinceDate: "Y",
      order: "publicationDate",
      sort: "desc",
    },
  },
  weekly_full_scan: {
    type: "weekly_full_scan",
    idPrefix: "weekly",
    deactivate: true,
    // price ascending keeps pagination stable while listings come and go
    query: {
      operation: "sale",
      propertyType: "homes",
      order: "price",
      sort: "asc",
    },
  },
};

export function isJobType(value: string): value is JobType {
  return value === "daily_new_listings" || value === "weekly_full_scan";
}
