import { DateKey, JobType } from "../core/dto";

export const ARCHIVE_ROOT = "raw_responses";

export function pageKey(
  jobType: JobType,
  dateKey: DateKey,
  page: number
): string {
  return `${ARCHIVE_ROOT}/${dateKey}/${jobType}_p${page}.json`;
}

export function metadataKey(jobType: JobType, dateKey: DateKey): string {
  return `${ARCHIVE_ROOT}/${dateKey}/${jobType}_meta.json`;
}

export function serializeArchive(payload: unknown): string {
  return JSON.stringify(payload, null, 2);
}
