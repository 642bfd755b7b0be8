import { promises as fs } from "fs";
import * as path from "path";
import { Logger } from "@listing-tracker/shared-utils";
import { DateKey, JobType } from "../core/dto";
import { ArchivePort } from "../core/ports";
import { metadataKey, pageKey, serializeArchive } from "./archive.keys";

/**
 * Archive under a local directory, mirroring the S3 key layout.
 */
export class LocalArchive implements ArchivePort {
  constructor(private baseDir: string, private logger?: Logger) {}

  async archivePage(
    jobType: JobType,
    dateKey: DateKey,
    page: number,
    payload: unknown
  ): Promise<string> {
    return this.write(pageKey(jobType, dateKey, page), payload);
  }

  async archiveMetadata(
    jobType: JobType,
    dateKey: DateKey,
    metadata: unknown
  ): Promise<string> {
    return this.write(metadataKey(jobType, dateKey), metadata);
  }

  private async write(key: string, payload: unknown): Promise<string> {
    const filePath = path.join(this.baseDir, key);
    await fs.mkdir(path.dirname(filePath), { recursive: true });
    await fs.writeFile(filePath, serializeArchive(payload), "utf-8");
    this.logger?.debug(`Archived ${filePath}`);
    return key;
  }
}
