import { S3 } from "aws-sdk";
import { Logger } from "@listing-tracker/shared-utils";
import { DateKey, JobType } from "../core/dto";
import { ArchivePort } from "../core/ports";
import { metadataKey, pageKey, serializeArchive } from "./archive.keys";

export interface S3ArchiveConfig {
  bucket: string;
  region?: string;
  /** Prepended to every key, e.g. `prod/` */
  prefix?: string;
  accessKeyId?: string;
  secretAccessKey?: string;
  endpoint?: string; // For LocalStack
}

/**
 * Raw response archive in S3. One JSON object per page plus one per job.
 */
export class S3Archive implements ArchivePort {
  private s3: S3;

  constructor(private config: S3ArchiveConfig, private logger?: Logger) {
    this.s3 = new S3({
      region: config.region ?? "eu-west-1",
      accessKeyId: config.accessKeyId,
      secretAccessKey: config.secretAccessKey,
      endpoint: config.endpoint,
      s3ForcePathStyle: config.endpoint ? true : undefined,
    });
  }

  async archivePage(
    jobType: JobType,
    dateKey: DateKey,
    page: number,
    payload: unknown
  ): Promise<string> {
    return this.put(pageKey(jobType, dateKey, page), payload);
  }

  async archiveMetadata(
    jobType: JobType,
    dateKey: DateKey,
    metadata: unknown
  ): Promise<string> {
    return this.put(metadataKey(jobType, dateKey), metadata);
  }

  private async put(key: string, payload: unknown): Promise<string> {
    const fullKey = `${this.config.prefix ?? ""}${key}`;
    await this.s3
      .putObject({
        Bucket: this.config.bucket,
        Key: fullKey,
        Body: serializeArchive(payload),
        ContentType: "application/json",
      })
      .promise();

    this.logger?.info(`Archived s3://${this.config.bucket}/${fullKey}`);
    return fullKey;
  }
}
