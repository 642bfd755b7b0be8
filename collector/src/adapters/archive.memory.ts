import { DateKey, JobType } from "../core/dto";
import { ArchivePort } from "../core/ports";
import { metadataKey, pageKey, serializeArchive } from "./archive.keys";

export class MemoryArchive implements ArchivePort {
  private objects = new Map<string, string>();
  private failing = false;

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
    if (this.failing) {
      throw new Error(`Archive unavailable: ${key}`);
    }
    this.objects.set(key, serializeArchive(payload));
    return key;
  }

  // Helper methods for testing

  setFailing(failing: boolean): void {
    this.failing = failing;
  }

  keys(): string[] {
    return Array.from(this.objects.keys());
  }

  get(key: string): unknown {
    const body = this.objects.get(key);
    return body === undefined ? undefined : JSON.parse(body);
  }
}
