import { z } from "zod";
import { Logger } from "@listing-tracker/shared-utils";
import { SearchPage, SearchQuery } from "../core/dto";
import { ApiLedgerPort, SourcePort } from "../core/ports";
import { errorMessage, sleep } from "../core/utils";
import { OAuthTokenManager } from "./auth.oauth";
import {
  AuthenticationError,
  HttpError,
  isRetryable,
  RateLimitError,
  ServerError,
} from "./errors";

const searchResponseSchema = z
  .object({
    total: z.number().int().nonnegative().default(0),
    totalPages: z.number().int().nonnegative().default(1),
    elementList: z.array(z.record(z.unknown())).default([]),
  })
  .passthrough();

export interface HttpSourceConfig {
  baseUrl: string;
  country: string;
  /** Minimum spacing between requests */
  minIntervalMs?: number;
  maxAttempts?: number;
  backoffBaseMs?: number;
  backoffMaxMs?: number;
  timeoutMs?: number;
}

export interface HttpSourceDeps {
  tokens: OAuthTokenManager;
  logger: Logger;
  ledger?: ApiLedgerPort;
  jobId?: string;
  fetchFn?: typeof fetch;
  sleepFn?: (ms: number) => Promise<void>;
  now?: () => number;
}

/**
 * Search API client: bearer-token auth, one request per `minIntervalMs`,
 * retries on 429 and 5xx with exponential backoff.
 */
export class HttpSearchSource implements SourcePort {
  private lastRequestAt?: number;

  constructor(
    private config: HttpSourceConfig,
    private deps: HttpSourceDeps
  ) {}

  async search(query: SearchQuery): Promise<SearchPage> {
    const maxAttempts = this.config.maxAttempts ?? 3;
    const baseMs = this.config.backoffBaseMs ?? 4000;
    const maxMs = this.config.backoffMaxMs ?? 60000;

    for (let attempt = 1; ; attempt++) {
      try {
        return await this.request(query);
      } catch (error) {
        if (!isRetryable(error) || attempt >= maxAttempts) {
          throw error;
        }
        const delayMs = Math.min(maxMs, baseMs * Math.pow(2, attempt - 1));
        this.deps.logger.warn(
          `Search attempt ${attempt}/${maxAttempts} failed (${errorMessage(
            error
          )}), retrying in ${delayMs}ms`
        );
        await this.sleep(delayMs);
      }
    }
  }

  private async request(query: SearchQuery): Promise<SearchPage> {
    await this.rateLimit();

    const endpoint = "/search";
    const url = `${this.config.baseUrl}/${this.config.country}${endpoint}`;
    const params = toFormParams(query);
    const token = await this.deps.tokens.getToken();
    const fetchFn = this.deps.fetchFn ?? fetch;

    const controller = new AbortController();
    const timeoutId = setTimeout(
      () => controller.abort(),
      this.config.timeoutMs ?? 30000
    );
    const started = this.now();

    this.deps.logger.info("API request", { endpoint, params });

    let response: Response;
    try {
      response = await fetchFn(url, {
        method: "POST",
        headers: {
          Authorization: `Bearer ${token}`,
          "Content-Type": "application/x-www-form-urlencoded",
        },
        body: new URLSearchParams(
          Object.entries(params).map(([k, v]): [string, string] => [k, String(v)])
        ).toString(),
        signal: controller.signal,
      });
    } finally {
      clearTimeout(timeoutId);
    }

    const durationMs = this.now() - started;
    const failure = responseError(response);

    await this.record({
      statusCode: response.status,
      durationMs,
      params,
      errorMessage: failure?.message,
    });

    if (failure) {
      if (failure instanceof AuthenticationError) {
        this.deps.tokens.invalidate();
      }
      this.deps.logger.warn(`API request failed: ${failure.message}`);
      throw failure;
    }

    const received = z.record(z.unknown()).parse(await response.json());
    const body = searchResponseSchema.parse(received);

    this.deps.logger.info("API response received", {
      total: body.total,
      items: body.elementList.length,
    });

    return {
      total: body.total,
      totalPages: body.totalPages,
      items: body.elementList,
      raw: received,
    };
  }

  private async rateLimit(): Promise<void> {
    const minIntervalMs = this.config.minIntervalMs ?? 1000;
    if (this.lastRequestAt !== undefined) {
      const elapsed = this.now() - this.lastRequestAt;
      if (elapsed < minIntervalMs) {
        await this.sleep(minIntervalMs - elapsed);
      }
    }
    this.lastRequestAt = this.now();
  }

  private async record(entry: {
    statusCode: number;
    durationMs: number;
    params: Record<string, string | number>;
    errorMessage?: string;
  }): Promise<void> {
    if (!this.deps.ledger) return;
    try {
      await this.deps.ledger.recordApiRequest({
        requestType: "search",
        endpoint: "/search",
        statusCode: entry.statusCode,
        durationMs: entry.durationMs,
        requestParams: entry.params,
        errorMessage: entry.errorMessage,
        jobId: this.deps.jobId,
      });
    } catch (error) {
      this.deps.logger.warn("Failed to track API request:", error);
    }
  }

  private sleep(ms: number): Promise<void> {
    return (this.deps.sleepFn ?? sleep)(ms);
  }

  private now(): number {
    return this.deps.now ? this.deps.now() : Date.now();
  }
}

export function toFormParams(
  query: SearchQuery
): Record<string, string | number> {
  const params: Record<string, string | number> = {
    operation: query.operation,
    propertyType: query.propertyType,
    locationId: query.locationId,
    maxItems: query.pageSize,
    numPage: query.page,
    order: query.order,
    sort: query.sort,
  };
  if (query.sinceDate) {
    params.sinceDate = query.sinceDate;
  }
  return params;
}

function responseError(response: Response): HttpError | undefined {
  if (response.status === 429) return new RateLimitError();
  if (response.status >= 500) return new ServerError(response.status);
  if (response.status === 401) {
    return new AuthenticationError(401, "API authentication failed");
  }
  if (!response.ok) {
    return new HttpError(
      response.status,
      `HTTP ${response.status}: ${response.statusText}`
    );
  }
  return undefined;
}
