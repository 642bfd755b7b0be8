import { z } from "zod";
import { Logger } from "@listing-tracker/shared-utils";
import { ApiLedgerPort } from "../core/ports";
import { AuthenticationError, HttpError } from "./errors";

const tokenResponseSchema = z.object({
  access_token: z.string().min(1),
  expires_in: z.number().positive().default(3600),
});

export interface OAuthConfig {
  tokenUrl: string;
  apiKey: string;
  apiSecret: string;
  /** Renew this long before the token expires */
  refreshBufferMs?: number;
  timeoutMs?: number;
}

/**
 * OAuth2 client-credentials token, cached until shortly before expiry.
 */
export class OAuthTokenManager {
  private token?: string;
  private expiresAt = 0;

  constructor(
    private config: OAuthConfig,
    private deps: {
      logger?: Logger;
      ledger?: ApiLedgerPort;
      jobId?: string;
      fetchFn?: typeof fetch;
      now?: () => number;
    } = {}
  ) {}

  async getToken(): Promise<string> {
    const now = this.now();
    if (this.token && now < this.expiresAt) {
      return this.token;
    }
    return this.requestToken();
  }

  invalidate(): void {
    this.token = undefined;
    this.expiresAt = 0;
  }

  private async requestToken(): Promise<string> {
    const fetchFn = this.deps.fetchFn ?? fetch;
    const credentials = Buffer.from(
      `${this.config.apiKey}:${this.config.apiSecret}`
    ).toString("base64");

    const controller = new AbortController();
    const timeoutId = setTimeout(
      () => controller.abort(),
      this.config.timeoutMs ?? 30000
    );
    const started = this.now();

    this.deps.logger?.info("Requesting new OAuth2 token");

    try {
      const response = await fetchFn(this.config.tokenUrl, {
        method: "POST",
        headers: {
          Authorization: `Basic ${credentials}`,
          "Content-Type": "application/x-www-form-urlencoded",
        },
        body: new URLSearchParams({
          grant_type: "client_credentials",
          scope: "read",
        }).toString(),
        signal: controller.signal,
      });

      await this.record(response.status, this.now() - started);

      if (response.status === 401) {
        throw new AuthenticationError(401, "Invalid API credentials");
      }
      if (!response.ok) {
        throw new HttpError(
          response.status,
          `Token request failed: HTTP ${response.status}`
        );
      }

      const body = tokenResponseSchema.parse(await response.json());
      const bufferMs = this.config.refreshBufferMs ?? 300000;

      this.token = body.access_token;
      this.expiresAt = this.now() + body.expires_in * 1000 - bufferMs;

      return body.access_token;
    } finally {
      clearTimeout(timeoutId);
    }
  }

  private async record(statusCode: number, durationMs: number): Promise<void> {
    if (!this.deps.ledger) return;
    try {
      await this.deps.ledger.recordApiRequest({
        requestType: "oauth_token",
        endpoint: this.config.tokenUrl,
        statusCode,
        durationMs,
        jobId: this.deps.jobId,
      });
    } catch (error) {
      this.deps.logger?.warn("Failed to track API request:", error);
    }
  }

  private now(): number {
    return this.deps.now ? this.deps.now() : Date.now();
  }
}
