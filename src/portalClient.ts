import { GridSource } from "./availabilityEngine";
import { PortalConfig } from "./config";
import { errorMessage, FetchFailure } from "./errors";
import { logger } from "./logger";

const log = logger.child("portal");

/**
 * Thin HTTP client for the crewing portal. Login is handled outside; the
 * session cookie comes from configuration.
 */
export class PortalClient implements GridSource {
  constructor(private readonly config: PortalConfig) {}

  async fetchGrid(bookingDate: string): Promise<string> {
    log.debug(`Fetching availability grid for ${bookingDate}`);
    return this.request(`grid?date=${encodeURIComponent(bookingDate)}`, "text/html");
  }

  async fetchStationDisplay(): Promise<string> {
    log.debug("Fetching station display");
    return this.request("station-display", "text/html");
  }

  /** Raw roster payload; validate it with `parseRoster`. */
  async fetchRoster(): Promise<unknown> {
    log.debug("Fetching roster");
    const body = await this.request("roster", "application/json");
    try {
      return JSON.parse(body);
    } catch (error) {
      throw new FetchFailure(`Roster response is not JSON: ${errorMessage(error)}`, { cause: error });
    }
  }

  private async request(pathname: string, accept: string): Promise<string> {
    const base = this.config.baseUrl.endsWith("/") ? this.config.baseUrl : `${this.config.baseUrl}/`;
    const url = new URL(pathname, base);

    const headers: Record<string, string> = {
      Accept: accept,
      "User-Agent": this.config.userAgent,
    };
    if (this.config.sessionCookie) {
      headers.Cookie = this.config.sessionCookie;
    }

    let response: Response;
    try {
      response = await fetch(url, {
        headers,
        signal: AbortSignal.timeout(this.config.requestTimeoutMs),
      });
    } catch (error) {
      throw new FetchFailure(`Request to ${url.pathname} failed: ${errorMessage(error)}`, { cause: error });
    }

    if (!response.ok) {
      throw new FetchFailure(`Request to ${url.pathname} returned HTTP ${response.status}`);
    }

    return response.text();
  }
}
