/**
 * GBIF (Global Biodiversity Information Facility) species API client
 * https://techdocs.gbif.org/en/openapi/v1/species
 */

import type { HttpClient } from "../utils/http-client.js";
import { classifyHttpError } from "../utils/http-client.js";
import type { GbifSearchPage, GbifSearchParams } from "./types.js";
import type { RawRecord } from "../../types/data-model.js";
import { isRawRecord } from "../../types/data-model.js";
import { isHttpUrl } from "../../utils/config-loader.js";
import { ConfigError, FetchError } from "../../utils/errors.js";

export class GbifClient {
  private readonly baseUrl: string;

  constructor(
    private readonly http: HttpClient,
    baseUrl: string,
  ) {
    if (!isHttpUrl(baseUrl)) {
      throw new ConfigError(`Malformed GBIF base URL: "${baseUrl}"`, { baseUrl });
    }
    this.baseUrl = baseUrl.replace(/\/+$/, "");
  }

  /**
   * GET a GBIF resource and return its JSON object body
   *
   * @param subject - species name or class the request is for, carried by
   *   any FetchError
   */
  private async getObject(
    path: string,
    subject: string,
    params?: GbifSearchParams,
  ): Promise<RawRecord> {
    const url = `${this.baseUrl}${path}`;
    let data: unknown;
    try {
      const response = await this.http.get<unknown>(url, { params });
      data = response.data;
    } catch (err) {
      const failure = classifyHttpError(err);
      throw new FetchError(subject, `GBIF request ${url} failed: ${failure.message}`, {
        cause: err,
      });
    }

    if (!isRawRecord(data)) {
      throw new FetchError(subject, `GBIF response from ${url} is not a JSON object`);
    }
    return data;
  }

  /**
   * One page of `/species/search`
   */
  async searchSpecies(params: GbifSearchParams, subject: string): Promise<GbifSearchPage> {
    const body = await this.getObject("/species/search", subject, params);
    const results = Array.isArray(body.results) ? body.results.filter(isRawRecord) : [];
    return {
      results,
      endOfRecords: body.endOfRecords === true,
    };
  }

  /**
   * Full detail of one taxon by its usage key
   */
  async getSpecies(usageKey: number, subject: string): Promise<RawRecord> {
    return this.getObject(`/species/${usageKey}`, subject);
  }

  /**
   * Resolve a name to the usage key of its best search match
   */
  async resolveUsageKey(name: string): Promise<number> {
    const page = await this.searchSpecies({ q: name, limit: 1 }, name);
    const first = page.results[0];
    if (!first) {
      throw new FetchError(name, `No GBIF result for "${name}"`);
    }
    const key = first.key;
    if (typeof key !== "number" || !Number.isInteger(key)) {
      throw new FetchError(name, `GBIF result for "${name}" has no usage key`);
    }
    return key;
  }
}
