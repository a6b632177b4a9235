/**
 * IP geolocation lookup over an ip-api style JSON endpoint.
 *
 * `lookup` never throws: transport errors, non-2xx responses, unexpected
 * bodies and `status != "success"` all resolve to null (degraded).
 */

import { z } from "zod";

export interface GeoMeta {
  country?: string;
  countryCode?: string;
  region?: string;
  regionName?: string;
}

export interface GeolocationClient {
  lookup(ip: string): Promise<GeoMeta | null>;
}

export const DEFAULT_GEO_ENDPOINT = "http://ip-api.com/json";

const GeoResponseSchema = z
  .object({
    status: z.string(),
    country: z.string().optional(),
    countryCode: z.string().optional(),
    region: z.string().optional(),
    regionName: z.string().optional(),
  })
  .passthrough();

type FetchLike = (url: string) => Promise<{
  ok: boolean;
  json(): Promise<unknown>;
}>;

export interface HttpGeolocationOptions {
  endpoint?: string;
  fetch?: FetchLike;
}

export function createHttpGeolocationClient(
  options: HttpGeolocationOptions = {},
): GeolocationClient {
  const endpoint = (options.endpoint ?? DEFAULT_GEO_ENDPOINT).replace(/\/+$/, "");
  const doFetch: FetchLike = options.fetch ?? ((url) => fetch(url));

  return {
    async lookup(ip: string): Promise<GeoMeta | null> {
      let body: unknown;
      try {
        const res = await doFetch(`${endpoint}/${encodeURIComponent(ip)}`);
        if (!res.ok) return null;
        body = await res.json();
      } catch {
        return null;
      }
      const parsed = GeoResponseSchema.safeParse(body);
      if (!parsed.success || parsed.data.status !== "success") return null;
      const { country, countryCode, region, regionName } = parsed.data;
      return { country, countryCode, region, regionName };
    },
  };
}
