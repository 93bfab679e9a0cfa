import type { FetchLike } from '../lib/types';
import { logDebug, logWarn } from '../lib/logger';
import type { ServiceConfig } from './_config';

/**
 * Turns a coordinate into a human-readable place name, or null when none is known.
 */
export interface PlaceNameLookup {
  lookup(lat: number, lon: number): Promise<string | null>;
}

interface NominatimAddress {
  city?: string;
  town?: string;
  village?: string;
  municipality?: string;
  county?: string;
  state?: string;
  country?: string;
}

export interface NominatimResponse {
  address?: NominatimAddress;
  display_name?: string;
}

interface GeocoderDeps {
  fetch: FetchLike;
  sleep: (ms: number) => Promise<void>;
  now: () => number;
}

const PLACE_PREFERENCE: readonly (keyof NominatimAddress)[] = [
  'city',
  'town',
  'village',
  'municipality',
  'county',
  'state',
  'country',
];

/**
 * Pick the most useful place name from a Nominatim reverse lookup.
 * Settlements get their state (or country) appended for context.
 */
export function pickPlaceName(data: NominatimResponse): string | null {
  const address = data.address ?? {};

  const key = PLACE_PREFERENCE.find(k => address[k]);
  if (key) {
    const name = address[key] ?? '';
    const isSettlement = key === 'city' || key === 'town' || key === 'village';
    if (isSettlement) {
      const context = address.state || address.country;
      if (context) return `${name}, ${context}`;
    }
    return name;
  }

  // Most specific part of the display name
  const first = data.display_name?.split(',')[0].trim();
  return first || null;
}

function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}

/**
 * Reverse geocoder backed by Nominatim (OpenStreetMap).
 *
 * Requests are serialized and spaced at least geocodeIntervalMs apart, as the
 * public Nominatim instance allows one request per second. Failures are
 * logged and reported as null.
 */
export class NominatimGeocoder implements PlaceNameLookup {
  private deps: GeocoderDeps;
  private nextRequestAt = 0;
  private queue: Promise<unknown> = Promise.resolve();

  constructor(
    private config: Pick<ServiceConfig, 'nominatimUrl' | 'geocoderUserAgent' | 'geocodeIntervalMs' | 'geocodeTimeoutMs'>,
    deps: Partial<GeocoderDeps> = {}
  ) {
    this.deps = {
      fetch: deps.fetch ?? globalThis.fetch.bind(globalThis),
      sleep: deps.sleep ?? sleep,
      now: deps.now ?? Date.now,
    };
  }

  lookup(lat: number, lon: number): Promise<string | null> {
    const result = this.queue.then(() => this.throttledLookup(lat, lon));
    this.queue = result;
    return result;
  }

  private async throttledLookup(lat: number, lon: number): Promise<string | null> {
    const wait = this.nextRequestAt - this.deps.now();
    if (wait > 0) {
      await this.deps.sleep(wait);
    }

    try {
      return await this.request(lat, lon);
    } catch (error) {
      logWarn('geocode', `Reverse geocoding failed for ${lat},${lon}`, {
        error: error instanceof Error ? error.message : String(error),
      });
      return null;
    } finally {
      this.nextRequestAt = this.deps.now() + this.config.geocodeIntervalMs;
    }
  }

  private async request(lat: number, lon: number): Promise<string | null> {
    const params = new URLSearchParams({
      lat: String(lat),
      lon: String(lon),
      format: 'json',
      addressdetails: '1',
    });

    logDebug('geocode', `Reverse geocoding ${lat},${lon}`);
    const response = await this.deps.fetch(`${this.config.nominatimUrl}?${params}`, {
      headers: { 'User-Agent': this.config.geocoderUserAgent },
      signal: AbortSignal.timeout(this.config.geocodeTimeoutMs),
    });

    if (!response.ok) {
      throw new Error(`Nominatim error: ${response.status}`);
    }

    const data: NominatimResponse = await response.json();
    return pickPlaceName(data);
  }
}
