import axios, { AxiosInstance, isAxiosError } from "axios";
import { GeoPoint } from "../utils/geoPoint.js";
import { APIError, GeocodingError, InvalidCoordinateError } from "../utils/errorHandler.js";
import { getProximityConfig } from "../utils/config.js";
import { getLogger } from "../utils/logger.js";
import type { GeocoderOptions, NominatimPlace } from '../types/index.js';

function isNominatimPlace(value: unknown): value is NominatimPlace {
  return typeof value === "object"
    && value !== null
    && typeof Reflect.get(value, "lat") === "string"
    && typeof Reflect.get(value, "lon") === "string";
}

/**
 * Resolves free-text addresses to coordinates through an OpenStreetMap
 * Nominatim endpoint.
 */
class GeocodingService {
  private client: AxiosInstance;

  constructor(options: GeocoderOptions = {}) {
    const config = getProximityConfig();
    this.client = options.client ?? axios.create({
      baseURL: options.baseURL ?? config.geocoderURL,
      timeout: options.timeoutMs ?? config.geocoderTimeoutMs,
      headers: {
        // Nominatim rejects requests without an identifying User-Agent
        "User-Agent": options.userAgent ?? config.geocoderUserAgent,
      },
    });
  }

  /**
   * Geocode an address to its best match
   * @throws GeocodingError (404) when nothing matches, (502) when the service fails or answers with bad coordinates
   */
  async geocode(address: string): Promise<GeoPoint> {
    const query = address.trim();
    if (!query) {
      throw new APIError("Address is required", 400);
    }

    let data: unknown;
    try {
      const response = await this.client.get("/search", {
        params: { q: query, format: "json", limit: 1 },
      });
      data = response.data;
    } catch (error) {
      const message = isAxiosError(error) || error instanceof Error ? error.message : String(error);
      throw new GeocodingError(`Geocoding service request failed: ${message}`, 502, { address: query });
    }

    const place: unknown = Array.isArray(data) ? data[0] : undefined;
    if (!isNominatimPlace(place)) {
      throw new GeocodingError(`Could not geocode address: ${query}`, 404, { address: query });
    }

    let point: GeoPoint;
    try {
      point = new GeoPoint(Number(place.lat), Number(place.lon), place.display_name ?? query);
    } catch (error) {
      if (error instanceof InvalidCoordinateError) {
        throw new GeocodingError(
          `Geocoding service returned invalid coordinates for: ${query}`,
          502,
          { address: query, lat: place.lat, lon: place.lon }
        );
      }
      throw error;
    }

    getLogger().debug({ address: query, latitude: point.latitude, longitude: point.longitude }, "Address geocoded");
    return point;
  }
}

export default GeocodingService;
