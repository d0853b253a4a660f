import type { Express } from "express";
import { APIError } from "./errorHandler.js";
import { GeoPoint, assertValidCoordinate } from "./geoPoint.js";
import { getLogger } from "./logger.js";
import type { Antenna, CoordinateField, Parcel, RouteContext, RouteModule } from '../types/index.js';

export const registerRoutes = (app: Express, context: RouteContext, modules: readonly RouteModule[]): void => {
  for (const routeModule of modules) {
    routeModule.handler(app, context);
    getLogger().debug(`Loaded System Route: ${routeModule.id}`);
  }
};

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Optional numeric parameter from a query string or JSON body
 */
export const parseOptionalNumber = (value: unknown, name: string): number | undefined => {
  if (value === undefined || value === null || value === "") {
    return undefined;
  }
  const num = typeof value === "string" ? Number(value) : value;
  if (typeof num !== "number" || !Number.isFinite(num)) {
    throw new APIError(`${name} must be a number`, 400, { [name]: value });
  }
  return num;
};

export const parseOptionalString = (value: unknown, name: string): string | undefined => {
  if (value === undefined || value === null || value === "") {
    return undefined;
  }
  if (typeof value !== "string") {
    throw new APIError(`${name} must be a string`, 400, { [name]: value });
  }
  return value;
};

const coordinateFrom = (item: Record<string, unknown>, field: CoordinateField, identifier: string): number => {
  const raw = item[field];
  const value = typeof raw === "string" && raw.trim() !== "" ? Number(raw) : raw;
  assertValidCoordinate(field, value, identifier);
  return value;
};

interface PointInput {
  id: string;
  location: GeoPoint;
  item: Record<string, unknown>;
}

const parsePointList = (value: unknown, name: string): PointInput[] => {
  if (!Array.isArray(value)) {
    throw new APIError(`${name} must be an array`, 400);
  }

  return value.map((item: unknown, index) => {
    if (!isRecord(item)) {
      throw new APIError(`${name}[${index}] must be an object`, 400);
    }
    const rawId = item.id;
    const id = typeof rawId === "string" || typeof rawId === "number" ? String(rawId) : `${name}-${index}`;
    const latitude = coordinateFrom(item, "latitude", id);
    const longitude = coordinateFrom(item, "longitude", id);
    return { id, location: new GeoPoint(latitude, longitude, id), item };
  });
};

/**
 * Parcels from a request body: [{ id, latitude, longitude, ...metadata }]
 */
export const parseParcels = (value: unknown): Parcel[] =>
  parsePointList(value, "parcels").map(({ id, location, item }) => ({
    id,
    location,
    metadata: stringMetadata(item),
  }));

/**
 * Antennas from a request body: [{ id, latitude, longitude, operator?, ...metadata }]
 */
export const parseAntennas = (value: unknown): Antenna[] =>
  parsePointList(value, "antennas").map(({ id, location, item }) => {
    const operator = typeof item.operator === "string" && item.operator ? item.operator : undefined;
    const metadata = stringMetadata(item);
    return operator ? { id, location, operator, metadata } : { id, location, metadata };
  });

const RESERVED_KEYS = new Set(["id", "latitude", "longitude", "operator"]);

function stringMetadata(item: Record<string, unknown>): Record<string, string> {
  const metadata: Record<string, string> = {};
  for (const [key, value] of Object.entries(item)) {
    if (!RESERVED_KEYS.has(key) && (typeof value === "string" || typeof value === "number" || typeof value === "boolean")) {
      metadata[key] = String(value);
    }
  }
  return metadata;
}
