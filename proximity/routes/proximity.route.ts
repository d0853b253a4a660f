import { Express } from "express";
import { proximityService } from "../services/ProximityService.js";
import { toReportRows } from "../utils/exportUtils.js";
import { APIError } from "../utils/errorHandler.js";
import { GeoPoint } from "../utils/geoPoint.js";
import { isRecord, parseAntennas, parseOptionalNumber, parseOptionalString, parseParcels } from "../utils/router.js";
import type { RouteContext } from '../types/index.js';

const registerEndpoint = (app: Express, context: RouteContext) => {
  /**
   * Evaluate parcels against their nearest antenna.
   * Body antennas take precedence over the dataset loaded at startup.
   */
  app.post("/proximity/evaluate", (req, res, next) => {
    try {
      const body: unknown = req.body;
      if (!isRecord(body)) {
        throw new APIError("Request body must be a JSON object", 400);
      }

      const parcels = parseParcels(body.parcels);
      const antennas = body.antennas === undefined ? context.antennas : parseAntennas(body.antennas);
      const threshold = parseOptionalNumber(body.threshold, "threshold") ?? context.defaultThresholdMeters;
      const operator = parseOptionalString(body.operator, "operator");

      const results = proximityService.evaluate(parcels, antennas, threshold, { operator });

      res.json({
        data: toReportRows(results),
        threshold,
        totalCount: results.length,
        withinCount: results.filter((result) => result.withinThreshold).length,
      });
    } catch (error) {
      next(error);
    }
  });

  /**
   * Nearest antenna to a coordinate pair or a geocoded address
   */
  app.get("/proximity/nearest", async (req, res, next) => {
    try {
      const address = parseOptionalString(req.query.address, "address");
      const operator = parseOptionalString(req.query.operator, "operator");

      let point: GeoPoint;
      if (address !== undefined) {
        if (!context.geocoder) {
          throw new APIError("Address lookup is not enabled", 501);
        }
        point = await context.geocoder.geocode(address);
      } else {
        const latitude = parseOptionalNumber(req.query.latitude, "latitude");
        const longitude = parseOptionalNumber(req.query.longitude, "longitude");
        if (latitude === undefined || longitude === undefined) {
          throw new APIError("Provide latitude and longitude, or an address", 400);
        }
        point = new GeoPoint(latitude, longitude);
      }

      const nearest = proximityService.findNearest(point, context.antennas, { operator });

      res.json({
        data: {
          point: point.toJSON(),
          antenna: {
            id: nearest.antenna.id,
            operator: nearest.antenna.operator ?? null,
            ...nearest.antenna.location.toJSON(),
          },
          distanceMeters: nearest.distanceMeters,
        },
      });
    } catch (error) {
      next(error);
    }
  });
};

export default {
  id: "proximity",
  handler: registerEndpoint,
};
