import { Express } from "express";
import { coverageService } from "../services/CoverageService.js";
import { operatorStatsService } from "../services/OperatorStatsService.js";
import { parseOptionalNumber, parseOptionalString } from "../utils/router.js";
import type { RouteContext } from '../types/index.js';

const registerEndpoint = (app: Express, context: RouteContext) => {
  app.get("/antennas/summary", (req, res, next) => {
    try {
      res.json({ data: coverageService.summarize(context.antennas) });
    } catch (error) {
      next(error);
    }
  });

  // Average nearest-neighbour spacing per operator, closest first
  app.get("/antennas/spacing", (req, res, next) => {
    try {
      const data = operatorStatsService.computeSpacing(context.antennas);
      res.json({ data, totalCount: data.length });
    } catch (error) {
      next(error);
    }
  });

  app.get("/antennas/coverage", (req, res, next) => {
    try {
      const grid = coverageService.findLowCoverageCells(context.antennas, {
        cellSizeDegrees: parseOptionalNumber(req.query.cellSize, "cellSize"),
        percentile: parseOptionalNumber(req.query.percentile, "percentile"),
        operator: parseOptionalString(req.query.operator, "operator"),
      });
      res.json({ data: grid });
    } catch (error) {
      next(error);
    }
  });
};

export default {
  id: "antennas",
  handler: registerEndpoint,
};
