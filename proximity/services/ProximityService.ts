import { distance } from "../utils/distance.js";
import { APIError, NoAntennaDataError } from "../utils/errorHandler.js";
import { filterByOperator, listOperators } from "../utils/operatorUtils.js";
import { getLogger } from "../utils/logger.js";
import type {
  Antenna,
  Coordinates,
  NearestAntenna,
  Parcel,
  ProximityOptions,
  ProximityResult,
} from '../types/index.js';

/** Antennas closer together than this (meters) count as equidistant; the earlier one wins */
export const TIE_EPSILON_METERS = 1e-6;

/**
 * Nearest-antenna evaluation over in-memory datasets.
 * Every lookup is a linear scan; distances are in meters.
 */
class ProximityService {
  /**
   * Evaluate each parcel against its nearest antenna
   * @param thresholdMeters - inclusive proximity limit
   * @returns one result per parcel, in input order
   */
  evaluate(
    parcels: readonly Parcel[],
    antennas: readonly Antenna[],
    thresholdMeters: number,
    options: ProximityOptions = {}
  ): ProximityResult[] {
    if (!Number.isFinite(thresholdMeters) || thresholdMeters < 0) {
      throw new APIError("Threshold must be a non-negative number of meters", 400, { threshold: thresholdMeters });
    }

    const candidates = this.selectCandidates(antennas, options);

    const results = parcels.map((parcel) => {
      const nearest = this.scan(parcel.location, candidates);
      return {
        parcel,
        nearestAntenna: nearest.antenna,
        distanceMeters: nearest.distanceMeters,
        withinThreshold: nearest.distanceMeters <= thresholdMeters,
      };
    });

    getLogger().debug(
      {
        parcels: parcels.length,
        antennas: candidates.length,
        thresholdMeters,
        within: results.filter((result) => result.withinThreshold).length,
      },
      "Proximity evaluation complete"
    );

    return results;
  }

  /**
   * Nearest antenna to a single point
   */
  findNearest(point: Coordinates, antennas: readonly Antenna[], options: ProximityOptions = {}): NearestAntenna {
    return this.scan(point, this.selectCandidates(antennas, options));
  }

  private selectCandidates(antennas: readonly Antenna[], options: ProximityOptions): readonly Antenna[] {
    if (antennas.length === 0) {
      throw new NoAntennaDataError();
    }

    if (!options.operator) {
      return antennas;
    }

    const filtered = filterByOperator(antennas, options.operator);
    if (filtered.length === 0) {
      throw new NoAntennaDataError(options.operator, listOperators(antennas));
    }
    return filtered;
  }

  private scan(point: Coordinates, candidates: readonly Antenna[]): NearestAntenna {
    const [first, ...rest] = candidates;
    if (!first) {
      throw new NoAntennaDataError();
    }

    let best: NearestAntenna = { antenna: first, distanceMeters: distance(point, first.location) };
    for (const antenna of rest) {
      const meters = distance(point, antenna.location);
      if (meters < best.distanceMeters - TIE_EPSILON_METERS) {
        best = { antenna, distanceMeters: meters };
      }
    }
    return best;
  }
}

export const proximityService = new ProximityService();

/**
 * Functional form of ProximityService#evaluate
 */
export function evaluate(
  parcels: readonly Parcel[],
  antennas: readonly Antenna[],
  thresholdMeters: number,
  options?: ProximityOptions
): ProximityResult[] {
  return proximityService.evaluate(parcels, antennas, thresholdMeters, options);
}

export default ProximityService;
