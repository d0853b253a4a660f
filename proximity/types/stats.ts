/**
 * Operator Statistics Types
 */

/**
 * Average distance from each antenna to the nearest other antenna of the same operator
 */
export interface OperatorSpacing {
  operator: string;
  antennaCount: number;
  averageNearestMeters: number;
}
