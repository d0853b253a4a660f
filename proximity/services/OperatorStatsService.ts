import { distance } from "../utils/distance.js";
import { groupByOperator } from "../utils/operatorUtils.js";
import { getLogger } from "../utils/logger.js";
import type { Antenna, OperatorSpacing } from '../types/index.js';

/**
 * Per-operator antenna spacing: how far, on average, each antenna is from
 * the closest other antenna run by the same operator.
 */
class OperatorStatsService {
  computeSpacing(antennas: readonly Antenna[]): OperatorSpacing[] {
    const spacing: OperatorSpacing[] = [];

    for (const [operator, group] of groupByOperator(antennas)) {
      // A lone antenna has no neighbour to measure against
      if (group.length < 2) {
        continue;
      }

      let total = 0;
      for (let i = 0; i < group.length; i++) {
        total += this.nearestNeighbourDistance(group, i);
      }

      spacing.push({
        operator,
        antennaCount: group.length,
        averageNearestMeters: total / group.length,
      });
    }

    spacing.sort((a, b) => a.averageNearestMeters - b.averageNearestMeters || a.operator.localeCompare(b.operator));

    getLogger().debug({ operators: spacing.length }, "Operator spacing computed");
    return spacing;
  }

  private nearestNeighbourDistance(group: readonly Antenna[], index: number): number {
    const origin = group[index].location;
    let nearest = Infinity;
    for (let j = 0; j < group.length; j++) {
      if (j !== index) {
        nearest = Math.min(nearest, distance(origin, group[j].location));
      }
    }
    return nearest;
  }
}

export const operatorStatsService = new OperatorStatsService();

export default OperatorStatsService;
