/**
 * Operator (network carrier) name helpers
 */

import type { Antenna } from '../types/index.js';

export const UNKNOWN_OPERATOR = 'UNKNOWN';

// Common spellings mapped to the names used in the antenna registry
const OPERATOR_ALIASES: Record<string, string> = {
  'FREE': 'FREE MOBILE',
  'ORANGE FRANCE': 'ORANGE',
  'BOUYGUES': 'BOUYGUES TELECOM',
  'SFR FRANCE': 'SFR',
};

/**
 * Upper-case, collapse whitespace and resolve known aliases
 */
export function normalizeOperator(name: string): string {
  const upper = name.trim().replace(/\s+/g, ' ').toUpperCase();
  return OPERATOR_ALIASES[upper] ?? upper;
}

/**
 * Normalized operator of an antenna, or UNKNOWN when it has none
 */
export function operatorOf(antenna: Antenna): string {
  return antenna.operator ? normalizeOperator(antenna.operator) : UNKNOWN_OPERATOR;
}

/**
 * Sorted distinct operators present in the dataset
 */
export function listOperators(antennas: readonly Antenna[]): string[] {
  const operators = new Set<string>();
  for (const antenna of antennas) {
    if (antenna.operator) {
      operators.add(normalizeOperator(antenna.operator));
    }
  }
  return [...operators].sort();
}

export function filterByOperator(antennas: readonly Antenna[], operator: string): Antenna[] {
  const target = normalizeOperator(operator);
  return antennas.filter(antenna => antenna.operator !== undefined && normalizeOperator(antenna.operator) === target);
}

/**
 * Group antennas by normalized operator, preserving input order within each group
 */
export function groupByOperator(antennas: readonly Antenna[]): Map<string, Antenna[]> {
  const groups = new Map<string, Antenna[]>();
  for (const antenna of antennas) {
    const key = operatorOf(antenna);
    const group = groups.get(key);
    if (group) {
      group.push(antenna);
    } else {
      groups.set(key, [antenna]);
    }
  }
  return groups;
}
