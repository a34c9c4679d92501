import type { BaseType, CalculationResult, FormatRule, Projection, UnitValue } from './types.js';
import { defaultRegistry, type UnitRegistry } from './registry.js';
import { PROJECTION_PERIODS } from './utils.js';

const BASE_LABELS: Record<BaseType, string> = {
  byte: 'bytes',
  second: 'seconds',
  meter: 'meters',
  unit: 'units',
  dataRate: 'bytes per second',
};

/**
 * Picks the largest threshold the magnitude reaches, scanning down from the top of an ascending table.
 * Magnitudes below every threshold are scaled by the smallest entry, not the base unit.
 */
export const formatWithRules = (value: number, rules: readonly FormatRule[]): string => {
  const magnitude = Math.abs(value);
  const rule = rules.slice().reverse().find(({ threshold }) => magnitude >= threshold) ?? rules[0];
  if (!rule) {
    return value.toFixed(3);
  }
  return `${(value / rule.threshold).toFixed(3)} ${rule.suffix}`;
}

export const formatBytes = (value: number, registry: UnitRegistry = defaultRegistry): string => {
  return formatWithRules(value, registry.formatRules('byte'));
}

export const formatBaseValue = ({ value, baseType }: UnitValue): string => {
  return `(${value.toFixed(0)} base ${BASE_LABELS[baseType]})`;
}

/**
 * Projects a bytes-per-second rate over each fixed period, in order: minute, hour, day, week
 */
export const projectDataRate = (bytesPerSecond: number, registry: UnitRegistry = defaultRegistry): Projection[] => {
  return PROJECTION_PERIODS.map(([period, seconds]) => ({
    period,
    formattedData: formatBytes(bytesPerSecond * seconds, registry),
  }));
}

/**
 * Renders an evaluated value for display. Data rates also carry their projections.
 */
export const formatResult = (result: UnitValue, registry: UnitRegistry = defaultRegistry): CalculationResult => {
  const baseValueDisplay = formatBaseValue(result);

  switch (result.baseType) {
    case 'dataRate':
      return {
        mainDisplay: `${formatBytes(result.value, registry)}/second`,
        baseValueDisplay,
        isDataRate: true,
        projections: projectDataRate(result.value, registry),
      };

    case 'unit':
      return { mainDisplay: result.value.toFixed(3), baseValueDisplay, isDataRate: false, projections: [] };

    case 'byte':
    case 'second':
    case 'meter':
      return {
        mainDisplay: formatWithRules(result.value, registry.formatRules(result.baseType)),
        baseValueDisplay,
        isDataRate: false,
        projections: [],
      };
  }
}
