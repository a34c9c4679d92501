import type { FormatRule, RegistryBaseType, UnitEntry } from './types.js';
import { DATA_BASE, TIME_BASE } from './utils.js';

// "b" and "m" belong to bytes and meters; the billion and million
// multipliers are only reachable through their full words.
const unitEntries: UnitEntry[] = [
  // Data (base: byte, steps of 1024)
  { key: 'b', base: 'byte', multiplier: 1, displayName: 'B' },
  { key: 'kb', base: 'byte', multiplier: DATA_BASE, displayName: 'KB' },
  { key: 'mb', base: 'byte', multiplier: DATA_BASE ** 2, displayName: 'MB' },
  { key: 'gb', base: 'byte', multiplier: DATA_BASE ** 3, displayName: 'GB' },
  { key: 'tb', base: 'byte', multiplier: DATA_BASE ** 4, displayName: 'TB' },
  { key: 'pb', base: 'byte', multiplier: DATA_BASE ** 5, displayName: 'PB' },

  // Large numbers (base: unit, powers of ten)
  { key: 'thousand', base: 'unit', multiplier: 1e3, displayName: '' },
  { key: 'k', base: 'unit', multiplier: 1e3, displayName: '' },
  { key: 'million', base: 'unit', multiplier: 1e6, displayName: '' },
  { key: 'billion', base: 'unit', multiplier: 1e9, displayName: '' },
  { key: 'trillion', base: 'unit', multiplier: 1e12, displayName: '' },
  { key: 't', base: 'unit', multiplier: 1e12, displayName: '' },

  // Time (base: second)
  { key: 'sec', base: 'second', multiplier: 1, displayName: 'sec' },
  { key: 'min', base: 'second', multiplier: TIME_BASE, displayName: 'min' },
  { key: 'hour', base: 'second', multiplier: TIME_BASE * 60, displayName: 'hr' },
  { key: 'day', base: 'second', multiplier: TIME_BASE * 60 * 24, displayName: 'day' },
  { key: 'week', base: 'second', multiplier: TIME_BASE * 60 * 24 * 7, displayName: 'wk' },

  // Length (base: meter)
  { key: 'mm', base: 'meter', multiplier: 1e-3, displayName: 'mm' },
  { key: 'cm', base: 'meter', multiplier: 1e-2, displayName: 'cm' },
  { key: 'm', base: 'meter', multiplier: 1, displayName: 'm' },
  { key: 'km', base: 'meter', multiplier: 1e3, displayName: 'km' },
  { key: 'inch', base: 'meter', multiplier: 0.0254, displayName: 'in' },
  { key: 'ft', base: 'meter', multiplier: 0.3048, displayName: 'ft' },
  { key: 'yd', base: 'meter', multiplier: 0.9144, displayName: 'yd' },
  { key: 'mile', base: 'meter', multiplier: 1609.34, displayName: 'mile' },
];

// Ascending by threshold
const formatRules: Record<RegistryBaseType, FormatRule[]> = {
  byte: [
    { threshold: 1, suffix: 'B' },
    { threshold: DATA_BASE, suffix: 'KB' },
    { threshold: DATA_BASE ** 2, suffix: 'MB' },
    { threshold: DATA_BASE ** 3, suffix: 'GB' },
    { threshold: DATA_BASE ** 4, suffix: 'TB' },
    { threshold: DATA_BASE ** 5, suffix: 'PB' },
  ],
  second: [
    { threshold: 1, suffix: 'seconds' },
    { threshold: TIME_BASE, suffix: 'minutes' },
    { threshold: TIME_BASE * 60, suffix: 'hours' },
    { threshold: TIME_BASE * 60 * 24, suffix: 'days' },
    { threshold: TIME_BASE * 60 * 24 * 7, suffix: 'weeks' },
  ],
  meter: [
    { threshold: 0.001, suffix: 'mm' },
    { threshold: 0.01, suffix: 'cm' },
    { threshold: 1, suffix: 'm' },
    { threshold: 1000, suffix: 'km' },
    { threshold: 1609.34, suffix: 'miles' },
  ],
  unit: [
    { threshold: 1, suffix: '' },
    { threshold: 1e3, suffix: 'thousand' },
    { threshold: 1e6, suffix: 'million' },
    { threshold: 1e9, suffix: 'billion' },
    { threshold: 1e12, suffix: 'trillion' },
  ],
};

export const REGISTRY_BASE_TYPES: readonly RegistryBaseType[] = Object.freeze(['byte', 'second', 'meter', 'unit'] as const);

export const freezeRules = (rules: readonly FormatRule[]): readonly FormatRule[] => {
  return Object.freeze(rules.map((rule) => Object.freeze({ ...rule })));
}

export const UNIT_ENTRIES: readonly UnitEntry[] = Object.freeze(unitEntries.map((entry) => Object.freeze(entry)));

export const FORMAT_RULES: Readonly<Record<RegistryBaseType, readonly FormatRule[]>> = Object.freeze({
  byte: freezeRules(formatRules.byte),
  second: freezeRules(formatRules.second),
  meter: freezeRules(formatRules.meter),
  unit: freezeRules(formatRules.unit),
});
