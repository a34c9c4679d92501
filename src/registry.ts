import type { FormatRule, RegistryBaseType, UnitDef, UnitEntry } from './types.js';
import { FORMAT_RULES, UNIT_ENTRIES, freezeRules } from './units.js';

/**
 * UnitRegistry holds (1) the recognised unit keys and (2) the per-dimension formatting thresholds.
 * It is frozen once constructed.
 * @constructor rejects duplicate keys, non-positive multipliers and unordered format tables
 * @method lookup: case-insensitive unit lookup
 * @method has: whether a key is a known unit
 * @method entries: every registered unit in declaration order
 * @method formatRules: ascending threshold table for a dimension
 */
export class UnitRegistry {
  private readonly units: ReadonlyMap<string, UnitDef>;
  private readonly formats: Readonly<Record<RegistryBaseType, readonly FormatRule[]>>;

  constructor(
    entries: readonly UnitEntry[] = UNIT_ENTRIES,
    formats: Readonly<Record<RegistryBaseType, readonly FormatRule[]>> = FORMAT_RULES,
  ) {
    const units = new Map<string, UnitDef>();

    for (const { key, base, multiplier, displayName } of entries) {
      const normalizedKey = key.toLowerCase();
      if (!/^[a-z]+$/.test(normalizedKey)) {
        throw new Error(`Unit key "${key}" must consist of letters only`);
      }
      if (units.has(normalizedKey)) {
        throw new Error(`Duplicate unit key "${normalizedKey}"`);
      }
      if (!(multiplier > 0) || !Number.isFinite(multiplier)) {
        throw new Error(`Unit "${normalizedKey}" must have a positive multiplier, got ${multiplier}`);
      }
      units.set(normalizedKey, Object.freeze({ base, multiplier, displayName }));
    }

    // Copies are kept so later changes to the caller's tables have no effect
    const copyRules = (base: RegistryBaseType): readonly FormatRule[] => {
      const rules = formats[base];
      if (!rules.length) {
        throw new Error(`Format table for ${base} is empty`);
      }
      rules.forEach((rule, index) => {
        const previous = rules[index - 1];
        if (previous && previous.threshold >= rule.threshold) {
          throw new Error(`Format table for ${base} must be ascending by threshold`);
        }
      });
      return freezeRules(rules);
    }

    this.units = units;
    this.formats = Object.freeze({
      byte: copyRules('byte'),
      second: copyRules('second'),
      meter: copyRules('meter'),
      unit: copyRules('unit'),
    });
    Object.freeze(this);
  }

  lookup = (key: string): UnitDef | undefined => {
    return this.units.get(key.toLowerCase());
  }

  has = (key: string): boolean => {
    return this.units.has(key.toLowerCase());
  }

  entries = (): UnitEntry[] => {
    return Array.from(this.units, ([key, def]) => ({ key, ...def }));
  }

  formatRules = (base: RegistryBaseType): readonly FormatRule[] => {
    return this.formats[base];
  }
}

export const defaultRegistry = new UnitRegistry();
