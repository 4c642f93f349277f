import type {
  EstimateSection,
  TakeoffCategory,
  TakeoffEntry,
  TakeoffTotals,
  WireTotal,
} from '../types';
import { isBlank, parseNumericField } from './commonUtils';

/**
 * Number of shapes still owned by the entry. A shape is live exactly as
 * long as it sits in its entry's list.
 */
export const liveShapeCount = (entry: TakeoffEntry): number => entry.shapes.length;

/** Labor below zero counts as none */
export const entryLaborHours = (entry: TakeoffEntry): number =>
  liveShapeCount(entry) * Math.max(0, parseNumericField(entry.labor));

const wireTotalKey = (type: string, cableSpec: string, material: string): string =>
  JSON.stringify([type, cableSpec, material]);

const addWireLength = (totals: Map<string, WireTotal>, addition: WireTotal): void => {
  const key = wireTotalKey(addition.type, addition.cableSpec, addition.material);
  const existing = totals.get(key);
  if (existing) {
    existing.length += addition.length;
  } else {
    totals.set(key, { ...addition });
  }
};

/**
 * Wire length per (type, cable, material) for one category.
 * Entries without a positive length or without any live shape contribute nothing.
 */
export const wireSubtotals = (category: TakeoffCategory): WireTotal[] => {
  if (!category.wireEnabled) return [];

  const totals = new Map<string, WireTotal>();
  for (const entry of category.entries) {
    if (!entry.wire) continue;
    const unitLength = parseNumericField(entry.wire.length);
    if (unitLength <= 0) continue;
    const count = liveShapeCount(entry);
    if (count === 0) continue;
    addWireLength(totals, {
      type: entry.wire.type,
      cableSpec: entry.wire.cableSpec,
      material: entry.wire.material,
      length: unitLength * count,
    });
  }
  return Array.from(totals.values());
};

/**
 * Global totals across every category. Hours and points include every
 * category; devices and wire leave out non-counting categories.
 */
export const computeTotals = (categories: readonly TakeoffCategory[]): TakeoffTotals => {
  let totalHours = 0;
  let totalDeviceCount = 0;
  let totalPointCount = 0;
  const wire = new Map<string, WireTotal>();

  for (const category of categories) {
    for (const entry of category.entries) {
      const count = liveShapeCount(entry);
      totalHours += entryLaborHours(entry);
      totalPointCount += count;
      if (category.countsDevices) {
        totalDeviceCount += count;
      }
    }
    if (category.countsDevices) {
      wireSubtotals(category).forEach((subtotal) => addWireLength(wire, subtotal));
    }
  }

  return {
    totalHours,
    totalDeviceCount,
    totalPointCount,
    wireTotals: Array.from(wire.values()),
  };
};

/** "Totals: Count=3; Hours=4.50" line shown at the top of a category */
export const formatCategoryTotals = (category: TakeoffCategory): string => {
  const count = category.entries.reduce((sum, entry) => sum + liveShapeCount(entry), 0);
  const hours = category.entries.reduce((sum, entry) => sum + entryLaborHours(entry), 0);
  return `Totals: Count=${count}; Hours=${hours.toFixed(2)}`;
};

export const formatWireTotals = (wireTotals: readonly WireTotal[]): string => {
  if (wireTotals.length === 0) return 'Wire Totals: -';
  const parts = wireTotals.map(
    (total) => `${total.length.toFixed(2)} ${total.type}/${total.cableSpec} (${total.material})`
  );
  return `Wire Totals: ${parts.join('; ')}`;
};

export const formatSummary = (totals: TakeoffTotals): string[] => [
  `Total Hours: ${totals.totalHours.toFixed(2)}`,
  `Total Devices: ${totals.totalDeviceCount}`,
  `Total Points: ${totals.totalPointCount}`,
  formatWireTotals(totals.wireTotals),
];

/**
 * Spreadsheet sections in display order: one row per named entry.
 */
export const buildEstimateSections = (categories: readonly TakeoffCategory[]): EstimateSection[] =>
  categories.map((category) => ({
    category: category.name,
    rows: category.entries
      .filter((entry) => !isBlank(entry.name))
      .map((entry) => ({ name: entry.name.trim(), count: liveShapeCount(entry) })),
  }));
