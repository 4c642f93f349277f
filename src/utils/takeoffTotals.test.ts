import { describe, it, expect } from 'vitest';
import type { RectangleShape, TakeoffCategory, TakeoffEntry, WireAttributes } from '../types';
import {
  liveShapeCount,
  wireSubtotals,
  computeTotals,
  formatCategoryTotals,
  formatWireTotals,
  formatSummary,
  buildEstimateSections,
} from './takeoffTotals';

let nextId = 0;

const makeShape = (): RectangleShape => ({
  id: `shape-${nextId++}`,
  kind: 'rectangle',
  pageIndex: 0,
  geometry: { x0: 0, y0: 0, x1: 10, y1: 10 },
  color: { r: 1, g: 0, b: 0 },
  opacity: 1,
});

const makeEntry = (
  name: string,
  count: number,
  labor: string,
  wire?: Partial<WireAttributes>
): TakeoffEntry => ({
  id: `entry-${nextId++}`,
  label: 'Takeoff',
  name,
  labor,
  colorName: 'Red',
  notes: '',
  wire: wire ? { type: 'NMD', cableSpec: '14-2', material: 'CU', length: '0', ...wire } : undefined,
  shapes: Array.from({ length: count }, makeShape),
});

const makeCategory = (
  name: string,
  entries: TakeoffEntry[],
  options: { wireEnabled?: boolean; countsDevices?: boolean } = {}
): TakeoffCategory => ({
  name,
  wireEnabled: options.wireEnabled ?? true,
  countsDevices: options.countsDevices ?? true,
  entries,
});

describe('takeoffTotals', () => {
  describe('liveShapeCount', () => {
    it('counts the shapes an entry owns', () => {
      expect(liveShapeCount(makeEntry('Switch', 3, '1'))).toBe(3);
      expect(liveShapeCount(makeEntry('Switch', 0, '1'))).toBe(0);
    });
  });

  describe('wireSubtotals', () => {
    it('merges entries sharing the same type, cable and material', () => {
      const category = makeCategory('General', [
        makeEntry('A', 2, '0', { length: '10' }),
        makeEntry('B', 1, '0', { length: '5.5' }),
        makeEntry('C', 4, '0', { length: '2', material: 'AL' }),
      ]);
      expect(wireSubtotals(category)).toEqual([
        { type: 'NMD', cableSpec: '14-2', material: 'CU', length: 25.5 },
        { type: 'NMD', cableSpec: '14-2', material: 'AL', length: 8 },
      ]);
    });

    it('skips zero, negative, unparsable lengths and entries without shapes', () => {
      const category = makeCategory('General', [
        makeEntry('A', 2, '0', { length: '0' }),
        makeEntry('B', 2, '0', { length: '-4' }),
        makeEntry('C', 2, '0', { length: 'ten' }),
        makeEntry('D', 0, '0', { length: '12' }),
      ]);
      expect(wireSubtotals(category)).toEqual([]);
    });

    it('returns nothing for categories without wire', () => {
      const category = makeCategory('Demo', [makeEntry('A', 2, '0', { length: '10' })], { wireEnabled: false });
      expect(wireSubtotals(category)).toEqual([]);
    });
  });

  describe('computeTotals', () => {
    const general = makeCategory('General', [
      makeEntry('Switch', 3, '1.5', { length: '10' }),
      makeEntry('Outlet', 2, 'abc', { length: '4', cableSpec: '12-2' }),
    ]);
    const lighting = makeCategory('Lighting', [makeEntry('Fixture', 4, '0.25', { length: '2' })]);
    const demo = makeCategory('Demo', [makeEntry('Remove', 5, '0.5')], { wireEnabled: false, countsDevices: false });

    it('sums hours and points everywhere and devices outside demolition', () => {
      const totals = computeTotals([general, lighting, demo]);
      expect(totals.totalHours).toBe(3 * 1.5 + 2 * 0 + 4 * 0.25 + 5 * 0.5);
      expect(totals.totalDeviceCount).toBe(9);
      expect(totals.totalPointCount).toBe(14);
    });

    it('merges wire subtotals across categories', () => {
      const totals = computeTotals([general, lighting, demo]);
      expect(totals.wireTotals).toEqual([
        { type: 'NMD', cableSpec: '14-2', material: 'CU', length: 38 },
        { type: 'NMD', cableSpec: '12-2', material: 'CU', length: 8 },
      ]);
    });

    it('leaves wire of non-counting categories out', () => {
      const wiredDemo = makeCategory('Demo', [makeEntry('Remove', 2, '0', { length: '3' })], {
        wireEnabled: true,
        countsDevices: false,
      });
      expect(computeTotals([wiredDemo]).wireTotals).toEqual([]);
    });

    it('does not depend on category or entry order', () => {
      const forward = computeTotals([general, lighting, demo]);
      const reversedGeneral = makeCategory('General', [...general.entries].reverse());
      const backward = computeTotals([demo, lighting, reversedGeneral]);
      const byKey = (a: { cableSpec: string }, b: { cableSpec: string }) => a.cableSpec.localeCompare(b.cableSpec);

      expect(backward.totalHours).toBe(forward.totalHours);
      expect(backward.totalDeviceCount).toBe(forward.totalDeviceCount);
      expect(backward.totalPointCount).toBe(forward.totalPointCount);
      expect([...backward.wireTotals].sort(byKey)).toEqual([...forward.wireTotals].sort(byKey));
    });

    it('treats negative labor as no labor', () => {
      const adjusted = makeCategory('General', [makeEntry('Credit', 4, '-2'), makeEntry('Switch', 2, '1.5')]);
      expect(computeTotals([adjusted]).totalHours).toBe(3);
    });

    it('returns zeros for an empty ledger', () => {
      expect(computeTotals([])).toEqual({ totalHours: 0, totalDeviceCount: 0, totalPointCount: 0, wireTotals: [] });
    });
  });

  describe('formatting', () => {
    it('formats the category totals line', () => {
      const category = makeCategory('General', [makeEntry('Switch', 3, '1.5'), makeEntry('', 1, '2')]);
      expect(formatCategoryTotals(category)).toBe('Totals: Count=4; Hours=6.50');
    });

    it('formats wire totals', () => {
      expect(formatWireTotals([])).toBe('Wire Totals: -');
      expect(
        formatWireTotals([
          { type: 'NMD', cableSpec: '14-2', material: 'CU', length: 12 },
          { type: 'AC90', cableSpec: '12-3', material: 'AL', length: 3.456 },
        ])
      ).toBe('Wire Totals: 12.00 NMD/14-2 (CU); 3.46 AC90/12-3 (AL)');
    });

    it('formats the summary lines', () => {
      expect(
        formatSummary({ totalHours: 2.5, totalDeviceCount: 7, totalPointCount: 9, wireTotals: [] })
      ).toEqual(['Total Hours: 2.50', 'Total Devices: 7', 'Total Points: 9', 'Wire Totals: -']);
    });
  });

  describe('buildEstimateSections', () => {
    it('keeps every named entry, including zero counts, and skips unnamed ones', () => {
      const sections = buildEstimateSections([
        makeCategory('General', [makeEntry('Switch', 3, '1.5'), makeEntry('Outlet', 0, '0'), makeEntry('  ', 2, '1')]),
        makeCategory('Lighting', [makeEntry(' Panel ', 1, '2')]),
      ]);
      expect(sections).toEqual([
        {
          category: 'General',
          rows: [
            { name: 'Switch', count: 3 },
            { name: 'Outlet', count: 0 },
          ],
        },
        { category: 'Lighting', rows: [{ name: 'Panel', count: 1 }] },
      ]);
    });
  });
});
