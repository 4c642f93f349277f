import { create } from 'zustand';
import type {
  Shape,
  TakeoffCategory,
  TakeoffEntry,
  TakeoffTotals,
  WireAttributes,
  WireTotal,
} from '../../types';
import {
  CABLE_SPECS,
  CATEGORY_DEFINITIONS,
  COLOR_NAMES,
  WIRE_MATERIALS,
  WIRE_TYPES,
} from '../../lib/takeoffOptions';
import { shapeEvents } from '../../lib/shapeEvents';
import { generateId } from '../../utils/commonUtils';
import { computeTotals, liveShapeCount, wireSubtotals } from '../../utils/takeoffTotals';

export type EntryUpdate = Partial<Pick<TakeoffEntry, 'name' | 'labor' | 'colorName' | 'notes'>>;

interface CategoryState {
  // State
  categories: TakeoffCategory[];
  /** Recomputed on every change to counts, labor or wire fields */
  totals: TakeoffTotals;

  // Actions
  addEntry: (categoryName: string) => TakeoffEntry;
  removeEntry: (categoryName: string, entryId: string) => void;
  clearCategory: (categoryName: string) => void;
  updateEntry: (entryId: string, updates: EntryUpdate) => void;
  updateWire: (entryId: string, updates: Partial<WireAttributes>) => void;
  attachShape: (entryId: string, shape: Shape) => boolean;
  detachShape: (shapeId: string) => Shape | null;
  /** Drop every shape (entries stay), used when another document is opened */
  clearShapes: () => void;
  reset: () => void;

  // Getters
  getCategory: (categoryName: string) => TakeoffCategory | undefined;
  getEntryById: (entryId: string) => TakeoffEntry | undefined;
  getEntryCount: (entryId: string) => number;
  findEntryForShape: (shapeId: string) => TakeoffEntry | undefined;
  getShapesOnPage: (pageIndex: number) => Shape[];
  getAllShapes: () => Shape[];
  getWireSubtotals: (categoryName: string) => WireTotal[];
}

const createInitialCategories = (): TakeoffCategory[] =>
  CATEGORY_DEFINITIONS.map((definition) => ({
    name: definition.name,
    wireEnabled: definition.wireEnabled,
    countsDevices: definition.countsDevices,
    entries: [],
  }));

const withTotals = (categories: TakeoffCategory[]) => ({
  categories,
  totals: computeTotals(categories),
});

const mapEntries = (
  categories: TakeoffCategory[],
  entryId: string,
  update: (entry: TakeoffEntry) => TakeoffEntry
): TakeoffCategory[] =>
  categories.map((category) =>
    category.entries.some((entry) => entry.id === entryId)
      ? {
          ...category,
          entries: category.entries.map((entry) => (entry.id === entryId ? update(entry) : entry)),
        }
      : category
  );

export const useCategoryStore = create<CategoryState>()((set, get) => ({
  // Initial state
  ...withTotals(createInitialCategories()),

  // Actions
  addEntry: (categoryName) => {
    const category = get().getCategory(categoryName);
    if (!category) {
      throw new Error(`Unknown takeoff category: ${categoryName}`);
    }

    const entry: TakeoffEntry = {
      id: generateId(),
      label: `Takeoff ${category.entries.length + 1}`,
      name: '',
      labor: '',
      colorName: COLOR_NAMES[0],
      notes: '',
      shapes: [],
    };
    if (category.wireEnabled) {
      entry.wire = { type: WIRE_TYPES[0], cableSpec: CABLE_SPECS[0], material: WIRE_MATERIALS[0], length: '' };
    }

    set((state) =>
      withTotals(
        state.categories.map((c) => (c.name === categoryName ? { ...c, entries: [...c.entries, entry] } : c))
      )
    );
    return entry;
  },

  removeEntry: (categoryName, entryId) => {
    const category = get().getCategory(categoryName);
    const entry = category?.entries.find((e) => e.id === entryId);
    if (!entry) return;

    // Each shape leaves the canvas with a deletion notice before the entry goes
    for (const shape of [...entry.shapes]) {
      shapeEvents.emit({ type: 'deleted', shape });
    }

    set((state) =>
      withTotals(
        state.categories.map((c) =>
          c.name === categoryName ? { ...c, entries: c.entries.filter((e) => e.id !== entryId) } : c
        )
      )
    );
    console.log(`🗑️ REMOVE_ENTRY: Removed ${entry.label} from ${categoryName} (${entry.shapes.length} shapes)`);
  },

  clearCategory: (categoryName) => {
    const category = get().getCategory(categoryName);
    if (!category) return;
    for (const entry of [...category.entries]) {
      get().removeEntry(categoryName, entry.id);
    }
  },

  updateEntry: (entryId, updates) => {
    set((state) => withTotals(mapEntries(state.categories, entryId, (entry) => ({ ...entry, ...updates }))));
  },

  updateWire: (entryId, updates) => {
    set((state) =>
      withTotals(
        mapEntries(state.categories, entryId, (entry) =>
          entry.wire ? { ...entry, wire: { ...entry.wire, ...updates } } : entry
        )
      )
    );
  },

  attachShape: (entryId, shape) => {
    if (!get().getEntryById(entryId)) {
      console.warn(`⚠️ ATTACH_SHAPE: Entry ${entryId} no longer exists, shape ${shape.id} dropped`);
      return false;
    }
    set((state) =>
      withTotals(mapEntries(state.categories, entryId, (entry) => ({ ...entry, shapes: [...entry.shapes, shape] })))
    );
    return true;
  },

  detachShape: (shapeId) => {
    const owner = get().findEntryForShape(shapeId);
    if (!owner) return null;
    const shape = owner.shapes.find((s) => s.id === shapeId) ?? null;
    set((state) =>
      withTotals(
        mapEntries(state.categories, owner.id, (entry) => ({
          ...entry,
          shapes: entry.shapes.filter((s) => s.id !== shapeId),
        }))
      )
    );
    return shape;
  },

  clearShapes: () => {
    set((state) =>
      withTotals(
        state.categories.map((category) => ({
          ...category,
          entries: category.entries.map((entry) => ({ ...entry, shapes: [] })),
        }))
      )
    );
  },

  reset: () => {
    set(withTotals(createInitialCategories()));
  },

  // Getters
  getCategory: (categoryName) => {
    return get().categories.find((category) => category.name === categoryName);
  },

  getEntryById: (entryId) => {
    for (const category of get().categories) {
      const entry = category.entries.find((e) => e.id === entryId);
      if (entry) return entry;
    }
    return undefined;
  },

  getEntryCount: (entryId) => {
    const entry = get().getEntryById(entryId);
    return entry ? liveShapeCount(entry) : 0;
  },

  findEntryForShape: (shapeId) => {
    for (const category of get().categories) {
      for (const entry of category.entries) {
        if (entry.shapes.some((shape) => shape.id === shapeId)) {
          return entry;
        }
      }
    }
    return undefined;
  },

  getShapesOnPage: (pageIndex) => {
    return get().getAllShapes().filter((shape) => shape.pageIndex === pageIndex);
  },

  getAllShapes: () => {
    return get().categories.flatMap((category) => category.entries.flatMap((entry) => entry.shapes));
  },

  getWireSubtotals: (categoryName) => {
    const category = get().getCategory(categoryName);
    return category ? wireSubtotals(category) : [];
  },
}));
