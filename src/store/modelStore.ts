// src/store/modelStore.ts
import { createStore } from "zustand/vanilla";
import { createModel } from "../engine/model";
import type {
  DistributedLoadInput,
  LoadCombinationInput,
  MaterialInput,
  MemberInput,
  Model,
  ModelInput,
  NodeInput,
  PlateInput,
  PointLoadInput,
  PressureInput,
  SectionInput,
  SelfWeightInput,
  ShearWallInput,
  SupportInput
} from "../engine/schema";

export interface EntityInputs {
  nodes: NodeInput;
  members: MemberInput;
  plates: PlateInput;
  materials: MaterialInput;
  sections: SectionInput;
  supports: SupportInput;
  point_loads: PointLoadInput;
  distributed_loads: DistributedLoadInput;
  area_loads: PressureInput;
  self_weight: SelfWeightInput;
  load_combinations: LoadCombinationInput;
  shear_walls: ShearWallInput;
}

export type Collection = keyof EntityInputs;

export type DraftEntities = { [C in Collection]: Readonly<Record<string, EntityInputs[C]>> };

export interface ModelDraft {
  settings?: ModelInput["settings"];
  load_cases?: ModelInput["load_cases"];
  entities: DraftEntities;
}

export type ModelStoreState = {
  draft: ModelDraft;

  load: (input: ModelInput) => void;
  reset: () => void;
  setSettings: (settings: ModelInput["settings"]) => void;
  upsert: <C extends Collection>(collection: C, key: string, entity: EntityInputs[C]) => void;
  remove: (collection: Collection, key: string) => void;
  rename: (collection: Collection, oldKey: string, newKey: string) => void;

  /** Next unused key of the form `${prefix}${n}`, e.g. "B3" after B1 and B2. */
  nextKey: (collection: Collection, prefix: string) => string;
  /** Validates the draft; throws ValidationError when it does not parse. */
  build: () => Model;

  // History for undo/redo
  history: ModelDraft[];
  future: ModelDraft[];
  undo: () => void;
  redo: () => void;
};

const emptyEntities = (): DraftEntities => ({
  nodes: {},
  members: {},
  plates: {},
  materials: {},
  sections: {},
  supports: {},
  point_loads: {},
  distributed_loads: {},
  area_loads: {},
  self_weight: {},
  load_combinations: {},
  shear_walls: {}
});

function draftFrom(input: ModelInput): ModelDraft {
  return {
    settings: input.settings,
    load_cases: input.load_cases,
    entities: {
      nodes: input.nodes ?? {},
      members: input.members ?? {},
      plates: input.plates ?? {},
      materials: input.materials ?? {},
      sections: input.sections ?? {},
      supports: input.supports ?? {},
      point_loads: input.point_loads ?? {},
      distributed_loads: input.distributed_loads ?? {},
      area_loads: input.area_loads ?? {},
      self_weight: input.self_weight ?? {},
      load_combinations: input.load_combinations ?? {},
      shear_walls: input.shear_walls ?? {}
    }
  };
}

function withEntries<C extends Collection>(
  draft: ModelDraft,
  collection: C,
  entries: Readonly<Record<string, EntityInputs[C]>>
): ModelDraft {
  return { ...draft, entities: { ...draft.entities, [collection]: entries } };
}

export function createModelStore(initial?: ModelInput) {
  return createStore<ModelStoreState>()((set, get) => {
    const commit = (update: (draft: ModelDraft) => ModelDraft | undefined) =>
      set((state) => {
        const next = update(state.draft);
        if (!next) return state;
        return { draft: next, history: [...state.history, state.draft], future: [] };
      });

    return {
      draft: initial ? draftFrom(initial) : { entities: emptyEntities() },
      history: [],
      future: [],

      load: (input) => commit(() => draftFrom(input)),
      reset: () => commit(() => ({ entities: emptyEntities() })),
      setSettings: (settings) => commit((draft) => ({ ...draft, settings })),

      upsert: (collection, key, entity) =>
        commit((draft) => withEntries(draft, collection, { ...draft.entities[collection], [key]: entity })),

      remove: (collection, key) =>
        commit((draft) => {
          if (!(key in draft.entities[collection])) return undefined;
          const entries = { ...draft.entities[collection] };
          delete entries[key];
          return withEntries(draft, collection, entries);
        }),

      // Keeps insertion order; references to the old key are not rewritten.
      rename: (collection, oldKey, newKey) =>
        commit((draft) => {
          const current = draft.entities[collection];
          if (!(oldKey in current) || newKey in current) return undefined;
          const entries: Record<string, EntityInputs[typeof collection]> = {};
          for (const key of Object.keys(current)) {
            entries[key === oldKey ? newKey : key] = current[key];
          }
          return withEntries(draft, collection, entries);
        }),

      nextKey: (collection, prefix) => {
        const nums = Object.keys(get().draft.entities[collection])
          .filter((k) => k.startsWith(prefix))
          .map((k) => Number(k.slice(prefix.length)))
          .filter((n) => Number.isInteger(n));
        const next = nums.length ? Math.max(...nums) + 1 : 1;
        return `${prefix}${next}`;
      },

      build: () => {
        const { settings, load_cases, entities } = get().draft;
        return createModel({ settings, load_cases, ...entities });
      },

      undo: () =>
        set((state) => {
          if (state.history.length === 0) return state;
          const prev = state.history[state.history.length - 1];
          return { draft: prev, history: state.history.slice(0, -1), future: [state.draft, ...state.future] };
        }),

      redo: () =>
        set((state) => {
          if (state.future.length === 0) return state;
          const [next, ...rest] = state.future;
          return { draft: next, history: [...state.history, state.draft], future: rest };
        })
    };
  });
}

export type ModelStore = ReturnType<typeof createModelStore>;
