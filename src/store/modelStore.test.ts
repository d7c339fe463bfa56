import { describe, it, expect } from "vitest";
import { createModelStore } from "./modelStore";
import { ValidationError } from "../engine/errors";

const beam = (a: number, b: number) => ({
  type: "beam",
  node_A: a,
  node_B: b,
  section_id: "W",
  fixity_A: "FFFFFF",
  fixity_B: "FFFFFF"
});

describe("model store", () => {
  it("builds a validated model from upserted entities", () => {
    const store = createModelStore();
    const { upsert } = store.getState();
    upsert("nodes", "1", { x: 0, y: 0, z: 0 });
    upsert("nodes", "2", { x: 5, y: 0, z: 0 });
    upsert("materials", "S", { name: "Steel", elasticity_modulus: 200000, density: 7850, poissons_ratio: 0.3 });
    upsert("sections", "W", { name: "W1", area: 0.01, Iz: 2e-4, Iy: 1e-4, material_id: "S" });
    upsert("members", "B1", beam(1, 2));
    upsert("load_combinations", "ULS", { name: "1.4D", criteria: "ULS", Dead: 1.4 });

    const model = store.getState().build();
    expect(Object.keys(model.nodes)).toEqual(["1", "2"]);
    expect(model.members.B1.node_B).toBe("2");
    expect([...model.load_combinations.ULS.factors]).toEqual([["Dead", 1.4]]);
  });

  it("undoes and redoes edits", () => {
    const store = createModelStore();
    store.getState().upsert("nodes", "1", { x: 0, y: 0, z: 0 });
    store.getState().upsert("nodes", "1", { x: 1, y: 0, z: 0 });
    expect(store.getState().draft.entities.nodes["1"]).toEqual({ x: 1, y: 0, z: 0 });

    store.getState().undo();
    expect(store.getState().draft.entities.nodes["1"]).toEqual({ x: 0, y: 0, z: 0 });
    store.getState().undo();
    expect(store.getState().draft.entities.nodes).toEqual({});
    store.getState().undo();
    expect(store.getState().history).toHaveLength(0);

    store.getState().redo();
    store.getState().redo();
    expect(store.getState().draft.entities.nodes["1"]).toEqual({ x: 1, y: 0, z: 0 });
    expect(store.getState().future).toHaveLength(0);
  });

  it("clears the redo stack on a new edit", () => {
    const store = createModelStore();
    store.getState().upsert("nodes", "1", { x: 0, y: 0, z: 0 });
    store.getState().undo();
    store.getState().upsert("nodes", "2", { x: 0, y: 0, z: 3 });
    expect(store.getState().future).toEqual([]);
    expect(Object.keys(store.getState().draft.entities.nodes)).toEqual(["2"]);
  });

  it("removes and renames entries, ignoring no-ops", () => {
    const store = createModelStore({ members: { B1: beam(1, 2), B2: beam(2, 3) } });
    const state = store.getState();

    state.remove("members", "B9");
    expect(store.getState().history).toHaveLength(0);

    state.rename("members", "B1", "B2");
    expect(store.getState().history).toHaveLength(0);

    state.rename("members", "B1", "B7");
    expect(Object.keys(store.getState().draft.entities.members)).toEqual(["B7", "B2"]);

    state.remove("members", "B2");
    expect(Object.keys(store.getState().draft.entities.members)).toEqual(["B7"]);
    expect(store.getState().history).toHaveLength(2);
  });

  it("replaces only the edited collection", () => {
    const store = createModelStore({ nodes: { 1: { x: 0, y: 0, z: 0 } }, members: { B1: beam(1, 2) } });
    const before = store.getState().draft.entities;

    store.getState().upsert("load_combinations", "ULS", { name: "1.2D", criteria: "ULS", Dead: 1.2 });
    store.getState().rename("nodes", "1", "N1");

    const after = store.getState().draft.entities;
    expect(after.members).toBe(before.members);
    expect(after.load_combinations).toEqual({ ULS: { name: "1.2D", criteria: "ULS", Dead: 1.2 } });
    expect(after.nodes).toEqual({ N1: { x: 0, y: 0, z: 0 } });
    expect(before.nodes).toEqual({ 1: { x: 0, y: 0, z: 0 } });
    expect(before.load_combinations).toEqual({});
  });

  it("suggests the next free key for a prefix", () => {
    const store = createModelStore({ members: { B1: beam(1, 2), B4: beam(2, 3), C1: beam(1, 3) } });
    expect(store.getState().nextKey("members", "B")).toBe("B5");
    expect(store.getState().nextKey("members", "C")).toBe("C2");
    expect(store.getState().nextKey("plates", "P")).toBe("P1");
  });

  it("raises ValidationError when the draft does not validate", () => {
    const store = createModelStore();
    store.getState().upsert("nodes", "1", { x: 0, y: 0, z: Number.NaN });
    expect(() => store.getState().build()).toThrow(ValidationError);
  });

  it("loads and resets whole models", () => {
    const store = createModelStore();
    store.getState().load({ nodes: { 1: { x: 0, y: 0, z: 0 } }, settings: { precision_values: 2 } });
    expect(store.getState().build().settings.precision_values).toBe(2);
    store.getState().reset();
    expect(store.getState().build().nodes).toEqual({});
    store.getState().undo();
    expect(Object.keys(store.getState().build().nodes)).toEqual(["1"]);
  });
});
