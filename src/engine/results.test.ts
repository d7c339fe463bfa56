import { describe, it, expect } from "vitest";
import {
  createMemberResults,
  createNodalDisplacement,
  createNodalReaction,
  createPlateResults
} from "./resultFactories";
import {
  AnalysisResultsSchema,
  computeGlobalExtremes,
  getAllCombinations,
  getMaxDisplacementByCombo,
  getMaxMemberMomentByCombo,
  getMemberResults,
  getNodalDisplacement,
  getPlateResults,
  type LoadCombinationResults
} from "./results";
import { FakeMember, FakeModel, FakeNode } from "../testing/fakeSolver";
import type { SolverQuad } from "./solver";

describe("nodal result factories", () => {
  it("reads missing combination values as zero", () => {
    const node = new FakeNode("N1", 0, 0, 0);
    node.DZ.set("ULS", -0.004);
    node.RY.set("ULS", 0.001);
    expect(createNodalDisplacement(node, "ULS")).toEqual({
      load_combination: "ULS",
      element_id: "N1",
      node_id: "N1",
      displacement: { x: 0, y: 0, z: -0.004 },
      rotation: { x: 0, y: 0.001, z: 0 }
    });
  });

  it("groups reactions into force and moment vectors", () => {
    const node = new FakeNode("N1", 0, 0, 0);
    node.RxnFZ.set("SLS", 42);
    node.RxnMX.set("SLS", -3);
    const reaction = createNodalReaction(node, "SLS");
    expect(reaction.force).toEqual({ x: 0, y: 0, z: 42 });
    expect(reaction.moment).toEqual({ x: -3, y: 0, z: 0 });
  });
});

describe("createMemberResults", () => {
  it("splits end forces and reads every extremum", () => {
    const member = new FakeMember("M1", "1", "2", "S", "W", 0)
      .set("maxShear", "ULS", 6, "Fz")
      .set("minTorque", "ULS", -0.5)
      .set("maxDeflection", "ULS", 0.02, "dy");
    member.endForces.set("ULS", [1, 2, 3, 4, 5, 6, 7, 8, 9, 10, 11, 12]);

    const results = createMemberResults(member, "ULS");
    expect(results.member_id).toBe("M1");
    expect(results.shear_force_z).toEqual({
      load_combination: "ULS",
      element_id: "M1",
      member_id: "M1",
      direction: "Fz",
      max_shear: 6,
      min_shear: 0
    });
    expect(results.torque.min_torque).toBe(-0.5);
    expect(results.deflection_y.max_deflection).toBe(0.02);
    expect(results.end_forces.i_end_forces).toEqual({ x: 1, y: 2, z: 3 });
    expect(results.end_forces.i_end_moments).toEqual({ x: 4, y: 5, z: 6 });
    expect(results.end_forces.j_end_forces).toEqual({ x: 7, y: 8, z: 9 });
  });

  it("rejects a short end force vector", () => {
    const member = new FakeMember("M1", "1", "2", "S", "W", 0);
    member.endForces.set("ULS", [1, 2, 3]);
    expect(() => createMemberResults(member, "ULS")).toThrow(RangeError);
  });
});

describe("createPlateResults", () => {
  function quad() {
    const fe = new FakeModel();
    fe.addQuad("P1", "1", "2", "3", "4", 0.2, "C");
    const handle = fe.quads.get("P1");
    if (!handle) throw new Error("quad not registered");
    handle.stresses.set("ULS", [1.5, -2, 0.25]);
    handle.moments.set("ULS", [3, 4, -1]);
    return handle;
  }

  it("evaluates corners and centre in natural coordinates", () => {
    const results = createPlateResults(quad(), "ULS");
    expect(results.element_type).toBe("Quad");
    expect(Object.keys(results.corner_stresses)).toEqual(["i", "j", "m", "n"]);
    expect(results.corner_stresses.j).toEqual({ x: 1, y: -1, sx: 1.5, sy: -2, txy: 0.25 });
    expect(results.corner_moments.n).toEqual({ x: -1, y: 1, mx: 3, my: 4, mxy: -1 });
    expect(results.center_stress).toEqual({ x: 0, y: 0, sx: 1.5, sy: -2, txy: 0.25 });
  });

  it("reports rectangular elements as plates and omits missing evaluators", () => {
    const rect: SolverQuad = { name: "R1", type: "Rect" };
    const results = createPlateResults(rect, "ULS");
    expect(results.element_type).toBe("Plate");
    expect(results.corner_stresses).toEqual({});
    expect(results.corner_moments).toEqual({});
    expect(results.center_stress).toBeUndefined();
  });
});

describe("AnalysisResults accessors", () => {
  function combination(): LoadCombinationResults {
    const node = new FakeNode("2", 0, 0, 3);
    node.DX.set("ULS", 0.6);
    node.DY.set("ULS", 0.8);
    node.RxnFX.set("ULS", -3);
    node.RxnFY.set("ULS", 4);
    const member = new FakeMember("M1", "1", "2", "S", "W", 0)
      .set("maxAxial", "ULS", 20)
      .set("minShear", "ULS", -25, "Fz")
      .set("maxMoment", "ULS", 14, "Mz")
      .set("minMoment", "ULS", -16, "My");
    const fe = new FakeModel();
    fe.addQuad("P1", "1", "2", "3", "4", 0.2, "C");
    const plate = fe.quads.get("P1");
    plate?.stresses.set("ULS", [2, -7, 1]);

    return {
      combination_name: "ULS",
      nodal_displacements: { "2": createNodalDisplacement(node, "ULS") },
      nodal_reactions: { "2": createNodalReaction(node, "ULS") },
      member_results: { M1: createMemberResults(member, "ULS") },
      plate_results: plate ? { P1: createPlateResults(plate, "ULS") } : {},
      shear_wall_results: {}
    };
  }

  const results = () => {
    const uls = combination();
    return AnalysisResultsSchema.parse({
      analysis_summary: { analysis_type: "Linear", num_nodes: 1, num_members: 1, num_plates: 1, num_load_combinations: 1 },
      load_combination_results: { ULS: uls },
      ...computeGlobalExtremes({ ULS: uls })
    });
  };

  it("looks up records by id and combination", () => {
    const r = results();
    expect(getAllCombinations(r)).toEqual(["ULS"]);
    expect(getNodalDisplacement(r, "2", "ULS")?.displacement.y).toBe(0.8);
    expect(getMemberResults(r, "M1", "ULS")?.axial_force.max_axial).toBe(20);
    expect(getPlateResults(r, "P1", "ULS")?.plate_id).toBe("P1");
    expect(getNodalDisplacement(r, "2", "SLS")).toBeUndefined();
  });

  it("computes per-combination maxima", () => {
    const r = results();
    expect(getMaxDisplacementByCombo(r, "ULS")).toBe(Math.hypot(0.6, 0.8, 0));
    expect(getMaxMemberMomentByCombo(r, "ULS")).toBe(16);
    expect(getMaxDisplacementByCombo(r, "SLS")).toBeUndefined();
    expect(getMaxMemberMomentByCombo(r, "SLS")).toBeUndefined();
  });

  it("computes global extremes across all records", () => {
    const r = results();
    expect(r.global_max_reaction).toBe(5);
    expect(r.global_max_member_force).toBe(25);
    expect(r.global_max_member_moment).toBe(16);
    expect(r.global_max_plate_stress).toBe(7);
  });

  it("returns zeros when there are no combinations", () => {
    expect(computeGlobalExtremes({})).toEqual({
      global_max_displacement: 0,
      global_max_reaction: 0,
      global_max_member_force: 0,
      global_max_member_moment: 0,
      global_max_plate_stress: 0
    });
  });
});
