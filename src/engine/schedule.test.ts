import { beforeAll, describe, it, expect } from "vitest";
import { computeMemberSchedule, summarizeModel } from "./schedule";
import { createModel } from "./model";
import type { Model } from "./schema";
import { loadTwoStoreyModel } from "../samples/twoStorey";

describe("computeMemberSchedule", () => {
  let sample: Model;

  beforeAll(async () => {
    sample = await loadTwoStoreyModel();
  });

  it("lists length and mass per member", () => {
    const rows = computeMemberSchedule(sample);
    expect(rows).toHaveLength(17);
    expect(rows[0]).toEqual(["ID", "Type", "Section", "Length", "Mass"]);
    expect(rows[1]).toEqual(["C1_GF", "column", "HEB200_Column", "3.000", "183.69"]);
    expect(rows.find((r) => r[0] === "B1_F1")).toEqual(["B1_F1", "beam", "IPE300_Beam", "6.000", "249.63"]);
    expect(rows.find((r) => r[0] === "B2_F1")).toEqual(["B2_F1", "beam", "IPE300_Beam", "4.000", "166.42"]);
  });

  it("leaves mass blank when the section is unknown", () => {
    const model = createModel({
      nodes: { 1: { x: 0, y: 0, z: 0 }, 2: { x: 0, y: 0, z: 2.5 } },
      members: {
        C1: { type: "column", node_A: 1, node_B: 2, section_id: "X", fixity_A: "FFFFFF", fixity_B: "FFFFFF" }
      }
    });
    expect(computeMemberSchedule(model)[1]).toEqual(["C1", "column", "X", "2.500", ""]);
  });

  it("summarizes counts and load groups", () => {
    expect(summarizeModel(sample)).toEqual({
      nodes: 12,
      members: 16,
      plates: 2,
      supports: 4,
      loads: 25,
      loadCombinations: 3,
      shearWalls: 2,
      loadGroups: ["Dead", "Live", "Wind"]
    });
  });
});
