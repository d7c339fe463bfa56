// src/engine/schedule.ts
import type { Model } from "./schema";
import { memberLength } from "./geometry";

export const SCHEDULE_HEADER = ["ID", "Type", "Section", "Length", "Mass"] as const;

/**
 * Member takeoff table: one row per member with its length (model length units) and
 * mass (length x section area x material density). Mass is blank when the section or
 * its material cannot be resolved.
 */
export function computeMemberSchedule(model: Model): string[][] {
  const rows: string[][] = [[...SCHEDULE_HEADER]];

  for (const [id, m] of Object.entries(model.members)) {
    const a = model.nodes[m.node_A];
    const b = model.nodes[m.node_B];
    const L = a && b ? memberLength(a, b) : 0;
    const section = model.sections[m.section_id];
    const material = section ? model.materials[section.material_id] : undefined;
    const mass = section && material ? (L * section.area * material.density).toFixed(2) : "";
    rows.push([id, m.type, section?.name ?? m.section_id, L.toFixed(3), mass]);
  }
  return rows;
}

export interface ModelSummary {
  nodes: number;
  members: number;
  plates: number;
  supports: number;
  loads: number;
  loadCombinations: number;
  shearWalls: number;
  /** Every load group referenced by a load, sorted. */
  loadGroups: string[];
}

export function summarizeModel(model: Model): ModelSummary {
  const groups = new Set<string>();
  const loads = [
    ...Object.values(model.point_loads),
    ...Object.values(model.distributed_loads),
    ...Object.values(model.area_loads),
    ...Object.values(model.self_weight)
  ];
  for (const load of loads) groups.add(load.load_group);
  for (const wall of Object.values(model.shear_walls)) {
    for (const load of wall.loads) groups.add(load.load_group);
  }

  return {
    nodes: Object.keys(model.nodes).length,
    members: Object.keys(model.members).length,
    plates: Object.keys(model.plates).length,
    supports: Object.keys(model.supports).length,
    loads: loads.length,
    loadCombinations: Object.keys(model.load_combinations).length,
    shearWalls: Object.keys(model.shear_walls).length,
    loadGroups: [...groups].sort()
  };
}
