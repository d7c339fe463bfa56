// Reshape populated solver handles into result records. No engineering happens here:
// every number is read straight off the handle and only regrouped into vectors.
import {
  MemberResultsSchema,
  NodalDisplacementSchema,
  NodalReactionSchema,
  PlateResultsSchema,
  ShearWallResultsSchema,
  type Corner,
  type CouplingBeamResult,
  type MemberResults,
  type NodalDisplacement,
  type NodalReaction,
  type PierResult,
  type PlateMoment,
  type PlateResults,
  type PlateStress,
  type ShearWallResults,
  type StoryStiffness,
  type Vector3D
} from "./results";
import type { ComboValues, ShearWallModel, SolverMember, SolverNode, SolverQuad } from "./solver";
import type { Logger } from "../utils/logger";

/** Lateral load the wall library applies to a story when computing its stiffness. */
export const STORY_TEST_FORCE = 100;

const CORNERS: ReadonlyArray<readonly [Corner, number, number]> = [
  ["i", -1, -1],
  ["j", 1, -1],
  ["m", 1, 1],
  ["n", -1, 1]
];

const read = (values: ComboValues, combo: string) => values.get(combo) ?? 0;
const vec = (x: number, y: number, z: number): Vector3D => ({ x, y, z });

export function createNodalDisplacement(node: SolverNode, combo: string): NodalDisplacement {
  return NodalDisplacementSchema.parse({
    load_combination: combo,
    element_id: node.name,
    node_id: node.name,
    displacement: vec(read(node.DX, combo), read(node.DY, combo), read(node.DZ, combo)),
    rotation: vec(read(node.RX, combo), read(node.RY, combo), read(node.RZ, combo))
  });
}

export function createNodalReaction(node: SolverNode, combo: string): NodalReaction {
  return NodalReactionSchema.parse({
    load_combination: combo,
    element_id: node.name,
    node_id: node.name,
    force: vec(read(node.RxnFX, combo), read(node.RxnFY, combo), read(node.RxnFZ, combo)),
    moment: vec(read(node.RxnMX, combo), read(node.RxnMY, combo), read(node.RxnMZ, combo))
  });
}

export function createMemberResults(member: SolverMember, combo: string): MemberResults {
  const base = { load_combination: combo, element_id: member.name, member_id: member.name };
  const f = member.f(combo);
  if (f.length < 12) {
    throw new RangeError(`member '${member.name}' returned ${f.length} end forces, expected 12`);
  }

  return MemberResultsSchema.parse({
    ...base,
    axial_force: { ...base, max_axial: member.maxAxial(combo), min_axial: member.minAxial(combo) },
    shear_force_y: {
      ...base,
      direction: "Fy",
      max_shear: member.maxShear("Fy", combo),
      min_shear: member.minShear("Fy", combo)
    },
    shear_force_z: {
      ...base,
      direction: "Fz",
      max_shear: member.maxShear("Fz", combo),
      min_shear: member.minShear("Fz", combo)
    },
    moment_y: {
      ...base,
      direction: "My",
      max_moment: member.maxMoment("My", combo),
      min_moment: member.minMoment("My", combo)
    },
    moment_z: {
      ...base,
      direction: "Mz",
      max_moment: member.maxMoment("Mz", combo),
      min_moment: member.minMoment("Mz", combo)
    },
    torque: { ...base, max_torque: member.maxTorque(combo), min_torque: member.minTorque(combo) },
    end_forces: {
      ...base,
      i_end_forces: vec(f[0], f[1], f[2]),
      i_end_moments: vec(f[3], f[4], f[5]),
      j_end_forces: vec(f[6], f[7], f[8]),
      j_end_moments: vec(f[9], f[10], f[11])
    },
    deflection_x: {
      ...base,
      direction: "dx",
      max_deflection: member.maxDeflection("dx", combo),
      min_deflection: member.minDeflection("dx", combo)
    },
    deflection_y: {
      ...base,
      direction: "dy",
      max_deflection: member.maxDeflection("dy", combo),
      min_deflection: member.minDeflection("dy", combo)
    },
    deflection_z: {
      ...base,
      direction: "dz",
      max_deflection: member.maxDeflection("dz", combo),
      min_deflection: member.minDeflection("dz", combo)
    }
  });
}

function stressAt(quad: SolverQuad, xi: number, eta: number, combo: string): PlateStress | undefined {
  if (!quad.membrane) return undefined;
  const [sx, sy, txy] = quad.membrane(xi, eta, true, combo);
  return { x: xi, y: eta, sx, sy, txy };
}

function momentAt(quad: SolverQuad, xi: number, eta: number, combo: string): PlateMoment | undefined {
  if (!quad.moment) return undefined;
  const [mx, my, mxy] = quad.moment(xi, eta, true, combo);
  return { x: xi, y: eta, mx, my, mxy };
}

export function createPlateResults(quad: SolverQuad, combo: string): PlateResults {
  const corner_stresses: Partial<Record<Corner, PlateStress>> = {};
  const corner_moments: Partial<Record<Corner, PlateMoment>> = {};

  for (const [corner, xi, eta] of CORNERS) {
    const stress = stressAt(quad, xi, eta, combo);
    if (stress) corner_stresses[corner] = stress;
    const moment = momentAt(quad, xi, eta, combo);
    if (moment) corner_moments[corner] = moment;
  }

  return PlateResultsSchema.parse({
    load_combination: combo,
    element_id: quad.name,
    plate_id: quad.name,
    element_type: quad.type === "Rect" ? "Plate" : "Quad",
    corner_stresses,
    corner_moments,
    center_stress: stressAt(quad, 0, 0, combo),
    center_moment: momentAt(quad, 0, 0, combo)
  });
}

function storyStiffness(wall: ShearWallModel, story: string, log?: Logger): StoryStiffness {
  try {
    const stiffness = wall.stiffness(story);
    return {
      story_name: story,
      stiffness,
      test_force: STORY_TEST_FORCE,
      max_displacement: stiffness > 0 ? STORY_TEST_FORCE / stiffness : 0
    };
  } catch (error) {
    log?.caught("story stiffness unavailable, reporting 0", error, { operation: "storyStiffness", entity: story });
    return { story_name: story, stiffness: 0, test_force: STORY_TEST_FORCE, max_displacement: 0 };
  }
}

export function createShearWallResults(
  wall: ShearWallModel,
  wallId: string,
  combo: string,
  log?: Logger
): ShearWallResults {
  const piers: Record<string, PierResult> = {};
  for (const [pierId, pier] of wall.piers) {
    const [P, M, V, ratio] = pier.sumForces(combo);
    piers[pierId] = {
      pier_id: pierId,
      x_position: pier.x,
      y_position: pier.y,
      width: pier.width,
      height: pier.height,
      axial_force: P,
      shear_force: V,
      moment: M,
      shear_span_ratio: ratio
    };
  }

  const coupling_beams: Record<string, CouplingBeamResult> = {};
  for (const [beamId, beam] of wall.couplingBeams) {
    const [P, M, V, ratio] = beam.sumForces(combo);
    coupling_beams[beamId] = {
      beam_id: beamId,
      x_position: beam.x,
      y_position: beam.y,
      length: beam.length,
      height: beam.height,
      axial_force: P,
      shear_force: V,
      moment: M,
      shear_span_ratio: ratio
    };
  }

  const story_stiffness: Record<string, StoryStiffness> = {};
  for (const story of wall.stories) {
    story_stiffness[story] = storyStiffness(wall, story, log);
  }

  return ShearWallResultsSchema.parse({
    wall_id: wallId,
    load_combination: combo,
    wall_length: wall.length,
    wall_height: wall.height,
    piers,
    coupling_beams,
    story_stiffness
  });
}
