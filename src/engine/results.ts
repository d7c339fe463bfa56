import { z } from "zod";

// Values read back from the solver may be NaN, e.g. a shear span ratio under zero shear.
const solverValue = z.number().or(z.nan());

export const Vector3DSchema = z.object({
  x: solverValue,
  y: solverValue,
  z: solverValue
}).readonly();

const BaseResult = z.object({
  load_combination: z.string(),
  element_id: z.string()
});

// === Nodal results ===

export const NodalDisplacementSchema = BaseResult.extend({
  node_id: z.string(),
  displacement: Vector3DSchema, // DX, DY, DZ
  rotation: Vector3DSchema // RX, RY, RZ
}).readonly();

export const NodalReactionSchema = BaseResult.extend({
  node_id: z.string(),
  force: Vector3DSchema,
  moment: Vector3DSchema
}).readonly();

// === Member results ===

const MemberResult = BaseResult.extend({ member_id: z.string() });

export const MemberAxialForceSchema = MemberResult.extend({
  max_axial: solverValue,
  min_axial: solverValue
}).readonly();

export const MemberShearForceSchema = MemberResult.extend({
  direction: z.enum(["Fy", "Fz"]),
  max_shear: solverValue,
  min_shear: solverValue
}).readonly();

export const MemberMomentSchema = MemberResult.extend({
  direction: z.enum(["My", "Mz"]),
  max_moment: solverValue,
  min_moment: solverValue
}).readonly();

export const MemberTorqueSchema = MemberResult.extend({
  max_torque: solverValue,
  min_torque: solverValue
}).readonly();

export const MemberEndForcesSchema = MemberResult.extend({
  i_end_forces: Vector3DSchema,
  i_end_moments: Vector3DSchema,
  j_end_forces: Vector3DSchema,
  j_end_moments: Vector3DSchema
}).readonly();

export const MemberDeflectionSchema = MemberResult.extend({
  direction: z.enum(["dx", "dy", "dz"]),
  max_deflection: solverValue,
  min_deflection: solverValue
}).readonly();

export const MemberResultsSchema = MemberResult.extend({
  axial_force: MemberAxialForceSchema,
  shear_force_y: MemberShearForceSchema,
  shear_force_z: MemberShearForceSchema,
  moment_y: MemberMomentSchema,
  moment_z: MemberMomentSchema,
  torque: MemberTorqueSchema,
  end_forces: MemberEndForcesSchema,
  deflection_x: MemberDeflectionSchema,
  deflection_y: MemberDeflectionSchema,
  deflection_z: MemberDeflectionSchema
}).readonly();

// === Plate results ===

// x, y are the natural coordinates (xi, eta) the value was evaluated at
export const PlateStressSchema = z.object({
  x: z.number(),
  y: z.number(),
  sx: solverValue,
  sy: solverValue,
  txy: solverValue
}).readonly();

export const PlateMomentSchema = z.object({
  x: z.number(),
  y: z.number(),
  mx: solverValue,
  my: solverValue,
  mxy: solverValue
}).readonly();

export const CornerSchema = z.enum(["i", "j", "m", "n"]);

export const PlateResultsSchema = BaseResult.extend({
  plate_id: z.string(),
  element_type: z.enum(["Plate", "Quad"]),
  corner_stresses: z.record(CornerSchema, PlateStressSchema).readonly(),
  corner_moments: z.record(CornerSchema, PlateMomentSchema).readonly(),
  center_stress: PlateStressSchema.optional(),
  center_moment: PlateMomentSchema.optional()
}).readonly();

// === Shear wall results ===

export const PierResultSchema = z.object({
  pier_id: z.string(),
  x_position: z.number(),
  y_position: z.number(),
  width: z.number(),
  height: z.number(),
  axial_force: solverValue,
  shear_force: solverValue,
  moment: solverValue,
  shear_span_ratio: solverValue // M/(V·L)
}).readonly();

export const CouplingBeamResultSchema = z.object({
  beam_id: z.string(),
  x_position: z.number(),
  y_position: z.number(),
  length: z.number(),
  height: z.number(),
  axial_force: solverValue,
  shear_force: solverValue,
  moment: solverValue,
  shear_span_ratio: solverValue // M/(V·H)
}).readonly();

export const StoryStiffnessSchema = z.object({
  story_name: z.string(),
  stiffness: solverValue,
  test_force: z.number(),
  max_displacement: solverValue
}).readonly();

export const ShearWallResultsSchema = z.object({
  wall_id: z.string(),
  load_combination: z.string(),
  wall_length: z.number(),
  wall_height: z.number(),
  piers: z.record(z.string(), PierResultSchema).readonly(),
  coupling_beams: z.record(z.string(), CouplingBeamResultSchema).readonly(),
  story_stiffness: z.record(z.string(), StoryStiffnessSchema).readonly()
}).readonly();

// === Aggregates ===

export const LoadCombinationResultsSchema = z.object({
  combination_name: z.string(),
  nodal_displacements: z.record(z.string(), NodalDisplacementSchema).readonly(),
  nodal_reactions: z.record(z.string(), NodalReactionSchema).readonly(),
  member_results: z.record(z.string(), MemberResultsSchema).readonly(),
  plate_results: z.record(z.string(), PlateResultsSchema).readonly(),
  shear_wall_results: z.record(z.string(), ShearWallResultsSchema).readonly()
}).readonly();

export const AnalysisSummarySchema = z.object({
  analysis_type: z.enum(["Linear", "P-Delta", "Nonlinear TC"]),
  solution_time: z.number().optional(), // seconds
  num_nodes: z.number().int(),
  num_members: z.number().int(),
  num_plates: z.number().int(),
  num_load_combinations: z.number().int()
}).readonly();

export const AnalysisResultsSchema = z.object({
  analysis_summary: AnalysisSummarySchema,
  model_name: z.string().optional(),
  analysis_date: z.string().optional(),
  load_combination_results: z.record(z.string(), LoadCombinationResultsSchema).readonly(),
  global_max_displacement: z.number().optional(),
  global_max_reaction: z.number().optional(),
  global_max_member_force: z.number().optional(),
  global_max_member_moment: z.number().optional(),
  global_max_plate_stress: z.number().optional()
}).readonly();

export type Vector3D = z.infer<typeof Vector3DSchema>;
export type NodalDisplacement = z.infer<typeof NodalDisplacementSchema>;
export type NodalReaction = z.infer<typeof NodalReactionSchema>;
export type MemberAxialForce = z.infer<typeof MemberAxialForceSchema>;
export type MemberShearForce = z.infer<typeof MemberShearForceSchema>;
export type MemberMoment = z.infer<typeof MemberMomentSchema>;
export type MemberTorque = z.infer<typeof MemberTorqueSchema>;
export type MemberEndForces = z.infer<typeof MemberEndForcesSchema>;
export type MemberDeflection = z.infer<typeof MemberDeflectionSchema>;
export type MemberResults = z.infer<typeof MemberResultsSchema>;
export type PlateStress = z.infer<typeof PlateStressSchema>;
export type PlateMoment = z.infer<typeof PlateMomentSchema>;
export type Corner = z.infer<typeof CornerSchema>;
export type PlateResults = z.infer<typeof PlateResultsSchema>;
export type PierResult = z.infer<typeof PierResultSchema>;
export type CouplingBeamResult = z.infer<typeof CouplingBeamResultSchema>;
export type StoryStiffness = z.infer<typeof StoryStiffnessSchema>;
export type ShearWallResults = z.infer<typeof ShearWallResultsSchema>;
export type LoadCombinationResults = z.infer<typeof LoadCombinationResultsSchema>;
export type AnalysisSummary = z.infer<typeof AnalysisSummarySchema>;
export type AnalysisResults = z.infer<typeof AnalysisResultsSchema>;

// === Accessors ===

export function getAllCombinations(results: AnalysisResults): string[] {
  return Object.keys(results.load_combination_results);
}

export function getNodalDisplacement(results: AnalysisResults, nodeId: string, combo: string) {
  return results.load_combination_results[combo]?.nodal_displacements[nodeId];
}

export function getMemberResults(results: AnalysisResults, memberId: string, combo: string) {
  return results.load_combination_results[combo]?.member_results[memberId];
}

export function getPlateResults(results: AnalysisResults, plateId: string, combo: string) {
  return results.load_combination_results[combo]?.plate_results[plateId];
}

const magnitude = (v: Vector3D) => Math.hypot(v.x, v.y, v.z);
// NaN entries are skipped.
const maxOf = (values: Iterable<number>) => {
  let max = 0;
  for (const v of values) if (!Number.isNaN(v)) max = Math.max(max, v);
  return max;
};

function* memberMoments(combo: LoadCombinationResults) {
  for (const m of Object.values(combo.member_results)) {
    yield* [m.moment_y.max_moment, m.moment_y.min_moment, m.moment_z.max_moment, m.moment_z.min_moment].map(Math.abs);
  }
}

function* memberForces(combo: LoadCombinationResults) {
  for (const m of Object.values(combo.member_results)) {
    yield* [
      m.axial_force.max_axial, m.axial_force.min_axial,
      m.shear_force_y.max_shear, m.shear_force_y.min_shear,
      m.shear_force_z.max_shear, m.shear_force_z.min_shear
    ].map(Math.abs);
  }
}

function* plateStresses(combo: LoadCombinationResults) {
  for (const p of Object.values(combo.plate_results)) {
    const points = [...Object.values(p.corner_stresses), ...(p.center_stress ? [p.center_stress] : [])];
    for (const s of points) yield* [s.sx, s.sy, s.txy].map(Math.abs);
  }
}

/** Largest translational displacement magnitude under `combo`, or undefined for an unknown combination. */
export function getMaxDisplacementByCombo(results: AnalysisResults, combo: string): number | undefined {
  const combination = results.load_combination_results[combo];
  if (!combination) return undefined;
  return maxOf(Object.values(combination.nodal_displacements).map((d) => magnitude(d.displacement)));
}

/** Largest |My| or |Mz| extreme over all members under `combo`. */
export function getMaxMemberMomentByCombo(results: AnalysisResults, combo: string): number | undefined {
  const combination = results.load_combination_results[combo];
  if (!combination) return undefined;
  return maxOf(memberMoments(combination));
}

export interface GlobalExtremes {
  global_max_displacement: number;
  global_max_reaction: number;
  global_max_member_force: number;
  global_max_member_moment: number;
  global_max_plate_stress: number;
}

export function computeGlobalExtremes(
  combinations: Readonly<Record<string, LoadCombinationResults>>
): GlobalExtremes {
  const all = Object.values(combinations);
  return {
    global_max_displacement: maxOf(
      all.flatMap((c) => Object.values(c.nodal_displacements).map((d) => magnitude(d.displacement)))
    ),
    global_max_reaction: maxOf(all.flatMap((c) => Object.values(c.nodal_reactions).map((r) => magnitude(r.force)))),
    global_max_member_force: maxOf(all.flatMap((c) => [...memberForces(c)])),
    global_max_member_moment: maxOf(all.flatMap((c) => [...memberMoments(c)])),
    global_max_plate_stress: maxOf(all.flatMap((c) => [...plateStresses(c)]))
  };
}
