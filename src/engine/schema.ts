import { z } from "zod";

// Entity references arrive as either "5" or 5; keys are always strings downstream.
export const KeySchema = z.union([z.string().min(1), z.number().int()]).transform(String);
// An empty reference reads as absent.
const OptionalKeySchema = z.union([z.literal("").transform(() => undefined), KeySchema]).optional();
export const AxesSchema = z.enum(["global", "local"]);

// === Settings ===

export const SettingsUnitsSchema = z.object({
  length: z.string().default("m"),
  section_length: z.string().default("mm"),
  material_strength: z.string().default("mpa"),
  density: z.string().default("kg/m3"),
  force: z.string().default("kn"),
  moment: z.string().default("kn-m"),
  pressure: z.string().default("kpa"),
  mass: z.string().default("kg"),
  translation: z.string().default("mm"),
  stress: z.string().default("mpa")
});

export const SettingsSchema = z.object({
  units: SettingsUnitsSchema.default({}),
  precision: z.string().default("fixed"),
  precision_values: z.number().int().nonnegative().default(3),
  vertical_axis: z.enum(["X", "Y", "Z"]).default("Z"),
  member_offsets_axis: AxesSchema.default("local"),
  solver_timeout: z.number().int().positive().default(600), // seconds
  smooth_plate_nodal_results: z.boolean().default(true),
  auto_stabilize_model: z.boolean().default(false),
  only_solve_user_defined_load_combinations: z.boolean().default(false)
});

// === Geometry, materials, sections ===

export const NodeSchema = z.object({
  x: z.number(),
  y: z.number(),
  z: z.number()
}).readonly();

export const MaterialSchema = z.object({
  id: z.number().int().optional(),
  name: z.string(),
  elasticity_modulus: z.number().positive(),
  shear_modulus: z.number().positive().optional(), // derived from E and nu when absent
  density: z.number().nonnegative(),
  poissons_ratio: z.number(),
  yield_strength: z.number().optional(),
  ultimate_strength: z.number().optional(),
  thermal_expansion_coefficient: z.number().optional(),
  aux: z.unknown().optional()
}).readonly();

export const SectionSchema = z.object({
  version: z.number().int().default(1),
  name: z.string(),
  area: z.number().positive(),
  Iz: z.number().nonnegative(), // strong axis
  Iy: z.number().nonnegative(), // weak axis
  material_id: KeySchema,
  J: z.number().nonnegative().optional(),
  aux: z.unknown().optional()
}).readonly();

export const MemberSchema = z.object({
  type: z.string(), // e.g. "beam", "column"
  node_A: KeySchema,
  node_B: KeySchema,
  section_id: KeySchema,
  rotation_angle: z.number().default(0),
  fixity_A: z.string(), // [Dx,Dy,Dz,Rx,Ry,Rz], F = fixed, R = released
  fixity_B: z.string(),
  offset_Ax: z.string().default("0"),
  offset_Ay: z.string().default("0"),
  offset_Az: z.string().default("0"),
  offset_Bx: z.string().default("0"),
  offset_By: z.string().default("0"),
  offset_Bz: z.string().default("0"),
  stiffness_A_Ry: z.number().default(1),
  stiffness_A_Rz: z.number().default(1),
  stiffness_B_Ry: z.number().default(1),
  stiffness_B_Rz: z.number().default(1)
}).readonly();

export const PlateSchema = z.object({
  type: z.string().default("plate"),
  nodes: z.array(KeySchema).readonly(), // corner nodes, in winding order
  material_id: KeySchema,
  thickness: z.number().positive(),
  membrane_thickness: z.number().positive().optional(),
  bending_thickness: z.number().positive().optional()
}).readonly();

export const SupportSchema = z.object({
  node: KeySchema,
  restraint_code: z.string(), // [Dx,Dy,Dz,Rx,Ry,Rz], T = restrained
  // prescribed displacements (settlements)
  tx: z.number().default(0),
  ty: z.number().default(0),
  tz: z.number().default(0),
  rx: z.number().default(0),
  ry: z.number().default(0),
  rz: z.number().default(0)
}).readonly();

// === Loads ===

const BaseLoadSchema = z.object({
  load_id: z.number().int(),
  load_group: z.string().min(1)
});

export const PointLoadSchema = BaseLoadSchema.extend({
  type: z.enum(["n", "m"]).default("n"), // n = force, m = moment
  node: OptionalKeySchema,
  member: OptionalKeySchema,
  x_mag: z.number(),
  y_mag: z.number(),
  z_mag: z.number()
}).readonly();

export const DistributedLoadSchema = BaseLoadSchema.extend({
  member: KeySchema,
  axes: AxesSchema.default("global"),
  x_mag_A: z.number().default(0),
  y_mag_A: z.number().default(0),
  z_mag_A: z.number().default(0),
  x_mag_B: z.number().default(0),
  y_mag_B: z.number().default(0),
  z_mag_B: z.number().default(0),
  position_A: z.number().min(0).max(100).default(0), // % of member length
  position_B: z.number().min(0).max(100).default(100)
}).readonly();

export const PressureSchema = BaseLoadSchema.extend({
  // 1-based position in Model.plates, not a key; integer-like plate keys count in numeric order
  plate_id: z.number().int(),
  axes: AxesSchema.default("global"),
  x_mag: z.number().default(0),
  y_mag: z.number().default(0),
  z_mag: z.number().default(0)
}).readonly();

export const SelfWeightSchema = z.object({
  x: z.number(),
  y: z.number(),
  z: z.number(),
  load_group: z.string().min(1)
}).readonly();

const RESERVED_COMBO_FIELDS = new Set(["name", "criteria"]);

// Flat on the wire ({ name, criteria, Dead: 1.35, Live: 1.5 }); every extra field is a load group factor.
export const LoadCombinationSchema = z
  .object({
    name: z.string(),
    criteria: z.string()
  })
  .catchall(z.number())
  .transform((raw) => {
    const entries = new Map<string, number>();
    for (const [group, factor] of Object.entries(raw)) {
      if (RESERVED_COMBO_FIELDS.has(group) || typeof factor !== "number") continue;
      entries.set(group, factor);
    }
    const factors: ReadonlyMap<string, number> = entries;
    return Object.freeze({ name: raw.name, criteria: raw.criteria, factors });
  });

export const LoadCasesSchema = z.object({
  AISC: z.record(z.string(), z.string()).default({})
});

// === Shear walls ===

export const ShearWallMaterialSchema = z.object({
  name: z.string(),
  elasticity_modulus: z.number().positive(),
  shear_modulus: z.number().positive(),
  poissons_ratio: z.number(),
  density: z.number().nonnegative(),
  thickness: z.number().positive(),
  x_start: z.number().optional(),
  x_end: z.number().optional(),
  y_start: z.number().optional(),
  y_end: z.number().optional()
}).readonly();

export const ShearWallOpeningSchema = z.object({
  name: z.string(),
  x_start: z.number(),
  y_start: z.number(),
  width: z.number().positive(),
  height: z.number().positive(),
  tie_stiffness: z.number().optional() // AE of a tie above the opening
}).readonly();

export const ShearWallFlangeSchema = z.object({
  thickness: z.number().positive(),
  width: z.number().positive(),
  x_position: z.number(),
  y_start: z.number(),
  y_end: z.number(),
  material_name: z.string(),
  side: z.enum(["NS", "FS"]) // near side / far side
}).readonly();

export const ShearWallSupportSchema = z.object({
  elevation: z.number().default(0),
  x_start: z.number().optional(),
  x_end: z.number().optional()
}).readonly();

export const ShearWallStorySchema = z.object({
  story_name: z.string(),
  elevation: z.number(),
  x_start: z.number().optional(),
  x_end: z.number().optional()
}).readonly();

export const ShearWallLoadSchema = BaseLoadSchema.extend({
  story_name: z.string(),
  force_magnitude: z.number(),
  load_type: z.enum(["shear", "axial"]).default("shear")
}).readonly();

export const ShearWallSchema = z.object({
  name: z.string(),
  length: z.number().positive(),
  height: z.number().positive(),
  mesh_size: z.number().positive().default(1),
  ky_modification_factor: z.number().positive().default(0.35), // cracked stiffness reduction
  materials: z.array(ShearWallMaterialSchema).readonly().default([]),
  openings: z.array(ShearWallOpeningSchema).readonly().default([]),
  flanges: z.array(ShearWallFlangeSchema).readonly().default([]),
  supports: z.array(ShearWallSupportSchema).readonly().default([]),
  stories: z.array(ShearWallStorySchema).readonly().default([]),
  loads: z.array(ShearWallLoadSchema).readonly().default([]),
  include_pier_analysis: z.boolean().default(true),
  include_coupling_beam_analysis: z.boolean().default(true)
}).readonly();

// === Model ===

const keyed = <T extends z.ZodTypeAny>(schema: T) =>
  z.record(z.string(), schema).default({}).transform((r) => Object.freeze(r));

export const ModelSchema = z.object({
  settings: SettingsSchema.default({}),
  nodes: keyed(NodeSchema),
  members: keyed(MemberSchema),
  plates: keyed(PlateSchema),
  materials: keyed(MaterialSchema),
  sections: keyed(SectionSchema),
  supports: keyed(SupportSchema),
  point_loads: keyed(PointLoadSchema),
  distributed_loads: keyed(DistributedLoadSchema),
  area_loads: keyed(PressureSchema),
  self_weight: keyed(SelfWeightSchema),
  load_combinations: keyed(LoadCombinationSchema),
  load_cases: LoadCasesSchema.default({}),
  shear_walls: keyed(ShearWallSchema)
}).readonly();

// TypeScript types inferred from Zod schemas
export type Axes = z.infer<typeof AxesSchema>;
export type SettingsUnits = z.infer<typeof SettingsUnitsSchema>;
export type Settings = z.infer<typeof SettingsSchema>;
export type Node = z.infer<typeof NodeSchema>;
export type Material = z.infer<typeof MaterialSchema>;
export type Section = z.infer<typeof SectionSchema>;
export type Member = z.infer<typeof MemberSchema>;
export type Plate = z.infer<typeof PlateSchema>;
export type Support = z.infer<typeof SupportSchema>;
export type PointLoad = z.infer<typeof PointLoadSchema>;
export type DistributedLoad = z.infer<typeof DistributedLoadSchema>;
export type Pressure = z.infer<typeof PressureSchema>;
export type SelfWeight = z.infer<typeof SelfWeightSchema>;
export type LoadCombination = z.infer<typeof LoadCombinationSchema>;
export type LoadCases = z.infer<typeof LoadCasesSchema>;
export type ShearWallMaterial = z.infer<typeof ShearWallMaterialSchema>;
export type ShearWallOpening = z.infer<typeof ShearWallOpeningSchema>;
export type ShearWallFlange = z.infer<typeof ShearWallFlangeSchema>;
export type ShearWallSupport = z.infer<typeof ShearWallSupportSchema>;
export type ShearWallStory = z.infer<typeof ShearWallStorySchema>;
export type ShearWallLoad = z.infer<typeof ShearWallLoadSchema>;
export type ShearWall = z.infer<typeof ShearWallSchema>;
export type Model = z.infer<typeof ModelSchema>;

// Input shapes (before defaults and key normalization)
export type NodeInput = z.input<typeof NodeSchema>;
export type MaterialInput = z.input<typeof MaterialSchema>;
export type SectionInput = z.input<typeof SectionSchema>;
export type MemberInput = z.input<typeof MemberSchema>;
export type PlateInput = z.input<typeof PlateSchema>;
export type SupportInput = z.input<typeof SupportSchema>;
export type PointLoadInput = z.input<typeof PointLoadSchema>;
export type DistributedLoadInput = z.input<typeof DistributedLoadSchema>;
export type PressureInput = z.input<typeof PressureSchema>;
export type SelfWeightInput = z.input<typeof SelfWeightSchema>;
export type ShearWallInput = z.input<typeof ShearWallSchema>;

// zod's catchall input type clashes with `name`/`criteria`, so the flat wire shape is spelled out.
export type LoadCombinationInput = {
  name: string;
  criteria: string;
  [loadGroup: string]: string | number;
};

export type ModelInput = Omit<z.input<typeof ModelSchema>, "load_combinations"> & {
  load_combinations?: Record<string, LoadCombinationInput>;
};
