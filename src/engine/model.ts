import type { z } from "zod";
import { ValidationError } from "./errors";
import {
  DistributedLoadSchema,
  LoadCombinationSchema,
  MaterialSchema,
  MemberSchema,
  ModelSchema,
  NodeSchema,
  PlateSchema,
  PointLoadSchema,
  PressureSchema,
  SectionSchema,
  SelfWeightSchema,
  ShearWallSchema,
  SupportSchema,
  type DistributedLoadInput,
  type LoadCombinationInput,
  type MaterialInput,
  type MemberInput,
  type Model,
  type ModelInput,
  type NodeInput,
  type PlateInput,
  type PointLoadInput,
  type PressureInput,
  type SectionInput,
  type SelfWeightInput,
  type ShearWallInput,
  type SupportInput
} from "./schema";

/**
 * Parses `input` with `schema`, throwing a {@link ValidationError} labelled with
 * `entity` instead of the raw ZodError.
 */
export function parseEntity<S extends z.ZodTypeAny>(schema: S, input: unknown, entity: string): z.output<S> {
  const parsed = schema.safeParse(input);
  if (!parsed.success) throw ValidationError.fromZod(entity, parsed.error);
  return parsed.data;
}

export const createNode = (input: NodeInput) => parseEntity(NodeSchema, input, "node");
export const createMaterial = (input: MaterialInput) => parseEntity(MaterialSchema, input, "material");
export const createSection = (input: SectionInput) => parseEntity(SectionSchema, input, "section");
export const createMember = (input: MemberInput) => parseEntity(MemberSchema, input, "member");
export const createPlate = (input: PlateInput) => parseEntity(PlateSchema, input, "plate");
export const createSupport = (input: SupportInput) => parseEntity(SupportSchema, input, "support");
export const createPointLoad = (input: PointLoadInput) => parseEntity(PointLoadSchema, input, "point load");
export const createDistributedLoad = (input: DistributedLoadInput) =>
  parseEntity(DistributedLoadSchema, input, "distributed load");
export const createPressure = (input: PressureInput) => parseEntity(PressureSchema, input, "pressure load");
export const createSelfWeight = (input: SelfWeightInput) => parseEntity(SelfWeightSchema, input, "self weight");
export const createLoadCombination = (input: LoadCombinationInput) =>
  parseEntity(LoadCombinationSchema, input, "load combination");
export const createShearWall = (input: ShearWallInput) => parseEntity(ShearWallSchema, input, "shear wall");

export function createModel(input: ModelInput): Model {
  return parseEntity(ModelSchema, input, "model");
}

/** Plain JSON form of a model; combination factors are flattened back onto the record. */
export function serializeModel(model: Model): Record<string, unknown> {
  const load_combinations: Record<string, Record<string, string | number>> = {};
  for (const [key, combo] of Object.entries(model.load_combinations)) {
    const flat: Record<string, string | number> = { name: combo.name, criteria: combo.criteria };
    for (const [group, factor] of combo.factors) flat[group] = factor;
    load_combinations[key] = flat;
  }
  return { ...model, load_combinations };
}
