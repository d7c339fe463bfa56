import { isRestrained, parseFixityCode, parseRestraintCode } from "./codes";
import type { Diagnostic, DiagnosticCode } from "./diagnostics";
import { TranslationError, UsageError } from "./errors";
import { memberLength, positionAlong } from "./geometry";
import {
  computeGlobalExtremes,
  AnalysisResultsSchema,
  type AnalysisResults,
  type LoadCombinationResults,
  type NodalDisplacement,
  type NodalReaction,
  type MemberResults,
  type PlateResults,
  type ShearWallResults
} from "./results";
import {
  createMemberResults,
  createNodalDisplacement,
  createNodalReaction,
  createPlateResults,
  createShearWallResults
} from "./resultFactories";
import type { DistributedLoad, Member, Model, PointLoad, Pressure, ShearWall } from "./schema";
import type { FiniteElementModel, ShearWallModel, StructuralSolver } from "./solver";
import type {
  AnalysisLabel,
  AnalysisOptions,
  AnalysisType,
  Dof,
  ForceDirection,
  LocalForceDirection,
  NodalLoadDirection
} from "./types";
import { loadConfig, type Config } from "../utils/config";
import { createLogger, type Logger } from "../utils/logger";

export interface Translation {
  model: FiniteElementModel;
  diagnostics: Diagnostic[];
}

export interface TranslatorOptions {
  logger?: Logger;
  config?: Config;
}

export interface NodeDisplacementSummary {
  DX: number;
  DY: number;
  DZ: number;
  RX: number;
  RY: number;
  RZ: number;
}

export interface MemberForceSummary {
  max_moment: number;
  min_moment: number;
  max_shear: number;
  min_shear: number;
  max_axial: number;
  min_axial: number;
}

export interface ReactionSummary {
  RxnFX: number;
  RxnFY: number;
  RxnFZ: number;
  RxnMX: number;
  RxnMY: number;
  RxnMZ: number;
}

export interface ResultsSummary {
  nodes: Record<string, Record<string, NodeDisplacementSummary>>;
  members: Record<string, Record<string, MemberForceSummary>>;
  reactions: Record<string, Record<string, ReactionSummary>>;
}

const ZERO_MEMBER_FORCES: Readonly<MemberForceSummary> = Object.freeze({
  max_moment: 0,
  min_moment: 0,
  max_shear: 0,
  min_shear: 0,
  max_axial: 0,
  min_axial: 0
});

const AXES = ["x", "y", "z"] as const;
const GLOBAL_FORCE: Record<(typeof AXES)[number], ForceDirection> = { x: "FX", y: "FY", z: "FZ" };
const LOCAL_FORCE: Record<(typeof AXES)[number], LocalForceDirection> = { x: "Fx", y: "Fy", z: "Fz" };
const GLOBAL_MOMENT: Record<(typeof AXES)[number], NodalLoadDirection> = { x: "MX", y: "MY", z: "MZ" };
const POINT_FIELDS = { x: "x_mag", y: "y_mag", z: "z_mag" } as const;
const LINE_FIELDS = {
  x: ["x_mag_A", "x_mag_B"],
  y: ["y_mag_A", "y_mag_B"],
  z: ["z_mag_A", "z_mag_B"]
} as const;
const SETTLEMENTS = [
  ["tx", "DX"],
  ["ty", "DY"],
  ["tz", "DZ"],
  ["rx", "RX"],
  ["ry", "RY"],
  ["rz", "RZ"]
] as const satisfies ReadonlyArray<readonly [string, Dof]>;

const ANALYSIS_LABELS: Record<AnalysisType, AnalysisLabel> = {
  linear: "Linear",
  pdelta: "P-Delta",
  nonlinear: "Nonlinear TC"
};

function isAnalysisType(value: string): value is AnalysisType {
  return Object.hasOwn(ANALYSIS_LABELS, value);
}

/**
 * Structural cross-references that must resolve before a model is handed to the solver.
 * Loads are not checked here; unresolved loads are skipped with a diagnostic instead.
 */
export function checkReferences(model: Model): string[] {
  const problems: string[] = [];
  const need = (ok: boolean, message: string) => {
    if (!ok) problems.push(message);
  };

  for (const [id, section] of Object.entries(model.sections)) {
    need(section.material_id in model.materials, `section '${id}' references missing material '${section.material_id}'`);
  }
  for (const [id, member] of Object.entries(model.members)) {
    need(member.node_A in model.nodes, `member '${id}' references missing node '${member.node_A}'`);
    need(member.node_B in model.nodes, `member '${id}' references missing node '${member.node_B}'`);
    need(member.section_id in model.sections, `member '${id}' references missing section '${member.section_id}'`);
  }
  for (const [id, plate] of Object.entries(model.plates)) {
    need(plate.material_id in model.materials, `plate '${id}' references missing material '${plate.material_id}'`);
    for (const node of plate.nodes) {
      need(node in model.nodes, `plate '${id}' references missing node '${node}'`);
    }
  }
  for (const [id, support] of Object.entries(model.supports)) {
    need(support.node in model.nodes, `support '${id}' references missing node '${support.node}'`);
  }
  return problems;
}

/**
 * Maps a {@link Model} onto an injected finite-element solver, runs its analyses and
 * reshapes the populated solver objects into result records.
 *
 * Single use: one translator owns exactly one solver model (and its shear walls).
 */
export class ModelTranslator {
  private readonly solver: StructuralSolver;
  private readonly log: Logger;
  private readonly config: Config;

  private source?: Model;
  private target?: FiniteElementModel;
  private diagnostics: Diagnostic[] = [];
  private readonly walls = new Map<string, ShearWallModel>();
  private analysis?: AnalysisType;

  constructor(solver: StructuralSolver, options: TranslatorOptions = {}) {
    this.solver = solver;
    this.config = options.config ?? loadConfig();
    this.log = options.logger ?? createLogger("Translator", { debug: this.config.debug });
  }

  /** Shear wall handles created by {@link translate}, keyed like `Model.shear_walls`. */
  get shearWalls(): ReadonlyMap<string, ShearWallModel> {
    return this.walls;
  }

  get analysisType(): AnalysisType | undefined {
    return this.analysis;
  }

  translate(model: Model): Translation {
    if (this.target) {
      throw new UsageError("translate() was already called; create a new ModelTranslator per model");
    }
    const problems = checkReferences(model);
    if (problems.length > 0) throw new TranslationError(problems);

    this.source = model;
    this.target = this.solver.createModel();
    this.diagnostics = [];

    this.translateMaterials(model, this.target);
    this.translateSections(model, this.target);
    this.translateNodes(model, this.target);
    this.translateSupports(model, this.target);
    this.translateMembers(model, this.target);
    this.translatePlates(model, this.target);
    this.translateLoads(model, this.target);
    this.translateLoadCombinations(model, this.target);
    this.translateShearWalls(model);

    this.log.info(`translated with ${this.diagnostics.length} diagnostic(s)`, { operation: "translate" });
    return { model: this.target, diagnostics: [...this.diagnostics] };
  }

  private warn(code: DiagnosticCode, entity: string, message: string) {
    this.diagnostics.push({ code, entity, message });
    this.log.warn(message, { operation: "translate", entity });
  }

  private translateMaterials(model: Model, fe: FiniteElementModel) {
    for (const [id, m] of Object.entries(model.materials)) {
      const E = m.elasticity_modulus;
      const nu = m.poissons_ratio;
      fe.addMaterial(id, {
        E,
        G: m.shear_modulus ?? E / (2 * (1 + nu)),
        nu,
        rho: m.density,
        fy: m.yield_strength
      });
    }
  }

  private translateSections(model: Model, fe: FiniteElementModel) {
    for (const [id, s] of Object.entries(model.sections)) {
      fe.addSection(id, { A: s.area, Iy: s.Iy, Iz: s.Iz, J: s.J ?? 0 });
    }
  }

  private translateNodes(model: Model, fe: FiniteElementModel) {
    for (const [id, n] of Object.entries(model.nodes)) {
      fe.addNode(id, n.x, n.y, n.z);
    }
  }

  private translateSupports(model: Model, fe: FiniteElementModel) {
    for (const support of Object.values(model.supports)) {
      fe.defSupport(support.node, parseRestraintCode(support.restraint_code));
      for (const [field, dof] of SETTLEMENTS) {
        if (support[field] !== 0) fe.defNodeDisp(support.node, dof, support[field]);
      }
    }
  }

  private translateMembers(model: Model, fe: FiniteElementModel) {
    for (const [id, m] of Object.entries(model.members)) {
      const section = model.sections[m.section_id];
      fe.addMember(id, m.node_A, m.node_B, section.material_id, m.section_id, m.rotation_angle);
      fe.defReleases(id, { ...parseFixityCode(m.fixity_A, "i"), ...parseFixityCode(m.fixity_B, "j") });
    }
  }

  private translatePlates(model: Model, fe: FiniteElementModel) {
    for (const [id, plate] of Object.entries(model.plates)) {
      if (plate.nodes.length !== 4) {
        this.warn(
          "plate-node-count",
          id,
          `plate '${id}' has ${plate.nodes.length} nodes; only 4-node plates are supported, skipping`
        );
        continue;
      }
      const [i, j, m, n] = plate.nodes;
      fe.addQuad(id, i, j, m, n, plate.thickness, plate.material_id);
    }
  }

  private translateLoads(model: Model, fe: FiniteElementModel) {
    for (const [id, load] of Object.entries(model.point_loads)) this.addPointLoad(model, fe, id, load);
    for (const [id, load] of Object.entries(model.distributed_loads)) this.addDistributedLoad(model, fe, id, load);
    for (const [id, load] of Object.entries(model.area_loads)) this.addPressure(model, fe, id, load);

    for (const sw of Object.values(model.self_weight)) {
      for (const axis of AXES) {
        if (sw[axis] !== 0) fe.addMemberSelfWeight(GLOBAL_FORCE[axis], sw[axis], sw.load_group);
      }
    }
  }

  private addPointLoad(model: Model, fe: FiniteElementModel, id: string, load: PointLoad) {
    if (load.node === undefined) {
      if (load.member !== undefined) {
        this.warn(
          "member-point-load",
          id,
          `point load '${id}' targets member '${load.member}' without a position along it, skipping`
        );
      } else {
        this.warn("node-not-found", id, `point load '${id}' names neither a node nor a member, skipping`);
      }
      return;
    }
    if (!(load.node in model.nodes)) {
      this.warn("node-not-found", id, `could not find node '${load.node}' for point load '${id}'`);
      return;
    }

    const directions = load.type === "m" ? GLOBAL_MOMENT : GLOBAL_FORCE;
    for (const axis of AXES) {
      const P = load[POINT_FIELDS[axis]];
      if (P !== 0) fe.addNodeLoad(load.node, directions[axis], P, load.load_group);
    }
  }

  /** Looks a member up by key, then by numeric equivalence ("7" matches "07"). */
  private resolveMember(model: Model, ref: string): [string, Member] | undefined {
    const direct = model.members[ref];
    if (direct) return [ref, direct];
    const wanted = Number(ref);
    if (Number.isNaN(wanted)) return undefined;
    return Object.entries(model.members).find(([key]) => key.trim() !== "" && Number(key) === wanted);
  }

  private addDistributedLoad(model: Model, fe: FiniteElementModel, id: string, load: DistributedLoad) {
    const resolved = this.resolveMember(model, load.member);
    if (!resolved) {
      this.warn("member-not-found", id, `could not find member '${load.member}' for distributed load '${id}'`);
      return;
    }
    const [memberId, member] = resolved;
    const length = memberLength(model.nodes[member.node_A], model.nodes[member.node_B]);
    const x1 = positionAlong(length, load.position_A);
    const x2 = positionAlong(length, load.position_B);
    const directions = load.axes === "local" ? LOCAL_FORCE : GLOBAL_FORCE;

    for (const axis of AXES) {
      const [start, end] = LINE_FIELDS[axis];
      const w1 = load[start];
      const w2 = load[end];
      if (w1 !== 0 || w2 !== 0) {
        fe.addMemberDistLoad(memberId, directions[axis], w1, w2, x1, x2, load.load_group);
      }
    }
  }

  // plate_id is a 1-based position in Model.plates, so reordering plates retargets pressures.
  // Integer-like keys ("2", "10") enumerate first and in numeric order, ahead of other keys.
  private addPressure(model: Model, fe: FiniteElementModel, id: string, load: Pressure) {
    const plateIds = Object.keys(model.plates);
    if (load.plate_id < 1 || load.plate_id > plateIds.length) {
      this.warn(
        "plate-not-found",
        id,
        `could not find plate for pressure load '${id}' with plate_id ${load.plate_id}`
      );
      return;
    }
    const plateId = plateIds[load.plate_id - 1];
    if (!fe.quads.has(plateId)) {
      this.warn("plate-not-translated", id, `plate '${plateId}' for pressure load '${id}' was not translated`);
      return;
    }

    if (load.x_mag !== 0 || load.y_mag !== 0) {
      this.warn(
        "pressure-axis-ignored",
        id,
        `pressure load '${id}': only the z component is applied as surface pressure; x/y ignored`
      );
    }
    if (load.z_mag !== 0) fe.addQuadSurfacePressure(plateId, load.z_mag, load.load_group);
  }

  private translateLoadCombinations(model: Model, fe: FiniteElementModel) {
    for (const [id, combo] of Object.entries(model.load_combinations)) {
      fe.addLoadCombo(id, combo.factors);
    }
  }

  private translateShearWalls(model: Model) {
    for (const [id, wall] of Object.entries(model.shear_walls)) {
      this.walls.set(id, this.buildShearWall(wall));
    }
  }

  private buildShearWall(wall: ShearWall): ShearWallModel {
    const sw = this.solver.createShearWall({
      length: wall.length,
      height: wall.height,
      meshSize: wall.mesh_size,
      kyMod: wall.ky_modification_factor
    });

    for (const m of wall.materials) {
      sw.addMaterial({
        name: m.name,
        E: m.elasticity_modulus,
        G: m.shear_modulus,
        nu: m.poissons_ratio,
        rho: m.density,
        t: m.thickness,
        xStart: m.x_start,
        xEnd: m.x_end,
        yStart: m.y_start,
        yEnd: m.y_end
      });
    }
    for (const o of wall.openings) {
      sw.addOpening({
        name: o.name,
        xStart: o.x_start,
        yStart: o.y_start,
        width: o.width,
        height: o.height,
        tie: o.tie_stiffness
      });
    }
    for (const f of wall.flanges) {
      sw.addFlange({
        thickness: f.thickness,
        width: f.width,
        x: f.x_position,
        yStart: f.y_start,
        yEnd: f.y_end,
        material: f.material_name,
        side: f.side
      });
    }
    for (const s of wall.supports) {
      sw.addSupport({ elevation: s.elevation, xStart: s.x_start, xEnd: s.x_end });
    }
    for (const s of wall.stories) {
      sw.addStory({ name: s.story_name, elevation: s.elevation, xStart: s.x_start, xEnd: s.x_end });
    }
    for (const load of wall.loads) {
      if (load.load_type === "axial") sw.addAxial(load.story_name, load.force_magnitude, load.load_group);
      else sw.addShear(load.story_name, load.force_magnitude, load.load_group);
    }
    return sw;
  }

  private requireTarget(operation: string): FiniteElementModel {
    if (!this.target) {
      throw new UsageError(`${operation}: no model has been translated yet, call translate() first`);
    }
    return this.target;
  }

  runAnalysis(type: string = "linear", options: AnalysisOptions = {}): void {
    const fe = this.requireTarget("runAnalysis");
    const tag = type.toLowerCase();
    if (!isAnalysisType(tag)) throw new UsageError(`Unknown analysis type: ${type}`);

    switch (tag) {
      case "linear":
        fe.analyzeLinear(options);
        break;
      case "pdelta":
        fe.analyzePDelta(options);
        break;
      case "nonlinear":
        fe.analyze(options);
        break;
    }
    this.analysis = tag;
    this.log.info(`${ANALYSIS_LABELS[tag]} analysis complete`, { operation: "runAnalysis" });
  }

  private combinations(fe: FiniteElementModel): string[] {
    const names = [...fe.loadCombos.keys()];
    return names.length > 0 ? names : [this.config.defaultCombo];
  }

  getResultsSummary(): ResultsSummary {
    const fe = this.requireTarget("getResultsSummary");
    const combos = this.combinations(fe);
    const summary: ResultsSummary = { nodes: {}, members: {}, reactions: {} };

    for (const [name, node] of fe.nodes) {
      const perCombo: Record<string, NodeDisplacementSummary> = {};
      for (const combo of combos) {
        if (!node.DX.has(combo)) continue;
        const d = createNodalDisplacement(node, combo);
        perCombo[combo] = {
          DX: d.displacement.x,
          DY: d.displacement.y,
          DZ: d.displacement.z,
          RX: d.rotation.x,
          RY: d.rotation.y,
          RZ: d.rotation.z
        };
      }
      summary.nodes[name] = perCombo;
    }

    for (const [name, member] of fe.members) {
      const perCombo: Record<string, MemberForceSummary> = {};
      for (const combo of combos) {
        try {
          perCombo[combo] = {
            max_moment: member.maxMoment("Mz", combo),
            min_moment: member.minMoment("Mz", combo),
            max_shear: member.maxShear("Fy", combo),
            min_shear: member.minShear("Fy", combo),
            max_axial: member.maxAxial(combo),
            min_axial: member.minAxial(combo)
          };
        } catch (error) {
          this.log.caught(`no results for combination '${combo}', using zeros`, error, {
            operation: "getResultsSummary",
            entity: name
          });
          perCombo[combo] = { ...ZERO_MEMBER_FORCES };
        }
      }
      summary.members[name] = perCombo;
    }

    for (const [name, node] of fe.nodes) {
      if (!isRestrained(node.support)) continue;
      const perCombo: Record<string, ReactionSummary> = {};
      for (const combo of combos) {
        if (!node.RxnFX.has(combo)) continue;
        const r = createNodalReaction(node, combo);
        perCombo[combo] = {
          RxnFX: r.force.x,
          RxnFY: r.force.y,
          RxnFZ: r.force.z,
          RxnMX: r.moment.x,
          RxnMY: r.moment.y,
          RxnMZ: r.moment.z
        };
      }
      summary.reactions[name] = perCombo;
    }

    return summary;
  }

  analyzeShearWalls(options: AnalysisOptions = {}): void {
    this.requireTarget("analyzeShearWalls");
    for (const [id, wall] of this.walls) {
      this.log.info("analyzing shear wall", { operation: "analyzeShearWalls", entity: id });
      wall.generate();
      wall.analyze(options);
      this.log.info("shear wall analysis complete", { operation: "analyzeShearWalls", entity: id });
    }
  }

  getShearWallResults(wallId: string, combo: string = this.config.defaultCombo): ShearWallResults {
    const wall = this.walls.get(wallId);
    if (!wall) throw new UsageError(`Shear wall ${wallId} not found`);
    return createShearWallResults(wall, wallId, combo, this.log);
  }

  /**
   * Full structured results for every solver combination. Shear walls report under the
   * same combination when their own model defines it, otherwise under the default one.
   */
  collectResults(meta: { modelName?: string; analysisDate?: string } = {}): AnalysisResults {
    const fe = this.requireTarget("collectResults");
    const analysis = this.analysis;
    if (!analysis) throw new UsageError("collectResults: run an analysis first");
    const combos = this.combinations(fe);
    const byCombo: Record<string, LoadCombinationResults> = {};

    for (const combo of combos) {
      const nodal_displacements: Record<string, NodalDisplacement> = {};
      const nodal_reactions: Record<string, NodalReaction> = {};
      for (const [name, node] of fe.nodes) {
        nodal_displacements[name] = createNodalDisplacement(node, combo);
        nodal_reactions[name] = createNodalReaction(node, combo);
      }

      const member_results: Record<string, MemberResults> = {};
      for (const [name, member] of fe.members) {
        member_results[name] = createMemberResults(member, combo);
      }

      const plate_results: Record<string, PlateResults> = {};
      for (const [name, quad] of fe.quads) {
        plate_results[name] = createPlateResults(quad, combo);
      }

      const shear_wall_results: Record<string, ShearWallResults> = {};
      for (const [id, wall] of this.walls) {
        if (wall.loadCombos.has(combo)) {
          shear_wall_results[id] = createShearWallResults(wall, id, combo, this.log);
        } else if (wall.loadCombos.has(this.config.defaultCombo)) {
          shear_wall_results[id] = createShearWallResults(wall, id, this.config.defaultCombo, this.log);
        }
      }

      byCombo[combo] = {
        combination_name: combo,
        nodal_displacements,
        nodal_reactions,
        member_results,
        plate_results,
        shear_wall_results
      };
    }

    return AnalysisResultsSchema.parse({
      analysis_summary: {
        analysis_type: ANALYSIS_LABELS[analysis],
        num_nodes: fe.nodes.size,
        num_members: fe.members.size,
        num_plates: fe.quads.size,
        num_load_combinations: combos.length
      },
      model_name: meta.modelName,
      analysis_date: meta.analysisDate,
      load_combination_results: byCombo,
      ...computeGlobalExtremes(byCombo)
    });
  }
}
