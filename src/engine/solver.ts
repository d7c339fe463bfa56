// src/engine/solver.ts
// The surface of the external finite-element and shear-wall library this package drives.
// Nothing here computes anything; implementations live outside the package (tests use
// src/testing/fakeSolver.ts).
import type {
  AnalysisOptions,
  Dof,
  DofFlags,
  ForceDirection,
  MemberLoadDirection,
  MemberReleases,
  NodalLoadDirection
} from "./types";

/** Per-combination values keyed by load combination name. */
export type ComboValues = ReadonlyMap<string, number>;

export interface SolverMaterialProps {
  E: number;
  G: number;
  nu: number;
  rho: number;
  fy?: number;
}

export interface SolverSectionProps {
  A: number;
  Iy: number;
  Iz: number;
  J: number;
}

export interface SolverNode {
  readonly name: string;
  readonly X: number;
  readonly Y: number;
  readonly Z: number;
  readonly DX: ComboValues;
  readonly DY: ComboValues;
  readonly DZ: ComboValues;
  readonly RX: ComboValues;
  readonly RY: ComboValues;
  readonly RZ: ComboValues;
  readonly RxnFX: ComboValues;
  readonly RxnFY: ComboValues;
  readonly RxnFZ: ComboValues;
  readonly RxnMX: ComboValues;
  readonly RxnMY: ComboValues;
  readonly RxnMZ: ComboValues;
  readonly support: Readonly<DofFlags>;
}

export interface SolverMember {
  readonly name: string;
  maxAxial(combo: string): number;
  minAxial(combo: string): number;
  maxShear(direction: "Fy" | "Fz", combo: string): number;
  minShear(direction: "Fy" | "Fz", combo: string): number;
  maxMoment(direction: "My" | "Mz", combo: string): number;
  minMoment(direction: "My" | "Mz", combo: string): number;
  maxTorque(combo: string): number;
  minTorque(combo: string): number;
  maxDeflection(direction: "dx" | "dy" | "dz", combo: string): number;
  minDeflection(direction: "dx" | "dy" | "dz", combo: string): number;
  /** Local end force vector [Fxi,Fyi,Fzi,Mxi,Myi,Mzi,Fxj,Fyj,Fzj,Mxj,Myj,Mzj]. */
  f(combo: string): readonly number[];
}

export interface SolverQuad {
  readonly name: string;
  /** "Rect" for rectangular plate elements; quads report anything else. */
  readonly type?: string;
  /** [Sx, Sy, Txy] at natural coordinates (xi, eta). */
  membrane?(xi: number, eta: number, local: boolean, combo: string): readonly [number, number, number];
  /** [Mx, My, Mxy] at natural coordinates (xi, eta). */
  moment?(xi: number, eta: number, local: boolean, combo: string): readonly [number, number, number];
}

export interface FiniteElementModel {
  addMaterial(name: string, props: SolverMaterialProps): void;
  addSection(name: string, props: SolverSectionProps): void;
  addNode(name: string, X: number, Y: number, Z: number): void;
  defSupport(nodeName: string, restraints: DofFlags): void;
  /** Enforced nodal displacement (support settlement). */
  defNodeDisp(nodeName: string, direction: Dof, magnitude: number): void;
  addMember(
    name: string,
    iNode: string,
    jNode: string,
    materialName: string,
    sectionName: string,
    rotation: number
  ): void;
  defReleases(memberName: string, releases: MemberReleases): void;
  addQuad(
    name: string,
    iNode: string,
    jNode: string,
    mNode: string,
    nNode: string,
    t: number,
    materialName: string
  ): void;
  addNodeLoad(nodeName: string, direction: NodalLoadDirection, P: number, loadCase: string): void;
  addMemberDistLoad(
    memberName: string,
    direction: MemberLoadDirection,
    w1: number,
    w2: number,
    x1: number,
    x2: number,
    loadCase: string
  ): void;
  addQuadSurfacePressure(quadName: string, pressure: number, loadCase: string): void;
  addMemberSelfWeight(direction: ForceDirection, factor: number, loadCase: string): void;
  addLoadCombo(name: string, factors: ReadonlyMap<string, number>): void;

  analyzeLinear(options?: AnalysisOptions): void;
  analyzePDelta(options?: AnalysisOptions): void;
  analyze(options?: AnalysisOptions): void;

  readonly nodes: ReadonlyMap<string, SolverNode>;
  readonly members: ReadonlyMap<string, SolverMember>;
  readonly quads: ReadonlyMap<string, SolverQuad>;
  readonly loadCombos: ReadonlyMap<string, ReadonlyMap<string, number>>;
}

// === Shear walls ===

export interface ShearWallGeometry {
  length: number;
  height: number;
  meshSize: number;
  kyMod: number;
}

/** [P, M, V, M/(V·L)] for piers, [P, M, V, M/(V·H)] for coupling beams. */
export type WallForces = readonly [number, number, number, number];

export interface Pier {
  readonly x: number;
  readonly y: number;
  readonly width: number;
  readonly height: number;
  sumForces(combo: string): WallForces;
}

export interface CouplingBeam {
  readonly x: number;
  readonly y: number;
  readonly length: number;
  readonly height: number;
  sumForces(combo: string): WallForces;
}

export interface ShearWallModel {
  readonly length: number;
  readonly height: number;
  readonly meshSize: number;
  readonly kyMod: number;

  addMaterial(material: {
    name: string;
    E: number;
    G: number;
    nu: number;
    rho: number;
    t: number;
    xStart?: number;
    xEnd?: number;
    yStart?: number;
    yEnd?: number;
  }): void;
  addOpening(opening: {
    name: string;
    xStart: number;
    yStart: number;
    width: number;
    height: number;
    tie?: number;
  }): void;
  addFlange(flange: {
    thickness: number;
    width: number;
    x: number;
    yStart: number;
    yEnd: number;
    material: string;
    side: "NS" | "FS";
  }): void;
  addSupport(support: { elevation: number; xStart?: number; xEnd?: number }): void;
  addStory(story: { name: string; elevation: number; xStart?: number; xEnd?: number }): void;
  addShear(storyName: string, force: number, loadCase: string): void;
  addAxial(storyName: string, force: number, loadCase: string): void;

  /** Meshes the wall and identifies piers and coupling beams. */
  generate(): void;
  analyze(options?: AnalysisOptions): void;

  readonly loadCombos: ReadonlyMap<string, ReadonlyMap<string, number>>;
  readonly piers: ReadonlyMap<string, Pier>;
  readonly couplingBeams: ReadonlyMap<string, CouplingBeam>;
  /** Story names in the order they were added. */
  readonly stories: readonly string[];
  stiffness(storyName: string): number;
}

/** Injected capability: the factory for solver objects. */
export interface StructuralSolver {
  createModel(): FiniteElementModel;
  createShearWall(geometry: ShearWallGeometry): ShearWallModel;
}
