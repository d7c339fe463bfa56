// src/engine/types.ts
// Direction tags and DOF names shared between the model, the decoders and the solver API.

export type Vec3 = [number, number, number];

export const DOF_ORDER = ["DX", "DY", "DZ", "RX", "RY", "RZ"] as const;
export type Dof = typeof DOF_ORDER[number];
export type DofFlags = Record<Dof, boolean>;

export type EndSuffix = "i" | "j";
export type ReleaseName = `${"Dx" | "Dy" | "Dz" | "Rx" | "Ry" | "Rz"}${EndSuffix}`;
export type MemberReleases = Partial<Record<ReleaseName, boolean>>;

export type ForceDirection = "FX" | "FY" | "FZ";
export type MomentDirection = "MX" | "MY" | "MZ";
export type NodalLoadDirection = ForceDirection | MomentDirection;
export type LocalForceDirection = "Fx" | "Fy" | "Fz";
export type MemberLoadDirection = ForceDirection | LocalForceDirection;

export type AnalysisType = "linear" | "pdelta" | "nonlinear";
export type AnalysisLabel = "Linear" | "P-Delta" | "Nonlinear TC";

export interface AnalysisOptions {
  log?: boolean;
  checkStability?: boolean;
  checkStatics?: boolean;
}
