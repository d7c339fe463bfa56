export type DiagnosticCode =
  | "plate-node-count"
  | "member-not-found"
  | "node-not-found"
  | "member-point-load"
  | "plate-not-found"
  | "plate-not-translated"
  | "pressure-axis-ignored";

/** A non-fatal translation problem. The entity named was skipped or partly applied. */
export interface Diagnostic {
  code: DiagnosticCode;
  /** Key of the offending entity in its model collection. */
  entity: string;
  message: string;
}
