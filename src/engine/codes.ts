import { DOF_ORDER, type DofFlags, type EndSuffix, type MemberReleases, type ReleaseName } from "./types";

const RELEASE_STEMS = ["Dx", "Dy", "Dz", "Rx", "Ry", "Rz"] as const;

/**
 * Decodes a support restraint code such as "TTTFFF".
 * Position k maps to DOF_ORDER[k]; 'T' (either case) means restrained, anything else is free.
 * Missing positions read as free.
 */
export function parseRestraintCode(code: string): DofFlags {
  const at = (k: number) => (code[k] ?? "").toUpperCase() === "T";
  return { DX: at(0), DY: at(1), DZ: at(2), RX: at(3), RY: at(4), RZ: at(5) };
}

/**
 * Decodes one member end fixity code ("FFFFFR" releases Rz) into solver release flags
 * suffixed with the end ('i' = node A, 'j' = node B). Codes shorter than six
 * characters produce no releases at all.
 */
export function parseFixityCode(code: string, end: EndSuffix): MemberReleases {
  if (code.length < 6) return {};
  const releases: MemberReleases = {};
  RELEASE_STEMS.forEach((stem, k) => {
    const name: ReleaseName = `${stem}${end}`;
    releases[name] = code[k].toUpperCase() === "R";
  });
  return releases;
}

export function isRestrained(flags: DofFlags): boolean {
  return DOF_ORDER.some((dof) => flags[dof]);
}
