// src/engine/geometry.ts
import type { Node } from "./schema";
import type { Vec3 } from "./types";

export function length3(a: Vec3, b: Vec3) {
  return Math.hypot(b[0]-a[0], b[1]-a[1], b[2]-a[2]);
}

export const toVec3 = (n: Node): Vec3 => [n.x, n.y, n.z];

export function memberLength(a: Node, b: Node) {
  return length3(toVec3(a), toVec3(b));
}

/** Absolute distance from node A for a load position given as a percentage of member length. */
export function positionAlong(length: number, percent: number) {
  return length * percent / 100;
}
