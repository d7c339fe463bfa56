import { fileURLToPath } from "node:url";
import { readModel } from "../utils/fileio";
import type { Model } from "../engine/schema";

export const TWO_STOREY_PATH = fileURLToPath(new URL("./two-storey.json", import.meta.url));

/**
 * Two-storey, single-bay steel frame (6 m x 4 m plan, 3 m storeys) with concrete floor
 * slabs, fixed bases, dead/live/wind loading, three combinations and two shear walls.
 */
export function loadTwoStoreyModel(): Promise<Model> {
  return readModel(TWO_STOREY_PATH);
}
