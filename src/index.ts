export * from "./engine/schema";
export * from "./engine/model";
export * from "./engine/results";
export * from "./engine/resultFactories";
export * from "./engine/codes";
export * from "./engine/geometry";
export * from "./engine/errors";
export * from "./engine/schedule";
export * from "./engine/translator";
export * from "./engine/solver";
export * from "./engine/types";
export * from "./engine/diagnostics";
export { createModelStore } from "./store/modelStore";
export type { Collection, DraftEntities, EntityInputs, ModelDraft, ModelStore, ModelStoreState } from "./store/modelStore";
export { parseModelJson, readModel, writeModel, toCsv, writeCsv } from "./utils/fileio";
export { createLogger } from "./utils/logger";
export type { Logger, LogContext } from "./utils/logger";
export { loadConfig, DEFAULT_CONFIG } from "./utils/config";
export type { Config } from "./utils/config";
