// src/utils/fileio.ts
import { readFile, writeFile } from "node:fs/promises";
import { parseEntity, serializeModel } from "../engine/model";
import { ModelSchema, type Model } from "../engine/schema";

/** Parses model JSON text; schema failures surface as ValidationError. */
export function parseModelJson(text: string): Model {
  const json: unknown = JSON.parse(text);
  return parseEntity(ModelSchema, json, "model");
}

export async function readModel(path: string): Promise<Model> {
  const text = await readFile(path, "utf8");
  return parseModelJson(text);
}

export async function writeModel(path: string, model: Model): Promise<void> {
  await writeFile(path, JSON.stringify(serializeModel(model), null, 2) + "\n", "utf8");
}

const csvCell = (value: string) => (/[",\n]/.test(value) ? `"${value.replace(/"/g, '""')}"` : value);

export function toCsv(rows: readonly (readonly string[])[]): string {
  return rows.map((r) => r.map(csvCell).join(",")).join("\n");
}

export async function writeCsv(path: string, rows: readonly (readonly string[])[]): Promise<void> {
  await writeFile(path, toCsv(rows) + "\n", "utf8");
}
