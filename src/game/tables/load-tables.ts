import { readFileSync } from "node:fs";
import { join } from "node:path";
import { fileURLToPath } from "node:url";
import { z } from "zod";
import { Character, Stage } from "../enums";
import { StaticTables, type StaticTableData } from "./static-tables";

const DEFAULT_DATA_DIR = fileURLToPath(new URL("./data/", import.meta.url));

const byte = z.number().int().min(0).max(0xff);
const halfword = z.number().int().min(0).max(0xffff);

const StagesFile = z.array(
  z.object({
    name: z.string(),
    externalId: halfword,
    stage: z.nativeEnum(Stage),
    edgeGroundPosition: z.number().positive().optional(),
  })
);

const NamedIdsFile = z.array(
  z.object({
    id: halfword,
    name: z.string().min(1),
  })
);

const CssCharactersFile = z.array(
  z.object({
    cssId: byte,
    character: z.nativeEnum(Character),
  })
);

const ZeroIndexedFile = z.array(
  z.object({
    character: z.nativeEnum(Character),
    actions: z.array(halfword),
  })
);

function readTable<T>(dir: string, file: string, schema: z.ZodType<T>): T {
  const path = join(dir, file);
  const parsed = schema.safeParse(JSON.parse(readFileSync(path, "utf8")));
  if (!parsed.success) {
    throw new Error(`Invalid static table ${path}: ${parsed.error.message}`);
  }
  return parsed.data;
}

/**
 * Reads and validates the raw table files in `dir`.
 */
export function readStaticTableData(dir: string = DEFAULT_DATA_DIR): StaticTableData {
  return {
    stages: readTable(dir, "stages.json", StagesFile),
    actions: readTable(dir, "actions.json", NamedIdsFile),
    cssCharacters: readTable(dir, "css-characters.json", CssCharactersFile),
    projectiles: readTable(dir, "projectiles.json", NamedIdsFile),
    zeroIndexedActions: readTable(dir, "zero-indexed-actions.json", ZeroIndexedFile),
  };
}

/**
 * Loads the static tables once. Pass a directory to use a different set of
 * table files with the same layout.
 */
export function loadStaticTables(dir?: string): StaticTables {
  return new StaticTables(readStaticTableData(dir));
}
