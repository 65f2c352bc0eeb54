export { StaticTables } from "./static-tables";
export type { StageEntry, NamedId, CssCharacterEntry, ZeroIndexedEntry, StaticTableData } from "./static-tables";
export { loadStaticTables, readStaticTableData } from "./load-tables";
