export { EventSizeTable } from "./event-size-table";
