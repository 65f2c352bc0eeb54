export { BinaryCodec, BinaryPrimitives, RecordView } from "./binary-codec";
export type { Field } from "./binary-codec";
