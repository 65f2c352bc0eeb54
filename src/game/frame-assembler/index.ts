export { FrameAssembler, type AssembledFrame } from "./frame-assembler";
