import { EventSizeTable } from "../../protocol/event-size-table";
import { Stage } from "../enums";
import { FRAME_NOT_STARTED } from "../snapshot";
import type { StaticTables } from "../tables/static-tables";

export interface DecoderSessionOptions {
  /** Accept streams older than the minimum version, using legacy bookends */
  allowOldVersion: boolean;
}

/**
 * All mutable state of one decoded stream.
 *
 * Every decoder receives the session explicitly; nothing is shared between
 * two streams decoded side by side.
 */
export class DecoderSession {
  readonly eventSizes = new EventSizeTable();

  /** Costume per zero-based port, from session start */
  readonly costumes: number[] = [0, 0, 0, 0];
  /** CPU level per zero-based port, from session start (0 for humans) */
  readonly cpuLevels: number[] = [0, 0, 0, 0];

  stage: Stage = Stage.NO_STAGE;
  version = "unknown";
  /** Synthesize frame boundaries from frame-index changes */
  legacyBookends = false;

  /** Latest frame index seen on a pre/post update (legacy mode only) */
  lastSeenFrame = FRAME_NOT_STARTED;
  /** Index of the last gameplay frame handed to the caller */
  lastDeliveredFrame = FRAME_NOT_STARTED;

  constructor(
    readonly tables: StaticTables,
    readonly options: DecoderSessionOptions
  ) {}

  /**
   * Forget frame progress, as happens at every session start.
   */
  resetFrames(): void {
    this.lastSeenFrame = FRAME_NOT_STARTED;
    this.lastDeliveredFrame = FRAME_NOT_STARTED;
  }
}
