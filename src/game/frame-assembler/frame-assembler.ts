import { playerDistance } from "../../protocol/decoders/frame-bookend";
import type { PostFrameCorrector } from "../post-frame-corrector";
import type { DecoderSession } from "../session";
import { createSnapshot, type Snapshot } from "../snapshot";

/**
 * Outcome of completing the in-progress frame.
 */
export type AssembledFrame =
  | { kind: "emitted"; snapshot: Snapshot }
  /** The frame index did not advance past the last delivered one */
  | { kind: "dropped"; frame: number }
  /** Nothing was decoded since the last completion */
  | { kind: "empty" };

/**
 * Owns the snapshot under construction and the last emitted one.
 */
export class FrameAssembler {
  private current: Snapshot | null = null;
  private previous: Snapshot | null = null;

  constructor(
    private readonly session: DecoderSession,
    private readonly corrector: PostFrameCorrector
  ) {}

  /**
   * The in-progress snapshot, created on first use.
   */
  snapshot(): Snapshot {
    if (!this.current) {
      this.current = createSnapshot();
    }
    return this.current;
  }

  get inProgress(): boolean {
    return this.current !== null;
  }

  /** Last gameplay snapshot handed out, used for lookback */
  get lastEmitted(): Snapshot | null {
    return this.previous;
  }

  completeFrame(): AssembledFrame {
    const snapshot = this.current;
    this.current = null;
    if (!snapshot) return { kind: "empty" };

    if (snapshot.frame <= this.session.lastDeliveredFrame) {
      return { kind: "dropped", frame: snapshot.frame };
    }

    this.corrector.correct(snapshot, this.previous);
    snapshot.distance = playerDistance(snapshot);

    this.session.lastDeliveredFrame = snapshot.frame;
    this.previous = snapshot;
    return { kind: "emitted", snapshot };
  }

  /**
   * Menu frames are never compared against gameplay frame indices.
   */
  completeMenuFrame(): AssembledFrame {
    const snapshot = this.current;
    this.current = null;
    if (!snapshot) return { kind: "empty" };

    this.corrector.applyFixups(snapshot);
    return { kind: "emitted", snapshot };
  }

  /**
   * Forget the in-progress and previous snapshots.
   */
  reset(): void {
    this.current = null;
    this.previous = null;
  }
}
