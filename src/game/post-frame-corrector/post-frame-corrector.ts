import { Action } from "../enums";
import type { PlayerState, Snapshot } from "../snapshot";
import type { StaticTables } from "../tables/static-tables";

/** Frames of invulnerability granted on the respawn platform */
export const RESPAWN_INVULNERABILITY = 120;
/** Frames of invulnerability granted when grabbing the ledge */
export const LEDGE_INVULNERABILITY = 36;
/** The descent at match start is not a respawn */
export const MATCH_START_FRAME = 150;
/** Players below this height are under the stage */
export const OFF_STAGE_HEIGHT = -6;

/**
 * Derives the stateful per-player fields that no single record carries,
 * using the previously emitted snapshot for lookback.
 */
export class PostFrameCorrector {
  constructor(private readonly tables: StaticTables) {}

  /**
   * Runs the lookback corrections and then the global fixups on a gameplay
   * frame that is about to be emitted.
   */
  correct(snapshot: Snapshot, previous: Snapshot | null): void {
    const edge = this.tables.edgeGroundPosition(snapshot.stage);

    for (const [port, player] of snapshot.players) {
      const before = previous?.players.get(port);
      player.invulnerabilityLeft = this.invulnerabilityLeft(snapshot.frame, player, before);
      player.moonwalkWarning = this.moonwalkWarning(player, before);
      player.offStage = isOffStage(player, edge);
    }

    this.applyFixups(snapshot);
  }

  /**
   * Fixups that hold for every emitted frame, menus included.
   */
  applyFixups(snapshot: Snapshot): void {
    for (const player of snapshot.players.values()) {
      if (this.tables.isZeroIndexed(player.character, player.action)) {
        player.actionFrame += 1;
      }
      // The engine only maintains the flag for standard attacks
      if (player.action < Action.NEUTRAL_ATTACK_1 || player.action > Action.DAIR) {
        player.interruptible = false;
      }
    }
  }

  private invulnerabilityLeft(frame: number, player: PlayerState, before: PlayerState | undefined): number {
    if (player.action === Action.ON_HALO_WAIT) return RESPAWN_INVULNERABILITY;
    if (player.action === Action.ON_HALO_DESCENT && frame > MATCH_START_FRAME) {
      return RESPAWN_INVULNERABILITY;
    }
    if (player.action === Action.EDGE_CATCHING && player.actionFrame === 1) {
      return LEDGE_INVULNERABILITY;
    }
    return before ? Math.max(0, before.invulnerabilityLeft - 1) : 0;
  }

  private moonwalkWarning(player: PlayerState, before: PlayerState | undefined): boolean {
    if (player.action !== Action.DASHING || !before) return false;
    return before.action !== Action.DASHING && before.action !== Action.TURNING;
  }
}

export function isOffStage(player: PlayerState, edge: number | undefined): boolean {
  if (edge === undefined) return false;
  return Math.abs(player.x) > edge && player.y < OFF_STAGE_HEIGHT && !player.onGround;
}
