export {
  PostFrameCorrector,
  isOffStage,
  RESPAWN_INVULNERABILITY,
  LEDGE_INVULNERABILITY,
  MATCH_START_FRAME,
  OFF_STAGE_HEIGHT,
} from "./post-frame-corrector";
