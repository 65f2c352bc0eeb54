export { decodeSessionStart, MINIMUM_VERSION, type SessionStartInfo } from "./session-start";
export { decodePreFrame, decodeButtons, normalizeStick, BUTTON_MASKS, PRE_FRAME_OFFSETS } from "./pre-frame";
export { decodePostFrame, POST_FRAME_OFFSETS } from "./post-frame";
export { decodeItemUpdate, toOwner, ITEM_UPDATE_OFFSETS } from "./item-update";
export { decodeFrameBookend, playerDistance } from "./frame-bookend";
export { decodeSessionEnd, type SessionEndInfo } from "./session-end";
export { decodeMenuFrame, sceneToMenu, cpuLevelFromSlider, MENU_FRAME_OFFSETS } from "./menu-frame";
