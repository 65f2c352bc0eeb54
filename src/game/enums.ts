/**
 * Controller port. The protocol encodes ports zero-based; everything past the
 * decoders uses 1..4.
 */
export type Port = 1 | 2 | 3 | 4;

export const PORTS: readonly Port[] = [1, 2, 3, 4];

/**
 * Converts a zero-based port byte into a {@link Port}, or null when the byte
 * is out of range.
 */
export function toPort(raw: number): Port | null {
  switch (raw + 1) {
    case 1:
      return 1;
    case 2:
      return 2;
    case 3:
      return 3;
    case 4:
      return 4;
    default:
      return null;
  }
}

/**
 * Internal stage ids.
 * Session-start records carry external ids, which the stage table maps here.
 */
export enum Stage {
  NO_STAGE = 0,
  YOSHIS_STORY = 0x06,
  FOUNTAIN_OF_DREAMS = 0x08,
  POKEMON_STADIUM = 0x12,
  BATTLEFIELD = 0x18,
  FINAL_DESTINATION = 0x19,
  DREAMLAND = 0x1a,
  RANDOM_STAGE = 0x1d,
}

/**
 * Internal character ids, as carried by post-frame updates.
 * The character-select screen uses a different ordering; see the CSS table.
 */
export enum Character {
  MARIO = 0,
  FOX = 1,
  CPTFALCON = 2,
  DK = 3,
  KIRBY = 4,
  BOWSER = 5,
  LINK = 6,
  SHEIK = 7,
  NESS = 8,
  PEACH = 9,
  POPO = 10,
  NANA = 11,
  PIKACHU = 12,
  SAMUS = 13,
  YOSHI = 14,
  JIGGLYPUFF = 15,
  MEWTWO = 16,
  LUIGI = 17,
  MARTH = 18,
  ZELDA = 19,
  YLINK = 20,
  DOC = 21,
  FALCO = 22,
  PICHU = 23,
  GAMEANDWATCH = 24,
  GANONDORF = 25,
  ROY = 26,
  WIREFRAME_MALE = 29,
  WIREFRAME_FEMALE = 30,
  GIGA_BOWSER = 31,
  SANDBAG = 32,
  UNKNOWN_CHARACTER = 255,
}

/**
 * Action-state ids the decoder itself reasons about.
 * The full id → name table is data (see tables/data/actions.json).
 */
export enum Action {
  ON_HALO_DESCENT = 0x0c,
  ON_HALO_WAIT = 0x0d,
  STANDING = 0x0e,
  TURNING = 0x12,
  DASHING = 0x14,
  /** First action of the contiguous standard-attack block */
  NEUTRAL_ATTACK_1 = 0x2c,
  /** Last action of the contiguous standard-attack block */
  DAIR = 0x45,
  EDGE_CATCHING = 0xfc,
  UNKNOWN_ANIMATION = 0xffff,
}

/** Subtype assigned to item ids missing from the projectile table */
export const UNKNOWN_PROJECTILE = -1;

/** Owner assigned to projectiles that do not belong to a port */
export const NO_OWNER = -1;

export enum Menu {
  IN_GAME = "IN_GAME",
  CHARACTER_SELECT = "CHARACTER_SELECT",
  STAGE_SELECT = "STAGE_SELECT",
  MAIN_MENU = "MAIN_MENU",
  SLIPPI_ONLINE_CSS = "SLIPPI_ONLINE_CSS",
  PRESS_START = "PRESS_START",
  UNKNOWN_MENU = "UNKNOWN_MENU",
}

export enum SubMenu {
  MAIN_MENU_SUBMENU = 0,
  ONE_PLAYER_SUBMENU = 1,
  VS_MODE_SUBMENU = 2,
  TROPHIES_SUBMENU = 3,
  OPTIONS_SUBMENU = 4,
  DATA_SUBMENU = 5,
  ONLINE_PLAY_SUBMENU = 8,
  NAME_ENTRY_SUBMENU = 11,
  ONLINE_CSS = 12,
  UNKNOWN_SUBMENU = 255,
}

export enum ControllerStatus {
  CONTROLLER_HUMAN = 0,
  CONTROLLER_CPU = 1,
  CONTROLLER_UNPLUGGED = 3,
}

export enum Button {
  BUTTON_A = "A",
  BUTTON_B = "B",
  BUTTON_X = "X",
  BUTTON_Y = "Y",
  BUTTON_Z = "Z",
  BUTTON_L = "L",
  BUTTON_R = "R",
  BUTTON_START = "START",
  BUTTON_D_UP = "D_UP",
  BUTTON_D_DOWN = "D_DOWN",
  BUTTON_D_LEFT = "D_LEFT",
  BUTTON_D_RIGHT = "D_RIGHT",
}

function numericMembers<E extends number>(values: ReadonlyArray<string | E>): Set<number> {
  const members = new Set<number>();
  for (const value of values) {
    if (typeof value === "number") members.add(value);
  }
  return members;
}

const stageIds = numericMembers(Object.values(Stage));
const characterIds = numericMembers(Object.values(Character));
const subMenuIds = numericMembers(Object.values(SubMenu));
const controllerStatusIds = numericMembers(Object.values(ControllerStatus));

export function isStage(value: number): value is Stage {
  return stageIds.has(value);
}

export function isCharacter(value: number): value is Character {
  return characterIds.has(value);
}

export function isSubMenu(value: number): value is SubMenu {
  return subMenuIds.has(value);
}

export function isControllerStatus(value: number): value is ControllerStatus {
  return controllerStatusIds.has(value);
}
