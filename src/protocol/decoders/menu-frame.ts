import { BinaryCodec, type RecordView } from "../../core/binary-codec";
import {
  Character,
  ControllerStatus,
  Menu,
  PORTS,
  Stage,
  SubMenu,
  isControllerStatus,
  isSubMenu,
} from "../../game/enums";
import type { DecoderSession } from "../../game/session";
import { createPlayerState, type Snapshot } from "../../game/snapshot";

export const MENU_FRAME_OFFSETS = {
  scene: 0x1,
  /** Cursor x of port 1; y follows at +4, ports repeat every 8 bytes */
  cursor: 0x3,
  readyToStart: 0x23,
  stage: 0x24,
  controllerStatus: 0x25,
  characterSelected: 0x29,
  /** Shared by the coin-down and CPU-slider checks */
  coinState: 0x2d,
  stageSelectCursorX: 0x31,
  stageSelectCursorY: 0x35,
  frame: 0x39,
  submenu: 0x3d,
  menuSelection: 0x3e,
  onlineCostume: 0x3f,
  nameTag: 0x40,
} as const;

const CURSOR_STRIDE = 8;
const COIN_DOWN = 2;
const NAME_TAG_ENTRY = 0x05;
const NAME_TAG_CSS = 0x00;

/** CPU-level slider: left end of port 1's slider and the per-port spacing */
const SLIDER_START_X = -30.9;
const SLIDER_PORT_SPACING = 15.4;
const SLIDER_STEP = 1.2;

export function sceneToMenu(scene: number): Menu {
  switch (scene) {
    case 0x0002:
      return Menu.CHARACTER_SELECT;
    case 0x0102:
    case 0x0108:
      return Menu.STAGE_SELECT;
    case 0x0202:
      return Menu.IN_GAME;
    case 0x0001:
      return Menu.MAIN_MENU;
    case 0x0008:
      return Menu.SLIPPI_ONLINE_CSS;
    case 0x0000:
      return Menu.PRESS_START;
    default:
      return Menu.UNKNOWN_MENU;
  }
}

/**
 * CPU level shown by a slider dragged to `cursorX` on zero-based port `index`.
 */
export function cpuLevelFromSlider(index: number, cursorX: number): number {
  const startX = SLIDER_START_X + SLIDER_PORT_SPACING * index;
  return 1 + Math.trunc((cursorX - startX) / SLIDER_STEP);
}

/**
 * Decodes a menu frame into the snapshot.
 *
 * Menu records have grown over protocol revisions, so every read here
 * tolerates a short record.
 */
export function decodeMenuFrame(session: DecoderSession, record: RecordView, snapshot: Snapshot): void {
  const { tables } = session;
  const menu = sceneToMenu(record.readOr(BinaryCodec.u16, MENU_FRAME_OFFSETS.scene, -1));
  snapshot.menuState = menu;

  const characterSelect = menu === Menu.CHARACTER_SELECT || menu === Menu.SLIPPI_ONLINE_CSS;
  if (characterSelect) {
    for (const port of PORTS) {
      const i = port - 1;
      const player = createPlayerState();
      snapshot.players.set(port, player);

      const status = record.readOr(BinaryCodec.u8, MENU_FRAME_OFFSETS.controllerStatus + i, -1);
      player.controllerStatus = isControllerStatus(status) ? status : ControllerStatus.CONTROLLER_UNPLUGGED;

      const cursorOffset = MENU_FRAME_OFFSETS.cursor + CURSOR_STRIDE * i;
      player.cursor = {
        x: record.readOr(BinaryCodec.f32, cursorOffset, 0),
        y: record.readOr(BinaryCodec.f32, cursorOffset + 4, 0),
      };

      const character = record.readOr(BinaryCodec.u8, MENU_FRAME_OFFSETS.characterSelected + i, null);
      player.characterSelected =
        character === null ? Character.UNKNOWN_CHARACTER : tables.characterFromCss(character);
      player.coinDown = record.readOr(BinaryCodec.u8, MENU_FRAME_OFFSETS.coinState + i, 0) === COIN_DOWN;
    }
    snapshot.readyToStart = record.readOr(BinaryCodec.u8, MENU_FRAME_OFFSETS.readyToStart, 0) !== 0;
  }

  if (menu === Menu.STAGE_SELECT) {
    const stage = record.readOr(BinaryCodec.u8, MENU_FRAME_OFFSETS.stage, null);
    snapshot.stage = stage === null ? Stage.NO_STAGE : tables.stageFromInternalId(stage);
    snapshot.stageSelectCursor = {
      x: record.readOr(BinaryCodec.f32, MENU_FRAME_OFFSETS.stageSelectCursorX, 0),
      y: record.readOr(BinaryCodec.f32, MENU_FRAME_OFFSETS.stageSelectCursorY, 0),
    };
  }

  snapshot.frame = record.readOr(BinaryCodec.i32, MENU_FRAME_OFFSETS.frame, 0);
  const submenu = record.readOr(BinaryCodec.u8, MENU_FRAME_OFFSETS.submenu, -1);
  snapshot.submenu = isSubMenu(submenu) ? submenu : SubMenu.UNKNOWN_SUBMENU;
  snapshot.menuSelection = record.readOr(BinaryCodec.u8, MENU_FRAME_OFFSETS.menuSelection, 0);

  if (menu === Menu.SLIPPI_ONLINE_CSS) {
    decodeOnlineCharacterSelect(record, snapshot);
  }
}

function decodeOnlineCharacterSelect(record: RecordView, snapshot: Snapshot): void {
  const costume = record.readOr(BinaryCodec.u8, MENU_FRAME_OFFSETS.onlineCostume, null);

  const nameTag = record.readOr(BinaryCodec.u8, MENU_FRAME_OFFSETS.nameTag, null);
  if (nameTag === NAME_TAG_ENTRY) {
    snapshot.submenu = SubMenu.NAME_ENTRY_SUBMENU;
  } else if (nameTag === NAME_TAG_CSS) {
    snapshot.submenu = SubMenu.ONLINE_CSS;
  }

  for (const [port, player] of snapshot.players) {
    const i = port - 1;
    if (costume !== null) player.costume = costume;

    const sliderFlag = record.readOr(BinaryCodec.u8, MENU_FRAME_OFFSETS.coinState + i, 0);
    player.isHoldingCpuSlider = player.cursor.y < 0 && sliderFlag !== 0;
    player.cpuLevel = player.isHoldingCpuSlider ? cpuLevelFromSlider(i, player.cursor.x) : 1;

    if (player.controllerStatus !== ControllerStatus.CONTROLLER_CPU) {
      player.cpuLevel = 0;
    }
  }
}
