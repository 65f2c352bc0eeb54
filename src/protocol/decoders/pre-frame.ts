import { BinaryCodec, type RecordView } from "../../core/binary-codec";
import { Button, toPort } from "../../game/enums";
import type { DecoderSession } from "../../game/session";
import { playerAt, type ControllerState, type Snapshot } from "../../game/snapshot";

export const PRE_FRAME_OFFSETS = {
  frame: 0x1,
  port: 0x5,
  mainStickX: 0x19,
  mainStickY: 0x1d,
  cStickX: 0x21,
  cStickY: 0x25,
  buttons: 0x31,
  lShoulder: 0x33,
  rShoulder: 0x37,
} as const;

/** Bit of each button in the physical button bitmask */
export const BUTTON_MASKS: ReadonlyArray<readonly [Button, number]> = [
  [Button.BUTTON_D_LEFT, 0x0001],
  [Button.BUTTON_D_RIGHT, 0x0002],
  [Button.BUTTON_D_DOWN, 0x0004],
  [Button.BUTTON_D_UP, 0x0008],
  [Button.BUTTON_Z, 0x0010],
  [Button.BUTTON_R, 0x0020],
  [Button.BUTTON_L, 0x0040],
  [Button.BUTTON_A, 0x0100],
  [Button.BUTTON_B, 0x0200],
  [Button.BUTTON_X, 0x0400],
  [Button.BUTTON_Y, 0x0800],
  [Button.BUTTON_START, 0x1000],
];

/**
 * Maps a raw stick axis in [-1, 1] onto [0, 1].
 */
export function normalizeStick(raw: number): number {
  return raw / 2 + 0.5;
}

export function decodeButtons(bits: number, into: ControllerState["button"]): void {
  for (const [button, mask] of BUTTON_MASKS) {
    into[button] = (bits & mask) !== 0;
  }
}

/**
 * Decodes a pre-frame update: the controller inputs for one port.
 * Records for ports outside 1..4 are ignored.
 */
export function decodePreFrame(session: DecoderSession, record: RecordView, snapshot: Snapshot): void {
  const port = toPort(record.read(BinaryCodec.u8, PRE_FRAME_OFFSETS.port));
  if (port === null) return;

  const player = playerAt(snapshot, port);
  player.costume = session.costumes[port - 1];
  player.cpuLevel = session.cpuLevels[port - 1];

  const controller = player.controllerState;
  controller.mainStick = {
    x: normalizeStick(record.read(BinaryCodec.f32, PRE_FRAME_OFFSETS.mainStickX)),
    y: normalizeStick(record.read(BinaryCodec.f32, PRE_FRAME_OFFSETS.mainStickY)),
  };
  controller.cStick = {
    x: normalizeStick(record.read(BinaryCodec.f32, PRE_FRAME_OFFSETS.cStickX)),
    y: normalizeStick(record.read(BinaryCodec.f32, PRE_FRAME_OFFSETS.cStickY)),
  };
  decodeButtons(record.read(BinaryCodec.u16, PRE_FRAME_OFFSETS.buttons), controller.button);
  controller.lShoulder = record.readOr(BinaryCodec.f32, PRE_FRAME_OFFSETS.lShoulder, 0);
  controller.rShoulder = record.readOr(BinaryCodec.f32, PRE_FRAME_OFFSETS.rShoulder, 0);
}
