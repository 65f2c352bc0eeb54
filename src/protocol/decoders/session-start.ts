import { BinaryCodec, type RecordView } from "../../core/binary-codec";
import type { Stage } from "../../game/enums";
import type { DecoderSession } from "../../game/session";
import { UnsupportedVersionError } from "../errors";

export const MINIMUM_VERSION = "3.0.0";

const MINIMUM_MAJOR = 3;

const VERSION_MAJOR = 0x1;
const VERSION_MINOR = 0x2;
const VERSION_BUILD = 0x3;
const STAGE = 0x13;

/** Per-port blocks repeat at this stride */
const PORT_STRIDE = 0x24;
const PLAYER_TYPE = 0x66;
const COSTUME = 0x68;
const CPU_LEVEL = 0x74;

/** Player type value of a CPU-controlled port */
const PLAYER_TYPE_CPU = 1;

export interface SessionStartInfo {
  version: string;
  legacyBookends: boolean;
  stage: Stage;
}

/**
 * Decodes a session-start record into the session.
 *
 * Selects legacy-bookend mode for old streams and fills the per-port costume
 * and CPU side tables that pre-frame updates copy into players.
 *
 * @throws UnsupportedVersionError when the stream is too old and the session
 *   was not created with `allowOldVersion`
 */
export function decodeSessionStart(session: DecoderSession, record: RecordView): SessionStartInfo {
  const major = record.read(BinaryCodec.u8, VERSION_MAJOR);
  const minor = record.read(BinaryCodec.u8, VERSION_MINOR);
  const build = record.read(BinaryCodec.u8, VERSION_BUILD);
  const version = `${major}.${minor}.${build}`;

  const belowMinimum = major < MINIMUM_MAJOR;
  if (belowMinimum && !session.options.allowOldVersion) {
    throw new UnsupportedVersionError(version, MINIMUM_VERSION);
  }

  session.version = version;
  session.legacyBookends = belowMinimum;
  session.resetFrames();
  session.stage = session.tables.stageFromExternalId(record.read(BinaryCodec.u16, STAGE));

  for (let i = 0; i < 4; i++) {
    const base = PORT_STRIDE * i;
    session.costumes[i] = record.readOr(BinaryCodec.u8, COSTUME + base, 0);
    const isCpu = record.readOr(BinaryCodec.u8, PLAYER_TYPE + base, 0) === PLAYER_TYPE_CPU;
    session.cpuLevels[i] = isCpu ? record.readOr(BinaryCodec.u8, CPU_LEVEL + base, 0) : 0;
  }

  return { version, legacyBookends: session.legacyBookends, stage: session.stage };
}
