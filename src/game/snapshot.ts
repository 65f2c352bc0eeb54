import {
  Action,
  Button,
  Character,
  ControllerStatus,
  Menu,
  Stage,
  SubMenu,
  UNKNOWN_PROJECTILE,
  NO_OWNER,
  type Port,
} from "./enums";

/** Frame index of a snapshot that has not received any gameplay data */
export const FRAME_NOT_STARTED = -10000;

export interface Vec2 {
  x: number;
  y: number;
}

export interface ControllerState {
  /** Main stick, each axis normalized to [0, 1] with 0.5 at rest */
  mainStick: Vec2;
  /** C-stick, each axis normalized to [0, 1] with 0.5 at rest */
  cStick: Vec2;
  /** Physical analog shoulder values */
  lShoulder: number;
  rShoulder: number;
  button: Record<Button, boolean>;
}

export interface PlayerState {
  x: number;
  y: number;
  /** true when facing right */
  facing: boolean;
  character: Character;
  action: number;
  actionFrame: number;
  percent: number;
  stock: number;
  shieldStrength: number;
  costume: number;
  cpuLevel: number;

  hitlag: boolean;
  hitstunFramesLeft: number;
  onGround: boolean;
  jumpsLeft: number;
  invulnerable: boolean;
  invulnerabilityLeft: number;
  moonwalkWarning: boolean;
  offStage: boolean;
  /** IASA window flag */
  interruptible: boolean;

  speedAirXSelf: number;
  speedYSelf: number;
  speedXAttack: number;
  speedYAttack: number;
  speedGroundXSelf: number;

  ecbTop: Vec2;
  ecbBottom: Vec2;
  ecbLeft: Vec2;
  ecbRight: Vec2;

  controllerState: ControllerState;

  // Menu-only
  cursor: Vec2;
  characterSelected: Character;
  coinDown: boolean;
  controllerStatus: ControllerStatus;
  isHoldingCpuSlider: boolean;
}

export interface Projectile {
  x: number;
  y: number;
  speedX: number;
  speedY: number;
  /** Owning port, or -1 */
  owner: number;
  subtype: number;
}

/**
 * State of the game on a single frame.
 *
 * Built incrementally while records for the frame arrive, then handed to the
 * caller once the frame completes. Callers should treat emitted snapshots as
 * read-only: the decoder keeps the latest one for lookback.
 */
export interface Snapshot {
  frame: number;
  stage: Stage;
  menuState: Menu;
  players: Map<Port, PlayerState>;
  projectiles: Projectile[];
  /** Distance between the two lowest-numbered active ports */
  distance: number;

  // Menu-only
  submenu: SubMenu;
  menuSelection: number;
  readyToStart: boolean;
  stageSelectCursor: Vec2;
}

export function createControllerState(): ControllerState {
  return {
    mainStick: { x: 0.5, y: 0.5 },
    cStick: { x: 0.5, y: 0.5 },
    lShoulder: 0,
    rShoulder: 0,
    button: {
      [Button.BUTTON_A]: false,
      [Button.BUTTON_B]: false,
      [Button.BUTTON_X]: false,
      [Button.BUTTON_Y]: false,
      [Button.BUTTON_Z]: false,
      [Button.BUTTON_L]: false,
      [Button.BUTTON_R]: false,
      [Button.BUTTON_START]: false,
      [Button.BUTTON_D_UP]: false,
      [Button.BUTTON_D_DOWN]: false,
      [Button.BUTTON_D_LEFT]: false,
      [Button.BUTTON_D_RIGHT]: false,
    },
  };
}

export function createPlayerState(): PlayerState {
  return {
    x: 0,
    y: 0,
    facing: true,
    character: Character.UNKNOWN_CHARACTER,
    action: Action.UNKNOWN_ANIMATION,
    actionFrame: 0,
    percent: 0,
    stock: 0,
    shieldStrength: 60,
    costume: 0,
    cpuLevel: 0,

    hitlag: false,
    hitstunFramesLeft: 0,
    onGround: true,
    jumpsLeft: 1,
    invulnerable: false,
    invulnerabilityLeft: 0,
    moonwalkWarning: false,
    offStage: false,
    interruptible: false,

    speedAirXSelf: 0,
    speedYSelf: 0,
    speedXAttack: 0,
    speedYAttack: 0,
    speedGroundXSelf: 0,

    ecbTop: { x: 0, y: 0 },
    ecbBottom: { x: 0, y: 0 },
    ecbLeft: { x: 0, y: 0 },
    ecbRight: { x: 0, y: 0 },

    controllerState: createControllerState(),

    cursor: { x: 0, y: 0 },
    characterSelected: Character.UNKNOWN_CHARACTER,
    coinDown: false,
    controllerStatus: ControllerStatus.CONTROLLER_UNPLUGGED,
    isHoldingCpuSlider: false,
  };
}

export function createProjectile(): Projectile {
  return { x: 0, y: 0, speedX: 0, speedY: 0, owner: NO_OWNER, subtype: UNKNOWN_PROJECTILE };
}

export function createSnapshot(): Snapshot {
  return {
    frame: FRAME_NOT_STARTED,
    stage: Stage.NO_STAGE,
    menuState: Menu.IN_GAME,
    players: new Map(),
    projectiles: [],
    distance: 0,

    submenu: SubMenu.UNKNOWN_SUBMENU,
    menuSelection: 0,
    readyToStart: false,
    stageSelectCursor: { x: 0, y: 0 },
  };
}

/**
 * Returns the player on `port`, creating it on first reference.
 */
export function playerAt(snapshot: Snapshot, port: Port): PlayerState {
  let player = snapshot.players.get(port);
  if (!player) {
    player = createPlayerState();
    snapshot.players.set(port, player);
  }
  return player;
}

/**
 * Active ports in ascending order.
 */
export function activePorts(snapshot: Snapshot): Port[] {
  return Array.from(snapshot.players.keys()).sort((a, b) => a - b);
}
