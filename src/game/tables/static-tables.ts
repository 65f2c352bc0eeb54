import { Action, Character, Stage, UNKNOWN_PROJECTILE, isStage } from "../enums";

export interface StageEntry {
  name: string;
  /** Id carried by session-start records */
  externalId: number;
  stage: Stage;
  /** Horizontal distance from center to the main platform's ledge */
  edgeGroundPosition?: number;
}

export interface NamedId {
  id: number;
  name: string;
}

export interface CssCharacterEntry {
  cssId: number;
  character: Character;
}

export interface ZeroIndexedEntry {
  character: Character;
  actions: number[];
}

/**
 * Raw table contents, as loaded from the data directory or supplied by the
 * host.
 */
export interface StaticTableData {
  stages: StageEntry[];
  actions: NamedId[];
  cssCharacters: CssCharacterEntry[];
  projectiles: NamedId[];
  zeroIndexedActions: ZeroIndexedEntry[];
}

/**
 * Read-only lookups over the game's static id tables.
 *
 * Every lookup resolves unmapped ids to a sentinel instead of failing, so
 * decoders never have to guard against them.
 */
export class StaticTables {
  private stagesByExternalId = new Map<number, Stage>();
  private edges = new Map<Stage, number>();
  private actionNames = new Map<number, string>();
  private cssCharacters = new Map<number, Character>();
  private projectileNames = new Map<number, string>();
  private zeroIndexed = new Map<Character, Set<number>>();

  constructor(data: StaticTableData) {
    for (const entry of data.stages) {
      this.stagesByExternalId.set(entry.externalId, entry.stage);
      if (entry.edgeGroundPosition !== undefined) {
        this.edges.set(entry.stage, entry.edgeGroundPosition);
      }
    }
    for (const { id, name } of data.actions) this.actionNames.set(id, name);
    for (const { cssId, character } of data.cssCharacters) this.cssCharacters.set(cssId, character);
    for (const { id, name } of data.projectiles) this.projectileNames.set(id, name);
    for (const { character, actions } of data.zeroIndexedActions) {
      let set = this.zeroIndexed.get(character);
      if (!set) {
        set = new Set();
        this.zeroIndexed.set(character, set);
      }
      for (const action of actions) set.add(action);
    }
  }

  /** Maps a session-start stage id; unmapped ids become NO_STAGE */
  stageFromExternalId(id: number): Stage {
    return this.stagesByExternalId.get(id) ?? Stage.NO_STAGE;
  }

  /** Validates an internal stage id; unknown ids become NO_STAGE */
  stageFromInternalId(id: number): Stage {
    return isStage(id) ? id : Stage.NO_STAGE;
  }

  /** Ground-edge bound of a stage, if one is known */
  edgeGroundPosition(stage: Stage): number | undefined {
    return this.edges.get(stage);
  }

  /** Returns the action id when known, else UNKNOWN_ANIMATION */
  action(id: number): number {
    return this.actionNames.has(id) ? id : Action.UNKNOWN_ANIMATION;
  }

  actionName(id: number): string {
    return this.actionNames.get(id) ?? "UNKNOWN_ANIMATION";
  }

  /** Maps a character-select id to the internal character */
  characterFromCss(cssId: number): Character {
    return this.cssCharacters.get(cssId) ?? Character.UNKNOWN_CHARACTER;
  }

  /** Returns the item id when it is a known projectile, else UNKNOWN_PROJECTILE */
  projectileSubtype(id: number): number {
    return this.projectileNames.has(id) ? id : UNKNOWN_PROJECTILE;
  }

  projectileName(id: number): string {
    return this.projectileNames.get(id) ?? "UNKNOWN_PROJECTILE";
  }

  /** Whether the game counts this character's action from frame 0 */
  isZeroIndexed(character: Character, action: number): boolean {
    return this.zeroIndexed.get(character)?.has(action) ?? false;
  }
}
