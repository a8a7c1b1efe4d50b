import type {
  GameStateView,
  PlayerId,
  PlayerStateView,
  PlayerView,
  Side,
} from "../domain/types";
import type {
  EngineParticipant,
  EngineSide,
  EngineState,
  EngineWizardState,
} from "../engine/simulationContract";

export type Participants = Record<EngineSide, EngineParticipant>;

export function toEngineSide(side: Side): EngineSide {
  return side === "player_1" ? "p1" : "p2";
}

/**
 * Engine state -> wire snapshot. Only copies; the engine's own objects are
 * never handed out.
 */
export function mapSnapshot(state: EngineState, participants: Participants): GameStateView {
  return {
    turn: state.turn,
    board_size: state.board_size,
    player_1: mapWizard(state.wizards.p1, participants.p1.player_id),
    player_2: mapWizard(state.wizards.p2, participants.p2.player_id),
    artifacts: state.artifacts.map((a) => ({
      type: a.type,
      position: [a.position[0], a.position[1]],
    })),
    minions: state.minions.map((m) => ({
      owner: ownerId(m.owner, participants),
      hp: m.hp,
      position: [m.position[0], m.position[1]],
    })),
  };
}

export function mapPlayerView(state: EngineState, participants: Participants, side: Side): PlayerView {
  const snapshot = mapSnapshot(state, participants);
  const wizard = state.wizards[toEngineSide(side)];
  const self = side === "player_1" ? snapshot.player_1 : snapshot.player_2;
  const opponent = side === "player_1" ? snapshot.player_2 : snapshot.player_1;
  return {
    turn: snapshot.turn,
    board_size: snapshot.board_size,
    self: { ...self, cooldowns: { ...wizard.cooldowns }, shield_active: wizard.shield_active },
    opponent,
    artifacts: snapshot.artifacts,
    minions: snapshot.minions,
  };
}

function mapWizard(w: EngineWizardState, player_id: PlayerId): PlayerStateView {
  return {
    player_id,
    name: w.name,
    hp: w.hp,
    mana: w.mana,
    position: [w.position[0], w.position[1]],
    is_alive: w.hp > 0,
  };
}

function ownerId(owner: EngineSide, participants: Participants): PlayerId {
  return participants[owner].player_id;
}
