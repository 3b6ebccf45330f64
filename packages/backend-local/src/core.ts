export type { Command, CommandContext } from "@mystic-grid/core/domain/commands/Command.js";
export { CreateLobby } from "@mystic-grid/core/domain/commands/CreateLobby.js";
export { DisconnectFromLobby } from "@mystic-grid/core/domain/commands/DisconnectFromLobby.js";
export { DisconnectPlayer } from "@mystic-grid/core/domain/commands/DisconnectPlayer.js";
export { EndSession } from "@mystic-grid/core/domain/commands/EndSession.js";
export { GetLobbyState } from "@mystic-grid/core/domain/commands/GetLobbyState.js";
export { GetSessionState } from "@mystic-grid/core/domain/commands/GetSessionState.js";
export { JoinLobby } from "@mystic-grid/core/domain/commands/JoinLobby.js";
export { JoinSession } from "@mystic-grid/core/domain/commands/JoinSession.js";
export { LeaveLobby } from "@mystic-grid/core/domain/commands/LeaveLobby.js";
export { LeaveSession } from "@mystic-grid/core/domain/commands/LeaveSession.js";
export { ReconnectPlayer } from "@mystic-grid/core/domain/commands/ReconnectPlayer.js";
export { SessionTick } from "@mystic-grid/core/domain/commands/SessionTick.js";
export {
  lobbyChannel,
  playerChannel,
  sessionChannel,
} from "@mystic-grid/core/domain/commands/SessionEvents.js";
export { ShareClue } from "@mystic-grid/core/domain/commands/ShareClue.js";
export { StartGame } from "@mystic-grid/core/domain/commands/StartGame.js";
export { StartSession } from "@mystic-grid/core/domain/commands/StartSession.js";
export { SubmitSolution } from "@mystic-grid/core/domain/commands/SubmitSolution.js";
export type { LobbySettings } from "@mystic-grid/core/domain/ports/LobbyGateway.js";
export {
  GameCommandInputError,
  type GameError,
  type GameErrorKind,
} from "@mystic-grid/core/domain/errors/index.js";
export type { GameConfig } from "@mystic-grid/core/domain/GameConfig.js";
export { createGameConfig, validateGameConfig } from "@mystic-grid/core/domain/GameConfig.js";
export {
  GameManager,
  createSweepPolicy,
  type CommandResult,
  type GameManagerOptions,
} from "@mystic-grid/core/domain/GameManager.js";
export type { Logger } from "@mystic-grid/core/domain/ports/Logger.js";
export type { MessageBus } from "@mystic-grid/core/domain/ports/MessageBus.js";
export type { Scheduler } from "@mystic-grid/core/domain/ports/Scheduler.js";
export { SHAPES } from "@mystic-grid/core/domain/typedefs.js";
export type {
  LobbyId,
  PlayerId,
  SessionId,
  TimePoint,
} from "@mystic-grid/core/domain/typedefs.js";
export { InMemoryLobbyGateway } from "@mystic-grid/core/adapters/in-memory/InMemoryLobbyGateway.js";
export { InMemorySessionGateway } from "@mystic-grid/core/adapters/in-memory/InMemorySessionGateway.js";
