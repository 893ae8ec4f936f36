/**
 * @termchess/engine - UCI engine bridge for termchess
 *
 * This package provides:
 * - The move codec between rules moves and UCI text
 * - UCI command builders and `bestmove` parsing
 * - The engine bridge that owns the engine process
 */

export const VERSION = '0.1.0';

export { encodeMove, decodeMove } from './codec/move-codec.js';

export {
  UCI,
  IS_READY,
  QUIT,
  setOptionCommand,
  handshakeCommands,
  positionCommand,
  goMoveTimeCommand,
  parseBestMove,
} from './uci/commands.js';
export type { HandshakeSettings } from './uci/commands.js';

export { EngineBridge, DEFAULT_ENGINE_CONFIG } from './bridge/engine-bridge.js';
export type {
  EngineConfig,
  EngineLogger,
  EngineBridgeOptions,
  BridgeState,
  EngineHealth,
  EngineClient,
} from './bridge/engine-bridge.js';

export { MoveChannel } from './bridge/move-channel.js';
export { spawnEngineProcess } from './bridge/engine-process.js';
export type { EngineProcess, SpawnProcess } from './bridge/engine-process.js';

export { EngineError, LaunchError, ProtocolError, EngineStateError, toError } from './errors.js';
