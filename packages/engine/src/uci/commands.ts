/**
 * UCI command builders and output parsing
 */

/**
 * Engine settings sent during the handshake
 */
export interface HandshakeSettings {
  /** Stockfish Skill Level (0-20) */
  skillLevel: number;
  /** Search threads */
  threads: number;
  /** Transposition table size in MB */
  hashMb: number;
}

export const UCI = 'uci';
export const IS_READY = 'isready';
export const QUIT = 'quit';

/**
 * Build a `setoption` command
 */
export function setOptionCommand(name: string, value: string | number | boolean): string {
  return `setoption name ${name} value ${String(value)}`;
}

/**
 * The fixed startup sequence: protocol init, readiness check, then options
 */
export function handshakeCommands(settings: HandshakeSettings): string[] {
  return [
    UCI,
    IS_READY,
    setOptionCommand('Skill Level', settings.skillLevel),
    setOptionCommand('Threads', settings.threads),
    setOptionCommand('Hash', settings.hashMb),
    setOptionCommand('UCI_AnalyseMode', false),
    setOptionCommand('UCI_LimitStrength', false),
  ];
}

export function positionCommand(fen: string): string {
  return `position fen ${fen}`;
}

export function goMoveTimeCommand(moveTimeMs: number): string {
  return `go movetime ${moveTimeMs}`;
}

/**
 * Extract the move from a `bestmove` line.
 *
 * Returns the second whitespace-separated token verbatim, or null if the
 * line is not a `bestmove` line or carries no move.
 */
export function parseBestMove(line: string): string | null {
  if (!line.startsWith('bestmove')) {
    return null;
  }
  const tokens = line.trim().split(/\s+/);
  return tokens[1] ?? null;
}
