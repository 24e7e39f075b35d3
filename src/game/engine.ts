import type { Player } from "../types.ts";
import type { RandomSource } from "../shared/prng.ts";
import type { Move, MoveRequest, RejectionReason } from "./moveTypes.ts";
import { createInitialGameState, type GameState } from "./state.ts";
import { applyMove } from "./applyMove.ts";
import { isCheckmate, type LegalityProbe } from "./checkmate.ts";
import { isLegalOpponentMove, playRandomOpponentMove } from "./opponentMoves.ts";
import { opponentOf } from "./pieces.ts";
import { isLegalPlayerMove, validateMove } from "./validateMove.ts";

export type GameOutcome = "checkmate" | "no-moves";

/** One human-versus-computer game. The outcome lives beside the state, not in it. */
export interface ChessGame {
  state: GameState;
  player: Player;
  opponent: Player;
  outcome: GameOutcome | null;
}

export type SubmitMoveResult =
  | { applied: true; inCheck: boolean; isCheckmate: boolean; move: Move }
  | { applied: false; reason: RejectionReason; message: string };

export interface OpponentMoveResult {
  applied: boolean;
  inCheck: boolean;
  isCheckmate: boolean;
  noMovesAvailable: boolean;
  move?: Move;
}

export function newGame(player: Player): ChessGame {
  return {
    state: createInitialGameState(),
    player,
    opponent: opponentOf(player),
    outcome: null,
  };
}

export function isGameOver(game: ChessGame): boolean {
  return game.outcome !== null;
}

/** The computer answers with its reduced rules; the player's side with the full validator. */
function probeFor(game: ChessGame, side: Player): LegalityProbe {
  return side === game.opponent ? isLegalOpponentMove : isLegalPlayerMove;
}

function settleCheckmate(game: ChessGame): boolean {
  const { state } = game;
  const mate = state.inCheck && isCheckmate(state, probeFor(game, state.toMove));
  if (mate) game.outcome = "checkmate";
  return mate;
}

export function submitMove(game: ChessGame, req: MoveRequest): SubmitMoveResult {
  if (isGameOver(game)) return { applied: false, reason: "GameOver", message: "The game is over" };
  if (req.piece.owner !== game.state.toMove) {
    return { applied: false, reason: "OutOfTurn", message: `It is ${game.state.toMove}'s turn` };
  }

  const verdict = validateMove(game.state, req);
  if (!verdict.ok) return { applied: false, reason: verdict.reason, message: verdict.message };

  applyMove(game.state, verdict.move);
  const mate = settleCheckmate(game);
  return { applied: true, inCheck: game.state.inCheck, isCheckmate: mate, move: verdict.move };
}

export function opponentMove(game: ChessGame, random: RandomSource): OpponentMoveResult {
  const idle = { applied: false, inCheck: game.state.inCheck, isCheckmate: game.outcome === "checkmate" };
  if (isGameOver(game)) return { ...idle, noMovesAvailable: game.outcome === "no-moves" };
  if (game.state.toMove !== game.opponent) throw new Error("opponentMove: not the computer's turn");

  const played = playRandomOpponentMove(game.state, random);
  if (!played) {
    game.outcome = "no-moves";
    return { ...idle, noMovesAvailable: true };
  }

  const mate = settleCheckmate(game);
  return {
    applied: true,
    inCheck: game.state.inCheck,
    isCheckmate: mate,
    noMovesAvailable: false,
    move: played.move,
  };
}
