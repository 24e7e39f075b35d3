import type { GameState } from "./state.ts";
import type { Move } from "./moveTypes.ts";
import { getSquare, setSquare } from "./board.ts";
import { isKingAttacked } from "./checkDetection.ts";
import { EMPTY, kindOf, opponentOf, type SquareValue } from "./pieces.ts";
import { landingValue } from "./selfCheck.ts";

export interface AppliedMove {
  move: Move;
  captured: SquareValue;
  didPromote: boolean;
}

/**
 * Commits an already-validated move in place: relocates (or promotes) the
 * piece, keeps the king cache current, recomputes `inCheck` for the side that
 * moves next and passes the turn. No legality checks happen here.
 */
export function applyMove(state: GameState, move: Move): AppliedMove {
  const mover = state.toMove;
  const moving = getSquare(state.board, move.from);
  if (moving === EMPTY) throw new Error("applyMove: no piece on the origin square");

  const captured = getSquare(state.board, move.to);
  setSquare(state.board, move.to, landingValue(state, move));
  setSquare(state.board, move.from, EMPTY);

  if (kindOf(moving) === "K") {
    state.kings[mover] = { r: move.to.r, c: move.to.c };
  }

  const next = opponentOf(mover);
  state.inCheck = isKingAttacked(state.board, state.kings[next], next);
  state.toMove = next;

  return { move, captured, didPromote: Boolean(move.promotion) };
}
