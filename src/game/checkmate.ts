import type { GameState } from "./state.ts";
import type { Square } from "./coords.ts";
import { cloneGameState } from "./state.ts";
import { allSquares, piecesOf } from "./board.ts";
import { isKingAttacked } from "./checkDetection.ts";

/** Answers "may the piece on `from` go to `to`" for the side to move. */
export type LegalityProbe = (state: GameState, from: Square, to: Square) => boolean;

export function hasEscapingMove(state: GameState, probe: LegalityProbe): boolean {
  const player = state.toMove;
  for (const { sq: from } of piecesOf(state.board, player)) {
    for (const to of allSquares()) {
      if (probe(state, from, to)) return true;
    }
  }
  return false;
}

/**
 * Checkmate when the side to move is attacked and no move passes `probe`.
 * The search runs on a private copy, so the caller's state is never touched.
 */
export function isCheckmate(state: GameState, probe: LegalityProbe): boolean {
  const scratch = cloneGameState(state);
  const player = scratch.toMove;
  if (!isKingAttacked(scratch.board, scratch.kings[player], player)) return false;
  return !hasEscapingMove(scratch, probe);
}
