import type { Player } from "../types.ts";
import type { GameState } from "./state.ts";
import type { Move } from "./moveTypes.ts";
import { cloneBoard, getSquare, setSquare, type Board } from "./board.ts";
import { EMPTY, kindOf, ownerOf, pieceValue } from "./pieces.ts";
import { isKingAttacked } from "./checkDetection.ts";

/** Value that lands on the destination: the mover, or its promotion. */
export function landingValue(state: GameState, move: Move): number {
  const moving = getSquare(state.board, move.from);
  if (!move.promotion) return moving;
  const owner = ownerOf(moving);
  if (!owner) throw new Error("landingValue: no piece to promote");
  return pieceValue({ owner, kind: move.promotion });
}

/** Plays `move` on a scratch copy of the board; the state's own board is untouched. */
export function boardAfter(state: GameState, move: Move): Board {
  const scratch = cloneBoard(state.board);
  setSquare(scratch, move.to, landingValue(state, move));
  setSquare(scratch, move.from, EMPTY);
  return scratch;
}

export function leavesKingAttacked(state: GameState, move: Move, mover: Player): boolean {
  const movedKind = kindOf(getSquare(state.board, move.from));
  const kingSq = movedKind === "K" ? move.to : state.kings[mover];
  return isKingAttacked(boardAfter(state, move), kingSq, mover);
}
