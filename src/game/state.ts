import type { PieceSpec, Player } from "../types.ts";
import type { Square } from "./coords.ts";
import { a1ToSquare } from "./coords.ts";
import { cloneBoard, createEmptyBoard, createStandardBoard, findKing, setSquare, type Board } from "./board.ts";
import { isKingAttacked } from "./checkDetection.ts";
import { pieceValue } from "./pieces.ts";

export interface GameState {
  board: Board;
  /** Cached king squares; always equal to the squares actually holding the kings. */
  kings: Record<Player, Square>;
  toMove: Player;
  /** The side about to move is in check. */
  inCheck: boolean;
}

export function createInitialGameState(): GameState {
  return {
    board: createStandardBoard(),
    kings: {
      W: { r: 0, c: 4 },
      B: { r: 7, c: 4 },
    },
    toMove: "W",
    inCheck: false,
  };
}

export function cloneGameState(state: GameState): GameState {
  return {
    board: cloneBoard(state.board),
    kings: {
      W: { ...state.kings.W },
      B: { ...state.kings.B },
    },
    toMove: state.toMove,
    inCheck: state.inCheck,
  };
}

/**
 * Builds a state from an arbitrary board. Kings are located by scanning and
 * `inCheck` is derived for the side to move.
 */
export function createGameStateFromBoard(board: Board, toMove: Player): GameState {
  const kings = {
    W: findKing(board, "W"),
    B: findKing(board, "B"),
  };
  return {
    board,
    kings,
    toMove,
    inCheck: isKingAttacked(board, kings[toMove], toMove),
  };
}

export type Placement = Record<string, PieceSpec>;

/** Convenience for setups: `{ e1: { owner: "W", kind: "K" }, ... }`. */
export function createGameStateFromPlacement(placement: Placement, toMove: Player): GameState {
  const board = createEmptyBoard();
  for (const [a1, spec] of Object.entries(placement)) {
    setSquare(board, a1ToSquare(a1), pieceValue(spec));
  }
  return createGameStateFromBoard(board, toMove);
}
