import type { Player } from "../types.ts";
import { BOARD_SIZE, type Square } from "./coords.ts";
import { EMPTY, kindOf, ownerOf, pieceSpecOf, type SquareValue } from "./pieces.ts";

export type Board = SquareValue[][];

const BACK_RANK_MAGNITUDES = [4, 2, 3, 5, 6, 3, 2, 4];

export function createEmptyBoard(): Board {
  const board: Board = [];
  for (let r = 0; r < BOARD_SIZE; r++) {
    board.push(new Array<SquareValue>(BOARD_SIZE).fill(EMPTY));
  }
  return board;
}

export function createStandardBoard(): Board {
  const board = createEmptyBoard();
  for (let c = 0; c < BOARD_SIZE; c++) {
    board[0][c] = BACK_RANK_MAGNITUDES[c];
    board[1][c] = 1;
    board[6][c] = -1;
    board[7][c] = -BACK_RANK_MAGNITUDES[c];
  }
  return board;
}

export function cloneBoard(board: Board): Board {
  return board.map((row) => row.slice());
}

export function getSquare(board: Board, sq: Square): SquareValue {
  return board[sq.r][sq.c];
}

export function setSquare(board: Board, sq: Square, value: SquareValue): void {
  board[sq.r][sq.c] = value;
}

export function isEmptySquare(board: Board, sq: Square): boolean {
  return board[sq.r][sq.c] === EMPTY;
}

export function boardsEqual(a: Board, b: Board): boolean {
  for (let r = 0; r < BOARD_SIZE; r++) {
    for (let c = 0; c < BOARD_SIZE; c++) {
      if (a[r][c] !== b[r][c]) return false;
    }
  }
  return true;
}

export function findKings(board: Board, player: Player): Square[] {
  const out: Square[] = [];
  for (let r = 0; r < BOARD_SIZE; r++) {
    for (let c = 0; c < BOARD_SIZE; c++) {
      const v = board[r][c];
      if (kindOf(v) === "K" && ownerOf(v) === player) out.push({ r, c });
    }
  }
  return out;
}

export function findKing(board: Board, player: Player): Square {
  const kings = findKings(board, player);
  if (kings.length !== 1) {
    throw new Error(`Expected exactly one ${player} king, found ${kings.length}`);
  }
  return kings[0];
}

/** Iterates the occupied squares owned by `player`, row by row. */
export function* piecesOf(board: Board, player: Player): Generator<{ sq: Square; value: SquareValue }> {
  for (let r = 0; r < BOARD_SIZE; r++) {
    for (let c = 0; c < BOARD_SIZE; c++) {
      const value = board[r][c];
      if (pieceSpecOf(value)?.owner === player) yield { sq: { r, c }, value };
    }
  }
}

export function* allSquares(): Generator<Square> {
  for (let r = 0; r < BOARD_SIZE; r++) {
    for (let c = 0; c < BOARD_SIZE; c++) {
      yield { r, c };
    }
  }
}
