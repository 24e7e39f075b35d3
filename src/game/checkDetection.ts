import type { Player } from "../types.ts";
import type { Board } from "./board.ts";
import { inBounds, type Square } from "./coords.ts";
import { EMPTY, colorSign, kindOf, ownerOf } from "./pieces.ts";

type Dir = { dr: number; dc: number };

const ORTHO: Dir[] = [
  { dr: 1, dc: 0 },
  { dr: -1, dc: 0 },
  { dr: 0, dc: 1 },
  { dr: 0, dc: -1 },
];

const DIAG: Dir[] = [
  { dr: 1, dc: 1 },
  { dr: -1, dc: -1 },
  { dr: 1, dc: -1 },
  { dr: -1, dc: 1 },
];

export const KNIGHT_JUMPS: Dir[] = [
  { dr: 2, dc: 1 },
  { dr: 2, dc: -1 },
  { dr: -2, dc: 1 },
  { dr: -2, dc: -1 },
  { dr: 1, dc: 2 },
  { dr: 1, dc: -2 },
  { dr: -1, dc: 2 },
  { dr: -1, dc: -2 },
];

function isEnemy(board: Board, r: number, c: number, owner: Player): boolean {
  const occupant = ownerOf(board[r][c]);
  return occupant !== null && occupant !== owner;
}

function rayHits(board: Board, king: Square, owner: Player, dirs: Dir[], sliders: ReadonlyArray<string>): boolean {
  for (const { dr, dc } of dirs) {
    let r = king.r + dr;
    let c = king.c + dc;
    while (inBounds(r, c)) {
      const v = board[r][c];
      if (v !== EMPTY) {
        const kind = kindOf(v);
        if (kind && isEnemy(board, r, c, owner) && sliders.includes(kind)) return true;
        break;
      }
      r += dr;
      c += dc;
    }
  }
  return false;
}

function enemyOfKindAt(board: Board, r: number, c: number, owner: Player, kind: string): boolean {
  if (!inBounds(r, c)) return false;
  return isEnemy(board, r, c, owner) && kindOf(board[r][c]) === kind;
}

/**
 * Is the `owner` king standing on `king` attacked? Pawn attacks are looked for
 * one row ahead in the king's own direction of travel, where enemy pawns that
 * strike it must stand.
 */
export function isKingAttacked(board: Board, king: Square, owner: Player): boolean {
  if (rayHits(board, king, owner, ORTHO, ["R", "Q"])) return true;
  if (rayHits(board, king, owner, DIAG, ["B", "Q"])) return true;

  for (const { dr, dc } of KNIGHT_JUMPS) {
    if (enemyOfKindAt(board, king.r + dr, king.c + dc, owner, "N")) return true;
  }

  const pawnRow = king.r + colorSign(owner);
  if (enemyOfKindAt(board, pawnRow, king.c - 1, owner, "P")) return true;
  if (enemyOfKindAt(board, pawnRow, king.c + 1, owner, "P")) return true;

  for (let dr = -1; dr <= 1; dr++) {
    for (let dc = -1; dc <= 1; dc++) {
      if (dr === 0 && dc === 0) continue;
      if (enemyOfKindAt(board, king.r + dr, king.c + dc, owner, "K")) return true;
    }
  }

  return false;
}
