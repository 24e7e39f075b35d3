import type { Board } from "./board.ts";
import type { Square } from "./coords.ts";
import { squareToA1 } from "./coords.ts";
import { EMPTY } from "./pieces.ts";
import { reject, type Rejection } from "./moveTypes.ts";

export type PathCheck = { ok: true; capture: boolean } | Rejection;

/**
 * Walks the squares strictly between `from` and `to`. Callers guarantee the two
 * squares share a row, a column or a diagonal.
 */
export function firstBlocker(board: Board, from: Square, to: Square): Square | null {
  const dr = Math.sign(to.r - from.r);
  const dc = Math.sign(to.c - from.c);
  let r = from.r + dr;
  let c = from.c + dc;
  while (r !== to.r || c !== to.c) {
    if (board[r][c] !== EMPTY) return { r, c };
    r += dr;
    c += dc;
  }
  return null;
}

export function isPathClear(board: Board, from: Square, to: Square): boolean {
  return firstBlocker(board, from, to) === null;
}

/**
 * Path and destination rule for line moves. An occupied destination is only
 * reachable when a capture is asserted; who occupies it is the caller's concern.
 */
export function checkPath(board: Board, from: Square, to: Square, captureAsserted: boolean): PathCheck {
  const blocker = firstBlocker(board, from, to);
  if (blocker) {
    return reject("BlockedPath", `Path ${squareToA1(from)}-${squareToA1(to)} is blocked at ${squareToA1(blocker)}`);
  }

  if (board[to.r][to.c] === EMPTY) return { ok: true, capture: false };

  if (!captureAsserted) {
    return reject("DirectiveMismatch", `Destination ${squareToA1(to)} is occupied but no capture was asserted`);
  }
  return { ok: true, capture: true };
}
