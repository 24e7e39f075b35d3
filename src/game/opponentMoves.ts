import type { Player } from "../types.ts";
import type { GameState } from "./state.ts";
import type { Move } from "./moveTypes.ts";
import type { RandomSource } from "../shared/prng.ts";
import { allSquares, getSquare, piecesOf } from "./board.ts";
import { isOnBoard, sameSquare, type Square } from "./coords.ts";
import { isPathClear } from "./clearPath.ts";
import { kindOf, ownerOf, pawnDir, pawnPromotionRow, pawnStartRow, PROMOTION_KINDS } from "./pieces.ts";
import { leavesKingAttacked } from "./selfCheck.ts";
import { applyMove, type AppliedMove } from "./applyMove.ts";

/**
 * Reduced rule set for the computer side: no directive tokens, a capture is
 * allowed whenever the destination holds a non-king enemy piece.
 */
export function isLegalOpponentMove(state: GameState, from: Square, to: Square): boolean {
  if (!isOnBoard(from) || !isOnBoard(to) || sameSquare(from, to)) return false;

  const moving = getSquare(state.board, from);
  const player = ownerOf(moving);
  const kind = kindOf(moving);
  if (!player || !kind) return false;

  const target = getSquare(state.board, to);
  const targetOwner = ownerOf(target);
  if (targetOwner === player) return false;
  if (targetOwner && kindOf(target) === "K") return false;

  const dr = to.r - from.r;
  const dc = to.c - from.c;
  const adr = Math.abs(dr);
  const adc = Math.abs(dc);

  let shapeOk = false;
  switch (kind) {
    case "P": {
      const dir = pawnDir(player);
      if (dc === 0 && dr === dir) shapeOk = targetOwner === null;
      else if (dc === 0 && dr === 2 * dir && from.r === pawnStartRow(player)) {
        shapeOk = targetOwner === null && isPathClear(state.board, from, to);
      } else shapeOk = adc === 1 && dr === dir && targetOwner !== null;
      break;
    }
    case "N":
      shapeOk = (adr === 2 && adc === 1) || (adr === 1 && adc === 2);
      break;
    case "K":
      shapeOk = adr <= 1 && adc <= 1;
      break;
    case "B":
      shapeOk = adr === adc && isPathClear(state.board, from, to);
      break;
    case "R":
      shapeOk = (adr === 0 || adc === 0) && isPathClear(state.board, from, to);
      break;
    case "Q":
      shapeOk = (adr === adc || adr === 0 || adc === 0) && isPathClear(state.board, from, to);
      break;
  }
  if (!shapeOk) return false;

  return !leavesKingAttacked(state, { from, to }, player);
}

/** Every (from, to) pair the computer may play for `player`, row-major order. */
export function generateOpponentMoves(state: GameState, player: Player = state.toMove): Move[] {
  const out: Move[] = [];
  for (const { sq: from } of piecesOf(state.board, player)) {
    for (const to of allSquares()) {
      if (isLegalOpponentMove(state, from, to)) out.push({ from, to });
    }
  }
  return out;
}

function needsPromotion(state: GameState, move: Move): boolean {
  const moving = getSquare(state.board, move.from);
  const owner = ownerOf(moving);
  return owner !== null && kindOf(moving) === "P" && move.to.r === pawnPromotionRow(owner);
}

/**
 * Draws one move uniformly from the legal set and commits it. Pawns reaching
 * the far rank promote to a piece drawn uniformly from N, B, R, Q.
 * Returns null, leaving the state untouched, when there is nothing to play.
 */
export function playRandomOpponentMove(state: GameState, random: RandomSource): AppliedMove | null {
  const candidates = generateOpponentMoves(state);
  if (candidates.length === 0) return null;

  const chosen = candidates[random.int(0, candidates.length)];
  const move: Move = needsPromotion(state, chosen)
    ? { ...chosen, promotion: random.pick(PROMOTION_KINDS) }
    : chosen;
  return applyMove(state, move);
}
