import type { GameState } from "./state.ts";
import { BOARD_SIZE } from "./coords.ts";
import { pieceSpecOf, type SquareValue } from "./pieces.ts";

function pieceToFenChar(v: SquareValue): string | null {
  const spec = pieceSpecOf(v);
  if (!spec) return null;
  return spec.owner === "W" ? spec.kind : spec.kind.toLowerCase();
}

/**
 * FEN for the current position. Castling and en passant do not exist in this
 * rule set, so those fields are always "-".
 */
export function gameStateToFen(state: GameState, opts?: { fullmove?: number; halfmove?: number }): string {
  const rows: string[] = [];

  // FEN lists rank 8 first; row 7 holds rank 8.
  for (let r = BOARD_SIZE - 1; r >= 0; r--) {
    let empties = 0;
    let row = "";
    for (let c = 0; c < BOARD_SIZE; c++) {
      const ch = pieceToFenChar(state.board[r][c]);
      if (!ch) {
        empties++;
        continue;
      }
      if (empties > 0) {
        row += String(empties);
        empties = 0;
      }
      row += ch;
    }
    if (empties > 0) row += String(empties);
    rows.push(row);
  }

  const side = state.toMove === "W" ? "w" : "b";
  const halfmove = Math.max(0, Math.round(opts?.halfmove ?? 0));
  const fullmove = Math.max(1, Math.round(opts?.fullmove ?? 1));

  return `${rows.join("/")} ${side} - - ${halfmove} ${fullmove}`;
}
