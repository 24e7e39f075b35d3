import type { Board } from "./board.ts";
import { BOARD_SIZE } from "./coords.ts";
import { pieceCode } from "./pieces.ts";

/**
 * Text dump of the board, row 0 (rank 1) first. Every square is a two-letter
 * code followed by a space; every row ends with a newline.
 */
export function renderBoard(board: Board): string {
  let out = "";
  for (let r = 0; r < BOARD_SIZE; r++) {
    let line = "";
    for (let c = 0; c < BOARD_SIZE; c++) {
      line += `${pieceCode(board[r][c])} `;
    }
    out += `${line}\n`;
  }
  return out;
}
