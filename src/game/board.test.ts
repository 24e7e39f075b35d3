import { describe, it, expect } from "vitest";
import { cloneBoard, createStandardBoard, findKing, findKings, getSquare } from "./board.ts";
import { a1ToSquare } from "./coords.ts";
import { pieceCode, pieceSpecOf, pieceValue } from "./pieces.ts";
import { renderBoard } from "./renderBoard.ts";

const START_DUMP =
  "WR WN WB WQ WK WB WN WR \n" +
  "WP WP WP WP WP WP WP WP \n" +
  "** ** ** ** ** ** ** ** \n" +
  "** ** ** ** ** ** ** ** \n" +
  "** ** ** ** ** ** ** ** \n" +
  "** ** ** ** ** ** ** ** \n" +
  "BP BP BP BP BP BP BP BP \n" +
  "BR BN BB BQ BK BB BN BR \n";

describe("board", () => {
  it("sets up the standard position with White on rows 0 and 1", () => {
    const board = createStandardBoard();
    expect(pieceSpecOf(getSquare(board, a1ToSquare("d1")))).toEqual({ owner: "W", kind: "Q" });
    expect(pieceSpecOf(getSquare(board, a1ToSquare("e8")))).toEqual({ owner: "B", kind: "K" });
    expect(getSquare(board, a1ToSquare("e4"))).toBe(0);
    expect(findKing(board, "W")).toEqual({ r: 0, c: 4 });
    expect(findKing(board, "B")).toEqual({ r: 7, c: 4 });
  });

  it("renders rank 1 first with a space after every code", () => {
    expect(renderBoard(createStandardBoard())).toBe(START_DUMP);
  });

  it("clones without sharing rows", () => {
    const board = createStandardBoard();
    const copy = cloneBoard(board);
    copy[1][4] = 0;
    expect(board[1][4]).toBe(1);
  });

  it("refuses boards without exactly one king", () => {
    const board = createStandardBoard();
    board[0][4] = 0;
    expect(findKings(board, "W")).toEqual([]);
    expect(() => findKing(board, "W")).toThrow("Expected exactly one W king, found 0");
  });

  it("piece codes", () => {
    expect(pieceCode(pieceValue({ owner: "B", kind: "N" }))).toBe("BN");
    expect(pieceCode(0)).toBe("**");
  });
});
