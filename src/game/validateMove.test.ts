import { describe, it, expect } from "vitest";
import type { PieceKind, Player } from "../types.ts";
import type { Directive, MoveRequest } from "./moveTypes.ts";
import { a1ToSquare } from "./coords.ts";
import { createGameStateFromPlacement, createInitialGameState, type GameState } from "./state.ts";
import { directivesFor, isLegalPlayerMove, validateMove } from "./validateMove.ts";
import { boardsEqual, cloneBoard } from "./board.ts";

function req(piece: string, from: string, to: string, primary?: Directive, secondary?: Directive): MoveRequest {
  const owner: Player = piece[0] === "W" ? "W" : "B";
  const kinds: Record<string, PieceKind> = { P: "P", N: "N", B: "B", R: "R", Q: "Q", K: "K" };
  const r: MoveRequest = { piece: { owner, kind: kinds[piece[1]] }, from: a1ToSquare(from), to: a1ToSquare(to) };
  if (primary) r.primary = primary;
  if (secondary) r.secondary = secondary;
  return r;
}

const x = (owner: Player, kind: PieceKind): Directive => ({ kind: "capture", target: { owner, kind } });
const y = (owner: Player, kind: PieceKind): Directive => ({ kind: "promote", piece: { owner, kind } });

function reasonOf(state: GameState, request: MoveRequest): string {
  const v = validateMove(state, request);
  return v.ok ? "ok" : v.reason;
}

describe("validateMove: opening moves", () => {
  it("accepts e2-e4 and leaves the board alone", () => {
    const state = createInitialGameState();
    const before = cloneBoard(state.board);
    expect(validateMove(state, req("WP", "e2", "e4"))).toEqual({
      ok: true,
      move: { from: { r: 1, c: 4 }, to: { r: 3, c: 4 } },
    });
    expect(boardsEqual(state.board, before)).toBe(true);
  });

  it("rejects a queen jumping over its own pawn", () => {
    expect(reasonOf(createInitialGameState(), req("WQ", "d1", "d3"))).toBe("BlockedPath");
  });

  it("knights jump", () => {
    expect(reasonOf(createInitialGameState(), req("WN", "g1", "f3"))).toBe("ok");
    expect(reasonOf(createInitialGameState(), req("WN", "g1", "g3"))).toBe("InvalidShape");
  });

  it("checks the claimed piece against the board", () => {
    expect(reasonOf(createInitialGameState(), req("WQ", "e2", "e4"))).toBe("PieceMismatch");
    expect(reasonOf(createInitialGameState(), req("WP", "e3", "e4"))).toBe("PieceMismatch");
  });

  it("rejects bad pawn shapes and null moves", () => {
    const state = createInitialGameState();
    expect(reasonOf(state, req("WP", "e2", "e5"))).toBe("InvalidShape");
    expect(reasonOf(state, req("WP", "e2", "e1"))).toBe("InvalidShape");
    expect(reasonOf(state, req("WP", "e2", "e2"))).toBe("InvalidShape");
  });

  it("matches directive tokens against the destination", () => {
    const state = createInitialGameState();
    // Capture token on an empty square.
    expect(reasonOf(state, req("WN", "g1", "f3", x("B", "P")))).toBe("DirectiveMismatch");
    // Own pawn on d2, no token.
    expect(reasonOf(state, req("WN", "b1", "d2"))).toBe("DirectiveMismatch");
    // Own pawn on d2, capture asserted.
    expect(reasonOf(state, req("WN", "b1", "d2", x("W", "P")))).toBe("DirectiveMismatch");
    // Diagonal pawn step without a capture.
    expect(reasonOf(state, req("WP", "e2", "d3"))).toBe("DirectiveMismatch");
  });
});

describe("validateMove: captures", () => {
  const setup = () =>
    createGameStateFromPlacement(
      {
        e1: { owner: "W", kind: "K" },
        e8: { owner: "B", kind: "K" },
        a1: { owner: "W", kind: "R" },
        a5: { owner: "B", kind: "N" },
      },
      "W",
    );

  it("accepts a capture naming the occupant", () => {
    expect(validateMove(setup(), req("WR", "a1", "a5", x("B", "N")))).toEqual({
      ok: true,
      move: { from: { r: 0, c: 0 }, to: { r: 4, c: 0 } },
    });
  });

  it("rejects a capture naming the wrong piece", () => {
    expect(reasonOf(setup(), req("WR", "a1", "a5", x("B", "B")))).toBe("DirectiveMismatch");
  });

  it("cannot slide through the captured piece", () => {
    expect(reasonOf(setup(), req("WR", "a1", "a6"))).toBe("BlockedPath");
  });

  it("never captures a king", () => {
    const state = createGameStateFromPlacement(
      {
        a1: { owner: "W", kind: "K" },
        e8: { owner: "B", kind: "K" },
        f6: { owner: "W", kind: "N" },
      },
      "W",
    );
    expect(reasonOf(state, req("WN", "f6", "e8", x("B", "K")))).toBe("DirectiveMismatch");
  });
});

describe("validateMove: self-check", () => {
  const pinned = () =>
    createGameStateFromPlacement(
      {
        e1: { owner: "W", kind: "K" },
        e2: { owner: "W", kind: "R" },
        e8: { owner: "B", kind: "R" },
        a8: { owner: "B", kind: "K" },
      },
      "W",
    );

  it("a pinned rook may not leave the file", () => {
    expect(reasonOf(pinned(), req("WR", "e2", "d2"))).toBe("SelfCheck");
  });

  it("a pinned rook may move along the file", () => {
    expect(reasonOf(pinned(), req("WR", "e2", "e5"))).toBe("ok");
    expect(reasonOf(pinned(), req("WR", "e2", "e8", x("B", "R")))).toBe("ok");
  });

  it("a capture that opens the king's file is refused and leaves the board as it was", () => {
    const state = createGameStateFromPlacement(
      {
        e1: { owner: "W", kind: "K" },
        e3: { owner: "W", kind: "N" },
        e8: { owner: "B", kind: "R" },
        d5: { owner: "B", kind: "P" },
        a8: { owner: "B", kind: "K" },
      },
      "W",
    );
    const before = cloneBoard(state.board);
    expect(reasonOf(state, req("WN", "e3", "d5", x("B", "P")))).toBe("SelfCheck");
    expect(boardsEqual(state.board, before)).toBe(true);
    expect(state.kings.W).toEqual({ r: 0, c: 4 });
  });

  it("the king may not step onto an attacked file", () => {
    const state = createGameStateFromPlacement(
      {
        e1: { owner: "W", kind: "K" },
        d8: { owner: "B", kind: "R" },
        a8: { owner: "B", kind: "K" },
      },
      "W",
    );
    expect(reasonOf(state, req("WK", "e1", "d1"))).toBe("SelfCheck");
    expect(reasonOf(state, req("WK", "e1", "d2"))).toBe("SelfCheck");
    expect(reasonOf(state, req("WK", "e1", "f1"))).toBe("ok");
    expect(reasonOf(state, req("WK", "e1", "e3"))).toBe("InvalidShape");
  });
});

describe("validateMove: king tokens", () => {
  const setup = () =>
    createGameStateFromPlacement(
      {
        e1: { owner: "W", kind: "K" },
        a8: { owner: "B", kind: "K" },
        d2: { owner: "B", kind: "N" },
      },
      "W",
    );

  it("a capture token toward an empty square is refused", () => {
    expect(reasonOf(setup(), req("WK", "e1", "e2", x("B", "P")))).toBe("DirectiveMismatch");
    expect(reasonOf(setup(), req("WK", "e1", "e2"))).toBe("ok");
    // f1 is covered by the d2 knight.
    expect(reasonOf(setup(), req("WK", "e1", "f1"))).toBe("SelfCheck");
  });

  it("the king captures a named piece next to it", () => {
    expect(reasonOf(setup(), req("WK", "e1", "d2", x("B", "N")))).toBe("ok");
    expect(reasonOf(setup(), req("WK", "e1", "d2"))).toBe("DirectiveMismatch");
  });
});

describe("validateMove: promotion", () => {
  const setup = () =>
    createGameStateFromPlacement(
      {
        e1: { owner: "W", kind: "K" },
        h6: { owner: "B", kind: "K" },
        b7: { owner: "W", kind: "P" },
        a8: { owner: "B", kind: "R" },
      },
      "W",
    );

  it("requires a promotion token on the far rank", () => {
    expect(reasonOf(setup(), req("WP", "b7", "b8"))).toBe("DirectiveMismatch");
  });

  it("promotes a forward push from the primary slot", () => {
    expect(validateMove(setup(), req("WP", "b7", "b8", y("W", "Q")))).toEqual({
      ok: true,
      move: { from: { r: 6, c: 1 }, to: { r: 7, c: 1 }, promotion: "Q" },
    });
  });

  it("rejects promotion to a king, a pawn or the opponent's piece", () => {
    expect(reasonOf(setup(), req("WP", "b7", "b8", y("W", "K")))).toBe("DirectiveMismatch");
    expect(reasonOf(setup(), req("WP", "b7", "b8", y("W", "P")))).toBe("DirectiveMismatch");
    expect(reasonOf(setup(), req("WP", "b7", "b8", y("B", "Q")))).toBe("DirectiveMismatch");
  });

  it("rejects a capture token on a forward push", () => {
    expect(reasonOf(setup(), req("WP", "b7", "b8", x("B", "R")))).toBe("DirectiveMismatch");
  });

  it("a capturing promotion puts the promotion in the secondary slot", () => {
    expect(validateMove(setup(), req("WP", "b7", "a8", x("B", "R"), y("W", "N")))).toEqual({
      ok: true,
      move: { from: { r: 6, c: 1 }, to: { r: 7, c: 0 }, promotion: "N" },
    });
    expect(reasonOf(setup(), req("WP", "b7", "a8", x("B", "R")))).toBe("DirectiveMismatch");
  });

  it("a promotion token before the far rank is misplaced", () => {
    expect(reasonOf(createInitialGameState(), req("WP", "e2", "e3", y("W", "Q")))).toBe("DirectiveMismatch");
  });
});

describe("validateMove: pawn steps", () => {
  it("a pawn cannot push into an occupied square", () => {
    const state = createGameStateFromPlacement(
      {
        e1: { owner: "W", kind: "K" },
        e8: { owner: "B", kind: "K" },
        d2: { owner: "W", kind: "P" },
        d3: { owner: "B", kind: "N" },
      },
      "W",
    );
    expect(reasonOf(state, req("WP", "d2", "d3"))).toBe("BlockedPath");
    expect(reasonOf(state, req("WP", "d2", "d4"))).toBe("BlockedPath");
  });

  it("the double step is only for the starting row", () => {
    const state = createGameStateFromPlacement(
      {
        e1: { owner: "W", kind: "K" },
        e8: { owner: "B", kind: "K" },
        d3: { owner: "W", kind: "P" },
        c6: { owner: "B", kind: "P" },
      },
      "W",
    );
    expect(reasonOf(state, req("WP", "d3", "d5"))).toBe("InvalidShape");
  });

  it("black pawns move toward row 0", () => {
    const state = createInitialGameState();
    state.toMove = "B";
    expect(reasonOf(state, req("BP", "e7", "e5"))).toBe("ok");
    expect(reasonOf(state, req("BP", "e7", "e8"))).toBe("InvalidShape");
  });
});

describe("isLegalPlayerMove", () => {
  it("synthesizes capture and promotion tokens", () => {
    const state = createGameStateFromPlacement(
      {
        e1: { owner: "W", kind: "K" },
        h6: { owner: "B", kind: "K" },
        b7: { owner: "W", kind: "P" },
        a8: { owner: "B", kind: "R" },
      },
      "W",
    );
    expect(directivesFor(state, a1ToSquare("b7"), a1ToSquare("a8"))).toEqual({
      primary: { kind: "capture", target: { owner: "B", kind: "R" } },
      secondary: { kind: "promote", piece: { owner: "W", kind: "Q" } },
    });
    expect(isLegalPlayerMove(state, a1ToSquare("b7"), a1ToSquare("a8"))).toBe(true);
    expect(isLegalPlayerMove(state, a1ToSquare("b7"), a1ToSquare("b8"))).toBe(true);
  });

  it("is false from an empty square", () => {
    const state = createInitialGameState();
    expect(isLegalPlayerMove(state, a1ToSquare("e4"), a1ToSquare("e5"))).toBe(false);
    expect(isLegalPlayerMove(state, a1ToSquare("e2"), a1ToSquare("e4"))).toBe(true);
  });
});
