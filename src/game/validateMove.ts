import type { PieceKind, PieceSpec, Player } from "../types.ts";
import type { GameState } from "./state.ts";
import type { Board } from "./board.ts";
import { getSquare, isEmptySquare } from "./board.ts";
import { isOnBoard, sameSquare, squareToA1, type Square } from "./coords.ts";
import { checkPath, firstBlocker } from "./clearPath.ts";
import {
  isPromotionKind,
  opponentOf,
  pawnDir,
  pawnPromotionRow,
  pawnStartRow,
  pieceSpecOf,
  pieceValue,
} from "./pieces.ts";
import { leavesKingAttacked } from "./selfCheck.ts";
import { reject, type Directive, type Move, type MoveRequest, type Rejection, type Validation } from "./moveTypes.ts";

function label(spec: PieceSpec): string {
  return `${spec.owner}${spec.kind}`;
}

/**
 * The capture target named by a directive must be exactly the opponent piece
 * standing on `to`. Kings are never capturable.
 */
function verifyCaptureTarget(board: Board, to: Square, mover: Player, target: PieceSpec): Rejection | null {
  const occupant = pieceSpecOf(getSquare(board, to));
  if (!occupant) {
    return reject("DirectiveMismatch", `Capture of ${label(target)} asserted but ${squareToA1(to)} is empty`);
  }
  if (occupant.owner === mover || target.owner !== opponentOf(mover)) {
    return reject("DirectiveMismatch", `Cannot capture own piece on ${squareToA1(to)}`);
  }
  if (getSquare(board, to) !== pieceValue(target)) {
    return reject(
      "DirectiveMismatch",
      `Capture target mismatch on ${squareToA1(to)}: found ${label(occupant)}, asserted ${label(target)}`,
    );
  }
  if (occupant.kind === "K") {
    return reject("DirectiveMismatch", "The king cannot be captured");
  }
  return null;
}

function promotionTarget(directive: Directive | undefined, mover: Player): PieceKind | Rejection {
  if (!directive || directive.kind !== "promote") {
    return reject("DirectiveMismatch", "A pawn reaching the far rank must name its promotion");
  }
  const { piece } = directive;
  if (piece.owner !== mover || !isPromotionKind(piece.kind)) {
    return reject("DirectiveMismatch", `Invalid promotion to ${label(piece)}`);
  }
  return piece.kind;
}

function isRejection<T>(value: T | Rejection): value is Rejection {
  return typeof value === "object" && value !== null && "ok" in value;
}

function misplacedToken(where: string): Rejection {
  return reject("DirectiveMismatch", `Unexpected directive token ${where}`);
}

/** Shared destination rule for knight and king moves, which have no path to walk. */
function checkStepDestination(state: GameState, req: MoveRequest, mover: Player): Rejection | null {
  if (isEmptySquare(state.board, req.to)) {
    if (req.primary || req.secondary) return misplacedToken(`on a quiet move to ${squareToA1(req.to)}`);
    return null;
  }
  if (req.primary?.kind !== "capture") {
    return reject("DirectiveMismatch", `Destination ${squareToA1(req.to)} is occupied but no capture was asserted`);
  }
  if (req.secondary) return misplacedToken("after a capture");
  return verifyCaptureTarget(state.board, req.to, mover, req.primary.target);
}

function validateSlider(state: GameState, req: MoveRequest, mover: Player, kind: PieceKind): Rejection | null {
  const dr = Math.abs(req.to.r - req.from.r);
  const dc = Math.abs(req.to.c - req.from.c);
  const straight = dr === 0 || dc === 0;
  const diagonal = dr === dc;
  const shapeOk = kind === "R" ? straight : kind === "B" ? diagonal : straight || diagonal;
  if (!shapeOk) return reject("InvalidShape", `${kind} cannot move ${squareToA1(req.from)}-${squareToA1(req.to)}`);

  const path = checkPath(state.board, req.from, req.to, req.primary?.kind === "capture");
  if (!path.ok) return path;

  if (req.primary?.kind === "promote" || req.secondary) return misplacedToken(`on a ${kind} move`);
  if (req.primary?.kind === "capture") return verifyCaptureTarget(state.board, req.to, mover, req.primary.target);
  return null;
}

function validatePawn(state: GameState, req: MoveRequest, mover: Player): Move | Rejection {
  const { from, to, primary, secondary } = req;
  const dir = pawnDir(mover);
  const dr = to.r - from.r;
  const dc = to.c - from.c;
  const farRank = to.r === pawnPromotionRow(mover);

  if (dc === 0 && dr === dir) {
    if (!isEmptySquare(state.board, to)) {
      return reject("BlockedPath", `Pawn cannot advance into occupied ${squareToA1(to)}`);
    }
    if (primary?.kind === "capture") return misplacedToken("on a forward pawn move");
    if (!farRank) {
      if (primary || secondary) return misplacedToken("before the far rank");
      return { from, to };
    }
    if (secondary) return misplacedToken("after a promotion");
    const promo = promotionTarget(primary, mover);
    if (isRejection(promo)) return promo;
    return { from, to, promotion: promo };
  }

  if (dc === 0 && dr === 2 * dir && from.r === pawnStartRow(mover)) {
    const blocker = firstBlocker(state.board, from, to);
    if (blocker) return reject("BlockedPath", `Pawn double step is blocked at ${squareToA1(blocker)}`);
    if (!isEmptySquare(state.board, to)) {
      return reject("BlockedPath", `Pawn cannot advance into occupied ${squareToA1(to)}`);
    }
    if (primary || secondary) return misplacedToken("on a pawn double step");
    return { from, to };
  }

  if (Math.abs(dc) === 1 && dr === dir) {
    if (primary?.kind !== "capture") {
      return reject("DirectiveMismatch", "A diagonal pawn move must assert its capture");
    }
    const bad = verifyCaptureTarget(state.board, to, mover, primary.target);
    if (bad) return bad;
    if (!farRank) {
      if (secondary) return misplacedToken("before the far rank");
      return { from, to };
    }
    const promo = promotionTarget(secondary, mover);
    if (isRejection(promo)) return promo;
    return { from, to, promotion: promo };
  }

  return reject("InvalidShape", `Pawn cannot move ${squareToA1(from)}-${squareToA1(to)}`);
}

function validateShapeAndDirectives(state: GameState, req: MoveRequest, mover: Player): Move | Rejection {
  const { from, to } = req;
  const dr = Math.abs(to.r - from.r);
  const dc = Math.abs(to.c - from.c);

  switch (req.piece.kind) {
    case "P":
      return validatePawn(state, req, mover);
    case "N": {
      const shapeOk = (dr === 2 && dc === 1) || (dr === 1 && dc === 2);
      if (!shapeOk) return reject("InvalidShape", `Knight cannot move ${squareToA1(from)}-${squareToA1(to)}`);
      return checkStepDestination(state, req, mover) ?? { from, to };
    }
    case "K": {
      if (dr > 1 || dc > 1) return reject("InvalidShape", `King cannot move ${squareToA1(from)}-${squareToA1(to)}`);
      return checkStepDestination(state, req, mover) ?? { from, to };
    }
    case "B":
    case "R":
    case "Q":
      return validateSlider(state, req, mover, req.piece.kind) ?? { from, to };
  }
}

/**
 * Full legality check for a player-submitted move. Never writes to the live
 * board: the self-check guard runs on a scratch copy and always comes last.
 */
export function validateMove(state: GameState, req: MoveRequest): Validation {
  const { from, to, piece } = req;
  if (!isOnBoard(from) || !isOnBoard(to)) return reject("InvalidShape", "Move leaves the board");
  if (sameSquare(from, to)) return reject("InvalidShape", "Move must change squares");

  if (getSquare(state.board, from) !== pieceValue(piece)) {
    return reject("PieceMismatch", `${label(piece)} is not on ${squareToA1(from)}`);
  }

  const mover = piece.owner;
  const result = validateShapeAndDirectives(state, req, mover);
  if (isRejection(result)) return result;

  if (leavesKingAttacked(state, result, mover)) {
    return reject("SelfCheck", `${squareToA1(from)}-${squareToA1(to)} would leave the ${mover} king in check`);
  }
  return { ok: true, move: result };
}

/**
 * The directive tokens a player would have to type for `from`-`to`: a capture
 * assertion naming the occupant, and a queen promotion at the far rank.
 */
export function directivesFor(state: GameState, from: Square, to: Square): Pick<MoveRequest, "primary" | "secondary"> {
  const mover = pieceSpecOf(getSquare(state.board, from));
  const occupant = pieceSpecOf(getSquare(state.board, to));
  const capture: Directive | undefined = occupant ? { kind: "capture", target: occupant } : undefined;
  if (!mover || mover.kind !== "P" || to.r !== pawnPromotionRow(mover.owner)) {
    return { primary: capture };
  }
  const promote: Directive = { kind: "promote", piece: { owner: mover.owner, kind: "Q" } };
  return capture ? { primary: capture, secondary: promote } : { primary: promote };
}

/** Legality of `from`-`to` for the piece standing there, with synthesized tokens. */
export function isLegalPlayerMove(state: GameState, from: Square, to: Square): boolean {
  const piece = pieceSpecOf(getSquare(state.board, from));
  if (!piece) return false;
  return validateMove(state, { from, to, piece, ...directivesFor(state, from, to) }).ok;
}
