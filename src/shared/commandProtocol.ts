import type { PieceSpec, Player } from "../types.ts";
import type { Directive, MoveRequest } from "../game/moveTypes.ts";
import { parseA1, squareToA1 } from "../game/coords.ts";
import { isPieceKind, isPlayer } from "../game/pieces.ts";

/**
 * Text commands, one per message:
 *   00W | 00B        new game, player takes that color
 *   01               dump the board
 *   02WPe2-e4[tok][tok]  player move; tok = x<color><kind> (capture) or y<color><kind> (promotion)
 *   03               computer move
 *   04               reset
 */
export type Command =
  | { type: "newGame"; color: Player | null }
  | { type: "dumpBoard" }
  | { type: "submitMove"; request: MoveRequest | null }
  | { type: "opponentMove" }
  | { type: "reset" }
  | { type: "unknown"; text: string };

export const REPLY = {
  newGame: "New game\n",
  noGame: "NOGAME\n",
  mate: "MATE\n",
  noMoves: "NOMOVES\n",
  outOfTurn: "OOT\n",
  invalidFormat: "INVFMT\n",
  illegalMove: "ILLMOVE\n",
  check: "CHECK\n",
  moveExecuted: "Move executed\n",
  ok: "OK\n",
  unknownCommand: "UNKCMD\n",
} as const;

const MOVE_RE = /^(?<piece>\S{2})(?<from>\S{2})-(?<to>\S{2})(?<first>\S{3})?(?<second>\S{3})?$/;
const TOKEN_RE = /^(?<tag>[xy])(?<owner>[WB])(?<kind>[PNBRQK])$/;

export function parsePieceSpec(text: string): PieceSpec | null {
  if (text.length !== 2) return null;
  const owner = text[0];
  const kind = text[1];
  if (!isPlayer(owner) || !isPieceKind(kind)) return null;
  return { owner, kind };
}

export function parseDirective(text: string): Directive | null {
  const match = TOKEN_RE.exec(text);
  if (!match || !match.groups) return null;
  const spec = parsePieceSpec(`${match.groups.owner}${match.groups.kind}`);
  if (!spec) return null;
  return match.groups.tag === "x" ? { kind: "capture", target: spec } : { kind: "promote", piece: spec };
}

/** Parses the body of a `02` command (everything after the two-digit code). */
export function parseMoveText(text: string): MoveRequest | null {
  const match = MOVE_RE.exec(text);
  if (!match || !match.groups) return null;
  const { piece, from, to, first, second } = match.groups;

  const spec = parsePieceSpec(piece);
  const fromSq = parseA1(from);
  const toSq = parseA1(to);
  if (!spec || !fromSq || !toSq) return null;

  const request: MoveRequest = { from: fromSq, to: toSq, piece: spec };
  if (first !== undefined) {
    const primary = parseDirective(first);
    if (!primary) return null;
    request.primary = primary;
  }
  if (second !== undefined) {
    const secondary = parseDirective(second);
    if (!secondary) return null;
    request.secondary = secondary;
  }
  return request;
}

export function parseCommand(raw: string): Command {
  const text = raw.trim();
  const code = text.slice(0, 2);
  const body = text.slice(2);

  switch (code) {
    case "00": {
      const color = body.trim();
      return { type: "newGame", color: isPlayer(color) ? color : null };
    }
    case "01":
      return { type: "dumpBoard" };
    case "02":
      return { type: "submitMove", request: parseMoveText(body.trim()) };
    case "03":
      return { type: "opponentMove" };
    case "04":
      return { type: "reset" };
    default:
      return { type: "unknown", text };
  }
}

/** Inverse of `parseMoveText`. */
export function formatMoveText(req: MoveRequest): string {
  const tok = (d: Directive | undefined) => {
    if (!d) return "";
    const spec = d.kind === "capture" ? d.target : d.piece;
    return `${d.kind === "capture" ? "x" : "y"}${spec.owner}${spec.kind}`;
  };
  return `${req.piece.owner}${req.piece.kind}${squareToA1(req.from)}-${squareToA1(req.to)}${tok(req.primary)}${tok(req.secondary)}`;
}
