import type { PieceKind, PieceSpec, Player } from "../types.ts";

/** Signed square value: 0 empty, sign = owner (+W / -B), magnitude = kind. */
export type SquareValue = number;

export const EMPTY: SquareValue = 0;

const KIND_MAGNITUDE: Record<PieceKind, number> = {
  P: 1,
  N: 2,
  B: 3,
  R: 4,
  Q: 5,
  K: 6,
};

const KIND_BY_MAGNITUDE: ReadonlyArray<PieceKind | null> = [null, "P", "N", "B", "R", "Q", "K"];

export const PROMOTION_KINDS: readonly PieceKind[] = ["N", "B", "R", "Q"];

export function opponentOf(p: Player): Player {
  return p === "W" ? "B" : "W";
}

export function colorSign(p: Player): 1 | -1 {
  return p === "W" ? 1 : -1;
}

export function pawnDir(player: Player): 1 | -1 {
  // White starts on rows 0/1 and advances toward row 7.
  return colorSign(player);
}

export function pawnStartRow(player: Player): number {
  return player === "W" ? 1 : 6;
}

export function pawnPromotionRow(player: Player): number {
  return player === "W" ? 7 : 0;
}

export function pieceValue(spec: PieceSpec): SquareValue {
  return colorSign(spec.owner) * KIND_MAGNITUDE[spec.kind];
}

export function ownerOf(v: SquareValue): Player | null {
  if (v > 0) return "W";
  if (v < 0) return "B";
  return null;
}

export function kindOf(v: SquareValue): PieceKind | null {
  return KIND_BY_MAGNITUDE[Math.abs(v)] ?? null;
}

export function pieceSpecOf(v: SquareValue): PieceSpec | null {
  const owner = ownerOf(v);
  const kind = kindOf(v);
  if (!owner || !kind) return null;
  return { owner, kind };
}

export function isPieceKind(ch: string): ch is PieceKind {
  return ch === "P" || ch === "N" || ch === "B" || ch === "R" || ch === "Q" || ch === "K";
}

export function isPlayer(ch: string): ch is Player {
  return ch === "W" || ch === "B";
}

/** Two-character code used by the board dump: "WP", "BK", ... or "**". */
export function pieceCode(v: SquareValue): string {
  const spec = pieceSpecOf(v);
  if (!spec) return "**";
  return `${spec.owner}${spec.kind}`;
}

export function isPromotionKind(kind: PieceKind): boolean {
  return PROMOTION_KINDS.includes(kind);
}
