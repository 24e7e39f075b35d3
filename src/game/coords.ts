export const BOARD_SIZE = 8;

/** Row r is rank r + 1 (White's back rank is row 0); column c is file a + c. */
export interface Square {
  r: number;
  c: number;
}

const A1_RE = /^(?<file>[a-h])(?<rank>[1-8])$/;

export function inBounds(r: number, c: number): boolean {
  return r >= 0 && r < BOARD_SIZE && c >= 0 && c < BOARD_SIZE;
}

export function isOnBoard(sq: Square): boolean {
  return Number.isInteger(sq.r) && Number.isInteger(sq.c) && inBounds(sq.r, sq.c);
}

export function sameSquare(a: Square, b: Square): boolean {
  return a.r === b.r && a.c === b.c;
}

export function squareToA1(sq: Square): string {
  const file = String.fromCharCode("a".charCodeAt(0) + sq.c);
  return `${file}${sq.r + 1}`;
}

export function parseA1(text: string): Square | null {
  const match = A1_RE.exec(text);
  if (!match || !match.groups) return null;
  const c = match.groups.file.charCodeAt(0) - "a".charCodeAt(0);
  const r = Number(match.groups.rank) - 1;
  return { r, c };
}

export function a1ToSquare(text: string): Square {
  const sq = parseA1(text);
  if (!sq) throw new Error(`Invalid square: ${text}`);
  return sq;
}
