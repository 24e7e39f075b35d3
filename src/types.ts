export type Player = "W" | "B";
export type PieceKind = "P" | "N" | "B" | "R" | "Q" | "K";

export interface PieceSpec { owner: Player; kind: PieceKind; }
