import type { PieceKind, PieceSpec } from "../types.ts";
import type { Square } from "./coords.ts";

/** `x` token: the destination holds exactly this opponent piece. */
export interface CaptureDirective {
  kind: "capture";
  target: PieceSpec;
}

/** `y` token: promote the pawn to this piece. */
export interface PromotionDirective {
  kind: "promote";
  piece: PieceSpec;
}

export type Directive = CaptureDirective | PromotionDirective;

export interface MoveRequest {
  from: Square;
  to: Square;
  piece: PieceSpec;
  primary?: Directive;
  secondary?: Directive;
}

/** A move that has passed validation and can be handed to `applyMove`. */
export interface Move {
  from: Square;
  to: Square;
  promotion?: PieceKind;
}

export type RejectionReason =
  | "InvalidShape"
  | "BlockedPath"
  | "DirectiveMismatch"
  | "SelfCheck"
  | "PieceMismatch"
  | "OutOfTurn"
  | "GameOver"
  | "NoLegalMoves";

export interface Rejection {
  ok: false;
  reason: RejectionReason;
  message: string;
}

export type Validation = { ok: true; move: Move } | Rejection;

export function reject(reason: RejectionReason, message: string): Rejection {
  return { ok: false, reason, message };
}
