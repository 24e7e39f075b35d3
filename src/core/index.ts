// "Core" is the deterministic rules surface (no transport, no randomness of its own).

export type { Player, PieceKind, PieceSpec } from "../types.ts";
export type { GameState } from "../game/state.ts";
export type { Board } from "../game/board.ts";
export type { Square } from "../game/coords.ts";
export type { Directive, Move, MoveRequest, RejectionReason, Validation } from "../game/moveTypes.ts";
export type { ChessGame, GameOutcome, OpponentMoveResult, SubmitMoveResult } from "../game/engine.ts";
export type { LegalityProbe } from "../game/checkmate.ts";

export { createInitialGameState, createGameStateFromPlacement, cloneGameState } from "../game/state.ts";
export { newGame, submitMove, opponentMove, isGameOver } from "../game/engine.ts";
export { validateMove, isLegalPlayerMove } from "../game/validateMove.ts";
export { generateOpponentMoves, isLegalOpponentMove } from "../game/opponentMoves.ts";
export { isKingAttacked } from "../game/checkDetection.ts";
export { isCheckmate } from "../game/checkmate.ts";
export { applyMove } from "../game/applyMove.ts";
export { renderBoard } from "../game/renderBoard.ts";
export { gameStateToFen } from "../game/fen.ts";
