import type { RandomSource } from "../shared/prng.ts";
import { GameSession } from "./gameSession.ts";
import { createSecureRandom } from "../shared/secureRandom.ts";
import { REPLY, parseCommand, type Command } from "../shared/commandProtocol.ts";
import { newGame, opponentMove, submitMove, type ChessGame } from "../game/engine.ts";
import { renderBoard } from "../game/renderBoard.ts";
import { gameStateToFen } from "../game/fen.ts";

function endReply(game: ChessGame): string | null {
  if (game.outcome === "checkmate") return REPLY.mate;
  if (game.outcome === "no-moves") return REPLY.noMoves;
  return null;
}

/**
 * Text-command front end of one game session: parses a command, applies it
 * to the session's game and answers with the protocol's reply text.
 */
export class CommandController {
  private readonly session: GameSession;

  constructor(opts: { random?: RandomSource } = {}) {
    this.session = new GameSession(opts.random ?? createSecureRandom());
  }

  execute(raw: string): Promise<string> {
    const command = parseCommand(raw);
    return this.session.run(() => this.dispatch(command));
  }

  /** FEN of the live position, or null when no game is running. */
  fen(): Promise<string | null> {
    return this.session.run(() => (this.session.game ? gameStateToFen(this.session.game.state) : null));
  }

  close(): Promise<void> {
    return this.session.close();
  }

  private dispatch(command: Command): string {
    switch (command.type) {
      case "newGame":
        if (!command.color) return REPLY.invalidFormat;
        this.session.game = newGame(command.color);
        return REPLY.newGame;
      case "dumpBoard": {
        const game = this.session.game;
        if (!game) return REPLY.noGame;
        return endReply(game) ?? renderBoard(game.state.board);
      }
      case "submitMove":
        return this.dispatchMove(command.request);
      case "opponentMove":
        return this.dispatchOpponent();
      case "reset": {
        const game = this.session.game;
        if (!game) return REPLY.noGame;
        const ended = endReply(game);
        if (ended) return ended;
        if (game.state.toMove !== game.player) return REPLY.outOfTurn;
        this.session.game = null;
        return REPLY.ok;
      }
      case "unknown":
        return REPLY.unknownCommand;
    }
  }

  private dispatchMove(request: Extract<Command, { type: "submitMove" }>["request"]): string {
    const game = this.session.game;
    if (!game) return REPLY.noGame;
    const ended = endReply(game);
    if (ended) return ended;
    if (game.state.toMove !== game.player) return REPLY.outOfTurn;
    if (!request) return REPLY.invalidFormat;
    if (request.piece.owner !== game.player) return REPLY.illegalMove;

    const result = submitMove(game, request);
    if (!result.applied) return REPLY.illegalMove;
    if (result.isCheckmate) return REPLY.mate;
    return result.inCheck ? REPLY.check : REPLY.moveExecuted;
  }

  private dispatchOpponent(): string {
    const game = this.session.game;
    if (!game) return REPLY.noGame;
    const ended = endReply(game);
    if (ended) return ended;
    if (game.state.toMove !== game.opponent) return REPLY.outOfTurn;

    const result = opponentMove(game, this.session.random);
    if (result.noMovesAvailable) return REPLY.noMoves;
    if (result.isCheckmate) return REPLY.mate;
    return result.inCheck ? REPLY.check : REPLY.moveExecuted;
  }
}
