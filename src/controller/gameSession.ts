import type { RandomSource } from "../shared/prng.ts";
import type { ChessGame } from "../game/engine.ts";

/**
 * Owns the single live game of one transport endpoint. Every action goes
 * through `run`, which lets at most one action touch the game at a time.
 */
export class GameSession {
  game: ChessGame | null = null;
  readonly random: RandomSource;
  private actionChain: Promise<void> = Promise.resolve();
  private closed = false;

  constructor(random: RandomSource) {
    this.random = random;
  }

  run<T>(fn: () => T | Promise<T>): Promise<T> {
    if (this.closed) return Promise.reject(new Error("Session closed"));

    // Chain actions so at most one runs at a time.
    const prev = this.actionChain;
    let resolveNext: () => void = () => undefined;
    this.actionChain = new Promise<void>((resolve) => {
      resolveNext = resolve;
    });

    return prev.then(fn).finally(() => resolveNext());
  }

  /** Rejects new actions; resolves once the queued ones have finished. */
  close(): Promise<void> {
    this.closed = true;
    return this.actionChain;
  }
}
