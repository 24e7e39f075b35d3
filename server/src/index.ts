import { startChessServer } from "./app.ts";

const port = Number(process.env.PORT ?? 8788);
const seed = process.env.CHESS_SEED || undefined;
const logCommands = process.env.CHESS_LOG_COMMANDS === "1";

startChessServer({ port, seed, logCommands })
  .then(({ url }) => {
    // eslint-disable-next-line no-console
    console.log(`[chess-server] listening on ${url}`);
    if (seed !== undefined) {
      // eslint-disable-next-line no-console
      console.log(`[chess-server] opponent seed: ${seed}`);
    }
  })
  .catch((err) => {
    // eslint-disable-next-line no-console
    console.error("[chess-server] failed to start", err);
    process.exitCode = 1;
  });
