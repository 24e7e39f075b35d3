import express from "express";
import cors from "cors";
import { createServer, type Server } from "node:http";

import WebSocket, { WebSocketServer, type RawData } from "ws";

import { CommandController } from "../../src/controller/commandController.ts";
import { createPrng, type RandomSource } from "../../src/shared/prng.ts";

type ServerOpts = {
  /** Seed for the computer's move choices; omit for `node:crypto` randomness. */
  seed?: number | string;
  /** Log every command and its reply. */
  logCommands?: boolean;
};

function commandFromBody(body: unknown): string | null {
  if (typeof body === "string") return body;
  if (body && typeof body === "object" && "command" in body && typeof body.command === "string") {
    return body.command;
  }
  return null;
}

function rawDataToText(raw: RawData): string {
  if (Array.isArray(raw)) return Buffer.concat(raw).toString("utf8");
  if (raw instanceof ArrayBuffer) return Buffer.from(raw).toString("utf8");
  return raw.toString("utf8");
}

export function createChessApp(opts: ServerOpts = {}): {
  app: express.Express;
  controller: CommandController;
  attachWebSockets: (server: Server) => void;
  shutdown: () => Promise<void>;
} {
  const random: RandomSource | undefined = opts.seed === undefined ? undefined : createPrng(opts.seed);
  const controller = new CommandController({ random });
  let wss: WebSocketServer | null = null;

  async function runCommand(text: string, via: string): Promise<string> {
    const reply = await controller.execute(text);
    if (opts.logCommands) {
      // eslint-disable-next-line no-console
      console.log(`[chess-server] [${via}] ${JSON.stringify(text.trim())} -> ${JSON.stringify(reply)}`);
    }
    return reply;
  }

  const app = express();
  app.use(cors());
  app.use(express.json({ limit: "16kb" }));
  app.use(express.text({ limit: "16kb" }));

  app.use((req, _res, next) => {
    if (opts.logCommands) {
      // eslint-disable-next-line no-console
      console.log(`[chess-server] ${req.method} ${req.path}`);
    }
    next();
  });

  app.get("/api/health", (_req, res) => {
    res.json({ ok: true });
  });

  app.post("/api/command", async (req, res) => {
    try {
      const text = commandFromBody(req.body);
      if (text === null) throw new Error("Missing command");
      const reply = await runCommand(text, "http");
      res.type("text/plain").send(reply);
    } catch (err) {
      const msg = err instanceof Error ? err.message : "Command failed";
      // eslint-disable-next-line no-console
      console.error("[chess-server] command error", msg);
      res.status(400).json({ error: msg });
    }
  });

  app.get("/api/board", async (_req, res) => {
    try {
      const reply = await runCommand("01", "http");
      res.type("text/plain").send(reply);
    } catch (err) {
      const msg = err instanceof Error ? err.message : "Board dump failed";
      // eslint-disable-next-line no-console
      console.error("[chess-server] board error", msg);
      res.status(400).json({ error: msg });
    }
  });

  app.get("/api/fen", async (_req, res) => {
    try {
      const fen = await controller.fen();
      if (fen === null) {
        res.status(404).json({ error: "No active game" });
        return;
      }
      res.json({ fen });
    } catch (err) {
      const msg = err instanceof Error ? err.message : "FEN export failed";
      // eslint-disable-next-line no-console
      console.error("[chess-server] fen error", msg);
      res.status(400).json({ error: msg });
    }
  });

  function attachWebSockets(server: Server): void {
    if (wss) return;

    wss = new WebSocketServer({ server, path: "/api/ws" });

    wss.on("connection", (ws: WebSocket) => {
      // Bad frames surface here; ws closes the socket itself afterwards.
      ws.on("error", (err: Error) => {
        // eslint-disable-next-line no-console
        console.error("[chess-server] ws error", err.message);
      });

      ws.on("message", (raw: RawData) => {
        runCommand(rawDataToText(raw), "ws")
          .then((reply) => {
            if (ws.readyState === WebSocket.OPEN) ws.send(reply);
          })
          .catch((err: unknown) => {
            const message = err instanceof Error ? err.message : "Command failed";
            // eslint-disable-next-line no-console
            console.error("[chess-server] ws command error", message);
            if (ws.readyState === WebSocket.OPEN) ws.send(JSON.stringify({ event: "error", payload: { message } }));
          });
      });
    });
  }

  async function shutdown(): Promise<void> {
    if (wss) {
      for (const client of wss.clients) client.terminate();
      await new Promise<void>((resolve) => {
        if (!wss) return resolve();
        wss.close(() => resolve());
      });
      wss = null;
    }
    await controller.close();
  }

  return { app, controller, attachWebSockets, shutdown };
}

export async function startChessServer(args: { port?: number } & ServerOpts): Promise<{
  app: express.Express;
  server: Server;
  url: string;
  close: () => Promise<void>;
}> {
  const { app, attachWebSockets, shutdown } = createChessApp({ seed: args.seed, logCommands: args.logCommands });

  const port = args.port !== undefined && Number.isFinite(args.port) ? args.port : 8788;

  // Use an explicit HTTP server so WebSockets can attach cleanly.
  const server = createServer(app);
  attachWebSockets(server);

  await new Promise<void>((resolve, reject) => {
    server.once("error", reject);
    server.once("listening", () => resolve());
    server.listen(port);
  });

  const address = server.address();
  const actualPort = address && typeof address === "object" ? address.port : port;

  async function close(): Promise<void> {
    await shutdown();
    server.closeIdleConnections();
    await new Promise<void>((resolve, reject) => {
      server.close((err) => (err ? reject(err) : resolve()));
    });
  }

  return { app, server, url: `http://localhost:${actualPort}`, close };
}
