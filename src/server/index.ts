import express, { NextFunction, Request, Response } from "express";
import http from "http";
import { Server, Socket } from "socket.io";
import { BattleSimulator, SimulateOptions } from "../simulator";
import { InvalidArgumentError, httpStatusFor, toErrorPayload } from "../errors";
import { AppConfig, loadConfig } from "../config";
import { LayeredDexStore } from "../data/dex-store";
import { CustomDexStore } from "../adapters/pokedex-adapter";
import { ShowdownDexStore } from "../adapters/showdown-dex";

export interface SimulateRequest {
  pokemon1: string;
  pokemon2: string;
  options: Pick<SimulateOptions, "detailed" | "seed">;
}

const isRecord = (v: unknown): v is Record<string, unknown> => typeof v === "object" && v !== null && !Array.isArray(v);

export function parseSimulateRequest(body: unknown): SimulateRequest {
  if (!isRecord(body)) throw new InvalidArgumentError("request body must be a JSON object");
  const { pokemon1, pokemon2, detailed, seed } = body;
  if (typeof pokemon1 !== "string" || !pokemon1.trim()) throw new InvalidArgumentError("pokemon1 is required");
  if (typeof pokemon2 !== "string" || !pokemon2.trim()) throw new InvalidArgumentError("pokemon2 is required");
  if (detailed !== undefined && typeof detailed !== "boolean") throw new InvalidArgumentError("detailed must be a boolean");
  if (seed !== undefined && (typeof seed !== "number" || !Number.isSafeInteger(seed) || seed < 0)) {
    throw new InvalidArgumentError("seed must be a non-negative integer");
  }
  return { pokemon1: pokemon1.trim(), pokemon2: pokemon2.trim(), options: { detailed, seed } };
}

function sendError(res: Response, err: unknown) {
  const status = httpStatusFor(err);
  if (status >= 500) console.error("[Server] Request failed:", err);
  res.status(status).json(toErrorPayload(err));
}

export function createApp(simulator: BattleSimulator) {
  const app = express();
  app.use(express.json());

  app.get("/api/health", (_req: Request, res: Response) => {
    res.json({ ok: true });
  });

  app.get("/api/pokemon/:name", async (req: Request, res: Response) => {
    try {
      res.json(await simulator.getPokemonInfo(req.params.name));
    } catch (err) {
      sendError(res, err);
    }
  });

  app.post("/api/battles", async (req: Request, res: Response) => {
    try {
      const { pokemon1, pokemon2, options } = parseSimulateRequest(req.body);
      res.json(await simulator.simulateBattle(pokemon1, pokemon2, options));
    } catch (err) {
      sendError(res, err);
    }
  });

  // Malformed JSON bodies surface here from express.json()
  app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
    if (isRecord(err) && err.type === "entity.parse.failed") {
      res.status(400).json(toErrorPayload(new InvalidArgumentError("request body is not valid JSON")));
      return;
    }
    sendError(res, err);
  });

  return app;
}

export function attachSocketHandlers(io: Server, simulator: BattleSimulator) {
  io.on("connection", (socket: Socket) => {
    socket.on("simulateBattle", async (data: unknown) => {
      try {
        const { pokemon1, pokemon2, options } = parseSimulateRequest(data);
        socket.emit("battleResult", await simulator.simulateBattle(pokemon1, pokemon2, options));
      } catch (err) {
        if (httpStatusFor(err) >= 500) console.error("[Server] simulateBattle failed:", err);
        socket.emit("error", toErrorPayload(err));
      }
    });

    socket.on("getPokemonInfo", async (data: unknown) => {
      try {
        const name = isRecord(data) && typeof data.name === "string" ? data.name : "";
        socket.emit("pokemonInfo", await simulator.getPokemonInfo(name));
      } catch (err) {
        if (httpStatusFor(err) >= 500) console.error("[Server] getPokemonInfo failed:", err);
        socket.emit("error", toErrorPayload(err));
      }
    });
  });
}

export function createSimulator(config: AppConfig): BattleSimulator {
  const custom = CustomDexStore.fromFile(config.customDexFile);
  const { species, moves } = custom.size;
  console.log(`[Server] Custom dex ${config.customDexFile}: ${species} species, ${moves} moves`);
  const store = new LayeredDexStore([custom, new ShowdownDexStore()]);
  return new BattleSimulator(store, { maxTurns: config.maxTurns, defaultSeed: config.defaultSeed });
}

export function startServer(config: AppConfig = loadConfig()) {
  const simulator = createSimulator(config);
  const server = http.createServer(createApp(simulator));
  const io = new Server(server, { cors: { origin: "*" } });
  attachSocketHandlers(io, simulator);
  server.listen(config.port, () => console.log(`[Server] Battle simulator running on :${config.port}`));
  return { server, io };
}

if (require.main === module) {
  startServer();
}
