import { v4 as uuidv4 } from "uuid";
import Engine, { BATTLE_MECHANICS, DEFAULT_MAX_TURNS, summarize } from "./engine";
import { Move, OutcomeReason, PokemonProfile, RandomSource, TurnLog } from "./types";
import { InvalidArgumentError, NotFoundError } from "./errors";
import { PokedexStore, ProfileDocument, toId } from "./data/dex-store";

export interface SimulateOptions {
  detailed?: boolean;
  seed?: number;
  rng?: RandomSource;
}

export interface BattleResult {
  battle_id: string;
  pokemon1: string;
  pokemon2: string;
  winner: string | null;
  outcome: OutcomeReason;
  total_turns: number;
  battle_summary: string;
  battle_mechanics: readonly string[];
  detailed_turns?: TurnLog[];
}

export interface SimulatorOptions {
  maxTurns?: number;
  defaultSeed?: number;
  logger?: Pick<Console, "log" | "error">;
}

/** Service facade: resolves names through the store, then runs one self-contained battle. */
export class BattleSimulator {
  private readonly maxTurns: number;
  private readonly logger: Pick<Console, "log" | "error">;

  constructor(private readonly store: PokedexStore, private readonly options: SimulatorOptions = {}) {
    this.maxTurns = options.maxTurns ?? DEFAULT_MAX_TURNS;
    this.logger = options.logger ?? console;
  }

  async simulateBattle(pokemon1Name: string, pokemon2Name: string, opts: SimulateOptions = {}): Promise<BattleResult> {
    validateNames(pokemon1Name, pokemon2Name);
    const detailed = opts.detailed ?? true;
    const seed = opts.seed ?? this.options.defaultSeed;
    if (seed !== undefined && (!Number.isSafeInteger(seed) || seed < 0)) {
      throw new InvalidArgumentError("seed must be a non-negative integer");
    }

    this.logger.log(`[BattleSimulator] Starting battle simulation: ${pokemon1Name} vs ${pokemon2Name}`);
    const [first, second] = await Promise.all([this.load(pokemon1Name), this.load(pokemon2Name)]);
    if (toId(first.profile.name) === toId(second.profile.name)) {
      throw new InvalidArgumentError(`Cannot battle ${first.profile.name} against itself`);
    }

    const engine = new Engine({ maxTurns: this.maxTurns, seed, rng: opts.rng });
    const [c1, c2] = engine.initializeBattle(first, second).combatants;
    this.logger.log(`[BattleSimulator] Battle ready: ${c1.name} (HP: ${c1.maxHP}) vs ${c2.name} (HP: ${c2.maxHP})`);
    const state = engine.run();

    const result: BattleResult = {
      battle_id: uuidv4(),
      pokemon1: c1.name,
      pokemon2: c2.name,
      winner: state.outcome?.winner?.name ?? null,
      outcome: state.outcome?.reason ?? "turn-limit",
      total_turns: state.turn,
      battle_summary: summarize(state, engine.maxTurns),
      battle_mechanics: BATTLE_MECHANICS,
    };
    if (detailed) result.detailed_turns = state.log;
    this.logger.log(`[BattleSimulator] ${result.battle_summary}`);
    return result;
  }

  async getPokemonInfo(name: string): Promise<ProfileDocument> {
    if (typeof name !== "string" || !toId(name)) throw new InvalidArgumentError("name is required");
    const doc = await this.store.getProfileDocument(name);
    if (!doc) throw new NotFoundError("pokemon", name);
    return doc;
  }

  private async load(name: string): Promise<{ profile: PokemonProfile; moves: Move[] }> {
    const profile = await this.store.lookupProfile(name);
    if (!profile) throw new NotFoundError("pokemon", name);
    const moves: Move[] = [];
    for (const id of profile.moves) {
      const move = await this.store.lookupMove(id);
      if (!move) throw new NotFoundError("move", id);
      moves.push(move);
    }
    return { profile, moves };
  }
}

function validateNames(a: unknown, b: unknown) {
  for (const [label, value] of [["pokemon1", a], ["pokemon2", b]] as const) {
    if (typeof value !== "string" || !toId(value)) throw new InvalidArgumentError(`${label} must be a non-empty name`);
  }
  if (typeof a === "string" && typeof b === "string" && toId(a) === toId(b)) {
    throw new InvalidArgumentError(`Cannot battle ${a} against itself`);
  }
}
