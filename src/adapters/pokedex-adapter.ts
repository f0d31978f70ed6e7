import fs from "fs";
import { Category, Move, PokemonProfile, Stats, StatusId, TypeName, isTypeName } from "../types";
import { DataIntegrityError } from "../errors";
import { AbilityEntry, EvolutionEntry, PokedexStore, ProfileDocument, toId } from "../data/dex-store";

// Custom dex file: `{ species: { [id]: {...} }, moves: { [id]: {...} } }`.
// Entries are kept raw and mapped on lookup, so one broken species only fails
// the requests that touch it.
export interface ExternalDexData {
  species: Record<string, unknown>;
  moves: Record<string, unknown>;
}

const isRecord = (v: unknown): v is Record<string, unknown> => typeof v === "object" && v !== null && !Array.isArray(v);
const isStringArray = (v: unknown): v is string[] => Array.isArray(v) && v.every((x) => typeof x === "string");

const STATUS_TOKENS: Record<string, StatusId> = {
  burn: "burn",
  brn: "burn",
  poison: "poison",
  psn: "poison",
  tox: "poison",
  toxic: "poison",
  paralysis: "paralysis",
  par: "paralysis",
  sleep: "sleep",
  slp: "sleep",
  freeze: "freeze",
  frz: "freeze",
  confusion: "confusion",
};

export function parseStatusToken(token: string): StatusId | undefined {
  return STATUS_TOKENS[toId(token)];
}

export function parseCategory(raw: string, context: string): Category {
  switch (toId(raw)) {
    case "physical":
      return "Physical";
    case "special":
      return "Special";
    case "status":
      return "Status";
    default:
      throw new DataIntegrityError(`${context} has unknown category "${raw}"`);
  }
}

export function parseTypes(raw: unknown, context: string): TypeName[] {
  if (!isStringArray(raw) || raw.length < 1 || raw.length > 2) {
    throw new DataIntegrityError(`${context} must have one or two types`);
  }
  return raw.map((t) => {
    // "fire" and "Fire" are both accepted
    const name = t.charAt(0).toUpperCase() + t.slice(1).toLowerCase();
    if (!isTypeName(name)) throw new DataIntegrityError(`${context} has unknown type "${t}"`);
    return name;
  });
}

const STAT_ALIASES: Record<keyof Stats, string[]> = {
  hp: ["hp", "HP", "Hp"],
  atk: ["atk", "ATK", "attack"],
  def: ["def", "DEF", "defense"],
  spa: ["spa", "spA", "SpA", "specialAttack", "special-attack"],
  spd: ["spd", "spD", "SpD", "specialDefense", "special-defense"],
  spe: ["spe", "SPE", "speed"],
};

export function normalizeStats(raw: unknown, context: string): Stats {
  if (!isRecord(raw)) throw new DataIntegrityError(`${context} has no base stats`);
  const pick = (stat: keyof Stats): number => {
    for (const key of STAT_ALIASES[stat]) {
      const v = raw[key];
      if (typeof v === "number" && Number.isFinite(v) && v >= 0) return v;
    }
    throw new DataIntegrityError(`${context} is missing base stat "${stat}"`);
  };
  return { hp: pick("hp"), atk: pick("atk"), def: pick("def"), spa: pick("spa"), spd: pick("spd"), spe: pick("spe") };
}

export function mapMove(id: string, raw: unknown): Move {
  const context = `Move ${id}`;
  if (!isRecord(raw)) throw new DataIntegrityError(`${context} is malformed`);
  const name = typeof raw.name === "string" ? raw.name : id;
  if (typeof raw.type !== "string") throw new DataIntegrityError(`${context} has no type`);
  const [type] = parseTypes([raw.type], context);
  if (typeof raw.category !== "string") throw new DataIntegrityError(`${context} has no category`);
  const category = parseCategory(raw.category, context);
  const power = category === "Status" || typeof raw.basePower !== "number" ? 0 : raw.basePower;
  const accuracy = typeof raw.accuracy === "number" ? raw.accuracy : 100;
  if (accuracy < 0 || accuracy > 100) throw new DataIntegrityError(`${context} has accuracy ${accuracy}`);
  const move: Move = { id: toId(id), name, type, category, power, accuracy };
  const secondary = raw.secondary;
  if (isRecord(secondary) && typeof secondary.status === "string") {
    const status = parseStatusToken(secondary.status);
    if (!status) throw new DataIntegrityError(`${context} has unknown secondary status "${secondary.status}"`);
    const chance = typeof secondary.chance === "number" ? secondary.chance : 100;
    move.secondary = { status, chance };
  }
  return move;
}

export function mapProfile(id: string, raw: unknown): PokemonProfile {
  if (!isRecord(raw)) throw new DataIntegrityError(`Pokemon ${id} is malformed`);
  const name = typeof raw.name === "string" ? raw.name : id;
  const context = `Pokemon ${name}`;
  return {
    id: toId(id),
    name,
    types: parseTypes(raw.types, context),
    baseStats: normalizeStats(raw.baseStats, context),
    moves: isStringArray(raw.moves) ? raw.moves.map(toId) : [],
  };
}

function mapAbilities(raw: unknown): AbilityEntry[] {
  if (!Array.isArray(raw)) return [];
  const out: AbilityEntry[] = [];
  raw.forEach((a: unknown, i) => {
    if (typeof a === "string") out.push({ name: a, slot: i + 1, hidden: false });
    else if (isRecord(a) && typeof a.name === "string") out.push({ name: a.name, slot: i + 1, hidden: a.hidden === true });
  });
  return out;
}

export function parseDexData(json: unknown): ExternalDexData {
  if (!isRecord(json)) throw new DataIntegrityError("Custom dex must be a JSON object");
  const species = json.species ?? {};
  const moves = json.moves ?? {};
  if (!isRecord(species) || !isRecord(moves)) throw new DataIntegrityError("Custom dex needs species and moves objects");
  return { species, moves };
}

export function loadCustomDex(file: string): ExternalDexData {
  if (!fs.existsSync(file)) return { species: {}, moves: {} };
  let json: unknown;
  try {
    json = JSON.parse(fs.readFileSync(file, "utf-8"));
  } catch (err) {
    throw new DataIntegrityError(`Custom dex ${file} is not valid JSON: ${err instanceof Error ? err.message : String(err)}`);
  }
  return parseDexData(json);
}

interface DexEntry {
  name: string;
  raw: unknown;
}

function indexEntries(table: Record<string, unknown>) {
  const entries = new Map<string, DexEntry>();
  const aliases = new Map<string, string>();
  for (const [key, raw] of Object.entries(table)) {
    const id = toId(key);
    const name = isRecord(raw) && typeof raw.name === "string" ? raw.name : key;
    entries.set(id, { name, raw });
    aliases.set(toId(name), id);
  }
  return { entries, aliases };
}

export class CustomDexStore implements PokedexStore {
  private readonly species: ReturnType<typeof indexEntries>;
  private readonly moves: ReturnType<typeof indexEntries>;

  constructor(data: ExternalDexData) {
    this.species = indexEntries(data.species);
    this.moves = indexEntries(data.moves);
  }

  static fromFile(file: string): CustomDexStore {
    return new CustomDexStore(loadCustomDex(file));
  }

  get size() {
    return { species: this.species.entries.size, moves: this.moves.entries.size };
  }

  async lookupProfile(name: string): Promise<PokemonProfile | undefined> {
    const id = this.resolve(this.species, name);
    return id === undefined ? undefined : this.profile(id);
  }

  async lookupMove(name: string): Promise<Move | undefined> {
    const id = this.resolve(this.moves, name);
    const entry = id === undefined ? undefined : this.moves.entries.get(id);
    return id === undefined || !entry ? undefined : mapMove(id, entry.raw);
  }

  async getProfileDocument(name: string): Promise<ProfileDocument | undefined> {
    const id = this.resolve(this.species, name);
    if (id === undefined) return undefined;
    const profile = this.profile(id);
    const raw = this.species.entries.get(id)?.raw;
    const entry = isRecord(raw) ? raw : {};
    const parent = this.parentOf(id);
    return {
      name: profile.name,
      num: typeof entry.num === "number" ? entry.num : undefined,
      stats: profile.baseStats,
      types: profile.types,
      abilities: mapAbilities(entry.abilities),
      moves: profile.moves,
      evolution: {
        evolvesFrom: parent === undefined ? null : this.displayName(parent),
        chain: this.evolutionChain(id),
      },
    };
  }

  private resolve(table: ReturnType<typeof indexEntries>, name: string): string | undefined {
    const id = toId(name);
    if (table.entries.has(id)) return id;
    return table.aliases.get(id);
  }

  private profile(id: string): PokemonProfile {
    const entry = this.species.entries.get(id);
    if (!entry) throw new DataIntegrityError(`Pokemon ${id} disappeared from the custom dex`);
    const profile = mapProfile(id, entry.raw);
    return { ...profile, name: entry.name };
  }

  private displayName(id: string): string {
    return this.species.entries.get(id)?.name ?? id;
  }

  // Parent id when it is in this dex, the raw reference otherwise
  private parentOf(id: string): string | undefined {
    const raw = this.species.entries.get(id)?.raw;
    if (!isRecord(raw) || typeof raw.evolvesFrom !== "string") return undefined;
    return this.resolve(this.species, raw.evolvesFrom) ?? raw.evolvesFrom;
  }

  private evolutionChain(id: string): EvolutionEntry[] {
    // Walk up to the base form, then collect descendants breadth-first
    const seen = new Set<string>([id]);
    let root = id;
    for (let parent = this.parentOf(root); parent !== undefined && !seen.has(parent); parent = this.parentOf(root)) {
      seen.add(parent);
      root = parent;
    }

    const chain: EvolutionEntry[] = [{ name: this.displayName(root), evolvesFrom: null }];
    const queue = [root];
    const visited = new Set([root]);
    while (queue.length > 0) {
      const current = queue.shift();
      if (current === undefined) break;
      for (const candidate of this.species.entries.keys()) {
        if (visited.has(candidate) || this.parentOf(candidate) !== current) continue;
        visited.add(candidate);
        queue.push(candidate);
        chain.push({ name: this.displayName(candidate), evolvesFrom: this.displayName(current) });
      }
    }
    return chain;
  }
}
