import { Dex, Species } from "@pkmn/dex";
import { Move, PokemonProfile, TypeName } from "../types";
import { BATTLE_LEVEL } from "../combatant";
import { AbilityEntry, EvolutionEntry, PokedexStore, ProfileDocument, toId } from "../data/dex-store";
import { parseStatusToken, parseTypes } from "./pokedex-adapter";

type ShowdownDex = typeof Dex;

// "9L36" = learned at level 36 in gen 9; other sources (TM, egg, tutor) are ignored
const LEVEL_UP_SOURCE = /^(\d+)L(\d+)$/;

/**
 * Store backed by the Showdown dataset bundled in @pkmn/dex. Nothing is
 * fetched at run time; learnsets are loaded lazily by the package itself.
 */
export class ShowdownDexStore implements PokedexStore {
  constructor(private readonly dex: ShowdownDex = Dex, private readonly level = BATTLE_LEVEL) {}

  async lookupProfile(name: string): Promise<PokemonProfile | undefined> {
    const species = this.species(name);
    if (!species) return undefined;
    return {
      id: species.id,
      name: species.name,
      types: this.types(species),
      baseStats: { ...species.baseStats },
      moves: await this.levelUpMoves(species),
    };
  }

  async lookupMove(name: string): Promise<Move | undefined> {
    const move = this.dex.moves.get(name);
    if (!move.exists) return undefined;
    const [type] = parseTypes([move.type], `Move ${move.name}`);
    const mapped: Move = {
      id: move.id,
      name: move.name,
      type,
      category: move.category,
      power: move.category === "Status" ? 0 : move.basePower,
      accuracy: move.accuracy === true ? 100 : move.accuracy,
    };
    // Multi-effect moves (Fire Fang: burn + flinch) list them under `secondaries`
    const effects = move.secondaries ?? (move.secondary ? [move.secondary] : []);
    for (const effect of effects) {
      const token = effect.status ?? effect.volatileStatus;
      const status = token ? parseStatusToken(token) : undefined;
      if (status) {
        mapped.secondary = { status, chance: effect.chance ?? 100 };
        break;
      }
    }
    return mapped;
  }

  async getProfileDocument(name: string): Promise<ProfileDocument | undefined> {
    const species = this.species(name);
    if (!species) return undefined;
    const moves = await this.levelUpMoves(species);
    return {
      name: species.name,
      num: species.num,
      stats: { ...species.baseStats },
      types: this.types(species),
      abilities: this.abilities(species),
      moves,
      evolution: {
        evolvesFrom: species.prevo ? species.prevo : null,
        chain: this.evolutionChain(species),
      },
    };
  }

  private species(name: string): Species | undefined {
    const species = this.dex.species.get(name);
    return species.exists ? species : undefined;
  }

  private types(species: Species): TypeName[] {
    return parseTypes([...species.types], `Pokemon ${species.name}`);
  }

  private abilities(species: Species): AbilityEntry[] {
    const a = species.abilities;
    const slots: [string | undefined, number, boolean][] = [
      [a[0], 1, false],
      [a[1], 2, false],
      [a.H, 3, true],
      [a.S, 4, false],
    ];
    return slots.flatMap(([ability, slot, hidden]) => (ability ? [{ name: ability, slot, hidden }] : []));
  }

  /** Level-up moves up to the battle level from the newest generation, most recently learned first. */
  private async levelUpMoves(species: Species): Promise<string[]> {
    let learnset = (await this.dex.learnsets.get(species.id)).learnset;
    if (!learnset && species.baseSpecies !== species.name) {
      learnset = (await this.dex.learnsets.get(toId(species.baseSpecies))).learnset;
    }
    if (!learnset) return [];

    const learned: { id: string; gen: number; level: number }[] = [];
    for (const [id, sources] of Object.entries(learnset)) {
      for (const source of sources) {
        const m = LEVEL_UP_SOURCE.exec(source);
        if (m) learned.push({ id, gen: Number(m[1]), level: Number(m[2]) });
      }
    }
    const newestGen = Math.max(0, ...learned.map((l) => l.gen));
    const best = new Map<string, number>();
    for (const l of learned) {
      if (l.gen !== newestGen || l.level > this.level) continue;
      best.set(l.id, Math.max(best.get(l.id) ?? 0, l.level));
    }
    return [...best.entries()]
      .sort((x, y) => y[1] - x[1] || x[0].localeCompare(y[0]))
      .map(([id]) => id);
  }

  private evolutionChain(species: Species): EvolutionEntry[] {
    let root = species;
    const seen = new Set([root.id]);
    while (root.prevo) {
      const parent = this.species(root.prevo);
      if (!parent || seen.has(parent.id)) break;
      seen.add(parent.id);
      root = parent;
    }
    const chain: EvolutionEntry[] = [{ name: root.name, evolvesFrom: null }];
    const queue: Species[] = [root];
    const visited = new Set([root.id]);
    while (queue.length > 0) {
      const current = queue.shift();
      if (!current) break;
      for (const evo of current.evos ?? []) {
        const next = this.species(evo);
        if (!next || visited.has(next.id)) continue;
        visited.add(next.id);
        chain.push({ name: next.name, evolvesFrom: current.name });
        queue.push(next);
      }
    }
    return chain;
  }
}
