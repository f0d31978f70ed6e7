import { Move, PokemonProfile, Stats, TypeName } from "../types";

export interface AbilityEntry {
  name: string;
  slot: number;
  hidden: boolean;
}

export interface EvolutionEntry {
  name: string;
  evolvesFrom: string | null;
}

/** Informational view of a species; carries no battle logic. */
export interface ProfileDocument {
  name: string;
  num?: number;
  stats: Stats;
  types: TypeName[];
  abilities: AbilityEntry[];
  moves: string[];
  evolution: {
    evolvesFrom: string | null;
    chain: EvolutionEntry[];
  };
}

/** Read-only data collaborator. `undefined` means the name is unknown. */
export interface PokedexStore {
  lookupProfile(name: string): Promise<PokemonProfile | undefined>;
  lookupMove(name: string): Promise<Move | undefined>;
  getProfileDocument(name: string): Promise<ProfileDocument | undefined>;
}

// "Mr. Mime", "mr-mime" and "MRMIME" all normalize to "mrmime"
export const toId = (s: string) => (s || "").toLowerCase().replace(/[^a-z0-9]/g, "");

/** Asks each store in turn; the first one that knows the name answers. */
export class LayeredDexStore implements PokedexStore {
  constructor(private readonly layers: readonly PokedexStore[]) {}

  lookupProfile(name: string) {
    return this.first((s) => s.lookupProfile(name));
  }

  lookupMove(name: string) {
    return this.first((s) => s.lookupMove(name));
  }

  getProfileDocument(name: string) {
    return this.first((s) => s.getProfileDocument(name));
  }

  private async first<T>(query: (store: PokedexStore) => Promise<T | undefined>): Promise<T | undefined> {
    for (const layer of this.layers) {
      const hit = await query(layer);
      if (hit !== undefined) return hit;
    }
    return undefined;
  }
}
