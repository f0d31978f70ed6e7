import { Dex } from "@pkmn/dex";
import { EffectivenessLabel, TYPE_NAMES, TypeName, isTypeName } from "../types";
import { DataIntegrityError } from "../errors";

export type Multiplier = 0 | 0.5 | 1 | 2;

const isMultiplier = (n: number): n is Multiplier => n === 0 || n === 0.5 || n === 1 || n === 2;

export type TypeChart = ReadonlyMap<TypeName, ReadonlyMap<TypeName, Multiplier>>;

// Rows may list only non-neutral matchups; every pair omitted is 1x.
export function buildTypeChart(raw: Record<string, Record<string, number>>): TypeChart {
  for (const key of Object.keys(raw)) {
    if (!isTypeName(key)) throw new DataIntegrityError(`Unknown attacking type in chart: ${key}`);
  }
  const chart = new Map<TypeName, ReadonlyMap<TypeName, Multiplier>>();
  for (const attack of TYPE_NAMES) {
    const entries = raw[attack] ?? {};
    const row = new Map<TypeName, Multiplier>(TYPE_NAMES.map((defend) => [defend, 1]));
    for (const [defend, value] of Object.entries(entries)) {
      if (!isTypeName(defend)) throw new DataIntegrityError(`Unknown defending type in chart: ${attack} -> ${defend}`);
      if (!isMultiplier(value)) throw new DataIntegrityError(`Invalid multiplier ${value} for ${attack} -> ${defend}`);
      row.set(defend, value);
    }
    chart.set(attack, row);
  }
  return chart;
}

/** What `Dex.types` offers: per defending type, a damage code keyed by attacking type. */
export interface DamageTakenSource {
  types: { get(name: string): { exists: boolean; damageTaken: { [attackOrEffect: string]: number } } };
}

// Showdown damage codes: 0 neutral, 1 weak, 2 resists, 3 immune
const DAMAGE_CODES: Partial<Record<number, Multiplier>> = { 0: 1, 1: 2, 2: 0.5, 3: 0 };

/** Inverts the defender-keyed Showdown table into attacker -> defender rows. */
export function typeChartFromDex(dex: DamageTakenSource = Dex): TypeChart {
  const raw: Record<string, Record<string, number>> = {};
  for (const attack of TYPE_NAMES) raw[attack] = {};
  for (const defend of TYPE_NAMES) {
    const info = dex.types.get(defend);
    if (!info.exists) throw new DataIntegrityError(`Type ${defend} is missing from the dex`);
    for (const attack of TYPE_NAMES) {
      const code = info.damageTaken[attack];
      const multiplier = DAMAGE_CODES[code];
      if (multiplier === undefined) throw new DataIntegrityError(`Unknown damage code ${code} for ${attack} -> ${defend}`);
      raw[attack][defend] = multiplier;
    }
  }
  return buildTypeChart(raw);
}

export const TYPE_CHART: TypeChart = typeChartFromDex();

export function lookupMultiplier(attack: string, defend: string, chart: TypeChart = TYPE_CHART): Multiplier {
  if (!isTypeName(attack)) throw new DataIntegrityError(`Unknown type: ${attack}`);
  if (!isTypeName(defend)) throw new DataIntegrityError(`Unknown type: ${defend}`);
  const value = chart.get(attack)?.get(defend);
  if (value === undefined) throw new DataIntegrityError(`Type chart has no entry for ${attack} -> ${defend}`);
  return value;
}

/** Product of the per-type multipliers: 0, 0.25, 0.5, 1, 2 or 4. */
export function typeEffectiveness(moveType: string, targetTypes: readonly string[], chart: TypeChart = TYPE_CHART): number {
  if (targetTypes.length < 1 || targetTypes.length > 2) {
    throw new DataIntegrityError(`Expected one or two defending types, got ${targetTypes.length}`);
  }
  return targetTypes.reduce((acc, t) => acc * lookupMultiplier(moveType, t, chart), 1);
}

export function effectivenessLabel(multiplier: number): EffectivenessLabel {
  if (multiplier === 0) return "no effect";
  if (multiplier < 1) return "not very effective";
  if (multiplier > 1) return "super effective";
  return "effective";
}
