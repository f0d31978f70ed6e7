import { Category, Combatant, Move } from "./types";
import { typeEffectiveness } from "./data/type-chart";
import { getEffectiveAttack } from "./status";

export const CRIT_CHANCE = 1 / 16;
export const CRIT_MULTIPLIER = 1.5;
export const STAB_MULTIPLIER = 1.5;
export const CONFUSION_POWER = 40;

// (((2L/5+2) * P * A/D) / 50) + 2, left unfloored until the final multiply
export function baseDamage(level: number, power: number, atk: number, def: number): number {
  return (((2 * level) / 5 + 2) * power * (atk / Math.max(1, def))) / 50 + 2;
}

export function chooseDefenseStat(target: Combatant, category: Category) {
  return category === "Physical" ? target.stats.def : target.stats.spd;
}

export function stabFor(user: Combatant, move: Move): number {
  return user.types.includes(move.type) ? STAB_MULTIPLIER : 1;
}

export interface DamageResult {
  damage: number;
  effectiveness: number;
  stab: number;
}

export function calcDamage(user: Combatant, target: Combatant, move: Move, opts: { crit: boolean }): DamageResult {
  const effectiveness = typeEffectiveness(move.type, target.types);
  const stab = stabFor(user, move);
  if (effectiveness === 0 || move.power <= 0) return { damage: 0, effectiveness, stab };
  const atk = getEffectiveAttack(user, move.category);
  const def = chooseDefenseStat(target, move.category);
  const base = baseDamage(user.level, move.power, atk, def);
  const damage = Math.max(1, Math.floor(base * stab * effectiveness * (opts.crit ? CRIT_MULTIPLIER : 1)));
  return { damage, effectiveness, stab };
}

/** Typeless physical self-hit: no STAB, no crit, no type multiplier. */
export function confusionDamage(pokemon: Combatant): number {
  const atk = getEffectiveAttack(pokemon, "Physical");
  return Math.max(1, Math.floor(baseDamage(pokemon.level, CONFUSION_POWER, atk, pokemon.stats.def)));
}
