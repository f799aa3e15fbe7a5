/**
 * Calorie Estimator
 *
 * Per-serving calories from a per-100g table and typical portion weights,
 * with a loose name match so "Pistachio Baklava" still finds "baklava".
 */

import calorieData from '../../data/calories.json';
import { CALORIES } from '../../constants';
import { foldText } from '../../utils/formatting';
import { isRecord } from '../../utils/validation';

type NumberTable = ReadonlyMap<string, number>;

function parseTable(raw: unknown, name: string): NumberTable {
  if (!isRecord(raw)) {
    throw new Error(`[calories] "${name}" must be an object`);
  }
  const table = new Map<string, number>();
  for (const [key, value] of Object.entries(raw)) {
    if (typeof value !== 'number') {
      throw new Error(`[calories] "${name}.${key}" must be a number`);
    }
    table.set(normalizeDessertName(key), value);
  }
  return table;
}

const CALORIES_PER_100G = parseTable(calorieData.caloriesPer100g, 'caloriesPer100g');
const PORTION_GRAMS = parseTable(calorieData.portionGrams, 'portionGrams');

export function normalizeDessertName(name: string): string {
  return foldText(name);
}

/**
 * Exact key first, then the first key where either name contains the other.
 */
function lookup(table: NumberTable, normalized: string): [string, number] | undefined {
  const exact = table.get(normalized);
  if (exact !== undefined) return [normalized, exact];

  if (normalized === '') return undefined;

  for (const [key, value] of table) {
    if (normalized.includes(key) || key.includes(normalized)) {
      return [key, value];
    }
  }
  return undefined;
}

export function getPortionWeight(dessertName: string): number {
  const match = lookup(PORTION_GRAMS, normalizeDessertName(dessertName));
  return match ? match[1] : CALORIES.DEFAULT_PORTION_GRAMS;
}

export function getCaloriesPerServing(dessertName: string): number {
  const match = lookup(CALORIES_PER_100G, normalizeDessertName(dessertName));
  if (!match) return CALORIES.DEFAULT_PER_SERVING;

  const [key, caloriesPer100g] = match;
  const grams = PORTION_GRAMS.get(key) ?? CALORIES.DEFAULT_PORTION_GRAMS;
  return Math.floor((caloriesPer100g * grams) / 100);
}

/**
 * Clamp to the calculator range and snap to half portions.
 */
export function normalizePortions(portions: number): number {
  if (!Number.isFinite(portions)) return CALORIES.MIN_PORTIONS;
  const snapped = Math.round(portions / CALORIES.PORTION_STEP) * CALORIES.PORTION_STEP;
  return Math.min(CALORIES.MAX_PORTIONS, Math.max(CALORIES.MIN_PORTIONS, snapped));
}

export function calculateTotalCalories(dessertName: string, portions: number): number {
  return Math.floor(getCaloriesPerServing(dessertName) * normalizePortions(portions));
}
