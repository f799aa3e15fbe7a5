/**
 * Dessert Catalog
 *
 * Static country/dessert lookup table loaded from data/catalog.json,
 * plus the search used by the browse screen.
 */

import catalogData from '../../data/catalog.json';
import { SEARCH } from '../../constants';
import { DIFFICULTIES } from '../../types';
import type {
  Country,
  Dessert,
  DessertEntry,
  DessertSearchOptions,
  Difficulty,
} from '../../types';
import { foldText } from '../../utils/formatting';
import { isRecord, isStringArray } from '../../utils/validation';

// === Loading ===

function isDifficulty(value: unknown): value is Difficulty {
  return typeof value === 'string' && DIFFICULTIES.some((d) => d === value);
}

function parseDessert(raw: unknown): Dessert {
  if (
    !isRecord(raw) ||
    typeof raw.id !== 'string' ||
    typeof raw.name !== 'string' ||
    typeof raw.description !== 'string' ||
    typeof raw.cookingTime !== 'number' ||
    typeof raw.servings !== 'number' ||
    !isDifficulty(raw.difficulty) ||
    !isStringArray(raw.ingredients) ||
    !isStringArray(raw.instructions)
  ) {
    throw new Error(`[catalog] Invalid dessert entry: ${JSON.stringify(raw)}`);
  }

  return {
    id: raw.id,
    name: raw.name,
    description: raw.description,
    cookingTime: raw.cookingTime,
    servings: raw.servings,
    difficulty: raw.difficulty,
    ingredients: raw.ingredients,
    instructions: raw.instructions,
  };
}

function parseCountry(raw: unknown): Country {
  if (
    !isRecord(raw) ||
    typeof raw.id !== 'string' ||
    typeof raw.name !== 'string' ||
    typeof raw.flag !== 'string' ||
    !Array.isArray(raw.desserts)
  ) {
    throw new Error(`[catalog] Invalid country entry: ${JSON.stringify(raw)}`);
  }

  return {
    id: raw.id,
    name: raw.name,
    flag: raw.flag,
    desserts: raw.desserts.map(parseDessert),
  };
}

export function parseCatalog(raw: unknown): Country[] {
  if (!isRecord(raw) || !Array.isArray(raw.countries)) {
    throw new Error('[catalog] Catalog must have a "countries" array');
  }
  return raw.countries.map(parseCountry);
}

const COUNTRIES: readonly Country[] = parseCatalog(catalogData);

const DESSERTS_BY_ID = new Map<string, DessertEntry>(
  COUNTRIES.flatMap((country) =>
    country.desserts.map((dessert): [string, DessertEntry] => [dessert.id, { country, dessert }])
  )
);

/** Number of countries in the catalog (target of the completionist achievement). */
export const COUNTRY_COUNT = COUNTRIES.length;

// === Lookups ===

export function getCountries(): readonly Country[] {
  return COUNTRIES;
}

export function getCountry(countryId: string): Country | undefined {
  return COUNTRIES.find((c) => c.id === countryId);
}

export function findDessert(dessertId: string): DessertEntry | undefined {
  return DESSERTS_BY_ID.get(dessertId);
}

export function getAllDesserts(): DessertEntry[] {
  return Array.from(DESSERTS_BY_ID.values());
}

// === Search ===

/**
 * Filter desserts by free text (dessert or country name), difficulty and
 * maximum cooking time. Text matching ignores case and Turkish accents.
 */
export function searchDesserts(options: DessertSearchOptions = {}): DessertEntry[] {
  const query = foldText(options.query ?? '');
  const difficulty = options.difficulty ?? 'all';
  const maxCookingTime = options.maxCookingTime ?? SEARCH.DEFAULT_MAX_COOKING_TIME;

  return getAllDesserts().filter(({ country, dessert }) => {
    const matchesQuery =
      query === '' ||
      foldText(dessert.name).includes(query) ||
      foldText(country.name).includes(query);
    const matchesDifficulty = difficulty === 'all' || dessert.difficulty === difficulty;
    const matchesTime = dessert.cookingTime <= maxCookingTime;

    return matchesQuery && matchesDifficulty && matchesTime;
  });
}
