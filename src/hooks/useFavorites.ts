/**
 * useFavorites Hook
 */

import { useCallback, useEffect, useState } from 'react';
import type { FavoritesSet } from '../services/favorites';

export interface UseFavoritesReturn {
  favorites: ReadonlySet<string>;
  isFavorite: (id: string) => boolean;
  toggle: (id: string) => boolean;
}

export function useFavorites(favoritesSet: FavoritesSet): UseFavoritesReturn {
  const [favorites, setFavorites] = useState<ReadonlySet<string>>(() => favoritesSet.all());

  useEffect(() => {
    setFavorites(favoritesSet.all());
    return favoritesSet.subscribe(setFavorites);
  }, [favoritesSet]);

  const isFavorite = useCallback((id: string) => favorites.has(id), [favorites]);

  const toggle = useCallback((id: string) => favoritesSet.toggle(id), [favoritesSet]);

  return { favorites, isFavorite, toggle };
}

export default useFavorites;
