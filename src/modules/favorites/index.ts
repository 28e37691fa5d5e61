/**
 * @fileoverview Public exports for the Favorites module.
 * @module modules/favorites
 * @version 1.0.0
 */

export { FavoritesStore, FavoritesError, compareFavorites } from './FavoritesStore';
export type { IFavoritesStore, FavoritesStoreConfig } from './interfaces';
export type { FavoriteEntry, FavoritesRecordResult, StoredFavorites } from './types';
export { DEFAULT_MAX_FAVORITES } from './constants';
