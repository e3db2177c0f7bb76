export interface FavoriteStore {
  listFavorites(): string[];
  addFavorite(name: string): void;
  removeFavorite(name: string): void;
}

/**
 * Favorite glyph names. Kept apart from the search index so toggling never
 * touches index state; the store is written before the in-memory set changes.
 */
export class Favorites {
  private names = new Set<string>();

  constructor(private store: FavoriteStore) {}

  load(): number {
    const next = new Set(this.store.listFavorites());
    this.names = next;
    return next.size;
  }

  has(name: string): boolean {
    return this.names.has(name);
  }

  /** Returns the new state. */
  toggle(name: string): boolean {
    if (this.names.has(name)) {
      try {
        this.store.removeFavorite(name);
      } catch (err) {
        throw new Error(`failed to remove favorite: ${err instanceof Error ? err.message : String(err)}`);
      }
      this.names.delete(name);
      return false;
    }
    try {
      this.store.addFavorite(name);
    } catch (err) {
      throw new Error(`failed to add favorite: ${err instanceof Error ? err.message : String(err)}`);
    }
    this.names.add(name);
    return true;
  }

  get size(): number {
    return this.names.size;
  }
}
