import { describe, it, expect, vi, afterEach } from 'vitest';
import { SearchHistory } from '../src/history';
import { Favorites, FavoriteStore } from '../src/favorites';
import { debounce } from '../src/watcher';

describe('SearchHistory', () => {
  it('keeps unique terms, most recent first, up to the limit', () => {
    const history = new SearchHistory(3);
    for (const term of ['a', 'b', '', 'c', 'a', 'd']) history.add(term);
    expect(history.list()).toEqual(['d', 'a', 'c']);
  });

  it('hands out copies', () => {
    const history = new SearchHistory();
    history.add('x');
    history.list().push('y');
    expect(history.list()).toEqual(['x']);
    history.clear();
    expect(history.list()).toEqual([]);
  });
});

describe('Favorites', () => {
  function store(initial: string[] = []): FavoriteStore & { names: string[] } {
    return {
      names: [...initial],
      listFavorites() {
        return [...this.names];
      },
      addFavorite(name) {
        this.names.push(name);
      },
      removeFavorite(name) {
        this.names = this.names.filter(n => n !== name);
      },
    };
  }

  it('loads from the store and toggles both ways', () => {
    const backing = store(['nf-fa-star']);
    const favorites = new Favorites(backing);
    expect(favorites.load()).toBe(1);
    expect(favorites.has('nf-fa-star')).toBe(true);
    expect(favorites.toggle('nf-fa-car')).toBe(true);
    expect(favorites.toggle('nf-fa-star')).toBe(false);
    expect(favorites.has('nf-fa-car')).toBe(true);
    expect(favorites.has('nf-fa-star')).toBe(false);
    expect(backing.names).toEqual(['nf-fa-car']);
    expect(favorites.size).toBe(1);
  });
});

describe('debounce', () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it('collapses bursts into one call', () => {
    vi.useFakeTimers();
    const fn = vi.fn();
    const run = debounce(fn, 100);
    run();
    vi.advanceTimersByTime(50);
    run();
    vi.advanceTimersByTime(99);
    expect(fn).not.toHaveBeenCalled();
    vi.advanceTimersByTime(1);
    expect(fn).toHaveBeenCalledTimes(1);
  });
});
