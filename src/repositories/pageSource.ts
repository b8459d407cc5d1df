import type { PaginationParams } from '../lib/pagination.js';
import { paginate, type PaginatedResponse } from '../lib/responses.js';

export interface PageWindow {
  skip: number;
  limit: number;
}

/** Anything that can count matching items and return one slice of them. */
export interface PageSource<T, F = Record<string, never>> {
  count(filters?: F): Promise<number>;
  findPage(window: PageWindow, filters?: F): Promise<T[]>;
}

export async function fetchPage<T, F>(
  source: PageSource<T, F>,
  params: PaginationParams,
  filters?: F,
): Promise<PaginatedResponse<T>> {
  const window = { skip: params.getSkip(), limit: params.getLimit() };
  const [items, total] = await Promise.all([
    source.findPage(window, filters),
    source.count(filters),
  ]);
  return paginate(params, items, total);
}

// --- In-Memory implementation ---

export interface InMemoryPageSourceOptions<T, F> {
  matches?: (item: T, filters: F) => boolean;
  /** Result ordering; insertion order when omitted. */
  compare?: (a: T, b: T) => number;
}

export class InMemoryPageSource<T, F = Record<string, never>> implements PageSource<T, F> {
  private readonly items: T[];
  private readonly matches: (item: T, filters: F) => boolean;
  private readonly compare?: (a: T, b: T) => number;

  constructor(items: T[] = [], options: InMemoryPageSourceOptions<T, F> = {}) {
    this.items = [...items];
    this.matches = options.matches ?? (() => true);
    this.compare = options.compare;
  }

  async count(filters?: F): Promise<number> {
    return this.select(filters).length;
  }

  async findPage(window: PageWindow, filters?: F): Promise<T[]> {
    return this.select(filters).slice(window.skip, window.skip + window.limit);
  }

  add(item: T): void {
    this.items.push(item);
  }

  private select(filters?: F): T[] {
    const selected =
      filters === undefined
        ? [...this.items]
        : this.items.filter((item) => this.matches(item, filters));
    return this.compare ? selected.sort(this.compare) : selected;
  }
}
