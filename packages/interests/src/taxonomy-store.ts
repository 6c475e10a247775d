/**
 * @fileoverview Taxonomy Store
 * @description Loads and caches the category → subcategory → tag tree, with an
 * offline sample taxonomy when the backend is unreachable
 */

import NodeCache from 'node-cache';
import { ApiError, ClientConfig, Logger, StateStore, scopedLogger, toApiError } from '@circles/core';
import { fallbackTaxonomy } from './fallback-taxonomy';
import { InterestApi } from './interest-api';
import { FlattenedTaxonomy, InterestCategory, InterestSubcategory, InterestTag } from './models';

/** Where a result came from. `fallback` is sample data, never real. */
export type TaxonomySource = 'remote' | 'fallback' | 'unavailable';

export interface TaxonomyResult<T> {
  items: T[];
  source: TaxonomySource;
  /** The failure that forced a fallback or an empty result. */
  error?: ApiError;
}

export interface TaxonomyTreeResult extends FlattenedTaxonomy {
  source: TaxonomySource;
  error?: ApiError;
}

export interface TaxonomyState extends FlattenedTaxonomy {
  /** Source of the last applied load, null before the first one. */
  source: TaxonomySource | null;
  error: ApiError | null;
}

/** Read side the selection machine depends on. */
export interface TaxonomyLoader {
  loadCategories(): Promise<TaxonomyResult<InterestCategory>>;
  loadSubcategories(categoryId: string): Promise<TaxonomyResult<InterestSubcategory>>;
  loadTags(subcategoryId: string): Promise<TaxonomyResult<InterestTag>>;
}

type Level = 'category' | 'subcategory' | 'tag';

export class TaxonomyStore implements TaxonomyLoader {
  readonly state = new StateStore<TaxonomyState>({
    categories: [],
    subcategories: [],
    tags: [],
    source: null,
    error: null,
  });

  private cache: NodeCache;
  private log: Logger;
  private fallbackEnabled: boolean;
  // newest request per level; older responses are returned to their caller but not applied
  private requestSeq: Record<Level, number> = { category: 0, subcategory: 0, tag: 0 };

  constructor(
    private api: InterestApi,
    config: Pick<ClientConfig, 'logger' | 'taxonomyFallback' | 'taxonomyCacheTtlSeconds'>,
  ) {
    this.cache = new NodeCache({ stdTTL: config.taxonomyCacheTtlSeconds, useClones: false });
    this.log = scopedLogger(config.logger, 'Taxonomy');
    this.fallbackEnabled = config.taxonomyFallback;
  }

  // ─── Loaders ──────────────────────────────────────────────────────────────

  async loadCategories(): Promise<TaxonomyResult<InterestCategory>> {
    const ticket = this.nextTicket('category');
    const result = await this.guard(
      'categories',
      () => this.api.fetchCategories(),
      () => fallbackTaxonomy().categories,
    );
    if (this.isCurrent('category', ticket)) {
      this.state.setState({ categories: result.items, source: result.source, error: result.error ?? null });
    }
    return result;
  }

  async loadSubcategories(categoryId: string): Promise<TaxonomyResult<InterestSubcategory>> {
    const ticket = this.nextTicket('subcategory');
    const cacheKey = `subcategories:${categoryId}`;
    const cached = this.cache.get<InterestSubcategory[]>(cacheKey);

    const result: TaxonomyResult<InterestSubcategory> = cached
      ? { items: cached, source: 'remote' }
      : await this.guard(
          `subcategories of ${categoryId}`,
          () => this.api.fetchSubcategories(categoryId),
          () => fallbackTaxonomy().subcategories.filter((s) => s.categoryId === categoryId),
        );
    if (!cached && result.source === 'remote') this.cache.set(cacheKey, result.items);

    if (this.isCurrent('subcategory', ticket)) {
      this.state.setState((s) => ({
        ...s,
        subcategories: [...s.subcategories.filter((sub) => sub.categoryId !== categoryId), ...result.items],
        source: result.source,
        error: result.error ?? null,
      }));
    }
    return result;
  }

  async loadTags(subcategoryId: string): Promise<TaxonomyResult<InterestTag>> {
    const ticket = this.nextTicket('tag');
    const cacheKey = `tags:${subcategoryId}`;
    const cached = this.cache.get<InterestTag[]>(cacheKey);
    const categoryId = this.findSubcategory(subcategoryId)?.categoryId ?? null;

    const result: TaxonomyResult<InterestTag> = cached
      ? { items: cached, source: 'remote' }
      : await this.guard(
          `tags of ${subcategoryId}`,
          () => this.api.fetchTags(subcategoryId, categoryId),
          () => fallbackTaxonomy().tags.filter((t) => t.subcategoryId === subcategoryId),
        );
    if (!cached && result.source === 'remote') this.cache.set(cacheKey, result.items);

    if (this.isCurrent('tag', ticket)) {
      this.state.setState((s) => ({
        ...s,
        tags: [...s.tags.filter((tag) => tag.subcategoryId !== subcategoryId), ...result.items],
        source: result.source,
        error: result.error ?? null,
      }));
    }
    return result;
  }

  /** One round trip for the whole tree; replaces all three collections. */
  async loadFullTree(): Promise<TaxonomyTreeResult> {
    const tickets = {
      category: this.nextTicket('category'),
      subcategory: this.nextTicket('subcategory'),
      tag: this.nextTicket('tag'),
    };

    let result: TaxonomyTreeResult;
    try {
      result = { ...(await this.api.fetchTree()), source: 'remote' };
      this.primeCache(result);
    } catch (err) {
      const error = toApiError(err);
      this.log.warn(`Tree load failed: ${error.message}`);
      result = this.fallbackEnabled
        ? { ...fallbackTaxonomy(), source: 'fallback', error }
        : { categories: [], subcategories: [], tags: [], source: 'unavailable', error };
    }

    const current =
      this.isCurrent('category', tickets.category) &&
      this.isCurrent('subcategory', tickets.subcategory) &&
      this.isCurrent('tag', tickets.tag);
    if (current) {
      this.state.setState({
        categories: result.categories,
        subcategories: result.subcategories,
        tags: result.tags,
        source: result.source,
        error: result.error ?? null,
      });
    }
    return result;
  }

  // ─── Views ────────────────────────────────────────────────────────────────

  subcategoriesOf(categoryId: string): InterestSubcategory[] {
    return this.state.getState().subcategories.filter((s) => s.categoryId === categoryId);
  }

  tagsOf(subcategoryId: string): InterestTag[] {
    return this.state.getState().tags.filter((t) => t.subcategoryId === subcategoryId);
  }

  findCategory(id: string): InterestCategory | undefined {
    return this.state.getState().categories.find((c) => c.id === id);
  }

  findSubcategory(id: string): InterestSubcategory | undefined {
    return this.state.getState().subcategories.find((s) => s.id === id);
  }

  findTag(id: string): InterestTag | undefined {
    return this.state.getState().tags.find((t) => t.id === id);
  }

  /** Drop cached child lists, e.g. on pull-to-refresh. */
  invalidate(): void {
    this.cache.flushAll();
  }

  // ─── Internals ────────────────────────────────────────────────────────────

  private async guard<T>(
    what: string,
    fetchRemote: () => Promise<T[]>,
    fromSample: () => T[],
  ): Promise<TaxonomyResult<T>> {
    try {
      return { items: await fetchRemote(), source: 'remote' };
    } catch (err) {
      const error = toApiError(err);
      if (!this.fallbackEnabled) {
        this.log.warn(`Failed to load ${what}: ${error.message}`);
        return { items: [], source: 'unavailable', error };
      }
      this.log.warn(`Failed to load ${what}, serving sample data: ${error.message}`);
      return { items: fromSample(), source: 'fallback', error };
    }
  }

  private primeCache(tree: FlattenedTaxonomy): void {
    for (const category of tree.categories) {
      this.cache.set(
        `subcategories:${category.id}`,
        tree.subcategories.filter((s) => s.categoryId === category.id),
      );
    }
    for (const subcategory of tree.subcategories) {
      this.cache.set(
        `tags:${subcategory.id}`,
        tree.tags.filter((t) => t.subcategoryId === subcategory.id),
      );
    }
  }

  private nextTicket(level: Level): number {
    this.requestSeq[level] += 1;
    return this.requestSeq[level];
  }

  private isCurrent(level: Level, ticket: number): boolean {
    return this.requestSeq[level] === ticket;
  }
}
