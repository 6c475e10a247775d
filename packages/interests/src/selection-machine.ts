/**
 * @fileoverview Selection State Machine
 * @description Guided picker: category → subcategory → tag, with "save at this
 * level" available once a category is chosen
 *
 * Async results (child lists, the commit) are applied only while the request
 * that produced them is still the newest for its level and the picker session
 * that issued it is still open.
 */

import {
  ClientConfig,
  Locale,
  Logger,
  MutationResult,
  StateStore,
  describeError,
  duplicateSelectionError,
  scopedLogger,
  toApiError,
} from '@circles/core';
import {
  InterestCategory,
  InterestLevelKind,
  InterestSubcategory,
  InterestTag,
  ProfileSelection,
  UserInterestProfile,
  selectionLeafId,
} from './models';
import { ProfileWriter } from './profile-repository';
import { TaxonomyLoader, TaxonomyResult, TaxonomySource } from './taxonomy-store';

export type SelectionStep = 'picking_category' | 'picking_subcategory' | 'picking_tag' | 'confirming';

export interface SelectionState {
  open: boolean;
  step: SelectionStep;
  category: InterestCategory | null;
  subcategory: InterestSubcategory | null;
  tag: InterestTag | null;
  /** Granularity that `commit()` will write; set only while confirming. */
  commitLevel: InterestLevelKind | null;
  categories: InterestCategory[];
  subcategories: InterestSubcategory[];
  tags: InterestTag[];
  loading: boolean;
  committing: boolean;
  /** Source of the list currently shown; `fallback` means sample data. */
  taxonomySource: TaxonomySource | null;
  /** Localized, user-visible. */
  error: string | null;
}

const INITIAL: SelectionState = {
  open: false,
  step: 'picking_category',
  category: null,
  subcategory: null,
  tag: null,
  commitLevel: null,
  categories: [],
  subcategories: [],
  tags: [],
  loading: false,
  committing: false,
  taxonomySource: null,
  error: null,
};

type ListLevel = 'category' | 'subcategory' | 'tag';

export class SelectionMachine {
  readonly state = new StateStore<SelectionState>(INITIAL);

  private session = 0;
  private generation: Record<ListLevel, number> = { category: 0, subcategory: 0, tag: 0 };
  private log: Logger;
  private locale: Locale;

  constructor(
    private taxonomy: TaxonomyLoader,
    private profiles: ProfileWriter,
    config: Pick<ClientConfig, 'logger' | 'locale'>,
  ) {
    this.log = scopedLogger(config.logger, 'Picker');
    this.locale = config.locale;
  }

  getState(): SelectionState {
    return this.state.getState();
  }

  // ─── Session ──────────────────────────────────────────────────────────────

  /** Start a fresh picker session and load the categories. */
  async open(): Promise<void> {
    this.session += 1;
    this.bump('category', 'subcategory', 'tag');
    this.state.setState({ ...INITIAL, open: true, loading: true });
    await this.loadList('category', () => this.taxonomy.loadCategories(), (items, source) => ({
      categories: items,
      taxonomySource: source,
    }));
  }

  /** Close the picker; late results from this session are ignored. */
  dismiss(): void {
    this.session += 1;
    this.bump('category', 'subcategory', 'tag');
    this.state.setState(INITIAL);
  }

  /** Back to the first step without closing; the category list is kept. */
  resetSelection(): void {
    if (!this.getState().open) return;
    this.bump('subcategory', 'tag');
    this.state.setState((s) => ({
      ...s,
      step: 'picking_category',
      category: null,
      subcategory: null,
      tag: null,
      commitLevel: null,
      subcategories: [],
      tags: [],
      loading: false,
      error: null,
    }));
  }

  // ─── Transitions ──────────────────────────────────────────────────────────

  /** Valid from any picking step; replaces the category and clears everything below it. */
  async selectCategory(category: InterestCategory): Promise<boolean> {
    const s = this.getState();
    if (!s.open || s.step === 'confirming') return false;

    this.bump('tag');
    this.state.setState({
      step: 'picking_subcategory',
      category,
      subcategory: null,
      tag: null,
      commitLevel: null,
      subcategories: [],
      tags: [],
      loading: true,
      error: null,
    });
    await this.loadList('subcategory', () => this.taxonomy.loadSubcategories(category.id), (items, source) => ({
      subcategories: items,
      taxonomySource: source,
    }));
    return true;
  }

  async selectSubcategory(subcategory: InterestSubcategory): Promise<boolean> {
    const s = this.getState();
    if (!s.open || (s.step !== 'picking_subcategory' && s.step !== 'picking_tag')) return false;
    if (!s.category || subcategory.categoryId !== s.category.id) return false;

    this.state.setState({
      step: 'picking_tag',
      subcategory,
      tag: null,
      commitLevel: null,
      tags: [],
      loading: true,
      error: null,
    });
    await this.loadList('tag', () => this.taxonomy.loadTags(subcategory.id), (items, source) => ({
      tags: items,
      taxonomySource: source,
    }));
    return true;
  }

  /** A tag is always terminal. */
  selectTag(tag: InterestTag): boolean {
    const s = this.getState();
    if (!s.open || s.step !== 'picking_tag') return false;
    if (!s.subcategory || tag.subcategoryId !== s.subcategory.id) return false;

    this.state.setState({ step: 'confirming', tag, commitLevel: 'tag', error: null });
    return true;
  }

  /** Commit at category (1) or subcategory (2) granularity with what is chosen so far. */
  saveAtLevel(level: 1 | 2): boolean {
    const s = this.getState();
    if (!s.open) return false;

    if (level === 1) {
      if (!s.category || (s.step !== 'picking_subcategory' && s.step !== 'picking_tag')) return false;
      // a pending subcategory list still lands, so back() has something to show
      this.bump('tag');
      this.state.setState({
        step: 'confirming',
        subcategory: null,
        tag: null,
        tags: [],
        commitLevel: 'category',
        error: null,
      });
      return true;
    }

    if (!s.subcategory || s.step !== 'picking_tag') return false;
    this.state.setState({ step: 'confirming', tag: null, commitLevel: 'subcategory', error: null });
    return true;
  }

  /**
   * One step back. Leaving confirming returns to the step the commit level
   * was chosen on; every other step clears its own selection and everything below.
   */
  back(): boolean {
    const s = this.getState();
    if (!s.open || s.committing) return false;

    switch (s.step) {
      case 'confirming': {
        const step: SelectionStep = s.commitLevel === 'category' ? 'picking_subcategory' : 'picking_tag';
        this.state.setState({ step, tag: null, commitLevel: null, error: null });
        return true;
      }
      case 'picking_tag':
        this.bump('tag');
        this.state.setState({
          step: 'picking_subcategory',
          subcategory: null,
          tag: null,
          tags: [],
          loading: false,
          error: null,
        });
        return true;
      case 'picking_subcategory':
        this.bump('subcategory', 'tag');
        this.state.setState({
          step: 'picking_category',
          category: null,
          subcategory: null,
          tag: null,
          subcategories: [],
          tags: [],
          loading: false,
          error: null,
        });
        return true;
      case 'picking_category':
        return false;
    }
  }

  /**
   * Write the confirmed selection. Success closes the picker; a failure
   * (duplicate included) keeps it on the confirmation step with a message.
   * Resolves to null when there is nothing to confirm.
   */
  async commit(): Promise<MutationResult<UserInterestProfile> | null> {
    const s = this.getState();
    const pending = this.pendingSelection(s);
    if (!s.open || s.step !== 'confirming' || s.committing || !pending) return null;

    const { selection, name } = pending;
    if (this.profiles.contains(selection.level, selectionLeafId(selection))) {
      const error = duplicateSelectionError(name);
      this.state.setState({ error: describeError(error, this.locale) });
      return { ok: false, error };
    }

    const session = this.session;
    this.state.setState({ committing: true, error: null });
    const result = await this.profiles.add(selection, name);

    if (session !== this.session) return result;
    if (result.ok) {
      this.log.info(`Saved ${selection.level} "${name}"`);
      this.bump('category', 'subcategory', 'tag');
      this.state.setState(INITIAL);
    } else {
      this.state.setState({ committing: false, error: describeError(result.error, this.locale) });
    }
    return result;
  }

  // ─── Internals ────────────────────────────────────────────────────────────

  private async loadList<T>(
    level: ListLevel,
    load: () => Promise<TaxonomyResult<T>>,
    toPatch: (items: T[], source: TaxonomySource) => Partial<SelectionState>,
  ): Promise<void> {
    const session = this.session;
    const generation = this.bump(level);

    let items: T[];
    let source: TaxonomySource;
    try {
      const result = await load();
      items = result.items;
      source = result.source;
    } catch (err) {
      // the user can still save at the current level
      this.log.warn(`Loading ${level} list failed: ${toApiError(err).message}`);
      items = [];
      source = 'unavailable';
    }

    if (session !== this.session || generation !== this.generation[level] || !this.getState().open) {
      this.log.debug(`Ignored stale ${level} list`);
      return;
    }
    this.state.setState({ ...toPatch(items, source), loading: false });
  }

  private pendingSelection(s: SelectionState): { selection: ProfileSelection; name: string } | null {
    switch (s.commitLevel) {
      case 'category':
        return s.category ? { selection: { level: 'category', categoryId: s.category.id }, name: s.category.name } : null;
      case 'subcategory':
        return s.subcategory
          ? {
              selection: {
                level: 'subcategory',
                categoryId: s.subcategory.categoryId,
                subcategoryId: s.subcategory.id,
              },
              name: s.subcategory.name,
            }
          : null;
      case 'tag':
        return s.tag ? { selection: { level: 'tag', tagId: s.tag.id }, name: s.tag.name } : null;
      case null:
        return null;
    }
  }

  /** Invalidate in-flight loads for the given levels; returns the last new generation. */
  private bump(...levels: ListLevel[]): number {
    let latest = 0;
    for (const level of levels) {
      this.generation[level] += 1;
      latest = this.generation[level];
    }
    return latest;
  }
}
