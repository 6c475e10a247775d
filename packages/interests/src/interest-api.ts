import { HttpClient, Logger, decodeEach, isApiError } from '@circles/core';
import {
  FlattenedTaxonomy,
  InterestCategory,
  InterestSubcategory,
  InterestTag,
  ProfileSelection,
  UserInterestProfile,
  categorySchema,
  decodeTaxonomyTree,
  encodeSelection,
  profileSchema,
  subcategorySchema,
  tagSchema,
} from './models';

const BASE = '/interests/hierarchical';

export const INTEREST_PATHS = {
  categories: `${BASE}/categories/`,
  subcategories: `${BASE}/subcategories/`,
  tags: `${BASE}/tags/`,
  tree: `${BASE}/categories_with_subcategories_and_tags/`,
  treeShort: `${BASE}/tree/`,
  profiles: `${BASE}/user-profiles/`,
  addCategoryLevel: `${BASE}/user-profiles/add_category_level/`,
  addSubcategoryLevel: `${BASE}/user-profiles/add_subcategory_level/`,
  profile: (id: string) => `${BASE}/user-profiles/${encodeURIComponent(id)}/`,
} as const;

/**
 * Typed access to the hierarchical interest endpoints. Taxonomy reads are
 * served to anonymous callers; profile reads and writes need a token.
 */
export class InterestApi {
  constructor(
    private http: HttpClient,
    private logger: Logger,
  ) {}

  async fetchCategories(): Promise<InterestCategory[]> {
    const raw = await this.http.get(INTEREST_PATHS.categories, { auth: 'optional' });
    return decodeEach(raw, 'categories', categorySchema, this.logger);
  }

  async fetchSubcategories(categoryId: string): Promise<InterestSubcategory[]> {
    const raw = await this.http.get(INTEREST_PATHS.subcategories, {
      params: { category_id: categoryId },
      auth: 'optional',
    });
    return decodeEach(raw, 'subcategories', subcategorySchema(categoryId), this.logger);
  }

  async fetchTags(subcategoryId: string, categoryId: string | null = null): Promise<InterestTag[]> {
    const raw = await this.http.get(INTEREST_PATHS.tags, {
      params: { subcategory_id: subcategoryId },
      auth: 'optional',
    });
    return decodeEach(raw, 'tags', tagSchema({ subcategoryId, categoryId }), this.logger);
  }

  /** Older deployments only expose the short `/tree/` route. */
  async fetchTree(): Promise<FlattenedTaxonomy> {
    let raw: unknown;
    try {
      raw = await this.http.get(INTEREST_PATHS.tree, { auth: 'optional' });
    } catch (error) {
      if (!isApiError(error) || !error.isNotFound) throw error;
      raw = await this.http.get(INTEREST_PATHS.treeShort, { auth: 'optional' });
    }
    return decodeTaxonomyTree(raw, this.logger);
  }

  async fetchProfiles(): Promise<UserInterestProfile[]> {
    const raw = await this.http.get(INTEREST_PATHS.profiles);
    return decodeEach(raw, 'user-profiles', profileSchema, this.logger);
  }

  /** Returns the raw response; the caller decides what to do when it does not decode. */
  createProfile(selection: ProfileSelection): Promise<unknown> {
    const body = encodeSelection(selection);
    switch (selection.level) {
      case 'category':
        return this.http.post(INTEREST_PATHS.addCategoryLevel, body);
      case 'subcategory':
        return this.http.post(INTEREST_PATHS.addSubcategoryLevel, body);
      case 'tag':
        return this.http.post(INTEREST_PATHS.profiles, body);
    }
  }

  async deleteProfile(id: string): Promise<void> {
    await this.http.delete(INTEREST_PATHS.profile(id));
  }
}
