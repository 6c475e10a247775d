import { z } from 'zod';
import {
  Logger,
  decodeEach,
  numberOr,
  optionalString,
  parseNested,
  parseOrDrop,
  parseWire,
  wireId,
  wireTimestamp,
} from '@circles/core';

// ─── Taxonomy ───────────────────────────────────────────────────────────────

/** First level of the taxonomy. */
export interface InterestCategory {
  id: string;
  name: string;
  /** Coarse grouping used for icons, e.g. "technical", "creative". */
  type: string;
  description: string;
  iconUrl: string | null;
  createdAt: Date;
}

/** Second level; owned by exactly one category. */
export interface InterestSubcategory {
  id: string;
  categoryId: string;
  name: string;
  description: string;
  /** Null when the payload omits it (nested tree responses). */
  createdAt: Date | null;
}

/** Third level; owned by exactly one subcategory. */
export interface InterestTag {
  id: string;
  subcategoryId: string;
  /** Denormalized grandparent; null when neither the payload nor the context provides it. */
  categoryId: string | null;
  name: string;
  description: string;
  usageCount: number;
  createdAt: Date;
}

export interface FlattenedTaxonomy {
  categories: InterestCategory[];
  subcategories: InterestSubcategory[];
  tags: InterestTag[];
}

// ─── Profiles ───────────────────────────────────────────────────────────────

export type InterestLevelKind = 'category' | 'subcategory' | 'tag';

export type InterestLevel =
  | { kind: 'category'; category: InterestCategory }
  | { kind: 'subcategory'; categoryId: string; subcategory: InterestSubcategory }
  | { kind: 'tag'; tag: InterestTag };

export interface UserInterestProfile {
  id: string;
  userId: string;
  level: InterestLevel;
  addedAt: Date;
}

/** Write request for a new profile entry at one granularity. */
export type ProfileSelection =
  | { level: 'category'; categoryId: string }
  | { level: 'subcategory'; categoryId: string; subcategoryId: string }
  | { level: 'tag'; tagId: string };

export function leafId(level: InterestLevel): string {
  switch (level.kind) {
    case 'category':
      return level.category.id;
    case 'subcategory':
      return level.subcategory.id;
    case 'tag':
      return level.tag.id;
  }
}

export function leafName(level: InterestLevel): string {
  switch (level.kind) {
    case 'category':
      return level.category.name;
    case 'subcategory':
      return level.subcategory.name;
    case 'tag':
      return level.tag.name;
  }
}

export function selectionLeafId(selection: ProfileSelection): string {
  switch (selection.level) {
    case 'category':
      return selection.categoryId;
    case 'subcategory':
      return selection.subcategoryId;
    case 'tag':
      return selection.tagId;
  }
}

/** Membership key: one profile entry per (level, leaf id). */
export function leafKey(kind: InterestLevelKind, id: string): string {
  return `${kind}:${id}`;
}

// ─── Wire decoding ──────────────────────────────────────────────────────────

/** A parent given as a bare id or as a nested object. */
const nestedCategoryRef = z.union([wireId, z.object({ id: wireId })]);
const nestedSubcategoryRef = z.union([
  wireId,
  z.object({ id: wireId, category_id: wireId.nullish(), category: nestedCategoryRef.nullish() }),
]);

function refId(ref: string | { id: string } | null | undefined): string | null {
  if (ref === null || ref === undefined) return null;
  return typeof ref === 'string' ? ref : ref.id;
}

export const categorySchema = z
  .object({
    id: wireId,
    name: z.string(),
    type: optionalString,
    description: optionalString,
    icon_url: optionalString,
    created_at: wireTimestamp,
  })
  .transform(
    (wire): InterestCategory => ({
      id: wire.id,
      name: wire.name,
      type: wire.type ?? 'other',
      description: wire.description ?? '',
      iconUrl: wire.icon_url,
      createdAt: wire.created_at,
    }),
  );

/** `parentCategoryId` fills the reference when the payload omits it. */
export function subcategorySchema(parentCategoryId?: string) {
  return z
    .object({
      id: wireId,
      category_id: wireId.nullish(),
      category: nestedCategoryRef.nullish(),
      name: z.string(),
      description: optionalString,
      created_at: wireTimestamp.nullish(),
    })
    .transform((wire, ctx): InterestSubcategory => {
      const categoryId = wire.category_id ?? refId(wire.category) ?? parentCategoryId;
      if (!categoryId) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'Subcategory has no category reference' });
        return z.NEVER;
      }
      return {
        id: wire.id,
        categoryId,
        name: wire.name,
        description: wire.description ?? '',
        createdAt: wire.created_at ?? null,
      };
    });
}

export interface TagParent {
  subcategoryId: string;
  categoryId: string | null;
}

export function tagSchema(parent?: TagParent) {
  return z
    .object({
      id: wireId,
      subcategory_id: wireId.nullish(),
      subcategory: nestedSubcategoryRef.nullish(),
      name: z.string(),
      description: optionalString,
      usage_count: numberOr(0),
      created_at: wireTimestamp,
    })
    .transform((wire, ctx): InterestTag => {
      const nested = wire.subcategory;
      const subcategoryId = wire.subcategory_id ?? refId(nested) ?? parent?.subcategoryId;
      if (!subcategoryId) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'Tag has no subcategory reference' });
        return z.NEVER;
      }
      // a nested subcategory object may carry the grandparent reference
      const nestedCategoryId =
        nested !== null && nested !== undefined && typeof nested !== 'string'
          ? nested.category_id ?? refId(nested.category)
          : null;
      return {
        id: wire.id,
        subcategoryId,
        categoryId: nestedCategoryId ?? parent?.categoryId ?? null,
        name: wire.name,
        description: wire.description ?? '',
        usageCount: wire.usage_count,
        createdAt: wire.created_at,
      };
    });
}

export function decodeCategory(raw: unknown): InterestCategory {
  return parseWire(categorySchema, raw, 'category');
}

export function decodeSubcategory(raw: unknown, parentCategoryId?: string): InterestSubcategory {
  return parseWire(subcategorySchema(parentCategoryId), raw, 'subcategory');
}

export function decodeTag(raw: unknown, parent?: TagParent): InterestTag {
  return parseWire(tagSchema(parent), raw, 'tag');
}

const treeNodeSchema = z.object({ category: z.unknown(), subcategories: z.unknown() });
const treeBranchSchema = z.object({ tags: z.unknown() });
const childList = z
  .array(z.unknown())
  .nullish()
  .transform((value) => value ?? []);

/**
 * Flatten `[{ category, subcategories: [{ ..., tags: [...] }] }]` into three
 * parallel collections, filling in parent references from the nesting.
 * A malformed node or child list is dropped on its own; its siblings stay.
 */
export function decodeTaxonomyTree(raw: unknown, logger: Logger): FlattenedTaxonomy {
  const flat: FlattenedTaxonomy = { categories: [], subcategories: [], tags: [] };

  decodeEach(raw, 'tree', treeNodeSchema, logger).forEach((node, index) => {
    const category = parseOrDrop(categorySchema, node.category, `tree[${index}].category`, logger);
    if (!category) return;
    flat.categories.push(category);

    const branches = parseOrDrop(childList, node.subcategories, `${category.id}.subcategories`, logger) ?? [];
    const branchSchema = subcategorySchema(category.id);
    branches.forEach((branch, branchIndex) => {
      const subcategory = parseOrDrop(branchSchema, branch, `${category.id}.subcategories[${branchIndex}]`, logger);
      if (!subcategory) return;
      flat.subcategories.push(subcategory);

      const fields = treeBranchSchema.safeParse(branch);
      const tags = fields.success ? fields.data.tags : undefined;
      const what = `${subcategory.id}.tags`;
      const list = parseOrDrop(childList, tags, what, logger) ?? [];
      const schema = tagSchema({ subcategoryId: subcategory.id, categoryId: category.id });
      flat.tags.push(...decodeEach(list, what, schema, logger));
    });
  });

  return flat;
}

/**
 * The most specific populated reference decides the level: the backend
 * denormalizes the category onto subcategory-level rows.
 */
export const profileSchema = z
  .object({
    id: wireId,
    user: z.union([wireId, z.object({ id: wireId })]),
    category: z.unknown(),
    subcategory: z.unknown(),
    tag: z.unknown(),
    added_at: wireTimestamp,
  })
  .transform((wire, ctx): UserInterestProfile => {
    const level = decodeLevel(wire, ctx);
    if (!level) return z.NEVER;
    return {
      id: wire.id,
      userId: typeof wire.user === 'string' ? wire.user : wire.user.id,
      level,
      addedAt: wire.added_at,
    };
  });

const denormalizedCategory = z.object({ id: wireId });

function decodeLevel(
  wire: { category?: unknown; subcategory?: unknown; tag?: unknown },
  ctx: z.RefinementCtx,
): InterestLevel | null {
  const { tag, subcategory, category } = wire;
  if (tag !== undefined && tag !== null) {
    const decoded = parseNested(tagSchema(), tag, 'tag', ctx);
    return decoded ? { kind: 'tag', tag: decoded } : null;
  }
  if (subcategory !== undefined && subcategory !== null) {
    const denormalized = denormalizedCategory.safeParse(category);
    const schema = subcategorySchema(denormalized.success ? denormalized.data.id : undefined);
    const decoded = parseNested(schema, subcategory, 'subcategory', ctx);
    return decoded ? { kind: 'subcategory', categoryId: decoded.categoryId, subcategory: decoded } : null;
  }
  if (category !== undefined && category !== null) {
    const decoded = parseNested(categorySchema, category, 'category', ctx);
    return decoded ? { kind: 'category', category: decoded } : null;
  }
  ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'Profile entry has no category, subcategory or tag' });
  return null;
}

export function decodeProfile(raw: unknown): UserInterestProfile {
  return parseWire(profileSchema, raw, 'profile');
}

export function encodeSelection(selection: ProfileSelection): Record<string, string | number> {
  switch (selection.level) {
    case 'category':
      return { category_id: selection.categoryId, level: 1 };
    case 'subcategory':
      return { category_id: selection.categoryId, subcategory_id: selection.subcategoryId, level: 2 };
    case 'tag':
      return { tag_id: selection.tagId };
  }
}
