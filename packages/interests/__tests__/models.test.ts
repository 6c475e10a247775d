import { silentLogger } from '@circles/core';
import {
  decodeProfile,
  decodeSubcategory,
  decodeTag,
  decodeTaxonomyTree,
  encodeSelection,
  leafId,
  leafName,
} from '../src/models';
import { ART, CREATED, PROGRAMMING, PYTHON, TECH, categoryProfileWire, tagProfileWire } from './support/wire';

describe('profile decoding', () => {
  it('decodes a tag-level entry with nothing else populated', () => {
    const profile = decodeProfile(tagProfileWire('p-1', PYTHON));

    expect(profile.level.kind).toBe('tag');
    expect(leafId(profile.level)).toBe('tag-003');
    expect(leafName(profile.level)).toBe('Python');
    expect(profile.userId).toBe('user-1');
    expect(profile.addedAt.toISOString()).toBe('2025-06-08T03:00:00.000Z');
  });

  it('prefers the subcategory over the denormalized category', () => {
    const profile = decodeProfile({
      id: 'p-2',
      user: 'user-1',
      category: TECH,
      subcategory: { id: 'tech-sub-001', name: 'Programming', description: '' },
      tag: null,
      added_at: CREATED,
    });

    expect(profile.level).toEqual({
      kind: 'subcategory',
      categoryId: 'tech-001',
      subcategory: {
        id: 'tech-sub-001',
        categoryId: 'tech-001',
        name: 'Programming',
        description: '',
        createdAt: null,
      },
    });
  });

  it('reads the user from a nested object', () => {
    const profile = decodeProfile(categoryProfileWire('p-3', TECH));

    expect(profile.userId).toBe('user-1');
    expect(profile.level.kind).toBe('category');
  });

  it('rejects an entry with no level at all', () => {
    expect(() =>
      decodeProfile({ id: 'p-4', user: 'user-1', category: null, subcategory: null, tag: null, added_at: CREATED }),
    ).toThrow('Profile entry has no category, subcategory or tag');
  });
});

describe('taxonomy decoding', () => {
  it('takes parent ids from *_id fields or nested objects', () => {
    expect(decodeSubcategory({ id: 's', category_id: 'c', name: 'S' }).categoryId).toBe('c');
    expect(decodeTag({ id: 't', subcategory: { id: 's', category: 'c' }, name: 'T', created_at: CREATED })).toMatchObject({
      subcategoryId: 's',
      categoryId: 'c',
      usageCount: 0,
    });
  });

  it('flattens the nested tree and re-derives parent references', () => {
    const tree = decodeTaxonomyTree(
      [
        {
          category: TECH,
          subcategories: [
            {
              id: 'tech-sub-001',
              name: 'Programming',
              description: '',
              tags: [{ id: 'tag-003', name: 'Python', description: '', usage_count: 52, created_at: CREATED }],
            },
          ],
        },
      ],
      silentLogger,
    );

    expect(tree.categories.map((c) => c.id)).toEqual(['tech-001']);
    expect(tree.subcategories[0].categoryId).toBe('tech-001');
    expect(tree.tags[0]).toMatchObject({ id: 'tag-003', subcategoryId: 'tech-sub-001', categoryId: 'tech-001' });
  });

  it('drops a malformed branch and keeps the rest', () => {
    const warn = jest.fn();
    const tree = decodeTaxonomyTree(
      [{ category: { id: 'broken' }, subcategories: [] }, { category: TECH, subcategories: [] }],
      { ...silentLogger, warn },
    );

    expect(tree.categories.map((c) => c.id)).toEqual(['tech-001']);
    expect(warn).toHaveBeenCalledWith('Dropped tree[0].category: name: Required; created_at: Required');
  });

  it('drops only the branch whose tag list is malformed', () => {
    const warn = jest.fn();
    const tree = decodeTaxonomyTree(
      [
        { category: TECH, subcategories: [{ ...PROGRAMMING, tags: {} }] },
        { category: ART, subcategories: [] },
      ],
      { ...silentLogger, warn },
    );

    expect(tree.categories.map((c) => c.id)).toEqual(['tech-001', 'art-001']);
    expect(tree.subcategories.map((s) => s.id)).toEqual(['tech-sub-001']);
    expect(tree.tags).toEqual([]);
    expect(warn).toHaveBeenCalledWith('Dropped tech-sub-001.tags: Expected array, received object');
  });

  it('drops a malformed subcategory list and keeps the category', () => {
    const warn = jest.fn();
    const tree = decodeTaxonomyTree([{ category: TECH, subcategories: 'none' }], { ...silentLogger, warn });

    expect(tree.categories.map((c) => c.id)).toEqual(['tech-001']);
    expect(tree.subcategories).toEqual([]);
    expect(warn).toHaveBeenCalledWith('Dropped tech-001.subcategories: Expected array, received string');
  });
});

describe('encodeSelection', () => {
  it('builds the body for each granularity', () => {
    expect(encodeSelection({ level: 'tag', tagId: 'tag-003' })).toEqual({ tag_id: 'tag-003' });
    expect(encodeSelection({ level: 'category', categoryId: 'tech-001' })).toEqual({ category_id: 'tech-001', level: 1 });
    expect(encodeSelection({ level: 'subcategory', categoryId: 'tech-001', subcategoryId: 'tech-sub-001' })).toEqual({
      category_id: 'tech-001',
      subcategory_id: 'tech-sub-001',
      level: 2,
    });
  });
});
