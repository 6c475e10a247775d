import { ApiErrorType, silentLogger } from '@circles/core';
import { FakeHttpClient, deferred } from '../../core/__tests__/support/fake-http';
import { INTEREST_PATHS, InterestApi } from '../src/interest-api';
import { ProfileRepository } from '../src/profile-repository';
import { DJANGO, PYTHON, TECH, categoryProfileWire, tagProfileWire } from './support/wire';

function setup() {
  const http = new FakeHttpClient();
  const repository = new ProfileRepository(new InterestApi(http, silentLogger), { logger: silentLogger });
  return { http, repository };
}

describe('ProfileRepository', () => {
  it('treats a 404 on first load as an empty profile', async () => {
    const { repository } = setup();

    const result = await repository.refresh();

    expect(result).toEqual({ ok: true, value: [] });
    expect(repository.state.getState().loaded).toBe(true);
  });

  it('round-trips a tag-level entry', async () => {
    const { http, repository } = setup();
    http.reply('POST', INTEREST_PATHS.profiles, tagProfileWire('p-1', PYTHON));
    http.reply('GET', INTEREST_PATHS.profiles, [tagProfileWire('p-1', PYTHON)]);

    const added = await repository.add({ level: 'tag', tagId: 'tag-003' }, 'Python');
    await repository.refresh();

    expect(added.ok).toBe(true);
    expect(http.callsTo('POST', INTEREST_PATHS.profiles)[0].body).toEqual({ tag_id: 'tag-003' });
    const entries = repository.list();
    expect(entries).toHaveLength(1);
    expect(entries[0].level.kind).toBe('tag');
    expect(entries[0].level.kind === 'tag' && entries[0].level.tag.id).toBe('tag-003');
  });

  it('rejects a duplicate before any request and leaves the list unchanged', async () => {
    const { http, repository } = setup();
    http.reply('POST', INTEREST_PATHS.profiles, tagProfileWire('p-1', PYTHON));

    await repository.add({ level: 'tag', tagId: 'tag-003' }, 'Python');
    const second = await repository.add({ level: 'tag', tagId: 'tag-003' }, 'Python');

    expect(second.ok).toBe(false);
    expect(!second.ok && second.error.type).toBe(ApiErrorType.DUPLICATE_SELECTION);
    expect(!second.ok && second.error.detail).toBe('Python');
    expect(http.callsTo('POST', INTEREST_PATHS.profiles)).toHaveLength(1);
    expect(repository.list()).toHaveLength(1);
  });

  it('keeps the same leaf at different levels apart', async () => {
    const { http, repository } = setup();
    http.reply('POST', INTEREST_PATHS.addCategoryLevel, categoryProfileWire('p-9', TECH));

    await repository.add({ level: 'category', categoryId: 'tech-001' });

    expect(repository.contains('category', 'tech-001')).toBe(true);
    expect(repository.contains('tag', 'tech-001')).toBe(false);
    expect(http.callsTo('POST', INTEREST_PATHS.addCategoryLevel)[0].body).toEqual({ category_id: 'tech-001', level: 1 });
  });

  it('serializes concurrent adds of the same leaf', async () => {
    const { http, repository } = setup();
    http.reply('POST', INTEREST_PATHS.profiles, tagProfileWire('p-1', PYTHON));

    const [first, second] = await Promise.all([
      repository.add({ level: 'tag', tagId: 'tag-003' }),
      repository.add({ level: 'tag', tagId: 'tag-003' }),
    ]);

    expect(first.ok).toBe(true);
    expect(second.ok).toBe(false);
    expect(http.callsTo('POST', INTEREST_PATHS.profiles)).toHaveLength(1);
  });

  it('maps a server-side duplicate rejection', async () => {
    const { http, repository } = setup();
    http.fail('POST', INTEREST_PATHS.profiles, 400, 'This interest is already registered');

    const result = await repository.add({ level: 'tag', tagId: 'tag-003' }, 'Python');

    expect(!result.ok && result.error.type).toBe(ApiErrorType.DUPLICATE_SELECTION);
  });

  it('reloads the list when the create response is not an entry', async () => {
    const { http, repository } = setup();
    http.reply('POST', INTEREST_PATHS.addCategoryLevel, { message: 'created' });
    http.reply('GET', INTEREST_PATHS.profiles, [categoryProfileWire('p-9', TECH)]);

    const result = await repository.add({ level: 'category', categoryId: 'tech-001' });

    expect(result.ok && result.value.id).toBe('p-9');
    expect(repository.contains('category', 'tech-001')).toBe(true);
  });

  describe('remove', () => {
    async function seeded() {
      const ctx = setup();
      ctx.http.reply('GET', INTEREST_PATHS.profiles, [
        tagProfileWire('p-1', PYTHON),
        tagProfileWire('p-2', DJANGO),
        categoryProfileWire('p-3', TECH),
      ]);
      await ctx.repository.refresh();
      return ctx;
    }

    it('removes immediately, before the server answers', async () => {
      const { http, repository } = await seeded();
      const pending = deferred<unknown>();
      http.on('DELETE', INTEREST_PATHS.profile('p-2'), () => pending.promise);

      const removal = repository.remove('p-2');
      await new Promise((resolve) => setImmediate(resolve));

      expect(repository.list().map((p) => p.id)).toEqual(['p-1', 'p-3']);
      expect(repository.contains('tag', 'tag-004')).toBe(false);
      pending.resolve(null);
      expect((await removal).ok).toBe(true);
    });

    it('restores the entry at its old position when the server fails', async () => {
      const { http, repository } = await seeded();
      http.fail('DELETE', INTEREST_PATHS.profile('p-2'), 500);

      const result = await repository.remove('p-2');

      expect(result.ok).toBe(false);
      expect(repository.list().map((p) => p.id)).toEqual(['p-1', 'p-2', 'p-3']);
      expect(repository.contains('tag', 'tag-004')).toBe(true);
    });

    it('counts a 404 as already removed', async () => {
      const { repository } = await seeded();

      const result = await repository.remove('p-1');

      expect(result.ok).toBe(true);
      expect(repository.list().map((p) => p.id)).toEqual(['p-2', 'p-3']);
    });
  });
});
