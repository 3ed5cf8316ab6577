import {
  CompileError,
  ConnectionNotFoundError,
  DataIntegrityError,
  DoesNotExist,
  MultipleObjectsReturned,
  QueryConfigError,
  SchemaError,
  StorageError
} from '../../core/errors';
import { Q } from '../../query/predicate';
import { SAMPLE_ARTICLES, setupArticles } from '../fixtures/articles';

async function seeded() {
  const setup = setupArticles();
  await setup.Article.bulkCreate(SAMPLE_ARTICLES);
  return setup;
}

describe('QuerySet chaining', () => {
  it('never mutates the receiver', async () => {
    const { Article } = await seeded();
    const base = Article.objects().filter({ published: true });
    const narrowed = base.filter({ views__gt: 20 });
    const limited = base.limit(1);

    expect(base.explain().request.filter).toBe('published == true');
    expect(narrowed.explain().request.filter).toBe('published == true and views > 20');
    expect(base.spec.limit).toBeNull();
    expect(limited.spec.limit).toBe(1);
    expect(Object.isFrozen(base.spec)).toBe(true);

    expect((await narrowed.fetch()).map((article) => article.pk)).toEqual([2]);
    expect((await base.fetch()).map((article) => article.pk)).toEqual([1, 2, 4]);
  });

  it('excludes with a negated predicate', async () => {
    const { Article } = await seeded();
    const qs = Article.objects().exclude({ title__contains: 'Search' });

    expect(qs.explain().request.filter).toBe('not (title like "%Search%")');
    expect((await qs.fetch()).map((article) => article.pk)).toEqual([3, 4]);
  });

  it('accepts predicate trees', async () => {
    const { Article } = await seeded();
    const qs = Article.objects().filter(Q.or(Q.where('views', 'lt', 8), Q.where('title', 'startswith', 'Rust')));

    expect((await qs.fetch()).map((article) => article.pk)).toEqual([3, 4]);
  });

  it('rejects invalid limits, offsets and fields at chain time', () => {
    const { Article } = setupArticles();

    expect(() => Article.objects().limit(0)).toThrow('limit must be a positive integer, got 0');
    expect(() => Article.objects().offset(-1)).toThrow(QueryConfigError);
    expect(() => Article.objects().filter(Q.where('views', 'contains', 'x'))).toThrow(CompileError);
    expect(() => Article.objects().filter(Q.or(Q.distanceLessThan(1), Q.where('views', 'gt', 1)))).toThrow(CompileError);
  });

  it('fails before any request when the chain is invalid', async () => {
    const { Article, memory } = await seeded();
    const query = jest.spyOn(memory, 'query');

    await expect(Article.objects().orderBy('distance').fetch()).rejects.toThrow(QueryConfigError);
    expect(query).not.toHaveBeenCalled();
  });
});

describe('QuerySet evaluation', () => {
  it('returns the rows matching a containment filter', async () => {
    const { Article } = await seeded();
    const results = await Article.objects().filter({ title__contains: 'Search' }).fetch();

    expect(results.map((article) => article.get('title'))).toEqual(['Search basics', 'Advanced Search']);
    expect(results.every((article) => article.persisted)).toBe(true);
  });

  it('sends a single request however often it is evaluated', async () => {
    const { Article, memory } = await seeded();
    const query = jest.spyOn(memory, 'query');
    const count = jest.spyOn(memory, 'count');
    const qs = Article.objects().filter({ published: true });

    const [first, second] = await Promise.all([qs.fetch(), qs.fetch()]);
    const third = await qs.fetch();

    expect(first).toBe(second);
    expect(third).toBe(first);
    expect(await qs.count()).toBe(3);
    expect(query).toHaveBeenCalledTimes(1);
    expect(count).not.toHaveBeenCalled();
  });

  it('returns identical results for separate querysets with the same chain', async () => {
    const { Article } = await seeded();
    const build = () => Article.objects().filter({ views__gte: 10 }).orderBy('-views');

    const first = (await build().fetch()).map((article) => article.toRecord());
    const second = (await build().fetch()).map((article) => article.toRecord());

    expect(second).toEqual(first);
  });

  it('stays unevaluated after a failed request', async () => {
    const { Article, memory } = await seeded();
    const query = jest.spyOn(memory, 'query').mockRejectedValueOnce(new StorageError('unavailable', 'Unavailable'));
    const qs = Article.objects();

    await expect(qs.fetch()).rejects.toThrow('unavailable');
    expect(await qs.fetch()).toHaveLength(4);
    expect(query).toHaveBeenCalledTimes(2);
  });

  it('pushes limit and offset to storage for unordered queries', async () => {
    const { Article } = await seeded();

    expect((await Article.objects().offset(1).limit(2).fetch()).map((article) => article.pk)).toEqual([2, 3]);
  });

  it('orders in process with nulls last', async () => {
    const { Article } = await seeded();

    expect((await Article.objects().orderBy('-views').fetch()).map((article) => article.pk)).toEqual([2, 3, 1, 4]);
    expect((await Article.objects().orderBy('rating').fetch()).map((article) => article.pk)).toEqual([4, 3, 1, 2]);
    expect((await Article.objects().orderBy('-rating').fetch()).map((article) => article.pk)).toEqual([1, 3, 4, 2]);
    expect((await Article.objects().orderBy('-views').offset(1).limit(2).fetch()).map((article) => article.pk)).toEqual([3, 1]);
  });

  it('rejects ordering by unknown or vector fields', () => {
    const { Article } = setupArticles();

    expect(() => Article.objects().orderBy('embedding')).toThrow("Cannot order by vector field 'embedding'");
  });

  it('iterates with for await', async () => {
    const { Article } = await seeded();
    const titles: Array<string | null> = [];

    for await (const article of Article.objects().filter({ published: false })) {
      titles.push(article.get('title'));
    }

    expect(titles).toEqual(['Rust in depth']);
  });

  it('raises DataIntegrityError for rows that fail their fields', async () => {
    const { Article, memory } = setupArticles();
    await memory.insert('article', [{ id: 1, title: 42, views: 1, published: true, rating: null, tags: null, embedding: [1, 0, 0] }]);

    const error = await Article.objects().fetch().catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(DataIntegrityError);
    expect(error).toMatchObject({ model: 'Article', rowIndex: 0 });
  });

  it('raises ConnectionNotFoundError for an unknown alias', async () => {
    const { Article } = setupArticles();

    await expect(Article.objects().using('replica').fetch()).rejects.toThrow(ConnectionNotFoundError);
  });

  it('reads another collection with on()', async () => {
    const { Article, memory } = await seeded();
    memory.createCollection('article_archive', { primaryKey: 'id' });

    expect(await Article.objects().on('article_archive').fetch()).toEqual([]);
  });
});

describe('QuerySet.count', () => {
  it('uses the storage count request and windows it', async () => {
    const { Article, memory } = await seeded();
    const count = jest.spyOn(memory, 'count');
    const query = jest.spyOn(memory, 'query');
    const published = Article.objects().filter({ published: true });

    expect(await published.count()).toBe(3);
    expect(await published.limit(2).count()).toBe(2);
    expect(await published.offset(2).count()).toBe(1);
    expect(await published.offset(5).count()).toBe(0);
    expect(count).toHaveBeenCalledTimes(4);
    expect(query).not.toHaveBeenCalled();
  });

  it('counts search results by fetching them', async () => {
    const { Article } = await seeded();

    expect(await Article.objects().search([1, 0, 0], { topK: 3 }).count()).toBe(3);
  });

  it('caches the count', async () => {
    const { Article, memory } = await seeded();
    const count = jest.spyOn(memory, 'count');
    const qs = Article.objects();

    await qs.count();
    await qs.count();

    expect(count).toHaveBeenCalledTimes(1);
  });
});

describe('QuerySet.get', () => {
  it('returns the single match', async () => {
    const { Article } = await seeded();
    const article = await Article.objects().get({ id: 3 });

    expect(article.get('title')).toBe('Rust in depth');
  });

  it('raises DoesNotExist when nothing matches', async () => {
    const { Article } = setupArticles();
    const error = await Article.objects().get({ id: 999 }).catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(DoesNotExist);
    expect(Article.isDoesNotExist(error)).toBe(true);
    expect((error as DoesNotExist).message).toBe('Article matching query does not exist');
  });

  it('raises MultipleObjectsReturned when more than one matches', async () => {
    const { Article } = setupArticles();
    await Article.create({ id: 1, title: 'Search', embedding: [1, 0, 0] });
    await Article.create({ id: 2, title: 'Search', embedding: [0, 1, 0] });

    const error = await Article.objects().get({ title: 'Search' }).catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(MultipleObjectsReturned);
    expect(Article.isMultipleObjectsReturned(error)).toBe(true);
    expect(Article.isDoesNotExist(error)).toBe(false);
  });
});

describe('QuerySet.first, last and exists', () => {
  it('returns the ends of an ordered queryset', async () => {
    const { Article } = await seeded();
    const byViews = Article.objects().orderBy('views');

    expect((await byViews.first())?.pk).toBe(4);
    expect((await byViews.last())?.pk).toBe(2);
  });

  it('reports whether anything matches', async () => {
    const { Article } = await seeded();

    expect(await Article.objects().filter({ views__gt: 40 }).exists()).toBe(true);
    expect(await Article.objects().filter({ views__gt: 100 }).exists()).toBe(false);
    expect(await Article.objects().filter({ views__gt: 100 }).first()).toBeNull();
  });
});

describe('QuerySet.search', () => {
  it('returns neighbours ranked by distance', async () => {
    const { Article } = await seeded();
    const results = await Article.objects().search([1, 0, 0], { topK: 2 }).fetch();

    expect(results.map((article) => article.pk)).toEqual([1, 2]);
    expect(results[0]!.distance).toBe(0);
    expect(results[1]!.distance).toBeCloseTo(0.02);
  });

  it('applies the scalar filter before ranking', async () => {
    const { Article } = await seeded();
    const results = await Article.objects().filter({ published: true }).search([0, 1, 0], { topK: 2 }).fetch();

    expect(results.map((article) => article.pk)).toEqual([2, 1]);
  });

  it('filters hits by a distance bound', async () => {
    const { Article } = await seeded();
    const results = await Article.objects().search([1, 0, 0]).filter({ distance__lt: 1 }).fetch();

    expect(results.map((article) => article.pk)).toEqual([1, 2]);
  });

  it('annotates distances under an alias', async () => {
    const { Article } = await seeded();
    const [nearest] = await Article.objects().search([0, 0, 1], { topK: 1 }).annotateDistance('score').fetch();

    expect(nearest!.pk).toBe(4);
    expect(nearest!.annotations).toEqual({ score: 0 });
  });

  it('reverses the ranking for -distance', async () => {
    const { Article } = await seeded();
    const results = await Article.objects().search([1, 0, 0]).orderBy('-distance').fetch();

    expect(results.map((article) => article.pk)).toEqual([4, 3, 2, 1]);
  });

  it('returns the farthest neighbour first for -distance, as fetch() does', async () => {
    const { Article } = await seeded();
    const farthestFirst = Article.objects().search([1, 0, 0], { topK: 4 }).orderBy('-distance');

    expect((await farthestFirst.first())?.pk).toBe(4);
    expect((await Article.objects().search([1, 0, 0], { topK: 4 }).first())?.pk).toBe(1);
  });

  it('caps the neighbour count by the limit and skips by the offset', async () => {
    const { Article, memory } = await seeded();
    const search = jest.spyOn(memory, 'search');
    const results = await Article.objects().search([1, 0, 0], { topK: 3 }).offset(1).limit(2).fetch();

    expect(results.map((article) => article.pk)).toEqual([2, 3]);
    expect(search).toHaveBeenCalledWith(expect.objectContaining({ topK: 2, offset: 1, metric: 'L2' }));
  });

  it('refuses to combine with a scalar ordering in either order', () => {
    const { Article } = setupArticles();

    expect(() => Article.objects().orderBy('views').search([1, 0, 0])).toThrow(QueryConfigError);
    expect(() => Article.objects().search([1, 0, 0]).orderBy('title')).toThrow(QueryConfigError);
    expect(() => Article.objects().search([1, 0, 0]).orderBy('-distance')).not.toThrow();
  });

  it('rejects query vectors of the wrong dimensionality at attach time', () => {
    const { Article } = setupArticles();

    expect(() => Article.objects().search([1, 0])).toThrow("Query vector for 'embedding' has 2 dimensions, expected 3");
    expect(() => Article.objects().search([1, 0, 0, 0])).toThrow(SchemaError);
  });

  it('rejects non-vector fields, bad topK and non-finite components', () => {
    const { Article } = setupArticles();

    expect(() => Article.objects().search([1, 0, 0], { field: 'title' })).toThrow("'title' is not a vector field of Article");
    expect(() => Article.objects().search([1, 0, 0], { topK: 0 })).toThrow('topK must be a positive integer, got 0');
    expect(() => Article.objects().search([1, Number.NaN, 0])).toThrow(SchemaError);
  });

  it('requires a search before annotating distances', () => {
    const { Article } = setupArticles();

    expect(() => Article.objects().annotateDistance()).toThrow(QueryConfigError);
    expect(() => Article.objects().search([1, 0, 0]).annotateDistance('title')).toThrow("Invalid distance annotation name 'title'");
  });
});

describe('QuerySet projections', () => {
  it('loads only the requested fields plus the primary key', async () => {
    const { Article } = await seeded();
    const [article] = await Article.objects().filter({ id: 1 }).only('title').fetch();

    expect(article!.isPartial).toBe(true);
    expect(article!.toRecord()).toEqual({ id: 1, title: 'Search basics' });
    expect(() => article!.get('views')).toThrow("Field 'views' was not loaded for this Article");
    await expect(article!.save()).rejects.toThrow(QueryConfigError);
  });

  it('defers the named fields', async () => {
    const { Article } = await seeded();
    const [article] = await Article.objects().filter({ id: 2 }).defer('embedding', 'tags').fetch();

    expect(article!.toRecord()).toEqual({ id: 2, title: 'Advanced Search', views: 50, published: true, rating: null });
  });

  it('refuses to defer the primary key', () => {
    const { Article } = setupArticles();

    expect(() => Article.objects().defer('id')).toThrow("The primary key 'id' cannot be deferred");
  });
});

describe('QuerySet.delete', () => {
  it('deletes every matching record', async () => {
    const { Article, memory } = await seeded();

    expect(await Article.objects().filter({ published: false }).delete()).toBe(1);
    expect(memory.dump('article').map((row) => row.id)).toEqual([1, 2, 4]);
  });

  it('refuses unfiltered, sliced and search querysets', async () => {
    const { Article, memory } = await seeded();
    const remove = jest.spyOn(memory, 'delete');

    await expect(Article.objects().delete()).rejects.toThrow('Refusing to delete every record; filter the queryset first');
    await expect(Article.objects().filter({ published: true }).limit(1).delete()).rejects.toThrow(QueryConfigError);
    await expect(Article.objects().search([1, 0, 0]).delete()).rejects.toThrow(QueryConfigError);
    expect(remove).not.toHaveBeenCalled();
  });
});
