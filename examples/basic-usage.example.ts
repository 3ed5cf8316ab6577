/**
 * Defines a model, stores a few records in the in-process client and runs a
 * filtered vector search over them.
 *
 * Run after `npm run build` with: node dist/examples/basic-usage.example.js
 */

import { CharField, defineModel, InMemoryStorageClient, IntField, Q, VectorField } from '../index';
import { ConnectionRegistry } from '../storage/connection-registry';

async function main(): Promise<void> {
  const registry = new ConnectionRegistry();
  const client = new InMemoryStorageClient();
  client.createCollection('article', { primaryKey: 'id', autoId: true });
  registry.register('default', client);

  const Article = defineModel({
    name: 'Article',
    registry,
    connection: 'default',
    fields: {
      id: new IntField({ primaryKey: true, autoId: true }),
      title: new CharField({ maxLength: 200 }),
      views: new IntField({ default: 0 }),
      embedding: new VectorField({ dim: 3, metric: 'COSINE' })
    }
  });

  await Article.bulkCreate([
    { title: 'Search for data work', views: 120, embedding: [0.9, 0.1, 0] },
    { title: 'Async Search in practice', views: 40, embedding: [0.7, 0.3, 0.1] },
    { title: 'Gardening basics', views: 300, embedding: [0, 0.2, 0.9] }
  ]);

  const popular = Article.objects().filter({ views__gte: 100 }).orderBy('-views');
  for await (const article of popular) {
    console.log(`[example] ${article.get('title')} (${article.get('views')} views)`);
  }

  const nearest = await Article.objects()
    .filter(Q.where('title', 'contains', 'Search'))
    .search([1, 0, 0], { topK: 5 })
    .annotateDistance('score')
    .fetch();
  for (const article of nearest) {
    console.log(`[example] ${article.get('title')} score=${article.annotations.score}`);
  }

  const first = nearest[0];
  if (first) {
    await first.update({ views: 121 });
    console.log(`[example] updated ${first.get('title')}; new id ${String(first.pk)}`);
  }
}

if (require.main === module) {
  main().catch((error: unknown) => {
    console.error(error);
    process.exitCode = 1;
  });
}
