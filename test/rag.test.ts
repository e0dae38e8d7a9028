import {describe, expect, it} from 'vitest'
import {augmentPrompt, combineQueryWithContext} from '../src/rag/augment.js'
import {InMemoryVectorStore, cosineSimilarity} from '../src/rag/memory-store.js'

async function seededStore(): Promise<InMemoryVectorStore> {
  const store = new InMemoryVectorStore()
  await store.saveEmbeddings('a', [1, 0], {content: 'alpha'})
  await store.saveEmbeddings('b', [0, 1], {content: 'beta'})
  await store.saveEmbeddings('c', [0.9, 0.1], {content: 'gamma'})
  await store.saveEmbeddings('d', [1, 0], {content: 'from another model'}, 'openai')
  return store
}

describe('cosineSimilarity', () => {
  it('scores direction, not magnitude', () => {
    expect(cosineSimilarity([1, 0], [0, 1])).toBe(0)
    expect(cosineSimilarity([1, 2], [2, 4])).toBeCloseTo(1, 10)
    expect(cosineSimilarity([0, 0], [1, 1])).toBe(0)
  })

  it('rejects vectors of different dimensions', () => {
    expect(() => cosineSimilarity([1], [1, 2])).toThrow('embedding dimensions differ: 1 vs 2')
  })
})

describe('InMemoryVectorStore', () => {
  it('ranks documents by similarity within a selector', async () => {
    const store = await seededStore()

    const documents = await store.queryRelevantDocuments([1, 0], 'default')
    expect(documents.map((document) => document.id)).toEqual(['a', 'c', 'b'])

    const limited = await store.queryRelevantDocuments([1, 0], 'default', {limit: 1})
    expect(limited).toEqual([{id: 'a', metadata: {content: 'alpha'}}])

    const other = await store.queryRelevantDocuments([1, 0], 'openai')
    expect(other.map((document) => document.id)).toEqual(['d'])
  })

  it('stores inserted documents with their content as metadata', async () => {
    const store = new InMemoryVectorStore()
    await store.insertDocument('hello', [1, 1])

    const [document] = await store.queryRelevantDocuments([1, 1], 'default')
    expect(store.size).toBe(1)
    expect(document.id).toMatch(/^doc-/)
    expect(document.metadata).toEqual({content: 'hello'})
  })

  it('returns copies of stored metadata', async () => {
    const store = await seededStore()
    const [first] = await store.queryRelevantDocuments([1, 0], 'default', {limit: 1})
    first.metadata.content = 'changed'

    const [again] = await store.queryRelevantDocuments([1, 0], 'default', {limit: 1})
    expect(again.metadata).toEqual({content: 'alpha'})
  })

  it('refuses empty embeddings', async () => {
    await expect(new InMemoryVectorStore().saveEmbeddings('x', [], {})).rejects.toThrow('embedding must not be empty')
  })
})

describe('combineQueryWithContext', () => {
  it('puts one content line per document before the query', () => {
    const prompt = combineQueryWithContext('What is alpha?', [
      {id: 'a', metadata: {content: 'alpha'}},
      {id: 'x', metadata: {title: 'no content'}},
      {id: 'c', metadata: {content: 'gamma'}}
    ])

    expect(prompt).toBe('Context: alpha\ngamma\n\nQuery: What is alpha?')
  })

  it('keeps the frame when nothing was retrieved', () => {
    expect(combineQueryWithContext('Q', [])).toBe('Context: \nQuery: Q')
  })
})

describe('augmentPrompt', () => {
  it('embeds the query and combines the closest documents', async () => {
    const store = await seededStore()
    const backend = {embed: async () => [1, 0]}

    const {prompt, documents} = await augmentPrompt({
      backend,
      store,
      selector: 'default',
      query: 'What is alpha?',
      queryOptions: {limit: 2}
    })

    expect(documents.map((document) => document.id)).toEqual(['a', 'c'])
    expect(prompt).toBe('Context: alpha\ngamma\n\nQuery: What is alpha?')
  })
})
