import {randomUUID} from 'node:crypto'
import {cloneJson, type JsonObject} from '../core/json.js'
import type {Document, QueryOptions, VectorDatabase} from './vector-store.js'

const DEFAULT_QUERY_LIMIT = 5
const DEFAULT_SELECTOR = 'default'

type StoredDocument = {
  id: string
  selector: string
  embedding: number[]
  metadata: JsonObject
}

export function cosineSimilarity(a: number[], b: number[]): number {
  if (a.length !== b.length) {
    throw new Error(`embedding dimensions differ: ${a.length} vs ${b.length}`)
  }

  let dot = 0
  let normA = 0
  let normB = 0
  for (let i = 0; i < a.length; i += 1) {
    dot += a[i] * b[i]
    normA += a[i] * a[i]
    normB += b[i] * b[i]
  }
  if (normA === 0 || normB === 0) return 0
  return dot / (Math.sqrt(normA) * Math.sqrt(normB))
}

export class InMemoryVectorStore implements VectorDatabase {
  private readonly documents = new Map<string, StoredDocument>()

  get size(): number {
    return this.documents.size
  }

  async insertDocument(content: string, embedding: number[], selector = DEFAULT_SELECTOR): Promise<void> {
    await this.saveEmbeddings(`doc-${randomUUID()}`, embedding, {content}, selector)
  }

  async saveEmbeddings(
    docId: string,
    embedding: number[],
    metadata: JsonObject,
    selector = DEFAULT_SELECTOR
  ): Promise<void> {
    if (embedding.length === 0) throw new Error('embedding must not be empty')
    this.documents.set(docId, {id: docId, selector, embedding: [...embedding], metadata: cloneJson(metadata)})
  }

  async queryRelevantDocuments(embedding: number[], selector: string, options: QueryOptions = {}): Promise<Document[]> {
    const limit = options.limit ?? DEFAULT_QUERY_LIMIT
    return [...this.documents.values()]
      .filter((document) => document.selector === selector && document.embedding.length === embedding.length)
      .map((document) => ({document, score: cosineSimilarity(embedding, document.embedding)}))
      .sort((a, b) => b.score - a.score)
      .slice(0, limit)
      .map(({document}) => ({id: document.id, metadata: cloneJson(document.metadata)}))
  }
}
