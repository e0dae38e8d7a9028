import type {JsonObject} from '../core/json.js'

export type Document = {
  id: string
  metadata: JsonObject
}

export type QueryOptions = {
  /** Maximum number of documents returned, best match first. */
  limit?: number
}

/**
 * Storage for embedded documents. `selector` names the embedding backend
 * the vectors came from, since vectors from different models are not comparable.
 */
export interface VectorDatabase {
  insertDocument(content: string, embedding: number[], selector?: string): Promise<void>
  queryRelevantDocuments(embedding: number[], selector: string, options?: QueryOptions): Promise<Document[]>
  saveEmbeddings(docId: string, embedding: number[], metadata: JsonObject, selector?: string): Promise<void>
}
