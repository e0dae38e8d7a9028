import type {RequestOptions, Backend} from '../providers/types.js'
import type {Document, QueryOptions, VectorDatabase} from './vector-store.js'

export function combineQueryWithContext(query: string, documents: Document[]): string {
  let context = ''
  for (const document of documents) {
    const content = document.metadata.content
    if (typeof content === 'string') context += `${content}\n`
  }
  return `Context: ${context}\nQuery: ${query}`
}

type AugmentPromptInput = {
  backend: Pick<Backend, 'embed'>
  store: VectorDatabase
  /** Which embedding backend's vectors to search. */
  selector: string
  query: string
  queryOptions?: QueryOptions
  requestOptions?: RequestOptions
}

export async function augmentPrompt(input: AugmentPromptInput): Promise<{prompt: string; documents: Document[]}> {
  const embedding = await input.backend.embed(input.query, input.requestOptions)
  const documents = await input.store.queryRelevantDocuments(embedding, input.selector, input.queryOptions)
  return {prompt: combineQueryWithContext(input.query, documents), documents}
}
