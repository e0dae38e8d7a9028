export {Conversation, type Message, type Parameters, type Role, type WireMessage} from './core/conversation.js'
export {
  BackendError,
  BackendHTTPError,
  DecodeError,
  RequestMarshalError,
  ToolExecutionError,
  ToolNotFoundError,
  TransportError
} from './core/errors.js'
export {InMemoryEventBus, type BackendEvent, type EventBus, type EventHandler} from './core/event-bus.js'
export {formatEvent} from './core/format-event.js'
export type {JsonObject, JsonPrimitive, JsonValue} from './core/json.js'
export {startRuntime, type Runtime} from './core/runtime.js'
export {LogFileSubscriber} from './core/subscribers/log-file-subscriber.js'
export {MetricsSubscriber, type BackendMetrics} from './core/subscribers/metrics-subscriber.js'
export {loadConfig} from './config/load-config.js'
export {appConfigSchema, type AppConfig, type BackendKind} from './config/schema.js'
export {ChatBackend, type ChatBackendOptions, type ModelReply, type ModelToolCall} from './providers/chat-backend.js'
export {createBackend, createConfiguredBackend, type BackendPurpose} from './providers/factory.js'
export {MockProvider} from './providers/mock-provider.js'
export {OllamaProvider} from './providers/ollama-provider.js'
export {OpenAIProvider} from './providers/openai-provider.js'
export type {Backend, PromptResponse, RequestOptions, ToolCall} from './providers/types.js'
export {augmentPrompt, combineQueryWithContext} from './rag/augment.js'
export {InMemoryVectorStore, cosineSimilarity} from './rag/memory-store.js'
export type {Document, QueryOptions, VectorDatabase} from './rag/vector-store.js'
export {ToolRegistry, type Tool, type ToolDescriptor, type ToolExecutor} from './tools/registry.js'
export {weatherTool} from './tools/weather.js'
