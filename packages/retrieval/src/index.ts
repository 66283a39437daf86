export type { EmbeddingProvider, VectorMatch, VectorStore } from './types.js';
export { EmbeddingError, VectorStoreError } from './errors.js';

// Embedding providers
export { HttpEmbeddingProvider, toVectors } from './embedding/http-embedding-provider.js';
export type { HttpEmbeddingOptions } from './embedding/http-embedding-provider.js';
export { OpenAIEmbeddingProvider } from './embedding/openai.js';
export { CohereEmbeddingProvider } from './embedding/cohere.js';
export { OllamaEmbeddingProvider } from './embedding/ollama.js';
export { HuggingFaceEmbeddingProvider } from './embedding/huggingface.js';
export { EMBEDDING_BUILDERS, createEmbeddingFactory } from './embedding/factory.js';
export type { EmbeddingProviderName } from './embedding/factory.js';

// Vector stores
export { QdrantVectorStore } from './vector/qdrant.js';
export { ChromaVectorStore, resolveChromaCollection } from './vector/chromadb.js';
export { PgVectorStore, buildSearchQuery } from './vector/pgvector.js';
export type { DistanceStrategy } from './vector/pgvector.js';
export { VECTOR_STORE_BUILDERS, createVectorStoreFactory } from './vector/factory.js';
export type { VectorStoreName } from './vector/factory.js';

// Managers and tools
export { EmbeddingManager, VectorStoreManager } from './managers.js';
export type { EmbeddingManagerOptions, VectorStoreManagerOptions } from './managers.js';
export { knowledgeTools, knowledgeSearchSpec, KNOWLEDGE_CATEGORY } from './knowledge-tool.js';
