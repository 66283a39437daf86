import type { ConfigProvider, Logger, ResolvedConfig } from '@toolgate/core';
import { getNumber, getString, requireKeys } from '@toolgate/core';
import {
  HttpClient,
  ProviderFactory,
  type ProviderBuildContext,
  type ProviderBuilder,
} from '@toolgate/connections';
import type { EmbeddingProvider } from '../types.js';
import { COHERE_DEFAULTS, CohereEmbeddingProvider } from './cohere.js';
import { HUGGINGFACE_DEFAULTS, HuggingFaceEmbeddingProvider } from './huggingface.js';
import { OLLAMA_DEFAULTS, OllamaEmbeddingProvider } from './ollama.js';
import { OPENAI_DEFAULTS, OpenAIEmbeddingProvider } from './openai.js';

export type EmbeddingProviderName = 'openai' | 'cohere' | 'ollama' | 'huggingface';

interface Defaults {
  baseUrl: string;
  model: string;
  batchSize: number;
}

function providerCategory(context: ProviderBuildContext): string {
  return `${context.category}.${context.provider}`;
}

function bearerClient(config: ResolvedConfig, defaults: Defaults): HttpClient {
  return new HttpClient({
    baseUrl: getString(config, 'baseUrl') ?? defaults.baseUrl,
    headers: { Authorization: `Bearer ${getString(config, 'apiKey') ?? ''}` },
  });
}

function commonOptions(config: ResolvedConfig, defaults: Defaults) {
  return {
    model: getString(config, 'model') ?? defaults.model,
    batchSize: getNumber(config, 'batchSize') ?? defaults.batchSize,
  };
}

export const EMBEDDING_BUILDERS: Readonly<Record<EmbeddingProviderName, ProviderBuilder<EmbeddingProvider>>> = {
  openai: (config, context) => {
    requireKeys(providerCategory(context), config, ['apiKey']);
    return new OpenAIEmbeddingProvider(bearerClient(config, OPENAI_DEFAULTS), {
      ...commonOptions(config, OPENAI_DEFAULTS),
      dimensions: getNumber(config, 'dimensions'),
    });
  },
  cohere: (config, context) => {
    requireKeys(providerCategory(context), config, ['apiKey']);
    return new CohereEmbeddingProvider(bearerClient(config, COHERE_DEFAULTS), {
      ...commonOptions(config, COHERE_DEFAULTS),
      inputType: getString(config, 'inputType') ?? COHERE_DEFAULTS.inputType,
    });
  },
  ollama: (config) =>
    new OllamaEmbeddingProvider(
      new HttpClient({ baseUrl: getString(config, 'baseUrl') ?? OLLAMA_DEFAULTS.baseUrl }),
      commonOptions(config, OLLAMA_DEFAULTS),
    ),
  huggingface: (config, context) => {
    requireKeys(providerCategory(context), config, ['apiKey']);
    return new HuggingFaceEmbeddingProvider(
      bearerClient(config, HUGGINGFACE_DEFAULTS),
      commonOptions(config, HUGGINGFACE_DEFAULTS),
    );
  },
};

/** Factory over the `embedding` category's `provider` discriminator. */
export function createEmbeddingFactory(
  config: ConfigProvider,
  logger: Logger,
): ProviderFactory<EmbeddingProvider, EmbeddingProviderName> {
  return new ProviderFactory({ config, logger, variants: EMBEDDING_BUILDERS });
}
