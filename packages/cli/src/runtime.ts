/**
 * Builds the collaborators a command needs from the config file
 */

import type {
  CatalogCollaborator,
  Logger,
  ModifierRegistry,
  ProductRepository,
  ReviewQueue,
  SemanticResolver,
} from '@snowmatch/core';
import { createJsonCatalog, createNdjsonModifierRegistry } from '@snowmatch/connector-file';
import {
  applySchema,
  createPostgresCatalog,
  createPostgresClient,
  createPostgresModifierRegistry,
  createPostgresProductRepository,
  createPostgresReviewQueue,
} from '@snowmatch/connector-db';
import { createAnthropicResolver, createSimilarityResolver } from '@snowmatch/resolvers';
import type { ResolverConfig, StoresConfig } from './config.js';

export interface Runtime {
  catalog: CatalogCollaborator;
  registry: ModifierRegistry;
  /** Only database stores persist records and review items */
  repository?: ProductRepository;
  reviewQueue?: ReviewQueue;
  close(): Promise<void>;
}

export function createResolver(config: ResolverConfig): SemanticResolver {
  switch (config.type) {
    case 'similarity':
      return createSimilarityResolver();
    case 'anthropic':
      return createAnthropicResolver({
        apiKey: config.apiKey,
        model: config.model,
        maxTokens: config.maxTokens,
        requestTimeoutMs: config.requestTimeoutMs,
        baseURL: config.baseURL,
      });
    default: {
      const exhaustive: never = config;
      throw new Error(`Unknown resolver type: ${String(exhaustive)}`);
    }
  }
}

export async function openStores(config: StoresConfig, logger: Logger): Promise<Runtime> {
  switch (config.type) {
    case 'file': {
      const catalog = createJsonCatalog({ id: 'catalog', filePath: config.catalogPath, encoding: config.encoding });
      const registry = createNdjsonModifierRegistry({
        id: 'modifier-registry',
        filePath: config.registryPath,
        encoding: config.encoding,
      });
      await Promise.all([catalog.connect(), registry.connect()]);
      logger.info('File stores loaded', { templates: catalog.size, catalog: config.catalogPath });

      return {
        catalog,
        registry,
        close: async () => {
          await catalog.disconnect();
          await registry.disconnect();
        },
      };
    }

    case 'postgresql': {
      const client = createPostgresClient({
        connectionString: config.connectionString,
        host: config.host,
        port: config.port,
        database: config.database,
        user: config.user,
        password: config.password,
        ssl: config.ssl,
        max: config.maxConnections,
      });
      await client.connect();
      if (config.applySchema) {
        try {
          await applySchema(client);
        } catch (error) {
          await client.disconnect();
          throw error;
        }
        logger.info('Database schema applied');
      }

      return {
        catalog: createPostgresCatalog(client),
        registry: createPostgresModifierRegistry(client),
        repository: createPostgresProductRepository(client),
        reviewQueue: createPostgresReviewQueue(client),
        close: async () => {
          await client.disconnect();
        },
      };
    }

    default: {
      const exhaustive: never = config;
      throw new Error(`Unknown store type: ${String(exhaustive)}`);
    }
  }
}
