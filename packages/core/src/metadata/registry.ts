import { ProviderError } from '@stixql/validation'
import type { SchemaConfig } from '@stixql/validation'
import type { RefTypeTable } from '../stix/refTypes.js'
import { DEFAULT_REF_TYPES } from '../stix/refTypes.js'
import type { SchemaProvider } from '../types/interfaces.js'
import type { SchemaContext } from './context.js'
import { createSchemaContext } from './context.js'

/**
 * In-memory schema store.
 *
 * Features:
 * - Loads from a provider → validates → throws on failure
 * - Atomic swap on reload; in-flight queries keep the snapshot they started with
 * - Failed reloads preserve the previous snapshot
 */
export class SchemaRegistry {
  private snapshot: SchemaContext
  private readonly provider: SchemaProvider

  private constructor(provider: SchemaProvider, snapshot: SchemaContext) {
    this.provider = provider
    this.snapshot = snapshot
  }

  static async create(provider: SchemaProvider, refTypes: RefTypeTable = DEFAULT_REF_TYPES): Promise<SchemaRegistry> {
    const config = await SchemaRegistry.load(provider)
    return new SchemaRegistry(provider, createSchemaContext(config, refTypes))
  }

  getSnapshot(): SchemaContext {
    return this.snapshot
  }

  /** Re-load from the provider (or `provider`, when given) and swap the snapshot. */
  async reload(provider: SchemaProvider = this.provider): Promise<void> {
    const config = await SchemaRegistry.load(provider)
    this.snapshot = createSchemaContext(config, this.snapshot.refTypes)
  }

  private static async load(provider: SchemaProvider): Promise<SchemaConfig> {
    try {
      return await provider.load()
    } catch (err) {
      throw new ProviderError(
        `Schema provider failed to load: ${err instanceof Error ? err.message : String(err)}`,
        err instanceof Error ? err : undefined,
      )
    }
  }
}
