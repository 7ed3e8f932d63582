/**
 * Engine configuration and validation
 *
 * @module engine/config
 */

import type { AuditContextProvider, UserIdResolver } from '../context/types.js';
import { ConfigurationError } from '../errors.js';
import type { AuditDbClient } from '../interfaces/db-client.js';
import type { SchemaMetadata } from '../interfaces/schema-metadata.js';
import type { TrackedSchemaRegistry } from '../schema/types.js';
import type { TypeRegistry } from '../serialization/types.js';
import type { AuditErrorHandler } from '../utils/error-handler.js';

/**
 * Options for {@link createAuditEngine}
 *
 * @example
 * ```typescript
 * const options: AuditEngineOptions = {
 *   client: prisma,
 *   schemaMetadata,
 *   resolveUserId: () => currentSession()?.userId,
 *   defaultUserIdField: 'ownerId',
 * };
 * ```
 */
export interface AuditEngineOptions {
  /** Base client used for reads and for transactions opened by `runAudited` */
  client: AuditDbClient;
  schemaMetadata: SchemaMetadata;
  /** Identity callback, used when the current frame names no acting user */
  resolveUserId?: UserIdResolver;
  defaultUserIdField?: string;
  defaultResourceIdField?: string;
  /** Batch timestamp factory (default: `new Date()`) */
  now?: () => Date;
  /** Commit id factory (default: cuid2) */
  generateCommitId?: () => string;
  /** Inject registries to share them between engines or isolate them in tests */
  types?: TypeRegistry;
  schemas?: TrackedSchemaRegistry;
  contextProvider?: AuditContextProvider;
  onError?: AuditErrorHandler;
}

const DELEGATES = ['auditTable', 'auditField', 'auditResource', 'auditChange'] as const;

const assertOptionalFunction = (value: unknown, name: string): void => {
  if (value !== undefined && typeof value !== 'function') {
    throw new ConfigurationError(`Option '${name}' must be a function`);
  }
};

const assertOptionalFieldName = (value: unknown, name: string): void => {
  if (value !== undefined && (typeof value !== 'string' || value.trim() === '')) {
    throw new ConfigurationError(`Option '${name}' must be a non-empty string`);
  }
};

/**
 * Validates engine options at startup
 *
 * @throws {ConfigurationError} On the first invalid option
 */
export const validateEngineOptions = (options: AuditEngineOptions): void => {
  const client: unknown = options.client;
  if (typeof client !== 'object' || client === null) {
    throw new ConfigurationError("Option 'client' is required");
  }
  for (const delegate of DELEGATES) {
    if (!(delegate in client) || typeof Reflect.get(client, delegate) !== 'object') {
      throw new ConfigurationError(
        `Client is missing the "${delegate}" delegate. Ensure the audit models exist in your schema.`,
      );
    }
  }

  if (typeof options.schemaMetadata?.getAllFields !== 'function') {
    throw new ConfigurationError("Option 'schemaMetadata' must provide getAllFields()");
  }

  assertOptionalFunction(options.resolveUserId, 'resolveUserId');
  assertOptionalFunction(options.now, 'now');
  assertOptionalFunction(options.generateCommitId, 'generateCommitId');
  assertOptionalFunction(options.onError, 'onError');
  assertOptionalFieldName(options.defaultUserIdField, 'defaultUserIdField');
  assertOptionalFieldName(options.defaultResourceIdField, 'defaultResourceIdField');

  if (options.schemas && (options.defaultUserIdField || options.defaultResourceIdField)) {
    throw new ConfigurationError(
      "Options 'defaultUserIdField' and 'defaultResourceIdField' apply to the engine's own schema registry; " +
        'pass them to createTrackedSchemaRegistry() when injecting one.',
    );
  }
};
