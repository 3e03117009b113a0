/**
 * Adapter between an ORM's save/delete notifications and the dispatcher.
 */

import type { Logger } from '../audit/logger.js';
import { silentLogger } from '../audit/logger.js';
import { describeError } from '../protocol/errors.js';
import { PurgeDispatcher } from './dispatcher.js';
import { ModelRegistry } from './registry.js';

/**
 * Implemented by whatever hooks into the data layer; call after a save and
 * around a delete.
 */
export interface EntityChangeListener {
  onChange(entityType: string, instance: unknown): void;
}

/**
 * Build a listener that purges registered entity types and ignores the rest.
 * It never throws into the mutation path and does not wait for delivery.
 */
export function createEntityChangeListener(
  dispatcher: PurgeDispatcher,
  registry: ModelRegistry,
  logger: Logger = silentLogger,
): EntityChangeListener {
  return {
    onChange(entityType, instance) {
      if (!registry.isRegistered(entityType)) {
        logger.debug('Ignoring change to unregistered entity type', { entityType });
        return;
      }

      void dispatcher.purgeEntity(entityType, instance).then(
        (result) => {
          logger.info('Triggered cache purge for entity change', { entityType, status: result.status });
        },
        (err: unknown) => {
          logger.error('Failed to purge cache for entity change', { entityType, error: describeError(err) });
        },
      );
    },
  };
}
