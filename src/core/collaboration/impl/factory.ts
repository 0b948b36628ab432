/**
 * Wires the collaboration components over one storage adapter
 */

import type { IStorageAdapter } from "../../storage/interfaces/IStorageAdapter.js";
import { openCollaborationTables, type CollaborationTables } from "../../storage/tables.js";
import { ObjectCatalog, RelationshipStore } from "../../relationships/impl/RelationshipStore.js";
import { LockManager } from "../../locks/impl/LockManager.js";
import { PresenceTracker } from "../../presence/impl/PresenceTracker.js";
import { MatrixAssembler } from "../../matrix/impl/MatrixAssembler.js";
import { CollaborationFacade } from "./CollaborationFacade.js";
import { CollaborationSweeper } from "./CollaborationSweeper.js";
import { DEFAULT_COLLABORATION_CONFIG, type CollaborationConfig } from "../../config.js";
import { systemClock, type Clock } from "../../clock.js";

export interface CollaborationCore {
  tables: CollaborationTables;
  objects: ObjectCatalog;
  relationships: RelationshipStore;
  locks: LockManager;
  presence: PresenceTracker;
  matrix: MatrixAssembler;
  facade: CollaborationFacade;
  sweeper: CollaborationSweeper;
  config: CollaborationConfig;
}

export function createCollaborationCore(
  adapter: IStorageAdapter,
  config: CollaborationConfig = DEFAULT_COLLABORATION_CONFIG,
  clock: Clock = systemClock
): CollaborationCore {
  const tables = openCollaborationTables(adapter);
  const objects = new ObjectCatalog(tables.objects);
  const relationships = new RelationshipStore(tables.relationships);
  const locks = new LockManager(tables.locks, config.lockGrantDurationMs);
  const presence = new PresenceTracker(tables.presence);
  const matrix = new MatrixAssembler({
    objects,
    relationships,
    locks,
    presence: { tracker: presence, activeWindowMs: config.presenceActiveWindowMs },
  });

  return {
    tables,
    objects,
    relationships,
    locks,
    presence,
    matrix,
    facade: new CollaborationFacade({ objects, relationships, locks, presence, matrix, config, clock }),
    sweeper: new CollaborationSweeper({ locks, presence, config, clock }),
    config,
  };
}
