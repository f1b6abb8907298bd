import { ingestionLog } from "../../../drizzle/schema";
import type { IngestionLog } from "../../../drizzle/schema";
import type { Executor } from "../../db";
import { createLogger } from "../../_core/logger";

export interface SyncContext {
  workerName: string;
  entityType: string;
  startedAt: Date;
  recordsProcessed: number;
  recordsInserted: number;
  recordsUpdated: number;
  errors: string[];
}

export type SyncStatus = IngestionLog["status"];

export function syncStatus(context: SyncContext): SyncStatus {
  if (context.errors.length === 0) return "success";
  return context.recordsInserted + context.recordsUpdated > 0 ? "partial" : "failure";
}

/**
 * Run bookkeeping for workers: counters while the run goes, one
 * ingestion_log row when it ends.
 */
export const syncLogger = {
  startSync(workerName: string, entityType: string = workerName): SyncContext {
    createLogger(workerName).info("Starting synchronization...");
    return {
      workerName,
      entityType,
      startedAt: new Date(),
      recordsProcessed: 0,
      recordsInserted: 0,
      recordsUpdated: 0,
      errors: [],
    };
  },

  async endSync(db: Executor, context: SyncContext, source: string): Promise<IngestionLog> {
    const status = syncStatus(context);
    const completedAt = new Date();
    const seconds = ((completedAt.getTime() - context.startedAt.getTime()) / 1000).toFixed(1);

    createLogger(context.workerName).info(
      `Finished with status ${status} in ${seconds}s: processed ${context.recordsProcessed}, ` +
        `inserted ${context.recordsInserted}, updated ${context.recordsUpdated}, errors ${context.errors.length}`,
    );

    const [row] = await db
      .insert(ingestionLog)
      .values({
        source,
        entityType: context.entityType,
        status,
        recordsProcessed: context.recordsProcessed,
        errorMessage: context.errors.length > 0 ? context.errors.join("\n") : null,
        startedAt: context.startedAt,
        completedAt,
      })
      .returning();
    return row;
  },
};
