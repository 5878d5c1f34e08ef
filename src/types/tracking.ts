/**
 * Matchflow — Tracking Types
 *
 * Persisted records and the status lifecycle they move through.
 */

import { z } from 'zod';
import { ItemSchema } from './item';

export const TrackedStatusSchema = z.enum([
  'new',
  'in_progress',
  'completed',
  'rejected',
  'expired',
]);
export type TrackedStatus = z.infer<typeof TrackedStatusSchema>;

export const HistoryEntrySchema = z.object({
  status: TrackedStatusSchema,
  timestamp: z.string().datetime(),
  note: z.string().optional(),
});
export type HistoryEntry = z.infer<typeof HistoryEntrySchema>;

export const TrackedRecordSchema = z.object({
  fingerprint: z.string().min(1),
  item: ItemSchema,
  status: TrackedStatusSchema,
  history: z.array(HistoryEntrySchema).min(1),
  createdAt: z.string().datetime(),
  updatedAt: z.string().datetime(),
});
export type TrackedRecord = z.infer<typeof TrackedRecordSchema>;

export const STORE_VERSION = 1;

export const TrackerStoreSchema = z
  .object({
    version: z.literal(STORE_VERSION),
    records: z.array(TrackedRecordSchema),
  })
  .superRefine((store, ctx) => {
    const seen = new Set<string>();

    store.records.forEach((record, index) => {
      if (seen.has(record.fingerprint)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['records', index, 'fingerprint'],
          message: `Duplicate fingerprint ${record.fingerprint}`,
        });
      }
      seen.add(record.fingerprint);

      const last = record.history.at(-1);
      if (last && last.status !== record.status) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['records', index, 'status'],
          message: `Status ${record.status} does not match last history entry ${last.status}`,
        });
      }

      for (let i = 1; i < record.history.length; i++) {
        if (Date.parse(record.history[i].timestamp) < Date.parse(record.history[i - 1].timestamp)) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            path: ['records', index, 'history', i, 'timestamp'],
            message: 'History timestamps must not decrease',
          });
        }
      }
    });
  });
export type TrackerStore = z.infer<typeof TrackerStoreSchema>;

export const ExportFormatSchema = z.enum(['csv', 'json']);
export type ExportFormat = z.infer<typeof ExportFormatSchema>;

export type TrackerStats = Record<TrackedStatus, number> & { total: number };
