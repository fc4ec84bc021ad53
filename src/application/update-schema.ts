import { z } from 'zod';
import { MAX_ID, UPDATE_STATES } from '../domain/index.js';

/**
 * Body of `POST /api/v1/updates`.
 *
 * `version` is optional; an absent or null version is a distinct identity
 * from any concrete version.
 */
export const applyUpdateSchema = z.object({
  name: z.string().trim().min(1).max(255),
  version: z.string().trim().min(1).max(255).nullable().optional(),
});

export type ApplyUpdateInput = z.infer<typeof applyUpdateSchema>;

/** Path parameter `:id`: a positive integer within the id column's range. */
export const updateIdSchema = z.coerce.number().int().positive().max(MAX_ID);

const limitSchema = z.coerce.number().int();

export const listUpdatesQuerySchema = z.object({
  state: z.enum(UPDATE_STATES).optional(),
  name: z.string().min(1).optional(),
  limit: limitSchema.optional(),
  offset: z.coerce.number().int().nonnegative().optional(),
});

export type ListUpdatesQuery = z.infer<typeof listUpdatesQuerySchema>;

export const listEventsQuerySchema = z.object({
  after: z.coerce.number().int().nonnegative().max(MAX_ID).optional(),
  limit: limitSchema.optional(),
});

export type ListEventsQuery = z.infer<typeof listEventsQuerySchema>;
