// Zod schemas for orders arriving from outside the engine and for queued
// orders inside a snapshot. Mirrors the Order union in src/engine/types.ts.

import { z } from 'zod';
import { hexCoordSchema, sectorOffsetSchema } from '@/lib/topology-schema';

const moveDraft = z.object({ kind: z.literal('move'), target: sectorOffsetSchema });

const jumpHexDraft = z.object({
  kind: z.literal('jump_hex'),
  target: hexCoordSchema,
  arrival: sectorOffsetSchema.optional(),
});

const jumpWormholeDraft = z.object({
  kind: z.literal('jump_wormhole'),
  targetSystemId: z.string().min(1),
});

const toggleInhibitorDraft = z.object({ kind: z.literal('toggle_inhibitor'), on: z.boolean() });

const colonizeDraft = z.object({ kind: z.literal('colonize'), bodyId: z.string().min(1) });

const loadColonistsDraft = z.object({
  kind: z.literal('load_colonists'),
  bodyId: z.string().min(1),
  amount: z.number().int().positive(),
});

const constructDraft = z.object({
  kind: z.literal('construct'),
  structureId: z.string().min(1),
  bodyId: z.string().min(1).optional(),
  offset: sectorOffsetSchema.optional(),
});

const attackDraft = z.object({ kind: z.literal('attack'), targetUnitId: z.string().min(1) });

export const orderDraftSchema = z.discriminatedUnion('kind', [
  moveDraft,
  jumpHexDraft,
  jumpWormholeDraft,
  toggleInhibitorDraft,
  colonizeDraft,
  loadColonistsDraft,
  constructDraft,
  attackDraft,
]);

const orderProgressSchema = z.object({
  remaining: z.number().nonnegative().optional(),
  hops: z.number().int().nonnegative().optional(),
});

const queued = { id: z.string().min(1), progress: orderProgressSchema.optional() };

export const orderSchema = z.discriminatedUnion('kind', [
  moveDraft.extend(queued),
  jumpHexDraft.extend(queued),
  jumpWormholeDraft.extend(queued),
  toggleInhibitorDraft.extend(queued),
  colonizeDraft.extend(queued),
  loadColonistsDraft.extend(queued),
  constructDraft.extend(queued),
  attackDraft.extend(queued),
]);
