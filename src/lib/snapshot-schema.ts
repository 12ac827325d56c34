// Zod schema for saved game snapshots.
// Mirrors GameSnapshot in src/engine/snapshot.ts; topology is stored by id only.

import { z } from 'zod';
import { gameConfigSchema, hullClassSchema, resourceBalanceSchema, turretSpecSchema } from '@/lib/ruleset-schema';
import { hexCoordSchema, sectorOffsetSchema } from '@/lib/topology-schema';
import { orderSchema } from '@/lib/order-schema';

const constructionProjectSchema = z.object({
  structureId: z.string(),
  bodyId: z.string().nullable(),
  offset: sectorOffsetSchema,
  turnsRemaining: z.number().int().nonnegative(),
});

const hyperdriveFields = {
  size: z.number().int().nonnegative(),
  cooldown: z.number().int().nonnegative(),
  jumpRange: z.number().int().positive(),
  cooldownRemaining: z.number().int().nonnegative(),
};

const componentSchema = z.discriminatedUnion('kind', [
  z.object({ kind: z.literal('engine'), size: z.number().int().nonnegative(), speed: z.number().positive() }),
  z.object({ kind: z.literal('hyperdrive_basic'), ...hyperdriveFields }),
  z.object({ kind: z.literal('hyperdrive_advanced'), ...hyperdriveFields }),
  z.object({
    kind: z.literal('weapon'),
    size: z.number().int().nonnegative(),
    turret: turretSpecSchema,
    cooldownRemaining: z.number().int().nonnegative(),
  }),
  z.object({
    kind: z.literal('inhibitor'),
    size: z.number().int().nonnegative(),
    radius: z.number().positive(),
    active: z.boolean(),
  }),
  z.object({
    kind: z.literal('colony'),
    size: z.number().int().nonnegative(),
    cargo: z.number().int().nonnegative(),
    maxCargo: z.number().int().nonnegative(),
  }),
  z.object({
    kind: z.literal('constructor'),
    size: z.number().int().nonnegative(),
    buildable: z.array(z.string()),
    project: constructionProjectSchema.nullable(),
  }),
]);

const unitSchema = z.object({
  id: z.string().min(1),
  name: z.string(),
  owner: z.string().min(1),
  hull: hullClassSchema,
  components: z.array(componentSchema),
  position: z.object({
    systemId: z.string().min(1),
    sector: hexCoordSchema,
    offset: sectorOffsetSchema,
  }),
  hullPoints: z.number(),
  maxHullPoints: z.number().positive(),
  orders: z.array(orderSchema),
  createdSeq: z.number().int().nonnegative(),
});

const playerSchema = z.object({
  id: z.string().min(1),
  name: z.string(),
  color: z.string(),
  isHuman: z.boolean(),
  allies: z.array(z.string()),
  resources: resourceBalanceSchema,
});

const bodyStateSchema = z.object({
  owner: z.string().nullable(),
  population: z.number().int().nonnegative(),
  extractor: z.boolean(),
});

const inhibitionFieldSchema = z.object({
  unitId: z.string().min(1),
  owner: z.string().min(1),
  systemId: z.string().min(1),
  sector: hexCoordSchema,
});

export const gameSnapshotSchema = z.object({
  version: z.literal(1),
  gameId: z.string().min(1),
  rulesetId: z.string().min(1),
  topologyId: z.string().min(1),
  turn: z.number().int().positive(),
  players: z.array(playerSchema),
  units: z.array(unitSchema),
  bodies: z.record(z.string(), bodyStateSchema),
  inhibition: z.array(inhibitionFieldSchema),
  nextUnitSeq: z.number().int().nonnegative(),
  nextOrderSeq: z.number().int().nonnegative(),
  rngSeed: z.number().int().nonnegative(),
  rngState: z.number().int().nonnegative(),
  config: gameConfigSchema,
  createdAt: z.string(),
  lastResolvedAt: z.string().nullable(),
});
