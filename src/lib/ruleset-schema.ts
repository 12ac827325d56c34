// Zod schema for runtime validation of ruleset.json files.
// Mirrors the TypeScript interfaces in src/rules/schema.ts.

import { z } from 'zod';

export const hullClassSchema = z.enum(['tiny', 'small', 'medium', 'large', 'huge']);

export const colonizableKindSchema = z.enum(['planet', 'moon', 'asteroid']);

export const resourceBalanceSchema = z.object({
  credits: z.number().nonnegative(),
  metal: z.number().nonnegative(),
  crystal: z.number().nonnegative(),
});

export const turretSpecSchema = z.object({
  type: z.enum(['mass_driver', 'beam', 'missile']),
  damage: z.number().nonnegative(),
  range: z.number().positive(),
  cooldown: z.number().int().nonnegative(),
});

export const gameConfigSchema = z.object({
  searchNodeBudget: z.number().int().positive(),
  sectorRadius: z.number().positive(),
  maxQueueLength: z.number().int().positive(),
  aiEnabled: z.boolean(),
});

const hullClassDefSchema = z.object({
  capacity: z.number().int().positive(),
  hitPoints: z.number().int().positive(),
});

const bodyClassDefSchema = z.object({
  id: z.string(),
  name: z.string(),
  kind: colonizableKindSchema,
  growthRate: z.number().min(0).max(1),
  capacity: z.number().int().positive(),
  metalYield: z.number().nonnegative(),
  crystalYield: z.number().nonnegative(),
});

const componentTemplateSchema = z.discriminatedUnion('kind', [
  z.object({ kind: z.literal('engine'), size: z.number().int().nonnegative(), speed: z.number().positive() }),
  z.object({
    kind: z.literal('hyperdrive_basic'),
    size: z.number().int().nonnegative(),
    cooldown: z.number().int().nonnegative(),
    jumpRange: z.number().int().positive(),
  }),
  z.object({
    kind: z.literal('hyperdrive_advanced'),
    size: z.number().int().nonnegative(),
    cooldown: z.number().int().nonnegative(),
    jumpRange: z.number().int().positive(),
  }),
  z.object({ kind: z.literal('weapon'), size: z.number().int().nonnegative(), turret: turretSpecSchema }),
  z.object({ kind: z.literal('inhibitor'), size: z.number().int().nonnegative(), radius: z.number().positive() }),
  z.object({
    kind: z.literal('colony'),
    size: z.number().int().nonnegative(),
    maxCargo: z.number().int().nonnegative(),
    cargo: z.number().int().nonnegative(),
  }),
  z.object({ kind: z.literal('constructor'), size: z.number().int().nonnegative(), buildable: z.array(z.string()) }),
]);

const unitTemplateSchema = z.object({
  id: z.string(),
  name: z.string(),
  hull: hullClassSchema,
  components: z.array(componentTemplateSchema),
});

const structureDefSchema = z.discriminatedUnion('kind', [
  z.object({
    kind: z.literal('unit'),
    id: z.string(),
    name: z.string(),
    cost: resourceBalanceSchema,
    buildTurns: z.number().int().positive(),
    unitTemplateId: z.string(),
  }),
  z.object({
    kind: z.literal('extractor'),
    id: z.string(),
    name: z.string(),
    cost: resourceBalanceSchema,
    buildTurns: z.number().int().positive(),
    allowedBodyKinds: z.array(colonizableKindSchema),
  }),
]);

export const rulesetPackageSchema = z.object({
  id: z.string(),
  name: z.string(),
  description: z.string(),
  hullClasses: z.object({
    tiny: hullClassDefSchema,
    small: hullClassDefSchema,
    medium: hullClassDefSchema,
    large: hullClassDefSchema,
    huge: hullClassDefSchema,
  }),
  bodyClasses: z.array(bodyClassDefSchema),
  unitTemplates: z.array(unitTemplateSchema),
  structures: z.array(structureDefSchema),
  startingFleet: z.array(z.string()),
  economy: z.object({
    taxRate: z.number().nonnegative(),
    startingResources: resourceBalanceSchema,
    homeworldPopulation: z.number().int().nonnegative(),
  }),
  defaults: gameConfigSchema,
});
