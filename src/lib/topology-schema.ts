// Zod schema for runtime validation of generated topology files.
// Mirrors the Topology interfaces in src/engine/types.ts.

import { z } from 'zod';

export const hexCoordSchema = z.object({ q: z.number().int(), r: z.number().int() });

export const sectorOffsetSchema = z.object({ x: z.number(), y: z.number() });

const celestialKindSchema = z.enum([
  'star',
  'planet',
  'moon',
  'asteroid',
  'wormhole_mouth',
  'nebula',
  'storm',
  'comet',
  'debris_field',
  'asteroid_field',
  'ice_field',
]);

const celestialObjectSchema = z.object({
  id: z.string().min(1),
  name: z.string(),
  kind: celestialKindSchema,
  sector: hexCoordSchema,
  offset: sectorOffsetSchema,
  bodyClass: z.string().nullable().default(null),
});

const starSystemSchema = z.object({
  id: z.string().min(1),
  name: z.string(),
  radius: z.number().int().nonnegative(),
  bodies: z.array(celestialObjectSchema).default([]),
});

const wormholeEndpointSchema = z.object({
  systemId: z.string().min(1),
  sector: hexCoordSchema,
});

const wormholeSchema = z.object({
  id: z.string().min(1),
  a: wormholeEndpointSchema,
  b: wormholeEndpointSchema,
  cost: z.number().positive(),
});

export const topologySchema = z.object({
  id: z.string().min(1),
  systems: z.array(starSystemSchema).min(1),
  wormholes: z.array(wormholeSchema).default([]),
  disconnected: z.boolean().default(false),
});
