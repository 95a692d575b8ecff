import { z } from 'zod';

const PassiveChoiceSchema = z.union([
  z.literal(0),
  z.literal(1),
  z.literal(2),
  z.literal(3),
]);

export const RosterUnitSchema = z.object({
  slot: z.number().int().min(1).max(9),
  name: z.string().min(1).max(50),
  base: z.object({
    level: z.number().int().positive(),
    str: z.number().nonnegative(),
    dex: z.number().nonnegative(),
    int: z.number().nonnegative(),
    vit: z.number().nonnegative(),
    critChance: z.number().min(0).max(100).optional(),
    critDamage: z.number().nonnegative().optional(),
    accuracy: z.number().nonnegative().optional(),
    evasion: z.number().nonnegative().optional(),
    skillEvasion: z.number().nonnegative().optional(),
  }),
  build: z.object({
    weaponKey: z.string().min(1),
    weaponPassive: PassiveChoiceSchema.default(0),
    offhandKey: z.string().min(1).nullable().default(null),
    offhandPassive: PassiveChoiceSchema.default(0),
    gearKeys: z.array(z.string().min(1)).default([]),
    skillKeys: z.array(z.string().min(1)).default([]),
    k: z.number().positive().optional(),
  }),
});

const TeamRosterSchema = z
  .array(RosterUnitSchema)
  .min(1)
  .max(9)
  .refine((units) => new Set(units.map((u) => u.slot)).size === units.length, {
    message: 'duplicate slot',
  });

export const RosterSchema = z.object({
  name: z.string().min(1).max(50),
  seed: z.string().min(1).optional(),
  startingTeam: z.enum(['A', 'B']).optional(),
  teams: z.object({
    A: TeamRosterSchema,
    B: TeamRosterSchema,
  }),
});

export type RosterUnit = z.infer<typeof RosterUnitSchema>;
export type Roster = z.infer<typeof RosterSchema>;
