// 카탈로그 JSON 스키마 (content/v1/*.json)

import { z } from 'zod';
import { MODIFIER_TAGS } from '../types/modifier.js';
import {
  AOE_SHAPES,
  TARGET_LOCATIONS,
  TARGET_SCOPES,
  TARGET_SIDES,
  type AoeShape,
} from '../types/targeting.js';

const AOE_ALIASES: Record<string, AoeShape> = {
  single: 'single',
  single_target: 'single',
  none: 'single',
  row_adjacent: 'row_adjacent',
  adjacent: 'row_adjacent',
  adjacent_1: 'row_adjacent',
  cross: 'cross',
  cross_1: 'cross',
  plus: 'cross',
  line: 'line',
  line_2: 'line',
  column: 'line',
  pierce: 'line',
};

export const AoeShapeSchema = z
  .string()
  .transform((s) => AOE_ALIASES[s.trim().toLowerCase()] ?? s)
  .pipe(z.enum(AOE_SHAPES));

export const AoeRatiosSchema = z
  .object({
    splash: z.number().nonnegative().optional(),
    near: z.number().nonnegative().optional(),
    far: z.number().nonnegative().optional(),
  })
  .default({});

export const StatusParamsSchema = z.record(
  z.union([z.number(), z.string(), z.boolean()]),
);

export const CatalogModifierSchema = z.object({
  stat: z.string().min(1),
  tag: z.enum(MODIFIER_TAGS),
  value: z.number().finite(),
  source: z.string().default(''),
  kScale: z.number().finite().optional(),
});

const PROC_TRIGGERS = ['on_hit', 'on_hit_taken', 'battle_start'] as const;

const procBase = {
  chancePct: z.number().min(0).max(100).default(100),
  trigger: z.enum(PROC_TRIGGERS).default('on_hit'),
};

export const ProcSchema = z.discriminatedUnion('key', [
  z.object({
    key: z.literal('apply_status'),
    ...procBase,
    status: z.string().min(1),
    duration: z.number().int().nonnegative().optional(),
    stacks: z.number().int().positive().default(1),
    params: StatusParamsSchema.default({}),
    target: z.enum(['target', 'self', 'team']).default('target'),
  }),
  z.object({
    key: z.literal('drain_ap'),
    ...procBase,
    amount: z.number().nonnegative(),
  }),
  z.object({
    key: z.literal('pure_damage'),
    ...procBase,
  }),
  z.object({
    key: z.literal('retaliate'),
    ...procBase,
    trigger: z.literal('on_hit_taken').default('on_hit_taken'),
    ratio: z.number().positive().default(1),
  }),
]);

export const PassiveOptionSchema = z.object({
  name: z.string(),
  mods: z.array(CatalogModifierSchema).default([]),
  procs: z.array(ProcSchema).default([]),
});

const PassivesSchema = z
  .object({
    '1': PassiveOptionSchema.optional(),
    '2': PassiveOptionSchema.optional(),
    '3': PassiveOptionSchema.optional(),
  })
  .default({});

const apAdjust = {
  apBaseDelta: z.number().default(0),
  apLessPct: z.number().nonnegative().default(0),
  apMorePct: z.number().default(0),
};

export const WeaponSchema = z.object({
  key: z.string().min(1),
  range: z.enum(['melee', 'ranged']),
  aoe: AoeShapeSchema,
  location: z.enum(['frontline', 'anywhere']),
  mainRatio: z.number().positive().default(1),
  aoeRatios: AoeRatiosSchema,
  ...apAdjust,
  defaultMods: z.array(CatalogModifierSchema).default([]),
  defaultProcs: z.array(ProcSchema).default([]),
  passives: PassivesSchema,
});

export const OffhandSchema = z.object({
  key: z.string().min(1),
  ...apAdjust,
  defaultMods: z.array(CatalogModifierSchema).default([]),
  defaultProcs: z.array(ProcSchema).default([]),
  passives: PassivesSchema,
});

export const FrameFlagsSchema = z
  .object({
    canAct: z.literal(false).optional(),
    canUseActiveSkills: z.literal(false).optional(),
    canBasicAttack: z.literal(false).optional(),
    ignorePassives: z.literal(true).optional(),
    blockApGain: z.literal(true).optional(),
  })
  .default({});

export const StatusDefinitionSchema = z
  .object({
    key: z.string().min(1),
    kind: z.enum(['buff', 'debuff', 'control', 'dot', 'special']),
    positive: z.boolean(),
    stackable: z.boolean().default(false),
    maxStacks: z.number().int().positive().default(1),
    refreshOnReapply: z.boolean().default(true),
    defaultDuration: z.number().int().nonnegative().default(1),
    params: StatusParamsSchema.default({}),
    frameFlags: FrameFlagsSchema,
    description: z.string().default(''),
  })
  .refine((d) => d.stackable || d.maxStacks === 1, {
    message: 'non-stackable status must have maxStacks 1',
    path: ['maxStacks'],
  });

export const TargetingSpecSchema = z.object({
  side: z.enum(TARGET_SIDES).default('enemy'),
  location: z.enum(TARGET_LOCATIONS).default('anywhere'),
  scope: z.enum(TARGET_SCOPES).default('single'),
  allowRetarget: z.boolean().default(true),
});

export const SkillDefinitionSchema = z.object({
  key: z.string().min(1),
  name: z.string(),
  kind: z.enum(['active', 'passive', 'aura']),
  apCost: z.number().int().nonnegative().default(0),
  mpCost: z.number().int().nonnegative().default(0),
  cooldown: z.number().int().nonnegative().default(0),
  duration: z.number().int().nonnegative().default(0),
  targeting: TargetingSpecSchema.default({}),
  aoe: AoeShapeSchema.default('single'),
  aoeRatios: AoeRatiosSchema,
  ratio: z.number().nonnegative().default(1),
  damageType: z.enum(['attack', 'skill', 'pure', 'none']).default('skill'),
  procs: z.array(ProcSchema).default([]),
});

export const GearItemSchema = z.object({
  key: z.string().min(1),
  name: z.string(),
  slot: z.enum([
    'helmet',
    'armor',
    'gloves',
    'boots',
    'ring',
    'necklace',
    'belt',
    'misc',
  ]),
  mods: z.array(CatalogModifierSchema).default([]),
});

export const ContentBundleSchema = z.object({
  weapons: z.array(WeaponSchema),
  offhands: z.array(OffhandSchema).default([]),
  statuses: z.array(StatusDefinitionSchema),
  skills: z.array(SkillDefinitionSchema).default([]),
  gear: z.array(GearItemSchema).default([]),
});

export type ContentBundleInput = z.input<typeof ContentBundleSchema>;
