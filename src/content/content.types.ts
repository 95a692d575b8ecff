import type { z } from 'zod';
import type {
  ContentBundleSchema,
  GearItemSchema,
  OffhandSchema,
  PassiveOptionSchema,
  ProcSchema,
  SkillDefinitionSchema,
  StatusDefinitionSchema,
  WeaponSchema,
} from './content.schema.js';

export type ProcDefinition = z.infer<typeof ProcSchema>;
export type ProcTrigger = ProcDefinition['trigger'];
export type PassiveOption = z.infer<typeof PassiveOptionSchema>;
export type WeaponDefinition = z.infer<typeof WeaponSchema>;
export type OffhandDefinition = z.infer<typeof OffhandSchema>;
export type StatusDefinition = z.infer<typeof StatusDefinitionSchema>;
export type SkillDefinition = z.infer<typeof SkillDefinitionSchema>;
export type GearItemDefinition = z.infer<typeof GearItemSchema>;
export type ContentBundle = z.infer<typeof ContentBundleSchema>;

/** 상태 정의 조회: 모르는 키는 UnknownKeyError */
export interface StatusCatalog {
  getStatus(key: string): StatusDefinition;
}

export interface EquipmentCatalog {
  getWeapon(key: string): WeaponDefinition;
  getOffhand(key: string): OffhandDefinition;
  getGearItem(key: string): GearItemDefinition;
}

export interface SkillCatalog {
  getSkill(key: string): SkillDefinition;
}
