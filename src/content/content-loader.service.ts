// content/v1 JSON 로드 + 메모리 레지스트리 (시작 시 해석, 모르는 키는 즉시 실패)

import { Injectable, Logger, type OnModuleInit } from '@nestjs/common';
import { readFile } from 'fs/promises';
import { join, resolve } from 'path';
import type { ZodIssue } from 'zod';
import {
  InvalidInputError,
  UnknownKeyError,
  UnsupportedModifierShapeError,
} from '../common/errors/game-errors.js';
import { formatZodIssues } from '../common/validation/zod-parse.js';
import { SimConfigService } from '../config/sim-config.service.js';
import { ContentBundleSchema } from './content.schema.js';
import type {
  ContentBundle,
  EquipmentCatalog,
  GearItemDefinition,
  OffhandDefinition,
  ProcDefinition,
  SkillCatalog,
  SkillDefinition,
  StatusCatalog,
  StatusDefinition,
  WeaponDefinition,
} from './content.types.js';

/** 모디파이어 레코드를 담는 카탈로그 필드 */
const MODIFIER_FIELDS: ReadonlySet<string | number> = new Set(['mods', 'defaultMods']);

function isModifierIssue(issue: ZodIssue): boolean {
  return issue.path.some((seg) => MODIFIER_FIELDS.has(seg));
}

const CATALOG_FILES = {
  weapons: 'weapons.json',
  offhands: 'offhands.json',
  statuses: 'statuses.json',
  skills: 'skills.json',
  gear: 'gear.json',
} as const;

function indexByKey<T extends { key: string }>(
  label: string,
  items: T[],
): Map<string, T> {
  const map = new Map<string, T>();
  for (const item of items) {
    if (map.has(item.key)) {
      throw new InvalidInputError(`Duplicate ${label} key: ${item.key}`, {
        key: item.key,
      });
    }
    map.set(item.key, item);
  }
  return map;
}

@Injectable()
export class ContentLoaderService
  implements OnModuleInit, StatusCatalog, EquipmentCatalog, SkillCatalog
{
  private readonly logger = new Logger(ContentLoaderService.name);
  private weapons = new Map<string, WeaponDefinition>();
  private offhands = new Map<string, OffhandDefinition>();
  private statuses = new Map<string, StatusDefinition>();
  private skills = new Map<string, SkillDefinition>();
  private gear = new Map<string, GearItemDefinition>();

  constructor(private readonly config: SimConfigService) {}

  async onModuleInit() {
    await this.loadAll();
  }

  contentDir(): string {
    return resolve(process.cwd(), this.config.get().contentDir);
  }

  async loadAll(dir: string = this.contentDir()): Promise<void> {
    const [weapons, offhands, statuses, skills, gear] = await Promise.all([
      readFile(join(dir, CATALOG_FILES.weapons), 'utf-8'),
      readFile(join(dir, CATALOG_FILES.offhands), 'utf-8'),
      readFile(join(dir, CATALOG_FILES.statuses), 'utf-8'),
      readFile(join(dir, CATALOG_FILES.skills), 'utf-8'),
      readFile(join(dir, CATALOG_FILES.gear), 'utf-8'),
    ]);

    this.loadBundle({
      weapons: JSON.parse(weapons),
      offhands: JSON.parse(offhands),
      statuses: JSON.parse(statuses),
      skills: JSON.parse(skills),
      gear: JSON.parse(gear),
    });
  }

  /** 검증 + 인덱싱 + 교차 참조 확인 */
  loadBundle(raw: unknown): void {
    const parsed = ContentBundleSchema.safeParse(raw);
    if (!parsed.success) {
      const { issues } = parsed.error;
      const shape = issues.filter(isModifierIssue);
      if (shape.length > 0) {
        throw new UnsupportedModifierShapeError('content bundle: unsupported modifier shape', {
          issues: formatZodIssues(shape),
        });
      }
      throw new InvalidInputError('content bundle: validation failed', {
        issues: formatZodIssues(issues),
      });
    }
    const bundle: ContentBundle = parsed.data;

    const statuses = indexByKey('status', bundle.statuses);
    const procs: ProcDefinition[] = [];
    for (const w of bundle.weapons) {
      procs.push(...w.defaultProcs);
      for (const p of Object.values(w.passives)) procs.push(...(p?.procs ?? []));
    }
    for (const o of bundle.offhands) {
      procs.push(...o.defaultProcs);
      for (const p of Object.values(o.passives)) procs.push(...(p?.procs ?? []));
    }
    for (const s of bundle.skills) procs.push(...s.procs);

    for (const proc of procs) {
      if (proc.key === 'apply_status' && !statuses.has(proc.status)) {
        throw new UnknownKeyError(`Unknown status in proc: ${proc.status}`, {
          key: proc.status,
        });
      }
    }

    this.weapons = indexByKey('weapon', bundle.weapons);
    this.offhands = indexByKey('offhand', bundle.offhands);
    this.statuses = statuses;
    this.skills = indexByKey('skill', bundle.skills);
    this.gear = indexByKey('gear', bundle.gear);

    this.logger.log(
      `Content loaded: weapons=${this.weapons.size} offhands=${this.offhands.size} ` +
        `statuses=${this.statuses.size} skills=${this.skills.size} gear=${this.gear.size}`,
    );
  }

  getWeapon(key: string): WeaponDefinition {
    return this.lookup(this.weapons, 'weapon', key);
  }

  getOffhand(key: string): OffhandDefinition {
    return this.lookup(this.offhands, 'offhand', key);
  }

  getStatus(key: string): StatusDefinition {
    return this.lookup(this.statuses, 'status', key);
  }

  getSkill(key: string): SkillDefinition {
    return this.lookup(this.skills, 'skill', key);
  }

  getGearItem(key: string): GearItemDefinition {
    return this.lookup(this.gear, 'gear', key);
  }

  private lookup<T>(map: Map<string, T>, label: string, key: string): T {
    const found = map.get(key);
    if (found === undefined) {
      throw new UnknownKeyError(`Unknown ${label}: ${key}`, { key });
    }
    return found;
  }
}
