// 스탯 modifier: 단일 태그 타입 (tuple/record 변형 없음)

export const MODIFIER_TAGS = ['base', 'inc', 'more', 'less', 'special'] as const;
export type ModifierTag = (typeof MODIFIER_TAGS)[number];

/**
 * base: 기본값에 더함
 * inc/more/less: 퍼센트 포인트 (20 = 20%). less 는 +20 / -20 모두 "20% 감소"
 * special: 평가 파이프라인이 무시 (규칙 레이어 전용)
 */
export interface ModifierLine {
  readonly stat: string;
  readonly tag: ModifierTag;
  readonly value: number;
  readonly source: string;
}

/** 카탈로그 원본: kScale 이 있으면 value * kScale * K 로 해석 */
export interface CatalogModifier extends ModifierLine {
  readonly kScale?: number;
}

/** 최종 스탯 키 */
export const STAT_KEYS = [
  'hp',
  'mp',
  'attack',
  'armour',
  'mr',
  'mhr',
  'crit_chance',
  'crit_damage',
  'accuracy',
  'evasion',
  'skill_evasion',
  'ap_gain',
] as const;
export type StatKey = (typeof STAT_KEYS)[number];

export const ATTRIBUTE_KEYS = ['str', 'dex', 'int', 'vit'] as const;
export type AttributeKey = (typeof ATTRIBUTE_KEYS)[number];
