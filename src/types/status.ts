export type StatusParamValue = number | string | boolean;
export type StatusParams = Record<string, StatusParamValue>;

export type StatusInstance = {
  key: string;
  remaining: number;
  stacks: number;
  params: StatusParams;
  sourceId: string | null;
};

export type StatusEvent =
  | { type: 'damage'; targetId: string; statusKey: string; amount: number }
  | { type: 'log'; targetId: string; message: string };

/** phase 단위 집계 결과: 매 phase 재계산, 저장하지 않음 */
export type StatusFrame = {
  canAct: boolean;
  canUseActiveSkills: boolean;
  canBasicAttack: boolean;
  ignorePassives: boolean;
  blockApGain: boolean;

  attackDamageMult: number;
  skillDamageMult: number;
  damageTakenMult: number;

  apGainBaseDelta: number;
  mhrBaseDelta: number;
  accuracyIncPctDelta: number;
  armourBaseDelta: number;
  mrBaseDelta: number;

  events: StatusEvent[];
};

export function emptyStatusFrame(): StatusFrame {
  return {
    canAct: true,
    canUseActiveSkills: true,
    canBasicAttack: true,
    ignorePassives: false,
    blockApGain: false,
    attackDamageMult: 1,
    skillDamageMult: 1,
    damageTakenMult: 1,
    apGainBaseDelta: 0,
    mhrBaseDelta: 0,
    accuracyIncPctDelta: 0,
    armourBaseDelta: 0,
    mrBaseDelta: 0,
    events: [],
  };
}
