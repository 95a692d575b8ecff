// 전투 시뮬레이터 오류 분류
// 검증/카탈로그 오류는 즉시 throw (호출 자체가 실패). "대상 없음", "자원 부족"은 결과값으로 반환한다.

export class GameError extends Error {
  constructor(
    public readonly code: string,
    message: string,
    public readonly details?: Record<string, unknown>,
  ) {
    super(message);
    this.name = 'GameError';
  }
}

export class InvalidSlotError extends GameError {
  constructor(message = 'Invalid slot', details?: Record<string, unknown>) {
    super('INVALID_SLOT', message, details);
  }
}

export class UnknownKeyError extends GameError {
  constructor(message = 'Unknown key', details?: Record<string, unknown>) {
    super('UNKNOWN_KEY', message, details);
  }
}

export class InsufficientResourceError extends GameError {
  constructor(
    message = 'Insufficient resource',
    details?: Record<string, unknown>,
  ) {
    super('INSUFFICIENT_RESOURCE', message, details);
  }
}

export class NoLegalTargetError extends GameError {
  constructor(message = 'No legal target', details?: Record<string, unknown>) {
    super('NO_LEGAL_TARGET', message, details);
  }
}

export class UnsupportedModifierShapeError extends GameError {
  constructor(
    message = 'Unsupported modifier shape',
    details?: Record<string, unknown>,
  ) {
    super('UNSUPPORTED_MODIFIER_SHAPE', message, details);
  }
}

export class InvalidInputError extends GameError {
  constructor(message = 'Invalid input', details?: Record<string, unknown>) {
    super('INVALID_INPUT', message, details);
  }
}

export class InvalidArgumentError extends GameError {
  constructor(message = 'Invalid argument', details?: Record<string, unknown>) {
    super('INVALID_ARGUMENT', message, details);
  }
}
