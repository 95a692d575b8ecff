import type { ZodIssue, ZodType, ZodTypeDef } from 'zod';
import { InvalidInputError } from '../errors/game-errors.js';

/** "weapons.0.range: Required" 형태 */
export function formatZodIssues(issues: readonly ZodIssue[]): string[] {
  return issues.map((i) => `${i.path.join('.')}: ${i.message}`);
}

/** zod 스키마 검증: 실패 시 이슈 목록을 담아 InvalidInputError */
export function parseWithSchema<T>(
  schema: ZodType<T, ZodTypeDef, unknown>,
  value: unknown,
  label: string,
): T {
  const result = schema.safeParse(value);
  if (!result.success) {
    throw new InvalidInputError(`${label}: validation failed`, {
      issues: formatZodIssues(result.error.issues),
    });
  }
  return result.data;
}
