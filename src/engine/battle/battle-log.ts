// 전투 로그 출력: 결정적 텍스트 라인. 진단 로그(Nest Logger)와 분리

import { Logger } from '@nestjs/common';

export interface BattleLogSink {
  write(line: string): void;
}

export class MemoryLogSink implements BattleLogSink {
  readonly lines: string[] = [];

  write(line: string): void {
    this.lines.push(line);
  }

  exportText(): string {
    return this.lines.join('\n');
  }
}

export class LoggerLogSink implements BattleLogSink {
  private readonly logger: Logger;

  constructor(context: string = 'Battle') {
    this.logger = new Logger(context);
  }

  write(line: string): void {
    this.logger.log(line);
  }
}

export class TeeLogSink implements BattleLogSink {
  private readonly sinks: BattleLogSink[];

  constructor(...sinks: BattleLogSink[]) {
    this.sinks = sinks;
  }

  write(line: string): void {
    for (const s of this.sinks) s.write(line);
  }
}

export const HEADER_WIDTH = 42;

export function writeHeader(sink: BattleLogSink, title: string): void {
  const bar = '='.repeat(HEADER_WIDTH);
  sink.write(bar);
  sink.write(title);
  sink.write(bar);
}

/** 로그용 숫자 표기: 정수는 그대로, 아니면 소수 1자리 */
export function fmt(n: number): string {
  return Number.isInteger(n) ? String(n) : n.toFixed(1);
}
