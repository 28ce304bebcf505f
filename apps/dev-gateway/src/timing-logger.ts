/**
 * Timing Logger
 *
 * 用于记录请求处理各阶段的耗时，帮助排查性能问题
 */

import * as fs from 'node:fs';
import * as path from 'node:path';

/**
 * 格式化时间戳
 */
function timestamp(): string {
  return new Date().toISOString();
}

/**
 * 写入日志文件
 */
function appendLog(file: string, message: string): void {
  const line = `[${timestamp()}] ${message}\n`;
  fs.appendFileSync(file, line);
}

interface TimingMark {
  name: string;
  time: number;
  elapsed: number;
}

/**
 * 请求计时器
 */
export class RequestTimer {
  private startTime: number;
  private marks: TimingMark[] = [];

  constructor(
    private readonly requestId: string,
    private readonly method: string,
    private readonly path: string,
    private readonly logFile?: string
  ) {
    this.startTime = performance.now();
    this.mark('request_start');
  }

  /**
   * 标记一个时间点
   */
  mark(name: string): void {
    const now = performance.now();
    this.marks.push({ name, time: now, elapsed: now - this.startTime });
  }

  /**
   * 记录结束并写入日志
   */
  finish(statusCode: number): void {
    this.mark('request_end');
    const totalTime = performance.now() - this.startTime;

    if (this.logFile) {
      const lines: string[] = [
        ``,
        `========== Request ${this.requestId} ==========`,
        `${this.method} ${this.path} -> ${statusCode}`,
        `Total: ${totalTime.toFixed(2)}ms`,
        ``,
        `Timeline:`,
      ];

      this.marks.forEach((mark, i) => {
        const delta = i > 0 ? mark.time - this.marks[i - 1].time : 0;
        lines.push(`  [${mark.elapsed.toFixed(2)}ms] ${mark.name} (+${delta.toFixed(2)}ms)`);
      });

      lines.push(`${'='.repeat(50)}`);
      appendLog(this.logFile, lines.join('\n'));
    }

    // 控制台输出（简化版）
    console.log(
      `[TIMING] ${this.requestId.slice(0, 8)} | ${this.method} ${this.path} -> ${statusCode} | ${totalTime.toFixed(0)}ms`
    );
    for (let i = 1; i < this.marks.length; i++) {
      const delta = this.marks[i].time - this.marks[i - 1].time;
      if (delta > 1) {
        // 只显示 > 1ms 的阶段
        console.log(`         -> ${this.marks[i].name}: ${delta.toFixed(0)}ms`);
      }
    }
  }
}

/**
 * 清空日志文件
 */
export function clearTimingLog(file: string): void {
  fs.mkdirSync(path.dirname(file), { recursive: true });
  fs.writeFileSync(file, `=== Timing Log Started at ${timestamp()} ===\n`);
  console.log(`[LOG] Timing log: ${file}`);
}
