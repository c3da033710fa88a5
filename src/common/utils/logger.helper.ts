import { Logger } from '@nestjs/common';

type StatsLogger = Pick<Logger, 'log' | 'warn'>;

function formatContext(context: unknown): string {
  if (context === undefined) return '';
  return ` (${typeof context === 'object' ? JSON.stringify(context) : String(context)})`;
}

export class LoggerHelper {
  static logWarning(
    logger: StatsLogger,
    operation: string,
    reason: string,
    context?: unknown,
  ): void {
    logger.warn(`${operation} 경고: ${reason}${formatContext(context)}`);
  }

  static logStats(
    logger: StatsLogger,
    operation: string,
    stats: Record<string, number | string>,
    processingTime?: number,
  ): void {
    const statsEntries = Object.entries(stats).map(
      ([key, value]) => `${key}: ${value}`,
    );
    const timeStr = processingTime !== undefined ? ` - ${processingTime}ms` : '';
    logger.log(`${operation} 통계: ${statsEntries.join(', ')}${timeStr}`);
  }
}
