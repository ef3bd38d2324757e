// packages/core/src/logger.ts
import { pino, type Logger } from 'pino';

export type { Logger };

export const logger: Logger = pino({
  name: 'docquery',
  level: process.env.LOG_LEVEL ?? 'info'
});

export function childLogger(component: string, parent: Logger = logger): Logger {
  return parent.child({ component });
}

// Request/schema text is logged as a short preview plus its length. Cuts on code points.
export function preview(text: string, max = 100): string {
  const chars = Array.from(text);
  return chars.length > max ? `${chars.slice(0, max).join('')}...` : text;
}
