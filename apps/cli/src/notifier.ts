import { APP_NAME } from '@folioforge/core';
import type { NotificationKind, Notifier } from './orchestrator/types.js';

const RULE = '='.repeat(60);

export function formatBanner(lines: string[]): string {
  return [RULE, ...lines.map((line) => `  ${line}`), RULE].join('\n');
}

/** Terminal stand-in for a desktop notification. */
export class ConsoleNotifier implements Notifier {
  constructor(private readonly write: (text: string) => void = (text) => console.log(text)) {}

  banner(subtitle: string): void {
    this.write(formatBanner([APP_NAME, subtitle]));
  }

  notify(kind: NotificationKind, message: string): void {
    const title = kind === 'success' ? 'SUCCESS: portfolio generated' : 'FAILED';
    this.write(formatBanner([title, '', ...message.split('\n')]));
  }
}
