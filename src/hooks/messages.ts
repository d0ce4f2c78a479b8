/**
 * Turning tool output into hook messages
 */

import type { HookMessage, MessageType, ResultStatus } from '../types/index.js';

/**
 * Non-empty lines of a captured output stream
 */
export function outputLines(output: Buffer | string): string[] {
  const text = typeof output === 'string' ? output : output.toString('utf-8');
  return text.split(/\r?\n/).filter((line) => line.trim().length > 0);
}

/**
 * Build messages from output lines using a pattern with named groups.
 *
 * Recognised groups: `file`, `line` and `type`. Without a categorizer every
 * message is an error.
 *
 * @throws Error when a line does not match, since the hook cannot report
 *   something it does not understand
 */
export function extractMessages(
  lines: string[],
  pattern: RegExp,
  categorize?: (type: string | undefined) => MessageType,
): HookMessage[] {
  return lines.map((line) => {
    const groups = pattern.exec(line)?.groups;
    if (!groups) {
      throw new Error(
        `Unexpected output: unable to determine line number or type of error/warning for output:\n${line}`,
      );
    }

    const lineNumber = groups.line !== undefined ? Number.parseInt(groups.line, 10) : undefined;
    return {
      type: categorize ? categorize(groups.type) : 'error',
      file: groups.file,
      line: lineNumber,
      content: line,
    };
  });
}

export function statusForMessages(messages: HookMessage[]): ResultStatus {
  if (messages.some((message) => message.type === 'error')) {
    return 'fail';
  }
  if (messages.some((message) => message.type === 'warning')) {
    return 'warn';
  }
  return 'pass';
}

export function formatMessages(messages: HookMessage[]): string {
  return messages.map((message) => message.content).join('\n');
}
