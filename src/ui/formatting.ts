/**
 * Low-level formatting helpers shared by every formatter.
 */

// ============================================================================
// Output Formatter Class
// ============================================================================

/**
 * Chainable builder for multi-line console output.
 */
export class OutputFormatter {
  private lines: string[] = [];

  text(content: string): this {
    this.lines.push(content);
    return this;
  }

  blank(): this {
    this.lines.push('');
    return this;
  }

  list(items: string[], indent: number = 2): this {
    const prefix = ' '.repeat(indent);
    items.forEach((item) => this.lines.push(prefix + item));
    return this;
  }

  section(title: string, items: string[], indent: number = 2): this {
    this.lines.push(title);
    return this.list(items, indent);
  }

  separator(char: string = '━', width: number = 50): this {
    this.lines.push(char.repeat(width));
    return this;
  }

  keyValue(key: string, value: string, keyWidth?: number): this {
    const formatted = keyWidth ? `${key}:`.padEnd(keyWidth) + value : `${key}: ${value}`;
    this.lines.push(formatted);
    return this;
  }

  keyValueList(pairs: Array<[string, string]>, keyWidth?: number): this {
    const width = keyWidth ?? Math.max(...pairs.map(([k]) => k.length)) + 2;
    pairs.forEach(([key, value]) => this.keyValue(key, value, width));
    return this;
  }

  build(): string {
    return this.lines.join('\n');
  }
}

// ============================================================================
// Text Utilities
// ============================================================================

/**
 * Join the truthy lines with newlines; null, undefined and false are skipped.
 */
export function joinLines(...lines: Array<string | null | undefined | false>): string {
  return lines
    .filter((line): line is string => line !== undefined && line !== null && line !== false)
    .join('\n');
}

export function pluralize(count: number, singular: string, plural?: string): string {
  const word = count === 1 ? singular : (plural ?? singular + 's');
  return `${count} ${word}`;
}

// ============================================================================
// Number Formatting
// ============================================================================

/**
 * @example
 * ```typescript
 * formatDuration(450)    // '450ms'
 * formatDuration(1500)   // '1.5s'
 * formatDuration(125000) // '2m 5s'
 * ```
 */
export function formatDuration(ms: number): string {
  const rounded = Math.round(ms);
  const seconds = Math.floor(rounded / 1000);
  const minutes = Math.floor(seconds / 60);
  if (minutes > 0) {
    const remainingSeconds = seconds % 60;
    return remainingSeconds > 0 ? `${minutes}m ${remainingSeconds}s` : `${minutes}m`;
  }
  if (seconds > 0) {
    return rounded % 1000 >= 100 ? `${(rounded / 1000).toFixed(1)}s` : `${seconds}s`;
  }
  return `${rounded}ms`;
}

/**
 * @example
 * ```typescript
 * formatBytes(512)     // '512 B'
 * formatBytes(2048)    // '2.0 KiB'
 * formatBytes(1048576) // '1.0 MiB'
 * ```
 */
export function formatBytes(bytes: number): string {
  if (bytes < 1024) {
    return `${bytes} B`;
  }
  if (bytes < 1024 * 1024) {
    return `${(bytes / 1024).toFixed(1)} KiB`;
  }
  return `${(bytes / (1024 * 1024)).toFixed(1)} MiB`;
}

export function formatPercent(ratio: number): string {
  return `${(ratio * 100).toFixed(1)}%`;
}

export function formatRate(perSecond: number): string {
  return `${perSecond.toFixed(1)} msg/s`;
}

export function formatMs(ms: number): string {
  return `${ms.toFixed(2)}ms`;
}
