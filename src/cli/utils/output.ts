/**
 * Output formatting utilities for CLI
 */

import chalk from 'chalk';
import ora, { type Ora } from 'ora';
import { statusFor, toErrorBody } from '../../lib/errors.js';

/**
 * Output format types
 */
export enum OutputFormat {
  HUMAN = 'human',
  JSON = 'json'
}

/**
 * Symbols for terminal output
 */
const symbols = {
  success: '✓',
  error: '✗',
  warning: '⚠',
  info: 'ℹ',
  bullet: '•'
};

type Cell = string | number | boolean | null | undefined;

/**
 * Output formatter class
 */
export class OutputFormatter {
  private quiet = false;

  constructor(private format: OutputFormat = OutputFormat.HUMAN) {}

  /**
   * Outputs success message
   */
  success(message: string, data?: Record<string, Cell>): void {
    if (this.format === OutputFormat.JSON) {
      this.json({ status: 'success', message, ...data });
      return;
    }
    if (this.quiet) return;

    console.log(`${chalk.green(symbols.success)} ${message}`);
    if (data) {
      this.details(data);
    }
  }

  /**
   * Outputs error message; always printed, quiet or not
   */
  error(message: string, error?: unknown): void {
    if (this.format === OutputFormat.JSON) {
      this.json({
        status: 'error',
        message,
        error: error === undefined ? undefined : { ...toErrorBody(error), status: statusFor(error) }
      });
      return;
    }

    console.error(`${chalk.red(symbols.error)} ${chalk.red(message)}`);
    if (error !== undefined) {
      const body = toErrorBody(error);
      console.error(`  ${chalk.dim(body.error)}`);
      if (body.details) {
        console.error(`  ${chalk.dim(body.details)}`);
      }
    }
  }

  /**
   * Outputs warning message
   */
  warning(message: string, details?: Record<string, Cell>): void {
    if (this.format === OutputFormat.JSON) {
      this.json({ status: 'warning', message, ...details });
      return;
    }
    if (this.quiet) return;

    console.warn(`${chalk.yellow(symbols.warning)} ${chalk.yellow(message)}`);
    if (details) {
      this.details(details);
    }
  }

  /**
   * Outputs info message
   */
  info(message: string, details?: Record<string, Cell>): void {
    if (this.format === OutputFormat.JSON) {
      this.json({ status: 'info', message, ...details });
      return;
    }
    if (this.quiet) return;

    console.log(`${chalk.blue(symbols.info)} ${message}`);
    if (details) {
      this.details(details);
    }
  }

  /**
   * Outputs a table
   */
  table(headers: string[], rows: Cell[][]): void {
    if (this.format === OutputFormat.JSON) {
      const data = rows.map((row) =>
        Object.fromEntries(headers.map((header, i) => [header, row[i] ?? null]))
      );
      this.json({ type: 'table', headers, data });
      return;
    }

    const widths = headers.map((h, i) => {
      const values = [h, ...rows.map((r) => String(r[i] ?? ''))];
      return Math.max(...values.map((v) => v.length));
    });

    console.log(chalk.bold(headers.map((h, i) => h.padEnd(widths[i] ?? 0)).join(' │ ')));
    console.log(chalk.dim(widths.map((w) => '─'.repeat(w)).join('─┼─')));

    for (const row of rows) {
      console.log(row.map((cell, i) => String(cell ?? '').padEnd(widths[i] ?? 0)).join(' │ '));
    }
  }

  /**
   * Outputs a list
   */
  list(items: string[], ordered: boolean = false): void {
    if (this.format === OutputFormat.JSON) {
      this.json({ type: 'list', items, ordered });
      return;
    }

    items.forEach((item, i) => {
      const prefix = ordered ? `${i + 1}.` : symbols.bullet;
      console.log(`  ${chalk.dim(prefix)} ${item}`);
    });
  }

  /**
   * Print a command result: the raw value under --json, otherwise `render()`
   */
  result(data: unknown, render: () => void): void {
    if (this.format === OutputFormat.JSON) {
      this.json(data);
    } else {
      render();
    }
  }

  /**
   * Outputs raw JSON
   */
  json(data: unknown): void {
    console.log(JSON.stringify(data, null, 2));
  }

  /**
   * Start a spinner on stderr; null under --json, --quiet or without a TTY
   */
  spinner(text: string): Ora | null {
    if (this.format === OutputFormat.JSON || this.quiet || !process.stderr.isTTY) {
      return null;
    }
    return ora({ text, color: 'cyan' }).start();
  }

  /**
   * Outputs details (key-value pairs)
   */
  private details(data: Record<string, Cell>): void {
    for (const [key, value] of Object.entries(data)) {
      const formattedKey = key.replace(/_/g, ' ').replace(/\b\w/g, (l) => l.toUpperCase());
      console.log(`  ${chalk.dim(formattedKey + ':')} ${String(value ?? '')}`);
    }
  }

  /**
   * Sets output format
   */
  setFormat(format: OutputFormat): void {
    this.format = format;
  }

  /**
   * Gets output format
   */
  getFormat(): OutputFormat {
    return this.format;
  }

  /**
   * Suppress info, success and warning lines
   */
  setQuiet(quiet: boolean): void {
    this.quiet = quiet;
  }
}

/**
 * Default output formatter instance
 */
export const output = new OutputFormatter();
