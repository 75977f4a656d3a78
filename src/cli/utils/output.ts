/**
 * Output formatting utilities for CLI
 */

import chalk from 'chalk';

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
  warning: '⚠'
};

type Details = Record<string, unknown>;

/**
 * Output formatter class
 */
export class OutputFormatter {
  private format: OutputFormat;

  constructor(format: OutputFormat = OutputFormat.HUMAN) {
    this.format = format;
  }

  /**
   * Outputs success message
   */
  success(message: string, data?: Details): void {
    if (this.format === OutputFormat.JSON) {
      this.json({ status: 'success', message, ...data });
    } else {
      console.log(`${chalk.green(symbols.success)} ${message}`);
      if (data) {
        this.details(data);
      }
    }
  }

  /**
   * Outputs error message
   */
  error(message: string, error?: Error & { code?: string }): void {
    if (this.format === OutputFormat.JSON) {
      this.json({
        status: 'error',
        message,
        error: error ? {
          name: error.name,
          code: error.code,
          message: error.message
        } : undefined
      });
    } else {
      console.error(`${chalk.red(symbols.error)} ${chalk.red(message)}`);
      if (error) {
        console.error(`  ${chalk.dim(error.message)}`);
      }
    }
  }

  /**
   * Outputs warning message
   */
  warning(message: string, details?: Details): void {
    if (this.format === OutputFormat.JSON) {
      this.json({ status: 'warning', message, ...details });
    } else {
      console.warn(`${chalk.yellow(symbols.warning)} ${chalk.yellow(message)}`);
      if (details) {
        this.details(details);
      }
    }
  }

  /**
   * Outputs a table
   */
  table(headers: string[], rows: Array<Array<string | number>>): void {
    if (this.format === OutputFormat.JSON) {
      const data = rows.map(row =>
        Object.fromEntries(headers.map((header, i) => [header, row[i]]))
      );
      this.json({ type: 'table', headers, data });
    } else {
      // Calculate column widths
      const widths = headers.map((h, i) => {
        const values = [h, ...rows.map(r => String(r[i] ?? ''))];
        return Math.max(...values.map(v => v.length));
      });

      const headerRow = headers.map((h, i) => h.padEnd(widths[i])).join(' │ ');
      console.log(chalk.bold(headerRow));

      const separator = widths.map(w => '─'.repeat(w)).join('─┼─');
      console.log(chalk.dim(separator));

      for (const row of rows) {
        const rowStr = row.map((cell, i) =>
          String(cell).padEnd(widths[i])
        ).join(' │ ');
        console.log(rowStr);
      }
    }
  }

  /**
   * Outputs raw JSON
   */
  private json(data: unknown): void {
    console.log(JSON.stringify(data, null, 2));
  }

  /**
   * Outputs details (key-value pairs)
   */
  private details(data: Details): void {
    for (const [key, value] of Object.entries(data)) {
      const formattedKey = key.replace(/_/g, ' ').replace(/\b\w/g, l => l.toUpperCase());
      const formattedValue = typeof value === 'object' && value !== null ? JSON.stringify(value) : String(value);
      console.log(`  ${chalk.dim(formattedKey + ':')} ${formattedValue}`);
    }
  }

  isJson(): boolean {
    return this.format === OutputFormat.JSON;
  }
}
