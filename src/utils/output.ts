/**
 * Output utilities for CLI
 */

import { AttributeEngineError, ValidationError } from '../errors.js';

export interface OutputOptions {
  json?: boolean;
  verbose?: boolean;
}

let globalOptions: OutputOptions = {};

export function setOutputOptions(options: OutputOptions): void {
  globalOptions = { ...globalOptions, ...options };
}

export function getOutputOptions(): OutputOptions {
  return globalOptions;
}

export function output(data: unknown, humanReadable?: string): void {
  if (globalOptions.json) {
    console.log(JSON.stringify(data, null, 2));
  } else {
    console.log(humanReadable ?? String(data));
  }
}

export function outputError(message: string, error?: Error): void {
  if (globalOptions.json) {
    console.error(JSON.stringify({
      error: message,
      details: error?.message,
    }));
  } else {
    console.error(`Error: ${message}`);
    if (error && globalOptions.verbose) {
      console.error(error.stack);
    }
  }
}

/**
 * Lines describing an engine error for a terminal. A multi-attribute
 * ValidationError gets one line per attribute, labelled when possible.
 */
export function describeFailure(error: AttributeEngineError, verbose = false): string[] {
  const lines = [`Error: ${error.userMessage}`];
  if (error instanceof ValidationError && error.issues.length > 1) {
    for (const issue of error.issues) {
      lines.push(`  - ${issue.label ?? issue.attributeName}: ${issue.messages.join(' ')}`);
    }
  }
  if (verbose) {
    lines.push(JSON.stringify(error.context, null, 2));
  }
  return lines;
}

/**
 * Report a failed command. Engine errors print their user message, or their
 * toJSON() form with --json; anything else goes through outputError.
 */
export function outputFailure(message: string, error: unknown): void {
  if (!(error instanceof AttributeEngineError)) {
    outputError(message, error instanceof Error ? error : undefined);
    return;
  }

  if (globalOptions.json) {
    console.error(JSON.stringify(error.toJSON()));
    return;
  }

  for (const line of describeFailure(error, globalOptions.verbose)) {
    console.error(line);
  }
}

export function outputSuccess(message: string, data?: unknown): void {
  if (!globalOptions.json) {
    console.log(`✓ ${message}`);
    return;
  }
  console.log(JSON.stringify(data === undefined ? { success: true, message } : { success: true, message, data }));
}

/** Column-aligned text table: header, rule, then one line per row */
export function formatTable(headers: string[], rows: string[][]): string[] {
  const widths = headers.map((header, i) => Math.max(header.length, ...rows.map(row => (row[i] ?? '').length)));
  const format = (cells: string[]): string => widths.map((width, i) => (cells[i] ?? '').padEnd(width)).join('  ').trimEnd();

  const headerLine = format(headers);
  return [headerLine, '-'.repeat(headerLine.length), ...rows.map(format)];
}

export function outputTable(headers: string[], rows: string[][]): void {
  if (globalOptions.json) {
    const records = rows.map(row => Object.fromEntries(headers.map((header, i) => [header, row[i] ?? ''])));
    console.log(JSON.stringify(records, null, 2));
    return;
  }

  for (const line of formatTable(headers, rows)) {
    console.log(line);
  }
}
