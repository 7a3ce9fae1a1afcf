import { AsyncLocalStorage } from 'async_hooks';

export interface FormatOptions {
  defaultMinify: boolean;
  prettySpaces: number;
}

const MAX_PRETTY_SPACES = 10;

function readFlag(value: string | undefined, fallback: boolean): boolean {
  if (value === undefined) return fallback;
  return ['1', 'true', 'yes', 'on'].includes(value.trim().toLowerCase());
}

function readSpaces(value: string | undefined, fallback: number): number {
  const parsed = value === undefined ? Number.NaN : Number.parseInt(value, 10);
  return Number.isInteger(parsed) && parsed >= 0 ? Math.min(parsed, MAX_PRETTY_SPACES) : fallback;
}

// Amounts are bigint end to end; JSON carries them as decimal strings.
function encodeBigints(_key: string, value: unknown): unknown {
  return typeof value === 'bigint' ? value.toString() : value;
}

/**
 * JSON rendering for every tool and resource response. A per-call minify
 * override applies to everything formatted inside `runWithMinifyOverride`.
 */
export class ResponseFormatter {
  private options: FormatOptions;
  private readonly overrides = new AsyncLocalStorage<{ minify: boolean }>();

  constructor() {
    this.options = {
      defaultMinify: readFlag(process.env['REPORTING_MCP_MINIFY_OUTPUT'], true),
      prettySpaces: readSpaces(process.env['REPORTING_MCP_PRETTY_SPACES'], 2),
    };
  }

  configure(options?: Partial<FormatOptions>): void {
    if (!options) return;
    const { defaultMinify, prettySpaces } = options;
    if (typeof defaultMinify === 'boolean') {
      this.options.defaultMinify = defaultMinify;
    }
    if (typeof prettySpaces === 'number' && Number.isInteger(prettySpaces) && prettySpaces >= 0) {
      this.options.prettySpaces = Math.min(prettySpaces, MAX_PRETTY_SPACES);
    }
  }

  getOptions(): FormatOptions {
    return { ...this.options };
  }

  runWithMinifyOverride<T>(minify: boolean | undefined, fn: () => T): T {
    return minify === undefined ? fn() : this.overrides.run({ minify }, fn);
  }

  format(value: unknown): string {
    const minify = this.overrides.getStore()?.minify ?? this.options.defaultMinify;
    return minify
      ? JSON.stringify(value, encodeBigints)
      : JSON.stringify(value, encodeBigints, this.options.prettySpaces);
  }
}

export const responseFormatter = new ResponseFormatter();
