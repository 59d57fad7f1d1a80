/**
 * Safe filter literals.
 *
 * Every piece of text that ends up inside a filter chain or graph is a
 * `SafeText`. Only this module can mint one: either by escaping a raw value
 * with `escapeFilterValue()`, or through the `filter` tag, whose static parts
 * are handler source code and whose interpolations must already be safe
 * (another `SafeText` or a number). A raw string cannot be spliced in.
 */
import { CompileInvariantViolation } from '../shared/errors.js';

const mint = Symbol('safe-text');

export class SafeText {
  private readonly value: string;

  constructor(key: typeof mint, value: string) {
    if (key !== mint) {
      throw new CompileInvariantViolation('SafeText can only be created by the escaping module');
    }
    this.value = value;
  }

  get text(): string {
    return this.value;
  }

  get isEmpty(): boolean {
    return this.value.length === 0;
  }

  toString(): string {
    return this.value;
  }

  toJSON(): string {
    return this.value;
  }
}

export type FilterPart = SafeText | number;

// Order matters: backslash first, so later substitutions are never re-escaped.
const ESCAPE_RULES: ReadonlyArray<{ from: string; to: string }> = [
  { from: '\\', to: '\\\\' },
  { from: "'", to: "\\'" },
  { from: ':', to: '\\:' },
  { from: ';', to: '\\;' },
  { from: '%', to: '%%' },
  { from: ',', to: '\\,' },
  { from: '[', to: '\\[' },
  { from: ']', to: '\\]' },
];

export function escapeFilterString(raw: string): string {
  if (typeof raw !== 'string') {
    throw new CompileInvariantViolation(`escaper invoked on a ${typeof raw} value`);
  }
  let out = raw;
  for (const { from, to } of ESCAPE_RULES) {
    out = out.split(from).join(to);
  }
  return out;
}

/** The one way an untrusted string becomes filter text. */
export function escapeFilterValue(raw: string): SafeText {
  return new SafeText(mint, escapeFilterString(raw));
}

/**
 * Integral numbers print without a fraction, everything else as the shortest
 * round-trip decimal.
 */
export function formatNumber(n: number): string {
  assertFinite(n);
  return String(n);
}

/**
 * Float rendering: integral values keep a trailing `.0` (25 -> "25.0").
 */
export function formatFloat(n: number): string {
  assertFinite(n);
  if (Number.isInteger(n) && Math.abs(n) < 1e16) return n.toFixed(1);
  return String(n);
}

function assertFinite(n: number): void {
  if (!Number.isFinite(n)) {
    throw new CompileInvariantViolation(`non-finite number in filter text: ${n}`);
  }
}

function renderPart(part: FilterPart): string {
  return typeof part === 'number' ? formatNumber(part) : part.text;
}

/** Tagged template for filter text. */
export function filter(strings: TemplateStringsArray, ...parts: FilterPart[]): SafeText {
  let out = strings[0] ?? '';
  parts.forEach((part, i) => {
    out += renderPart(part) + (strings[i + 1] ?? '');
  });
  return new SafeText(mint, out);
}

export function float(n: number): SafeText {
  return new SafeText(mint, formatFloat(n));
}

export function fixed(n: number, digits: number): SafeText {
  assertFinite(n);
  return new SafeText(mint, n.toFixed(digits));
}

export function joinFilters(parts: readonly FilterPart[], separator: ',' | ';' | ':' | '|' | '' = ','): SafeText {
  return new SafeText(mint, parts.map(renderPart).join(separator));
}

export const EMPTY = new SafeText(mint, '');

const TEMPLATE_PLACEHOLDER = /\{([A-Za-z_][A-Za-z0-9_]*)\}/g;

/**
 * Fill a skill template. The template text comes from a loaded skill
 * definition and is trusted like handler source; every substituted value must
 * already be safe.
 */
export function renderTemplate(template: string, values: Readonly<Record<string, FilterPart>>): SafeText {
  const out = template.replace(TEMPLATE_PLACEHOLDER, (_match, name: string) => {
    const part = values[name];
    if (part === undefined) {
      throw new CompileInvariantViolation(`template placeholder '{${name}}' has no value`);
    }
    return renderPart(part);
  });
  return new SafeText(mint, out);
}
